/**
 * Interactive selection over the orphan list.
 *
 * `transition` is pure: it takes a state and a command and returns a new
 * state plus an optional notice for the operator. `runInteractiveSession` is
 * the console shell around it.
 */

import * as readline from "readline/promises";
import type { Candidate } from "./classifier.js";

export const CONFIRMATION_TOKEN = "DELETE";

export type SessionPhase = "reviewing" | "confirming-delete" | "done";

export interface SessionItem {
  readonly candidate: Candidate;
  readonly selected: boolean;
}

export interface SessionState {
  readonly phase: SessionPhase;
  readonly items: readonly SessionItem[];
  /** Frozen when the session ends; empty after a quit. */
  readonly deletionSet: readonly Candidate[];
}

export type SessionCommand =
  | { type: "toggle"; index: number }
  | { type: "select-all" }
  | { type: "select-none" }
  | { type: "show" }
  | { type: "request-delete" }
  | { type: "quit" }
  | { type: "confirm"; input: string };

export type SessionNotice =
  | { type: "invalid-index"; index: number; max: number }
  | { type: "nothing-selected" }
  | { type: "awaiting-confirmation" }
  | { type: "cancelled" }
  | { type: "not-allowed"; command: SessionCommand["type"]; phase: SessionPhase }
  | { type: "unknown-input"; input: string };

export interface TransitionResult {
  state: SessionState;
  notice?: SessionNotice;
}

export function createSession(orphans: readonly Candidate[]): SessionState {
  return {
    phase: "reviewing",
    items: orphans
      .filter((c) => c.classification.kind === "orphan")
      .map((candidate) => ({ candidate, selected: true })),
    deletionSet: [],
  };
}

export function selectedItems(state: SessionState): Candidate[] {
  return state.items.filter((i) => i.selected).map((i) => i.candidate);
}

export function selectedCount(state: SessionState): number {
  return state.items.reduce((n, i) => n + (i.selected ? 1 : 0), 0);
}

export function selectedSize(state: SessionState): number {
  return state.items.reduce((sum, i) => sum + (i.selected ? i.candidate.sizeBytes : 0), 0);
}

function withSelection(state: SessionState, pick: (item: SessionItem, index: number) => boolean): SessionState {
  return { ...state, items: state.items.map((item, i) => ({ candidate: item.candidate, selected: pick(item, i) })) };
}

export function transition(state: SessionState, command: SessionCommand): TransitionResult {
  if (state.phase === "done") {
    return { state, notice: { type: "not-allowed", command: command.type, phase: state.phase } };
  }

  if (state.phase === "confirming-delete") {
    if (command.type === "confirm" && command.input === CONFIRMATION_TOKEN) {
      return { state: { ...state, phase: "done", deletionSet: selectedItems(state) } };
    }
    return { state: { ...state, phase: "reviewing" }, notice: { type: "cancelled" } };
  }

  switch (command.type) {
    case "toggle": {
      const max = state.items.length;
      if (!Number.isInteger(command.index) || command.index < 1 || command.index > max) {
        return { state, notice: { type: "invalid-index", index: command.index, max } };
      }
      const target = command.index - 1;
      return { state: withSelection(state, (item, i) => (i === target ? !item.selected : item.selected)) };
    }
    case "select-all":
      return { state: withSelection(state, () => true) };
    case "select-none":
      return { state: withSelection(state, () => false) };
    case "show":
      return { state };
    case "request-delete":
      if (selectedCount(state) === 0) {
        return { state, notice: { type: "nothing-selected" } };
      }
      return { state: { ...state, phase: "confirming-delete" }, notice: { type: "awaiting-confirmation" } };
    case "quit":
      return { state: { ...state, phase: "done", deletionSet: [] } };
    case "confirm":
      return { state, notice: { type: "not-allowed", command: command.type, phase: state.phase } };
  }
}

/**
 * Reviewing-phase input: a bare number or "t <n>" toggles, a/n select all or
 * none, s shows, d asks to delete, q quits. Returns null for anything else.
 */
export function parseCommand(line: string): SessionCommand | null {
  const input = line.trim().toLowerCase();
  if (/^\d+$/.test(input)) return { type: "toggle", index: parseInt(input, 10) };

  const toggle = /^t(?:oggle)?\s+(\d+)$/.exec(input);
  if (toggle) return { type: "toggle", index: parseInt(toggle[1], 10) };

  switch (input) {
    case "a":
    case "all":
      return { type: "select-all" };
    case "n":
    case "none":
      return { type: "select-none" };
    case "s":
    case "show":
    case "":
      return { type: "show" };
    case "d":
    case "delete":
      return { type: "request-delete" };
    case "q":
    case "quit":
      return { type: "quit" };
    default:
      return null;
  }
}

/**
 * Auto mode: every orphan is selected and becomes the deletion set without a prompt.
 */
export function autoSelect(candidates: readonly Candidate[]): Candidate[] {
  const orphans = candidates.filter((c) => c.classification.kind === "orphan");
  for (const c of orphans) c.selected = true;
  return orphans;
}

export interface SessionIO {
  prompt(question: string): Promise<string>;
  render(state: SessionState, notice?: SessionNotice): void;
}

export function consoleSessionIO(render: SessionIO["render"]): SessionIO & { close(): void } {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  return {
    prompt: (question) => rl.question(question),
    render,
    close: () => rl.close(),
  };
}

/**
 * Drives the state machine from operator input until it reaches `done`.
 * The returned deletion set is empty when the operator quits. `selected` on
 * each candidate is synced to the final state.
 */
export async function runInteractiveSession(orphans: readonly Candidate[], io: SessionIO): Promise<Candidate[]> {
  let state = createSession(orphans);
  io.render(state);

  while (state.phase !== "done") {
    let command: SessionCommand | null;
    if (state.phase === "confirming-delete") {
      const answer = await io.prompt(`Type ${CONFIRMATION_TOKEN} to remove ${selectedCount(state)} folder(s): `);
      command = { type: "confirm", input: answer };
    } else {
      const line = await io.prompt("> ");
      command = parseCommand(line);
      if (!command) {
        io.render(state, { type: "unknown-input", input: line.trim() });
        continue;
      }
    }

    const result = transition(state, command);
    state = result.state;
    if (state.phase !== "done") io.render(state, result.notice);
  }

  for (const item of state.items) item.candidate.selected = item.selected;
  return [...state.deletionSet];
}
