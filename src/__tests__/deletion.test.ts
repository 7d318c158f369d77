import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import type { Candidate } from "../lib/classifier.js";
import { clampConcurrency, executeDeletion } from "../lib/deletion.js";
import { categorizeDeletionError } from "../lib/errors.js";

const TEST_DIR = path.join(os.tmpdir(), "osweep-deletion-test");

function candidate(name: string, sizeBytes: number, dir = "/data"): Candidate {
  return { path: path.join(dir, name), name, sizeBytes, locationTag: "data", classification: { kind: "orphan" }, selected: true };
}

function fsError(code: string, message = `${code}: failed`) {
  return Object.assign(new Error(message), { code });
}

function delay(ms: number) {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

describe("Deletion Module", () => {
  describe("categorizeDeletionError", () => {
    it("should sort errors into locked, access-denied and other", () => {
      expect(categorizeDeletionError(fsError("EBUSY")).category).toBe("locked");
      expect(categorizeDeletionError(fsError("ETXTBSY")).category).toBe("locked");
      expect(categorizeDeletionError(fsError("EACCES")).category).toBe("access-denied");
      expect(categorizeDeletionError(fsError("EPERM")).category).toBe("access-denied");
      expect(categorizeDeletionError(fsError("ENOTEMPTY")).category).toBe("other");
      expect(categorizeDeletionError("weird")).toEqual({ category: "other", code: undefined, message: "weird" });
    });
  });

  describe("clampConcurrency", () => {
    it("should keep the pool between 1 and 16", () => {
      expect(clampConcurrency(undefined)).toBe(4);
      expect(clampConcurrency(0)).toBe(1);
      expect(clampConcurrency(100)).toBe(16);
      expect(clampConcurrency(2.7)).toBe(2);
      expect(clampConcurrency(NaN)).toBe(4);
    });
  });

  describe("executeDeletion", () => {
    it("should count only successful deletions toward calculated space", async () => {
      const items = [candidate("a", 100), candidate("b", 200), candidate("c", 300)];
      const result = await executeDeletion(items, {
        remove: async (p) => {
          if (p.endsWith("b")) throw fsError("EBUSY", "resource busy or locked");
        },
        freeSpace: () => null,
      });

      expect(result.deletedCount).toBe(2);
      expect(result.failedCount).toBe(1);
      expect(result.deletedSize).toBe(400);
      expect(result.failedNames).toEqual(["b"]);
      expect(result.failuresByCategory).toEqual({ "locked": 1, "access-denied": 0, "other": 0 });
      expect(result.outcomes[1]).toEqual({
        candidate: items[1],
        succeeded: false,
        failure: { category: "locked", code: "EBUSY", message: "resource busy or locked" },
      });
    });

    it("should keep going after a failure", async () => {
      const attempted: string[] = [];
      const items = [candidate("a", 1), candidate("b", 2), candidate("c", 3)];
      const result = await executeDeletion(items, {
        concurrency: 1,
        remove: async (p) => {
          attempted.push(path.basename(p));
          if (p.endsWith("a")) throw fsError("EACCES");
        },
        freeSpace: () => null,
      });

      expect(attempted).toEqual(["a", "b", "c"]);
      expect(result.deletedCount).toBe(2);
      expect(result.failuresByCategory["access-denied"]).toBe(1);
    });

    it("should report observed space separately from calculated space", async () => {
      const samples = [1000, 1600];
      const result = await executeDeletion([candidate("a", 500)], {
        remove: async () => {},
        freeSpace: () => samples.shift() ?? null,
      });

      expect(result.deletedSize).toBe(500);
      expect(result.observedFreedBytes).toBe(600);
    });

    it("should sample the parent folder of the first candidate by default", async () => {
      const sampled: string[] = [];
      await executeDeletion([candidate("a", 1, "/vol/apps")], {
        remove: async () => {},
        freeSpace: (p) => {
          sampled.push(p);
          return 0;
        },
      });
      expect(sampled).toEqual(["/vol/apps", "/vol/apps"]);
    });

    it("should leave observed space null when the volume can't be sampled", async () => {
      const result = await executeDeletion([candidate("a", 500)], {
        remove: async () => {},
        freeSpace: () => null,
      });
      expect(result.observedFreedBytes).toBeNull();
    });

    it("should touch nothing on a dry run", async () => {
      let removals = 0;
      const result = await executeDeletion([candidate("a", 10), candidate("b", 20)], {
        dryRun: true,
        remove: async () => {
          removals++;
        },
      });

      expect(removals).toBe(0);
      expect(result.dryRun).toBe(true);
      expect(result.deletedCount).toBe(2);
      expect(result.deletedSize).toBe(30);
      expect(result.observedFreedBytes).toBeNull();
    });

    it("should report outcomes in input order whatever the completion order", async () => {
      const delays: Record<string, number> = { a: 30, b: 5, c: 15 };
      const items = [candidate("a", 1), candidate("b", 2), candidate("c", 3)];
      const completed: string[] = [];
      const result = await executeDeletion(items, {
        concurrency: 3,
        remove: async (p) => {
          await delay(delays[path.basename(p)]);
        },
        freeSpace: () => null,
        onOutcome: (o) => completed.push(o.candidate.name),
      });

      expect(completed).toEqual(["b", "c", "a"]);
      expect(result.outcomes.map((o) => o.candidate.name)).toEqual(["a", "b", "c"]);
    });

    it("should never run more removals at once than the pool size", async () => {
      let active = 0;
      let peak = 0;
      const items = ["a", "b", "c", "d", "e"].map((n) => candidate(n, 1));
      await executeDeletion(items, {
        concurrency: 2,
        remove: async () => {
          active++;
          peak = Math.max(peak, active);
          await delay(5);
          active--;
        },
        freeSpace: () => null,
      });

      expect(peak).toBe(2);
    });

    it("should never remove candidates that aren't orphans", async () => {
      const removed: string[] = [];
      const matched: Candidate = { ...candidate("Steam", 50), classification: { kind: "matched", owner: "Steam" } };
      const result = await executeDeletion([matched, candidate("gone", 10)], {
        remove: async (p) => {
          removed.push(p);
        },
        freeSpace: () => null,
      });

      expect(removed).toEqual([path.join("/data", "gone")]);
      expect(result.deletedCount).toBe(1);
      expect(result.outcomes.map((o) => o.candidate.name)).toEqual(["gone"]);
    });

    it("should remove a nested orphan only through its selected ancestor", async () => {
      const removed: string[] = [];
      const outer = candidate("share", 4096);
      const inner = candidate(path.join("share", "LeftoverApp"), 4096);
      const result = await executeDeletion([inner, outer], {
        remove: async (p) => {
          removed.push(p);
        },
        freeSpace: () => null,
      });

      expect(removed).toEqual([path.join("/data", "share")]);
      expect(result.deletedCount).toBe(1);
      expect(result.deletedSize).toBe(4096);
    });

    it("should handle an empty selection", async () => {
      const result = await executeDeletion([]);
      expect(result.deletedCount).toBe(0);
      expect(result.failedCount).toBe(0);
      expect(result.deletedSize).toBe(0);
      expect(result.observedFreedBytes).toBeNull();
    });

    describe("on disk", () => {
      beforeEach(() => {
        if (fs.existsSync(TEST_DIR)) {
          fs.rmSync(TEST_DIR, { recursive: true });
        }
        fs.mkdirSync(TEST_DIR, { recursive: true });
      });

      afterEach(() => {
        if (fs.existsSync(TEST_DIR)) {
          fs.rmSync(TEST_DIR, { recursive: true });
        }
      });

      it("should remove whole folders", async () => {
        for (const name of ["one", "two"]) {
          fs.mkdirSync(path.join(TEST_DIR, name, "nested"), { recursive: true });
          fs.writeFileSync(path.join(TEST_DIR, name, "nested", "file.bin"), "x".repeat(64));
        }
        fs.mkdirSync(path.join(TEST_DIR, "keep"));

        const result = await executeDeletion([candidate("one", 64, TEST_DIR), candidate("two", 64, TEST_DIR)]);

        expect(result.deletedCount).toBe(2);
        expect(result.deletedSize).toBe(128);
        expect(fs.existsSync(path.join(TEST_DIR, "one"))).toBe(false);
        expect(fs.existsSync(path.join(TEST_DIR, "two"))).toBe(false);
        expect(fs.existsSync(path.join(TEST_DIR, "keep"))).toBe(true);
        expect(typeof result.observedFreedBytes).toBe("number");
      });

      it("should report a folder that is already gone as a failure", async () => {
        const result = await executeDeletion([candidate("vanished", 64, TEST_DIR)], { freeSpace: () => null });

        expect(result.deletedCount).toBe(0);
        expect(result.deletedSize).toBe(0);
        expect(result.failedNames).toEqual(["vanished"]);
        expect(result.outcomes[0].failure?.code).toBe("ENOENT");
        expect(result.failuresByCategory.other).toBe(1);
      });
    });
  });
});
