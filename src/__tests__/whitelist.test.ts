import { describe, it, expect } from "vitest";
import { createWhitelist, isWhitelisted, loadBaselineWhitelist } from "../lib/whitelist.js";

describe("Whitelist Module", () => {
  it("should ship a baseline of known vendor and system names", () => {
    const baseline = loadBaselineWhitelist();
    expect(baseline.length).toBeGreaterThanOrEqual(40);
    expect(baseline).toContain("Microsoft");
  });

  it("should include the baseline by default", () => {
    expect(isWhitelisted(createWhitelist(), "microsoft")).toBe(true);
  });

  it("should fold case of both the list and the lookup", () => {
    const whitelist = createWhitelist(["JetBrains"], []);
    expect(isWhitelisted(whitelist, "JETBRAINS")).toBe(true);
    expect(isWhitelisted(whitelist, "jetbrains")).toBe(true);
    expect(isWhitelisted(whitelist, "JetBrainsToolbox")).toBe(false);
  });

  it("should merge additions with the baseline and drop blanks", () => {
    const whitelist = createWhitelist(["Zoom", "  ", "zoom"], ["Microsoft"]);
    expect([...whitelist].sort()).toEqual(["microsoft", "zoom"]);
  });
});
