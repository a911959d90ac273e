import { describe, expect, it } from "vitest";
import { isAtLeast, parseSeverity, SEVERITIES, severityRank } from "../../severity.js";

describe("severity ordering", () => {
  it("should order trace < debug < info < warn < error", () => {
    const ranks = SEVERITIES.map(severityRank);
    expect(ranks).toEqual([0, 1, 2, 3, 4]);
  });

  it("should compare against a minimum", () => {
    expect(isAtLeast("error", "warn")).toBe(true);
    expect(isAtLeast("warn", "warn")).toBe(true);
    expect(isAtLeast("info", "warn")).toBe(false);
  });
});

describe("parseSeverity", () => {
  it("should parse names case-insensitively", () => {
    expect(parseSeverity("INFO")).toBe("info");
    expect(parseSeverity(" debug ")).toBe("debug");
    expect(parseSeverity("Warning")).toBe("warn");
  });

  it("should return undefined for unknown names", () => {
    expect(parseSeverity("fatal")).toBeUndefined();
    expect(parseSeverity("off")).toBeUndefined();
  });
});
