import { describe, expect, it } from "vitest";
import { createStats, formatSummary } from "../src/transfer/stats.js";

describe("formatSummary", () => {
  it("lists found and transferred counts separately", () => {
    const stats = { ...createStats(), total: 3, downloaded: 2, uploaded: 1, skipped: 1, failed: 1 };

    expect(formatSummary(stats, 1234)).toEqual([
      "Transfer summary:",
      "  Total files found: 3",
      "  Files downloaded: 2",
      "  Files uploaded: 1",
      "  Files skipped: 1",
      "  Files failed: 1",
      "  Total time: 1.23 seconds",
    ]);
  });
});
