import type { TransferStats } from "../types.js";

export function createStats(): TransferStats {
  return { total: 0, downloaded: 0, uploaded: 0, skipped: 0, failed: 0 };
}

export function formatSummary(stats: TransferStats, elapsedMs: number) {
  return [
    "Transfer summary:",
    `  Total files found: ${stats.total}`,
    `  Files downloaded: ${stats.downloaded}`,
    `  Files uploaded: ${stats.uploaded}`,
    `  Files skipped: ${stats.skipped}`,
    `  Files failed: ${stats.failed}`,
    `  Total time: ${(elapsedMs / 1000).toFixed(2)} seconds`,
  ];
}
