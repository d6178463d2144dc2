import { formatBytes } from '../render/format-size.js';
import type { MirrorReport } from './types.js';

/**
 * Render a mirror report as plain lines. Every failed path is listed with
 * its failure kind so a targeted re-run is possible.
 */
export function formatMirrorReport(report: MirrorReport): string[] {
  const bytesFetched = report.leaves.reduce((sum, leaf) => sum + leaf.bytesFetched, 0);
  const lines = [
    `Source: ${report.source || '(bucket root)'} -> ${report.localRoot}`,
    `Selected: ${report.selected}`,
    `Fetched: ${report.fetched}, Skipped: ${report.skipped}, Failed: ${report.failed}, Cancelled: ${report.cancelled}`,
    `Extracted: ${report.extracted}, Extraction failed: ${report.extractionFailed}`,
    `Transferred: ${formatBytes(bytesFetched)} in ${(report.durationMs / 1000).toFixed(1)}s`,
  ];

  for (const warning of report.warnings) {
    lines.push(`Warning: ${warning}`);
  }

  if (report.failures.length > 0) {
    lines.push('Failures:');
    for (const failure of report.failures) {
      lines.push(`  [${failure.kind}] ${failure.remotePath}: ${failure.message}`);
    }
  }

  return lines;
}
