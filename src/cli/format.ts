/**
 * Human-readable console output for the CLI.
 *
 * @module cli/format
 */

import type { LedgerStats } from '@/types/digest';
import type { RunProgress, RunReport } from '@/services/pipeline';

const RULE = '═'.repeat(60);

export function formatReport(report: RunReport): string {
  const lines = [
    RULE,
    `  Digest run: ${report.profile}${report.force ? ' (forced)' : ''}${report.aborted ? ' (aborted)' : ''}`,
    RULE,
    `  Candidates:          ${report.candidates}`,
    `  Already processed:   ${report.alreadyProcessed}`,
    `  Fetch failures:      ${report.fetchFailures}`,
    `  Content skips:       ${report.contentSkips}`,
    `  Extracted (full):    ${report.extractedFull}`,
    `  Extracted (fallback): ${report.extractedFallback}`,
    `  Carried over:        ${report.carriedOver}`,
    `  Digest:              ${report.digestId ?? 'none'}`,
  ];

  if (report.artifactPath) {
    lines.push(`  Document:            ${report.artifactPath}`);
  }

  lines.push(
    `  Delivery:            ${report.delivery}`,
    `  Pruned entries:      ${report.pruned}`,
    `  Tokens / cost:       ${report.tokensUsed} / $${report.estimatedCost.toFixed(4)}`,
    `  Duration:            ${(report.durationMs / 1000).toFixed(1)}s`
  );

  if (report.errors.length > 0) {
    lines.push('', `  ⚠️  ${report.errors.length} problem(s):`);
    for (const problem of report.errors) {
      const target = problem.messageId ? ` ${problem.messageId}` : '';
      lines.push(`     - [${problem.stage}]${target}: ${problem.error}`);
    }
  }

  lines.push(RULE);
  return lines.join('\n');
}

export function formatStats(profile: string, stats: LedgerStats): string {
  const lines = [
    RULE,
    `  Ledger statistics: ${profile}`,
    RULE,
    `  Entries:             ${stats.totalEntries}`,
    `  Last 7 days:         ${stats.entriesLast7Days}`,
    `  Full / fallback:     ${stats.fullCount} / ${stats.fallbackCount}`,
    `  Digests:             ${stats.digestCount}`,
  ];

  if (stats.lastDigest) {
    lines.push(
      `  Last digest:         ${stats.lastDigest.digestId}`,
      `    created:           ${stats.lastDigest.createdAt}`,
      `    messages:          ${stats.lastDigest.messageCount}`
    );
    if (stats.lastDigest.artifactPath) {
      lines.push(`    document:          ${stats.lastDigest.artifactPath}`);
    }
  }

  lines.push(RULE);
  return lines.join('\n');
}

export function formatProgress(progress: RunProgress): string {
  return `Progress before failure: ${progress.succeeded} succeeded, ${progress.degraded} degraded, ${progress.skipped} skipped`;
}
