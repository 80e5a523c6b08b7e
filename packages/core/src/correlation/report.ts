import type { CorrelationReport } from './correlation-window.js';

/** Practical text budget of one radio frame. */
export const MAX_REPLY_LENGTH = 130;
export const CONTINUATION_PREFIX = '(cont) ';

export function formatReport(report: CorrelationReport): string {
  switch (report.kind) {
    case 'paths':
      return [`Found ${report.paths.length} unique path(s):`, ...report.paths].join('\n');
    case 'undecodable':
      return (
        `No paths extracted from ${report.matchingPackets} matching packet(s) (hash: ${report.targetHash}). ` +
        'Packets may be direct (0 hops) or path extraction failed.'
      );
    case 'silent':
      return `No matching packets found during ${(report.durationMs / 1000).toFixed(1)}s window. Tracking hash: ${report.targetHash}.`;
  }
}

/** Opening text of a continuation page; the prefix is left off when it would push the entry over budget. */
function continuationOf(entry: string, maxLength: number): string {
  const prefixed = CONTINUATION_PREFIX + entry;
  return prefixed.length <= maxLength ? prefixed : entry;
}

/**
 * Pack entries into pages of at most maxLength characters.
 * Entries are never split; one longer than the budget gets a page to itself.
 * Pages after the first start with CONTINUATION_PREFIX where it fits.
 */
export function paginate(entries: string[], separator: string, maxLength: number = MAX_REPLY_LENGTH): string[] {
  const pages: string[] = [];
  let current: string | null = null;

  for (const entry of entries) {
    if (current === null) {
      current = pages.length === 0 ? entry : continuationOf(entry, maxLength);
      continue;
    }
    const candidate: string = current + separator + entry;
    if (candidate.length <= maxLength) {
      current = candidate;
    } else {
      pages.push(current);
      current = continuationOf(entry, maxLength);
    }
  }

  if (current !== null) pages.push(current);
  return pages;
}

/** Report text split into sendable pages. Path reports break between paths, others between words. */
export function paginateReport(report: CorrelationReport, maxLength: number = MAX_REPLY_LENGTH): string[] {
  if (report.kind === 'paths') {
    return paginate([`Found ${report.paths.length} unique path(s):`, ...report.paths], '\n', maxLength);
  }
  return paginate(formatReport(report).split(' '), ' ', maxLength);
}
