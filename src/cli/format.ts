import type { QuickmarkedEntry } from '../quickmark/overlay.js';
import type { ChannelSummary } from '../feed/feedDb.js';
import type { MarkResult } from '../commands/mark.js';
import type { ChannelUpdateReport } from '../sync/update.js';

function oneLine(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * `[position] text  link  identity`, with the link column left out when absent.
 */
export function formatEntryLine({ position, entry }: QuickmarkedEntry): string {
  const columns = [`[${position}] ${oneLine(entry.primaryText)}`];
  if (entry.link) columns.push(entry.link);
  columns.push(entry.identity);
  return columns.join('  ');
}

export function formatFeedLine(feed: ChannelSummary): string {
  return `${oneLine(feed.title)}  ${feed.link}  ${feed.unread}/${feed.total} unread`;
}

export function formatMarkResult(result: MarkResult): string {
  switch (result.status) {
    case 'marked':
      return `✓ ${result.target} marked as read`;
    case 'already-read':
      return `${result.target}: already read`;
    case 'unknown-identity':
      return `${result.target}: no such entry`;
    case 'no-quickmark':
      return `${result.target}: no entry has this number`;
  }
}

export function formatUpdateReport(report: ChannelUpdateReport): string[] {
  const title = oneLine(report.channel.title);
  switch (report.status) {
    case 'new-entries':
      return [`${title} (${report.entries.length} new)`, ...report.entries.map((e) => `  ${formatEntryLine(e)}`)];
    case 'unchanged':
      return [];
    case 'failed':
      return [`✗ ${title} (${report.channel.link}): ${report.error}`];
  }
}

/**
 * Split `mark` arguments into quickmark positions and the tokens that are not one.
 */
export function parsePositions(tokens: readonly string[]): { positions: number[]; invalid: string[] } {
  const positions: number[] = [];
  const invalid: string[] = [];
  for (const token of tokens) {
    if (/^\d+$/.test(token) && Number(token) > 0) {
      positions.push(Number(token));
    } else {
      invalid.push(token);
    }
  }
  return { positions, invalid };
}
