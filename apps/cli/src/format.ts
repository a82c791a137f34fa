/**
 * Terminal formatting for command output.
 */
import {
  TABLE_KEYWORD_COUNT,
  type DatabaseStatistics,
  type DocumentSummaryRow,
  type ProcessedDocument,
  type Summary,
  stringifyValue,
} from '@paper-sieve/core';

// ─── Terminal formatting ─────────────────────────────────────────────────────

export const bold = (s: string): string => `\x1b[1m${s}\x1b[0m`;
export const green = (s: string): string => `\x1b[32m${s}\x1b[0m`;
export const red = (s: string): string => `\x1b[31m${s}\x1b[0m`;
export const yellow = (s: string): string => `\x1b[33m${s}\x1b[0m`;
export const cyan = (s: string): string => `\x1b[36m${s}\x1b[0m`;
export const dim = (s: string): string => `\x1b[2m${s}\x1b[0m`;

export function stripAnsi(s: string): string {
  return s.replace(/\x1b\[[0-9;]*m/g, '');
}

// ─── Tables ──────────────────────────────────────────────────────────────────

/**
 * Plain-text table: header, dash rule, rows. Columns are left-aligned to the widest cell.
 */
export function renderTable(headers: readonly string[], rows: ReadonlyArray<readonly string[]>): string[] {
  const widths = headers.map((header, col) => Math.max(header.length, ...rows.map((row) => (row[col] ?? '').length)));
  const line = (cells: readonly string[]): string =>
    widths.map((width, col) => (cells[col] ?? '').padEnd(width)).join('  ').trimEnd();

  return [line(headers), widths.map((width) => '-'.repeat(width)).join('  '), ...rows.map(line)];
}

export function formatResultsTable(docs: readonly ProcessedDocument[]): string[] {
  return renderTable(
    ['File', 'Primary Category', 'Words', 'Top Keywords'],
    docs.map((doc) => [
      doc.metadata.filename,
      doc.categorization.primaryCategory,
      String(doc.wordCount),
      doc.keywords.slice(0, TABLE_KEYWORD_COUNT).join(', '),
    ]),
  );
}

export function formatDistribution(distribution: ReadonlyArray<[string, number]>): string[] {
  return [bold('Category Distribution:'), ...distribution.map(([category, count]) => `  ${category}: ${count}`)];
}

// ─── Summaries ───────────────────────────────────────────────────────────────

export function formatSummary(summary: Summary): string[] {
  if (summary.kind !== 'structured') {
    const text = summary.kind === 'raw' ? summary.text : `Failed to generate summary: ${summary.reason}`;
    return [bold(green('Summary:')), text];
  }

  const lines = [bold(green('Structured Summary:'))];
  for (const [key, value] of Object.entries(summary.fields)) {
    if (value === undefined || value === null) continue;
    if (typeof value === 'object' && !Array.isArray(value)) {
      lines.push(`${cyan(`${key}:`)}`);
      for (const [subKey, subValue] of Object.entries(value)) {
        lines.push(`  • ${subKey}: ${stringifyValue(subValue)}`);
      }
    } else {
      lines.push(`${cyan(`${key}:`)} ${stringifyValue(value)}`);
    }
  }
  return lines;
}

/**
 * Preview of an example JSON file: nested objects show their first three entries,
 * long values are cut at 100 characters.
 */
export function formatExample(data: Record<string, unknown>): string[] {
  const lines: string[] = [];
  for (const [key, value] of Object.entries(data)) {
    if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
      const entries = Object.entries(value);
      lines.push(yellow(`${key}:`));
      for (const [subKey, subValue] of entries.slice(0, 3)) {
        lines.push(`  • ${subKey}: ${stringifyValue(subValue)}`);
      }
      if (entries.length > 3) {
        lines.push(`  ... and ${entries.length - 3} more`);
      }
    } else {
      const display = stringifyValue(value);
      lines.push(`${yellow(`${key}:`)} ${display.length > 100 ? `${display.slice(0, 100)}...` : display}`);
    }
  }
  return lines;
}

// ─── Storage ─────────────────────────────────────────────────────────────────

export function formatSearchResults(rows: readonly DocumentSummaryRow[]): string[] {
  return renderTable(
    ['ID', 'Title', 'Authors', 'Year', 'Category'],
    rows.map((row) => [
      String(row.id),
      row.title ?? row.source_file,
      row.authors ?? '',
      row.year_published === null ? '' : String(row.year_published),
      row.primary_category ?? '',
    ]),
  );
}

export function formatStatistics(stats: DatabaseStatistics): string[] {
  const lines = [bold(`Total documents: ${stats.totalDocuments}`)];
  const section = (title: string, entries: Array<[string, number]>): void => {
    if (entries.length === 0) return;
    lines.push('', bold(title));
    for (const [label, count] of entries) lines.push(`  ${label}: ${count}`);
  };
  section('By category:', stats.byCategory.map((row) => [row.category, row.count]));
  section('By year:', stats.byYear.map((row) => [String(row.year), row.count]));
  section('Top journals:', stats.topJournals.map((row) => [row.journal, row.count]));
  return lines;
}
