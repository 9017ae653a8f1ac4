/**
 * Plain-text tables and chart payloads for term comparisons
 */

import type {
  AttributionResult,
  DatedDocument,
  SeriesChartFile,
  TermSeries
} from './types.js';

/**
 * Render rows as an aligned table. The first column is left-aligned,
 * the rest right-aligned.
 */
export function renderTable(headers: string[], rows: string[][]): string[] {
  const widths = headers.map((header, col) =>
    Math.max(header.length, ...rows.map(row => (row[col] ?? '').length))
  );

  const formatRow = (cells: string[]): string =>
    widths
      .map((width, col) => {
        const cell = cells[col] ?? '';
        return col === 0 ? cell.padEnd(width) : cell.padStart(width);
      })
      .join('  ');

  return [
    formatRow(headers),
    widths.map(width => '-'.repeat(width)).join('  '),
    ...rows.map(formatRow)
  ];
}

/**
 * Cumulative order counts at fixed day offsets, one row per term.
 * A dash marks a checkpoint the term never reached.
 */
export function formatComparisonTable(terms: TermSeries[], checkpoints: number[]): string[] {
  const headers = ['Term', 'Start', ...checkpoints.map(day => `Day ${day}`), 'Total'];

  const rows = terms.map(term => [
    term.key,
    term.start,
    ...checkpoints.map(day => (day < term.series.length ? String(term.series[day]) : '-')),
    String(term.total)
  ]);

  return renderTable(headers, rows);
}

/**
 * Orders per term with the first and last signing dates
 */
export function formatTermSummary<D extends DatedDocument>(result: AttributionResult<D>): string[] {
  const rows: string[][] = [];

  for (const { interval, documents } of result.terms.values()) {
    if (documents.length === 0) continue;
    rows.push([
      interval.key,
      interval.start,
      String(interval.endOffsetDays),
      String(documents.length),
      documents[0].signing_date ?? '',
      documents[documents.length - 1].signing_date ?? ''
    ]);
  }

  return renderTable(['Term', 'Start', 'Days', 'Orders', 'First', 'Last'], rows);
}

/**
 * Summarize documents that couldn't be attributed, showing at most `limit`
 */
export function formatFailures<D extends DatedDocument>(
  result: AttributionResult<D>,
  describe: (document: D) => string,
  limit = 5
): string[] {
  const count = result.failures.length;
  if (count === 0) return [];

  const lines = [`Skipped ${count} document${count === 1 ? '' : 's'} that could not be attributed:`];
  for (const { document, error } of result.failures.slice(0, limit)) {
    lines.push(`  - ${describe(document)}: ${error.message}`);
  }
  if (count > limit) {
    lines.push(`  ... and ${count - limit} more`);
  }
  return lines;
}

/**
 * Chart payload for external plotting
 */
export function toChartFile(terms: TermSeries[], horizonDays: number, generatedAt: Date): SeriesChartFile {
  return {
    horizon_days: horizonDays,
    generated_at: generatedAt.toISOString(),
    terms: terms.map(term => ({
      key: term.key,
      label: term.label,
      ordinal: term.ordinal,
      start: term.start,
      end_offset_days: term.endOffsetDays,
      total: term.total,
      series: term.series
    }))
  };
}
