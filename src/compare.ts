/**
 * Compare executive order pace across presidential terms
 */

import {
  CACHED_ORDERS_FILE,
  DEFAULT_CHECKPOINTS,
  DEFAULT_HORIZON_DAYS,
  INAUGURATIONS_FILE,
  SERIES_FILE
} from './config.js';
import { attribute } from './attribute.js';
import { EmptySeriesFilterError } from './errors.js';
import { ensureOrders } from './fetch.js';
import { buildIntervalTable, loadInaugurations } from './intervals.js';
import { formatComparisonTable, formatFailures, formatTermSummary, toChartFile } from './report.js';
import { compareTerms } from './series.js';
import { writeJson } from './utils.js';
import type { RawExecutiveOrder, TermSeries } from './types.js';

export interface CompareRunOptions {
  terms?: string[];
  from?: string;
  to?: string;
  horizonDays?: number;
  allTerms?: boolean;
  showOrders?: boolean;
  out?: string;
  now?: Date;
  inaugurationsFile?: string;
  cacheFile?: string;
}

function describeOrder(order: RawExecutiveOrder): string {
  const label = order.executive_order_number !== null
    ? `EO ${order.executive_order_number}`
    : order.document_number;
  return `${label} (${order.signing_date ?? 'no signing date'})`;
}

/**
 * Main compare function. Returns the compared series, or null when no term
 * matched the filters.
 */
export async function compare(options: CompareRunOptions = {}): Promise<TermSeries[] | null> {
  const horizonDays = options.horizonDays ?? DEFAULT_HORIZON_DAYS;

  console.log(`\n=== Comparing Executive Orders by Term ===\n`);

  const entries = await loadInaugurations(options.inaugurationsFile ?? INAUGURATIONS_FILE);
  const table = buildIntervalTable(entries, options.now ?? new Date());
  console.log(`Loaded ${table.length} terms`);

  const orders = await ensureOrders({ cacheFile: options.cacheFile ?? CACHED_ORDERS_FILE });
  console.log(`Loaded ${orders.length} executive orders`);

  const result = attribute(orders, table);
  for (const line of formatFailures(result, describeOrder)) {
    console.warn(line);
  }

  if (options.showOrders) {
    console.log('');
    for (const line of formatTermSummary(result)) {
      console.log(line);
    }
  }

  // Terms that began before the earliest order would be compared on partial data,
  // unless the caller names terms explicitly
  const skipPartial = !options.allTerms && !options.terms;
  const minStart = options.from ?? (skipPartial ? result.earliestDate ?? undefined : undefined);

  let series: TermSeries[];
  try {
    series = compareTerms(result, {
      horizonDays,
      terms: options.terms,
      minStart,
      maxStart: options.to
    });
  } catch (err) {
    if (err instanceof EmptySeriesFilterError) {
      console.log('No data: no terms match the requested filters.');
      return null;
    }
    throw err;
  }

  const checkpoints = DEFAULT_CHECKPOINTS.filter(day => day < horizonDays);
  console.log(`\nCumulative executive orders since inauguration (horizon ${horizonDays} days)\n`);
  for (const line of formatComparisonTable(series, [...checkpoints, horizonDays])) {
    console.log(line);
  }

  const out = options.out ?? SERIES_FILE;
  await writeJson(out, toChartFile(series, horizonDays, new Date()));
  console.log(`\nWrote ${series.length} series to ${out}`);

  return series;
}
