/**
 * Term Pace
 *
 * Attributes Federal Register executive orders to presidential terms and
 * compares how quickly each term issued them.
 */

export { fetchOrders, fetchAllExecutiveOrders, loadCachedOrders, ensureOrders } from './fetch.js';
export { buildIntervalTable, loadInaugurations, parseInaugurations, termKey } from './intervals.js';
export { locateInterval } from './locate.js';
export { attribute } from './attribute.js';
export { buildSeries, compareTerms } from './series.js';
export { compare } from './compare.js';
export * from './errors.js';
export * from './types.js';
