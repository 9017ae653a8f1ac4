#!/usr/bin/env node
import 'dotenv/config';

/**
 * CLI for comparing executive order pace across presidential terms
 *
 * Usage:
 *   npm run compare                                          # All terms covered by the data
 *   npm run compare -- --terms "Joe Biden term 1,Donald J. Trump term 2"
 *   npm run compare -- --from 2001-01-01 --to 2017-01-01     # Terms starting in [from, to)
 *   npm run compare -- --horizon 100                         # First 100 days only
 *   npm run compare -- --all-terms                           # Include terms before the data starts
 *   npm run compare -- --show-orders                         # Print per-term order counts
 *   npm run compare -- --out series.json                     # Chart data location
 */

import { compare } from '../compare.js';
import { parseArgs, splitList } from '../utils.js';

const args = parseArgs(process.argv.slice(2));

const terms = typeof args.terms === 'string' ? splitList(args.terms) : undefined;
const from = typeof args.from === 'string' ? args.from : undefined;
const to = typeof args.to === 'string' ? args.to : undefined;
const out = typeof args.out === 'string' ? args.out : undefined;
const horizonDays = args.horizon ? parseInt(String(args.horizon), 10) : undefined;
const allTerms = Boolean(args['all-terms']);
const showOrders = Boolean(args['show-orders']);

if (horizonDays !== undefined && (Number.isNaN(horizonDays) || horizonDays < 0)) {
  console.error(`Invalid --horizon: ${String(args.horizon)}. Must be a non-negative number of days.`);
  process.exit(1);
}

compare({ terms, from, to, out, horizonDays, allTerms, showOrders }).catch((err: Error) => {
  console.error('Error:', err.message);
  process.exit(1);
});
