#!/usr/bin/env node
import 'dotenv/config';

/**
 * CLI for fetching executive orders into the local cache
 *
 * Usage:
 *   npm run fetch                # Fetch all EOs unless already cached
 *   npm run fetch -- --force     # Replace the cache
 */

import { fetchOrders } from '../fetch.js';
import { parseArgs } from '../utils.js';

const args = parseArgs(process.argv.slice(2));

const force = Boolean(args.force);

fetchOrders({ force }).catch((err: Error) => {
  console.error('Error:', err.message);
  process.exit(1);
});
