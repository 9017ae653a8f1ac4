/**
 * Configuration for the pipeline
 */

import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { homedir } from 'node:os';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// __dirname is dist/ at runtime and src/ under the test runner; both sit one level below the root
export const DATA_DIR = join(__dirname, '..', 'data');
export const OUTPUT_DIR = join(DATA_DIR, 'output');

export const INAUGURATIONS_FILE = process.env.INAUGURATIONS_FILE ?? join(DATA_DIR, 'inaugurations.json');
export const SERIES_FILE = join(OUTPUT_DIR, 'term-series.json');

// Cache follows the XDG base directory layout
const XDG_CACHE_HOME = process.env.XDG_CACHE_HOME || join(homedir(), '.cache');
export const CACHE_DIR = process.env.TERM_PACE_CACHE_DIR ?? join(XDG_CACHE_HOME, 'term-pace');
export const CACHED_ORDERS_FILE = join(CACHE_DIR, 'executive-orders.json');

// Federal Register API
export const FEDERAL_REGISTER_BASE_URL =
  process.env.FEDERAL_REGISTER_BASE_URL ?? 'https://www.federalregister.gov/api/v1';
export const FETCH_PAGE_SIZE = 1000; // API maximum
export const FETCH_DELAY_MS = 500; // Delay between pages

// Comparison
export const DEFAULT_HORIZON_DAYS = 365;
export const DEFAULT_CHECKPOINTS = [30, 100, 180, 365];
