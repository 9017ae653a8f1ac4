/**
 * Fetch executive orders from the Federal Register API and cache them on disk
 */

import { Ajv } from 'ajv';
import { existsSync } from 'node:fs';
import {
  CACHED_ORDERS_FILE,
  FEDERAL_REGISTER_BASE_URL,
  FETCH_DELAY_MS,
  FETCH_PAGE_SIZE
} from './config.js';
import { readJson, writeJson, sleep } from './utils.js';
import type { CachedOrdersFile, RawExecutiveOrder } from './types.js';

interface FederalRegisterResponse {
  count: number;
  total_pages?: number;
  results?: FederalRegisterDocument[];
}

interface FederalRegisterDocument {
  document_number: string;
  executive_order_number: number | string | null;
  title: string;
  signing_date: string | null;
  publication_date: string;
  president: {
    name: string;
    identifier: string;
  } | null;
  html_url: string;
}

const FIELDS = [
  'document_number',
  'executive_order_number',
  'title',
  'signing_date',
  'publication_date',
  'president',
  'html_url'
];

const ajv = new Ajv({ allErrors: true });

const validateCache = ajv.compile<CachedOrdersFile>({
  type: 'object',
  required: ['orders', 'fetched_at', 'count'],
  properties: {
    fetched_at: { type: 'string' },
    count: { type: 'integer' },
    orders: {
      type: 'array',
      items: {
        type: 'object',
        required: ['document_number', 'title', 'signing_date', 'publication_date', 'html_url'],
        properties: {
          document_number: { type: 'string' },
          executive_order_number: { type: 'number', nullable: true },
          title: { type: 'string' },
          signing_date: { type: 'string', nullable: true },
          publication_date: { type: 'string' },
          president: {
            type: 'object',
            nullable: true,
            required: ['name', 'identifier'],
            properties: {
              name: { type: 'string' },
              identifier: { type: 'string' }
            }
          },
          html_url: { type: 'string' }
        }
      }
    }
  }
});

/**
 * Build the documents.json URL for one page of executive orders
 */
export function buildOrdersUrl(baseUrl: string, page: number): URL {
  const url = new URL(`${baseUrl}/documents.json`);
  url.searchParams.append('conditions[type][]', 'PRESDOCU');
  url.searchParams.set('conditions[presidential_document_type]', 'executive_order');
  url.searchParams.set('conditions[correction]', '0');
  url.searchParams.set('order', 'oldest');
  url.searchParams.set('per_page', String(FETCH_PAGE_SIZE));
  url.searchParams.set('page', String(page));
  for (const field of FIELDS) {
    url.searchParams.append('fields[]', field);
  }
  return url;
}

function toRawOrder(doc: FederalRegisterDocument): RawExecutiveOrder {
  // API may return the EO number as a string
  const eoNumber = doc.executive_order_number === null || doc.executive_order_number === ''
    ? null
    : Number(doc.executive_order_number);

  return {
    document_number: doc.document_number,
    executive_order_number: eoNumber !== null && Number.isFinite(eoNumber) ? eoNumber : null,
    title: doc.title,
    signing_date: doc.signing_date,
    publication_date: doc.publication_date,
    president: doc.president,
    html_url: doc.html_url
  };
}

/**
 * Fetch every page of executive orders
 */
export async function fetchAllExecutiveOrders(
  options: { baseUrl?: string; delayMs?: number } = {}
): Promise<RawExecutiveOrder[]> {
  const baseUrl = options.baseUrl ?? FEDERAL_REGISTER_BASE_URL;
  const delayMs = options.delayMs ?? FETCH_DELAY_MS;

  const allOrders: RawExecutiveOrder[] = [];
  let page = 1;
  let totalPages = 1;

  do {
    const response = await fetch(buildOrdersUrl(baseUrl, page).toString());

    if (!response.ok) {
      throw new Error(`API error: ${response.status} ${response.statusText}`);
    }

    const data = (await response.json()) as FederalRegisterResponse;

    // On first page, print total count and pages
    if (page === 1) {
      totalPages = data.total_pages ?? 1;
      console.log(`  Found ${data.count} executive orders across ${totalPages} page${totalPages === 1 ? '' : 's'}`);
    }

    console.log(`  Fetching page ${page}/${totalPages}...`);

    for (const doc of data.results ?? []) {
      allOrders.push(toRawOrder(doc));
    }

    page++;

    if (page <= totalPages) {
      await sleep(delayMs); // Rate limit between pages
    }
  } while (page <= totalPages);

  return allOrders;
}

/**
 * Load cached orders, or null if nothing has been fetched yet
 */
export async function loadCachedOrders(filePath: string = CACHED_ORDERS_FILE): Promise<RawExecutiveOrder[] | null> {
  const data = await readJson(filePath);

  if (data === null) {
    return null;
  }
  if (!validateCache(data)) {
    throw new Error(`Corrupt cache ${filePath}: ${ajv.errorsText(validateCache.errors)}. Re-run fetch with --force.`);
  }

  return data.orders;
}

/**
 * Save orders to the cache, oldest signing date first
 */
export async function saveCachedOrders(
  orders: RawExecutiveOrder[],
  filePath: string = CACHED_ORDERS_FILE
): Promise<void> {
  const sorted = [...orders].sort((a, b) =>
    (a.signing_date ?? '').localeCompare(b.signing_date ?? '')
  );

  const file: CachedOrdersFile = {
    orders: sorted,
    fetched_at: new Date().toISOString(),
    count: sorted.length
  };
  await writeJson(filePath, file);

  console.log(`Saved ${sorted.length} executive orders to ${filePath}`);
}

/**
 * Main fetch function. The cache is written once; pass `force` to replace it.
 */
export async function fetchOrders(options: {
  force?: boolean;
  baseUrl?: string;
  delayMs?: number;
  cacheFile?: string;
} = {}): Promise<void> {
  const cacheFile = options.cacheFile ?? CACHED_ORDERS_FILE;

  console.log(`\n=== Fetching Executive Orders ===\n`);

  if (existsSync(cacheFile) && !options.force) {
    console.log(`Cache already exists at ${cacheFile}. Use --force to re-fetch.`);
    return;
  }

  const orders = await fetchAllExecutiveOrders(options);
  await saveCachedOrders(orders, cacheFile);

  console.log(`\nDone!`);
}

/**
 * Return cached orders, fetching them first if the cache is empty
 */
export async function ensureOrders(options: { baseUrl?: string; cacheFile?: string } = {}): Promise<RawExecutiveOrder[]> {
  const cacheFile = options.cacheFile ?? CACHED_ORDERS_FILE;
  const cached = await loadCachedOrders(cacheFile);
  if (cached) {
    return cached;
  }

  console.log('No cached executive orders found, fetching...');
  await fetchOrders({ ...options, cacheFile });

  const fetched = await loadCachedOrders(cacheFile);
  if (!fetched) {
    throw new Error(`Cache was not written: ${cacheFile}`);
  }
  return fetched;
}
