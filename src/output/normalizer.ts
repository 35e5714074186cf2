/**
 * Normalizer & Aggregator
 * Splits compound product / space fields into atomic rows and collects the
 * run's rows in discovery order with exact duplicates collapsed.
 */

import type { ProductSpaceRecord } from '../types/index.js';

const PRODUCT_SEPARATORS = /[,;]|\s+and\s+/i;
const SPACE_SEPARATORS = /[/,;]|\s+and\s+/i;

/** Tokens this short or shorter are discarded */
const MIN_TOKEN_LENGTH = 2;

function splitField(value: string, separators: RegExp): string[] {
  const tokens = value
    .split(separators)
    .map((token) => token.trim())
    .filter((token) => token.length > MIN_TOKEN_LENGTH);

  return tokens.length > 0 ? tokens : [value];
}

/**
 * One row per (product token x space token) pair; firm, brand and confidence carried over
 */
export function normalize(records: ProductSpaceRecord[]): ProductSpaceRecord[] {
  const normalized: ProductSpaceRecord[] = [];

  for (const record of records) {
    const products = splitField(record.productCovered, PRODUCT_SEPARATORS);
    const spaces = splitField(record.productSpace, SPACE_SEPARATORS);

    for (const productCovered of products) {
      for (const productSpace of spaces) {
        normalized.push({ ...record, productCovered, productSpace });
      }
    }
  }

  return normalized;
}

/** Identity over the exported columns; confidence is not one of them */
function recordKey(record: ProductSpaceRecord): string {
  return JSON.stringify([record.repFirmName, record.brandCarried, record.productCovered, record.productSpace]);
}

/**
 * Owns the run's final record set. Rows are append-only; a row equal in the four
 * exported fields to an earlier one is ignored, so the first confidence seen stays.
 */
export class RecordAggregator {
  private readonly rows: ProductSpaceRecord[] = [];
  private readonly seen = new Set<string>();

  /**
   * @returns how many rows were new
   */
  add(records: ProductSpaceRecord[]): number {
    let added = 0;
    for (const record of records) {
      const key = recordKey(record);
      if (this.seen.has(key)) continue;
      this.seen.add(key);
      this.rows.push({ ...record });
      added++;
    }
    return added;
  }

  get size(): number {
    return this.rows.length;
  }

  records(): ProductSpaceRecord[] {
    return this.rows.map((record) => ({ ...record }));
  }
}

/**
 * Concatenate per-page row lists in page order and drop exact duplicates
 */
export function aggregate(recordsFromAllPages: ProductSpaceRecord[][]): ProductSpaceRecord[] {
  const aggregator = new RecordAggregator();
  for (const pageRecords of recordsFromAllPages) {
    aggregator.add(pageRecords);
  }
  return aggregator.records();
}
