/**
 * Line sheet export
 * Fixed four-column CSV; the header row is written even with no records
 */

import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { logger } from '../utils/logger.js';
import type { ProductSpaceRecord } from '../types/index.js';

export const LINE_SHEET_HEADERS = ['Rep Firm Name', 'Brand Carried', 'Product Covered', 'Product Space'];

function quote(cell: string): string {
  return `"${cell.replace(/"/g, '""')}"`;
}

/**
 * Generate CSV from headers and rows
 */
export function generateCsv(headers: string[], rows: string[][]): string {
  const csvRows = [headers.join(',')];

  for (const row of rows) {
    csvRows.push(row.map(quote).join(','));
  }

  return csvRows.join('\n');
}

export function generateLineSheetCsv(records: ProductSpaceRecord[]): string {
  const rows = records.map((record) => [
    record.repFirmName,
    record.brandCarried,
    record.productCovered,
    record.productSpace,
  ]);

  return generateCsv(LINE_SHEET_HEADERS, rows);
}

/**
 * Write the line sheet, creating parent directories as needed
 * @returns the path written
 */
export async function writeLineSheet(outputPath: string, records: ProductSpaceRecord[]): Promise<string> {
  await mkdir(path.dirname(outputPath), { recursive: true });
  await writeFile(outputPath, generateLineSheetCsv(records) + '\n', 'utf8');

  logger.info('Line sheet written', { outputPath, records: records.length });
  return outputPath;
}
