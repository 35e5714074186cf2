/**
 * Output file naming
 * <KIND>[_Firm][_n_URLs][_pct pct_STATUS]_<YYYYMMDD_HHMMSS>[_suffix].csv
 */

import path from 'node:path';

export type OutputKind = 'single' | 'batch' | 'consolidated';

export interface OutputFilenameOptions {
  kind: OutputKind;
  repFirmName?: string;
  urlCount?: number;
  successCount?: number;
  totalCount?: number;
  suffix?: string;
  now?: Date;
}

const KIND_PREFIX: Record<OutputKind, string> = {
  single: 'SINGLE',
  batch: 'BATCH',
  consolidated: 'CONSOLIDATED',
};

const KIND_DIRECTORY: Record<OutputKind, string> = {
  single: 'single_scrapes',
  batch: 'batch_scrapes',
  consolidated: 'consolidated_results',
};

export const OUTPUT_EXTENSION = '.csv';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** Local time as YYYYMMDD_HHMMSS */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * Firm name reduced to word characters joined by underscores
 * e.g. "Acme Rep, Inc." -> "Acme_Rep_Inc"
 */
export function cleanFirmName(name: string): string {
  return name
    .replace(/[^\w\s-]/g, '')
    .replace(/[-\s]+/g, '_')
    .replace(/^_+|_+$/g, '');
}

export function successStatus(successCount: number, totalCount: number): string {
  const rate = Math.floor((successCount / totalCount) * 100);
  const status = rate === 100 ? 'SUCCESS' : rate >= 50 ? 'PARTIAL' : 'FAILED';
  return `${rate}pct_${status}`;
}

export function standardizedFilename(options: OutputFilenameOptions): string {
  const components = [KIND_PREFIX[options.kind]];

  if (options.repFirmName && options.kind === 'single') {
    const cleaned = cleanFirmName(options.repFirmName);
    if (cleaned) components.push(cleaned);
  }

  if (options.urlCount && options.kind !== 'single') {
    components.push(`${options.urlCount}_URLs`);
  }

  if (options.successCount !== undefined && options.totalCount) {
    components.push(successStatus(options.successCount, options.totalCount));
  }

  components.push(formatTimestamp(options.now ?? new Date()));

  if (options.suffix) {
    components.push(options.suffix);
  }

  return components.join('_') + OUTPUT_EXTENSION;
}

/**
 * Where an export lands: a standardized name under the kind's subdirectory,
 * or an explicit filename (forced to .csv) directly under the output directory
 */
export function resolveOutputPath(
  outputDirectory: string,
  options: OutputFilenameOptions,
  explicitFilename?: string
): string {
  if (explicitFilename) {
    return path.join(outputDirectory, withCsvExtension(explicitFilename));
  }
  return path.join(outputDirectory, KIND_DIRECTORY[options.kind], standardizedFilename(options));
}

export function withCsvExtension(filename: string): string {
  const extension = path.extname(filename);
  if (extension.toLowerCase() === OUTPUT_EXTENSION) return filename;
  return (extension ? filename.slice(0, -extension.length) : filename) + OUTPUT_EXTENSION;
}
