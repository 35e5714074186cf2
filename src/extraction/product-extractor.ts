/**
 * Product Extractor
 * Turns page text into draft product rows via the oracle.
 * Always returns at least one row.
 */

import { logger } from '../utils/logger.js';
import { extractJsonArray, isRecord } from '../utils/response-parser.js';
import type { DraftProductRecord, Oracle } from '../types/index.js';

const TEXT_PREVIEW_CHARS = 10000;

/** Brand placeholder carried by the fallback row; never treated as a real brand */
export const UNAVAILABLE_BRAND = 'Information not available on website';

const FALLBACK_PRODUCT = 'Water/Wastewater Treatment Equipment';
const FALLBACK_SPACE = 'General';

/** Accepted key spellings for each draft field, in precedence order */
const FIELD_KEYS: ReadonlyArray<[keyof DraftProductRecord, string[]]> = [
  ['repFirmName', ['Rep Firm Name', 'repFirmName', 'rep_firm_name']],
  ['brandCarried', ['Brand Carried', 'brandCarried', 'brand_carried']],
  ['productCovered', ['Product Covered', 'productCovered', 'product_covered']],
  ['productSpace', ['Product Space', 'Space', 'productSpace', 'product_space']],
];

const SYSTEM_PROMPT =
  'You extract and categorize rep firm line sheet information. Always answer with a JSON array of objects with exactly the keys "Rep Firm Name", "Brand Carried", "Product Covered", "Product Space". One product per object.';

export function fallbackDraft(firmNameHint: string): DraftProductRecord {
  return {
    repFirmName: firmNameHint,
    brandCarried: UNAVAILABLE_BRAND,
    productCovered: FALLBACK_PRODUCT,
    productSpace: FALLBACK_SPACE,
  };
}

export class ProductExtractor {
  constructor(private readonly oracle: Oracle) {}

  /**
   * Extract draft product rows from page text
   * Oracle errors, unparseable answers and answers with no valid row all yield
   * exactly one fallback row carrying the firm name hint.
   */
  async extract(pageText: string, firmNameHint: string): Promise<DraftProductRecord[]> {
    let response: string;
    try {
      response = await this.oracle.complete({
        systemPrompt: SYSTEM_PROMPT,
        userPrompt: buildExtractionPrompt(pageText.slice(0, TEXT_PREVIEW_CHARS), firmNameHint),
        maxOutputTokens: 2000,
        temperature: 0.1,
      });
    } catch (error) {
      logger.warn('Product extraction failed, using fallback row', {
        firmName: firmNameHint,
        error: error instanceof Error ? error.message : String(error),
      });
      return [fallbackDraft(firmNameHint)];
    }

    const rows = extractJsonArray(response);
    if (!rows) {
      logger.warn('Could not parse product extraction as JSON, using fallback row', {
        firmName: firmNameHint,
        responsePreview: response.slice(0, 200),
      });
      return [fallbackDraft(firmNameHint)];
    }

    const drafts: DraftProductRecord[] = [];
    for (const row of rows) {
      const draft = toDraft(row, firmNameHint);
      if (draft) {
        drafts.push(draft);
      }
    }

    if (rows.length !== drafts.length) {
      logger.debug('Dropped invalid product rows', {
        firmName: firmNameHint,
        dropped: rows.length - drafts.length,
      });
    }

    if (drafts.length === 0) {
      return [fallbackDraft(firmNameHint)];
    }

    logger.info('Products extracted', { firmName: firmNameHint, count: drafts.length });
    return drafts;
  }
}

/**
 * Validate one oracle row
 * @returns null when the row is not an object, a field holds a non-text value,
 * or every product field is empty
 */
export function toDraft(row: unknown, firmNameHint: string): DraftProductRecord | null {
  if (!isRecord(row)) return null;

  const draft: DraftProductRecord = {
    repFirmName: '',
    brandCarried: '',
    productCovered: '',
    productSpace: '',
  };

  for (const [field, keys] of FIELD_KEYS) {
    const key = keys.find((candidate) => candidate in row);
    if (key === undefined) continue;

    const value = row[key];
    if (typeof value === 'string') {
      draft[field] = value.trim();
    } else if (typeof value === 'number' && Number.isFinite(value)) {
      draft[field] = String(value);
    } else if (value !== null) {
      return null;
    }
  }

  if (!draft.brandCarried && !draft.productCovered && !draft.productSpace) {
    return null;
  }

  if (!draft.repFirmName) {
    draft.repFirmName = firmNameHint;
  }

  return draft;
}

function buildExtractionPrompt(content: string, firmNameHint: string): string {
  return `Extract a table with the following columns:
- Rep Firm Name (the official, properly capitalized name of the rep firm, not an abbreviation, domain, or placeholder)
- Brand Carried (the official, properly capitalized brand/manufacturer name, not a filename, abbreviation, or unclear string)
- Product Covered (the exact products listed or mentioned on the page; be as specific as possible)
- Product Space (broad water/wastewater treatment process steps, e.g. Flow Control, Clarification, Disinfection, Aeration, Filtration, Chemical Feed. Do NOT use specific model names or chemicals. Use 'Water Treatment' or 'Wastewater Treatment' only as a last resort)

Rep Firm Name: ${firmNameHint}

Website content:
${content}

IMPORTANT:
- Each individual product goes on its own row. "Brand A carries pumps, valves, and filters" is 3 rows.
- Do NOT include entries where the Rep Firm Name or Brand Carried is not a proper, official, capitalized name.
- Do NOT include filenames, placeholders, or unclear strings (e.g. 'top of page', 'Sig 3-14-22.png') in any field.
- If no clear product information is found, return a single entry with the official rep firm name and a general description.

Return a JSON array of objects with keys: "Rep Firm Name", "Brand Carried", "Product Covered", "Product Space".`;
}
