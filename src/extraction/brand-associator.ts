/**
 * Brand Associator
 * Pairs text-extracted products with the brands shown as logos on the same page.
 * Runs only for TEXT_PRODUCTS_IMAGE_BRANDS and MIXED pages.
 */

import { logger } from '../utils/logger.js';
import { extractJsonArray, isRecord, readText } from '../utils/response-parser.js';
import { createBrandProbeChain, runProbeChain, type BrandProbe } from './brand-probes.js';
import { UNAVAILABLE_BRAND } from './product-extractor.js';
import type {
  BrandCandidate,
  Confidence,
  DraftProductRecord,
  FetchedPage,
  ImageMeta,
  Oracle,
  ProductSpaceRecord,
} from '../types/index.js';
import type { PageSource } from '../scraper/page-fetcher.js';

const MIN_LOGO_SIZE = 30;
const TEXT_PREVIEW_CHARS = 2000;
const CONTEXT_PREVIEW_CHARS = 100;

const STANDALONE_PRODUCT = 'General equipment line';
const STANDALONE_SPACE = 'General';

const CONFIDENCE_LEVELS: readonly Confidence[] = ['HIGH', 'MEDIUM', 'LOW'];

interface BrandAssociation {
  product: string;
  brands: string[];
  confidence: Confidence;
}

/**
 * Images with a known width and height where either side is under 30px are icons
 */
export function isLogoSized(image: ImageMeta): boolean {
  if (image.width === null || image.height === null) return true;
  return image.width >= MIN_LOGO_SIZE && image.height >= MIN_LOGO_SIZE;
}

export class BrandAssociator {
  private readonly probes: BrandProbe[];

  constructor(
    private readonly oracle: Oracle,
    private readonly pages: PageSource
  ) {
    this.probes = createBrandProbeChain(oracle);
  }

  async associate(
    url: string,
    draftProducts: DraftProductRecord[],
    firmNameHint: string
  ): Promise<ProductSpaceRecord[]> {
    return this.associatePage(await this.pages.fetch(url), draftProducts, firmNameHint);
  }

  /**
   * Build brand candidates from every logo-sized image on the page
   * Images no probe can name are dropped.
   */
  async extractBrandCandidates(page: FetchedPage): Promise<BrandCandidate[]> {
    const candidates: BrandCandidate[] = [];

    for (const image of page.imageElements) {
      if (!isLogoSized(image)) continue;

      const hit = await runProbeChain(this.probes, image);
      if (!hit) continue;

      candidates.push({
        brandName: hit.brandName,
        imageUrl: image.src,
        linkUrl: image.isClickable ? image.linkTarget : undefined,
        contextText: image.contextText,
        isClickable: image.isClickable,
        extractionMethod: hit.extractionMethod,
      });
    }

    logger.info('Brand candidates extracted from images', { url: page.url, count: candidates.length });
    return candidates;
  }

  async associatePage(
    page: FetchedPage,
    draftProducts: DraftProductRecord[],
    firmNameHint: string
  ): Promise<ProductSpaceRecord[]> {
    const candidates = await this.extractBrandCandidates(page);

    if (candidates.length === 0 || draftProducts.length === 0) {
      return draftProducts.map((draft) => ({ ...draft }));
    }

    let associations: BrandAssociation[] | null = null;
    try {
      const response = await this.oracle.complete({
        userPrompt: buildAssociationPrompt(page, draftProducts, candidates, firmNameHint),
        maxOutputTokens: 1000,
        temperature: 0.1,
      });
      associations = parseAssociations(response);
      if (!associations) {
        logger.warn('Could not parse brand associations, using fallback', { url: page.url });
      }
    } catch (error) {
      logger.warn('Brand association failed, using fallback', {
        url: page.url,
        error: error instanceof Error ? error.message : String(error),
      });
    }

    const records = associations
      ? applyAssociations(draftProducts, associations)
      : fallbackAssociation(draftProducts, candidates);

    const withStandalone = addStandaloneBrands(records, candidates, firmNameHint);

    logger.info('Products associated with brands', {
      url: page.url,
      products: draftProducts.length,
      records: withStandalone.length,
      usedFallback: associations === null,
    });
    return withStandalone;
  }
}

/**
 * Parse `[{product, brands: [...], confidence}]`
 * Entries that are not objects are skipped; a missing or unknown confidence is MEDIUM.
 * @returns null when the response holds no JSON array
 */
export function parseAssociations(response: string): BrandAssociation[] | null {
  const entries = extractJsonArray(response);
  if (!entries) return null;

  const associations: BrandAssociation[] = [];
  for (const entry of entries) {
    if (!isRecord(entry)) continue;

    const rawBrands = entry['brands'];
    const brands = Array.isArray(rawBrands)
      ? rawBrands
          .filter((brand): brand is string => typeof brand === 'string')
          .map((brand) => brand.trim())
          .filter((brand) => brand.length > 0)
      : [];

    const confidenceText = (readText(entry, 'confidence') ?? '').toUpperCase();

    associations.push({
      product: readText(entry, 'product') ?? '',
      brands,
      confidence: CONFIDENCE_LEVELS.find((level) => level === confidenceText) ?? 'MEDIUM',
    });
  }
  return associations;
}

function containsEitherWay(a: string, b: string): boolean {
  const left = a.toLowerCase();
  const right = b.toLowerCase();
  if (!left || !right) return false;
  return left.includes(right) || right.includes(left);
}

/**
 * Expand each matched draft into one row per associated brand; unmatched drafts pass through
 */
export function applyAssociations(
  draftProducts: DraftProductRecord[],
  associations: BrandAssociation[]
): ProductSpaceRecord[] {
  const records: ProductSpaceRecord[] = [];

  for (const draft of draftProducts) {
    const match = associations.find((association) =>
      containsEitherWay(association.product, draft.productCovered)
    );

    if (!match || match.brands.length === 0) {
      records.push({ ...draft });
      continue;
    }

    for (const brand of match.brands) {
      records.push({
        repFirmName: draft.repFirmName,
        brandCarried: brand,
        productCovered: draft.productCovered,
        productSpace: draft.productSpace,
        confidence: match.confidence,
      });
    }
  }

  return records;
}

function hasUsableBrand(draft: DraftProductRecord): boolean {
  const brand = draft.brandCarried.trim();
  return brand !== '' && brand !== 'Unknown' && brand !== UNAVAILABLE_BRAND;
}

/**
 * Deterministic association: a draft without a usable brand takes the first
 * candidate whose name appears in its product text, tagged LOW
 */
export function fallbackAssociation(
  draftProducts: DraftProductRecord[],
  candidates: BrandCandidate[]
): ProductSpaceRecord[] {
  return draftProducts.map((draft): ProductSpaceRecord => {
    if (hasUsableBrand(draft)) {
      return { ...draft };
    }

    const product = draft.productCovered.toLowerCase();
    const candidate = candidates.find(
      (brand) => brand.brandName !== '' && product.includes(brand.brandName.toLowerCase())
    );
    if (!candidate) {
      return { ...draft };
    }

    return {
      repFirmName: draft.repFirmName,
      brandCarried: candidate.brandName,
      productCovered: draft.productCovered,
      productSpace: draft.productSpace,
      confidence: 'LOW',
    };
  });
}

/**
 * Every detected brand appears at least once: brands no row mentions get a
 * LOW-confidence row with a generic product
 */
export function addStandaloneBrands(
  records: ProductSpaceRecord[],
  candidates: BrandCandidate[],
  firmNameHint: string
): ProductSpaceRecord[] {
  const output = [...records];

  for (const candidate of candidates) {
    const name = candidate.brandName.toLowerCase();
    const represented = output.some((record) => record.brandCarried.toLowerCase().includes(name));
    if (represented) continue;

    output.push({
      repFirmName: firmNameHint,
      brandCarried: candidate.brandName,
      productCovered: STANDALONE_PRODUCT,
      productSpace: STANDALONE_SPACE,
      confidence: 'LOW',
    });
  }

  return output;
}

function buildAssociationPrompt(
  page: FetchedPage,
  draftProducts: DraftProductRecord[],
  candidates: BrandCandidate[],
  firmNameHint: string
): string {
  const productLines = draftProducts
    .map((draft) => `- ${draft.productCovered || 'Unknown'} (Space: ${draft.productSpace || 'Unknown'})`)
    .join('\n');
  const brandLines = candidates
    .map((brand) => `- ${brand.brandName} (Context: ${brand.contextText.slice(0, CONTEXT_PREVIEW_CHARS)}...)`)
    .join('\n');

  return `I'm analyzing a rep firm website page to associate products with their corresponding brands.

REP FIRM: ${firmNameHint}
PAGE URL: ${page.url}

EXTRACTED PRODUCTS:
${productLines}

EXTRACTED BRANDS:
${brandLines}

PAGE CONTENT PREVIEW:
${page.plainText.slice(0, TEXT_PREVIEW_CHARS)}

Decide which brands are associated with which products. Consider:
1. Proximity of brand logos to product descriptions
2. Context clues in surrounding text
3. Industry knowledge of which brands make which products
4. Water/wastewater treatment equipment manufacturers

Return a JSON array where each product gets its likely brands:
[
  {
    "product": "Product Name",
    "brands": ["Brand1", "Brand2"],
    "confidence": "HIGH|MEDIUM|LOW"
  }
]

If you cannot determine brand associations, return an empty list.`;
}
