/**
 * Structure Classifier
 * Labels a page as text-only, text products with image brands, or mixed,
 * which decides whether brand association runs for it
 */

import { logger } from '../utils/logger.js';
import { extractJsonObject, readText } from '../utils/response-parser.js';
import type {
  ExtractionStrategy,
  FetchedPage,
  ImageMeta,
  Oracle,
  PageStructureProfile,
  StructureType,
} from '../types/index.js';
import type { PageSource } from '../scraper/page-fetcher.js';

const STRUCTURE_TYPES: readonly StructureType[] = ['TEXT_ONLY', 'TEXT_PRODUCTS_IMAGE_BRANDS', 'MIXED'];

const EXTRACTION_STRATEGIES: readonly ExtractionStrategy[] = [
  'TEXT_SCRAPING',
  'IMAGE_LINK_EXTRACTION',
  'OCR',
  'COMBINATION',
];

const DEFAULT_STRATEGY: Record<StructureType, ExtractionStrategy> = {
  TEXT_ONLY: 'TEXT_SCRAPING',
  TEXT_PRODUCTS_IMAGE_BRANDS: 'IMAGE_LINK_EXTRACTION',
  MIXED: 'COMBINATION',
};

const TEXT_PREVIEW_CHARS = 2000;
const MARKUP_PREVIEW_CHARS = 5000;
const MAX_IMAGES_IN_PROMPT = 20;
const ICON_SIZE = 30;

export const FALLBACK_PROFILE: PageStructureProfile = {
  structureType: 'TEXT_ONLY',
  extractionStrategy: 'TEXT_SCRAPING',
  hasClickableBrandImages: false,
  clickableBrandImageLinks: [],
  recommendedApproach: 'Standard text scraping (fallback)',
};

/**
 * Icons and spacers: both dimensions known and both under 30px
 */
export function isIconImage(image: ImageMeta): boolean {
  return (
    image.width !== null && image.height !== null && image.width < ICON_SIZE && image.height < ICON_SIZE
  );
}

function fallbackProfile(): PageStructureProfile {
  return { ...FALLBACK_PROFILE, clickableBrandImageLinks: [] };
}

export class StructureClassifier {
  constructor(
    private readonly oracle: Oracle,
    private readonly pages: PageSource
  ) {}

  async classify(url: string): Promise<PageStructureProfile> {
    return this.classifyPage(await this.pages.fetch(url));
  }

  /**
   * Classify an already fetched page. Never throws: any oracle or parse
   * failure yields the TEXT_ONLY / TEXT_SCRAPING profile.
   */
  async classifyPage(page: FetchedPage): Promise<PageStructureProfile> {
    const images = page.imageElements.filter((image) => !isIconImage(image)).slice(0, MAX_IMAGES_IN_PROMPT);

    let response: string;
    try {
      response = await this.oracle.complete({
        userPrompt: buildStructurePrompt(page, images),
        maxOutputTokens: 1000,
        temperature: 0.1,
      });
    } catch (error) {
      logger.warn('Structure analysis failed, defaulting to text scraping', {
        url: page.url,
        error: error instanceof Error ? error.message : String(error),
      });
      return fallbackProfile();
    }

    const profile = parseStructureProfile(response);
    if (!profile) {
      logger.warn('Could not parse structure analysis, defaulting to text scraping', { url: page.url });
      return fallbackProfile();
    }

    logger.info('Page structure classified', {
      url: page.url,
      structureType: profile.structureType,
      extractionStrategy: profile.extractionStrategy,
    });
    return profile;
  }
}

/**
 * Parse the oracle's JSON profile
 * @returns null when no object is found or structure_type is not one of the three types
 */
export function parseStructureProfile(response: string): PageStructureProfile | null {
  const analysis = extractJsonObject(response);
  if (!analysis) return null;

  const structureType = STRUCTURE_TYPES.find((type) => type === readText(analysis, 'structure_type'));
  if (!structureType) return null;

  const extractionStrategy =
    EXTRACTION_STRATEGIES.find((strategy) => strategy === readText(analysis, 'extraction_strategy')) ??
    DEFAULT_STRATEGY[structureType];

  const rawLinks = analysis['brand_images_with_links'];
  const clickableBrandImageLinks = Array.isArray(rawLinks)
    ? rawLinks.filter((link): link is string => typeof link === 'string' && link.trim() !== '')
    : [];

  return {
    structureType,
    extractionStrategy,
    hasClickableBrandImages: analysis['has_clickable_brand_images'] === true,
    clickableBrandImageLinks,
    recommendedApproach: readText(analysis, 'recommended_approach') ?? '',
  };
}

function describeImage(image: ImageMeta, index: number): string {
  return `Image ${index + 1}: src=${image.src.slice(0, 50)}..., alt='${image.altText}', title='${image.titleText}', parent_link=${image.linkTarget}, context='${image.contextText.slice(0, 100)}...'`;
}

function buildStructurePrompt(page: FetchedPage, images: ImageMeta[]): string {
  return `I'm analyzing a rep firm website page to understand its structure for product/brand extraction.

PAGE URL: ${page.url}

TEXT CONTENT PREVIEW (first ${TEXT_PREVIEW_CHARS} chars):
${page.plainText.slice(0, TEXT_PREVIEW_CHARS)}

IMAGE ELEMENTS FOUND:
${images.map(describeImage).join('\n')}

HTML SOURCE (first ${MARKUP_PREVIEW_CHARS} chars):
${page.rawMarkup.slice(0, MARKUP_PREVIEW_CHARS)}

Determine:
1. Data format type:
   - "TEXT_ONLY": products and brands are all in text
   - "TEXT_PRODUCTS_IMAGE_BRANDS": products in text, brands shown as images/logos
   - "MIXED": a combination of both
2. Brand extraction strategy:
   - TEXT_ONLY: TEXT_SCRAPING
   - TEXT_PRODUCTS_IMAGE_BRANDS: IMAGE_LINK_EXTRACTION when logos link to brand pages, otherwise OCR
   - MIXED: COMBINATION
3. Whether brand logos are clickable and which image URLs carry links.

Return your analysis in this exact JSON format:
{
  "structure_type": "TEXT_ONLY|TEXT_PRODUCTS_IMAGE_BRANDS|MIXED",
  "extraction_strategy": "TEXT_SCRAPING|IMAGE_LINK_EXTRACTION|OCR|COMBINATION",
  "has_clickable_brand_images": true/false,
  "brand_images_with_links": ["image URLs that are clickable"],
  "recommended_approach": "how to extract the data"
}`;
}
