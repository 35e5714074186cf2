/**
 * Relevance Selector
 * Narrows a crawl's link set down to the pages most likely to hold
 * product / brand / line sheet information
 */

import { logger } from '../utils/logger.js';
import { extractUrls } from '../utils/response-parser.js';
import { isInternalUrl, matchesRelevanceKeyword } from './url-patterns.js';
import type { Link, Oracle } from '../types/index.js';

/** Upper bound on pages handed to the extraction stages */
export const MAX_SELECTED_PAGES = 10;

/** Links shown to the oracle, in discovery order */
const MAX_LINKS_IN_PROMPT = 100;

export class RelevanceSelector {
  constructor(private readonly oracle: Oracle) {}

  /**
   * Select up to 10 internal URLs worth deep-scraping
   *
   * Oracle first; keyword match when the oracle fails or names no usable URL;
   * [baseUrl] when even the keywords match nothing. Empty only when allLinks is empty.
   */
  async select(allLinks: Link[], baseUrl: string, firmNameHint: string): Promise<string[]> {
    if (allLinks.length === 0) {
      return [];
    }

    let selected: string[] = [];

    try {
      const response = await this.oracle.complete({
        userPrompt: buildRelevancePrompt(allLinks.slice(0, MAX_LINKS_IN_PROMPT), firmNameHint),
        maxOutputTokens: 500,
        temperature: 0.1,
      });
      selected = parseSelectedUrls(response, baseUrl);

      logger.info('Oracle identified relevant pages', {
        baseUrl,
        count: selected.length,
        urls: selected,
      });
    } catch (error) {
      logger.warn('Relevance oracle failed, using keyword fallback', {
        baseUrl,
        error: error instanceof Error ? error.message : String(error),
      });
    }

    if (selected.length > 0) {
      return selected;
    }

    return this.selectByKeyword(allLinks, baseUrl);
  }

  /**
   * Deterministic fallback: internal links whose href or text contains a relevance keyword
   */
  selectByKeyword(allLinks: Link[], baseUrl: string): string[] {
    const matches = dedupe(
      allLinks
        .filter((link) => isInternalUrl(link.href, baseUrl))
        .filter((link) => matchesRelevanceKeyword(link.href, link.displayText))
        .map((link) => link.href)
    ).slice(0, MAX_SELECTED_PAGES);

    if (matches.length > 0) {
      logger.info('Keyword fallback selected pages', { baseUrl, count: matches.length, urls: matches });
      return matches;
    }

    logger.info('Keyword fallback matched nothing, using base URL', { baseUrl });
    return [baseUrl];
  }
}

/**
 * Pull internal URLs out of the oracle's free-text answer
 */
export function parseSelectedUrls(response: string, baseUrl: string): string[] {
  return dedupe(extractUrls(response).filter((url) => isInternalUrl(url, baseUrl))).slice(
    0,
    MAX_SELECTED_PAGES
  );
}

function buildRelevancePrompt(links: Link[], firmNameHint: string): string {
  const linkLines = links
    .map((link) => `Link: '${link.displayText}' -> ${link.href} (Depth: ${link.depth})`)
    .join('\n');

  return `I'm analyzing a rep firm website (${firmNameHint}) to find pages containing product information, line sheets, or manufacturer catalogs.

Here are the links found on the website:
${linkLines}

For rep firm websites, product information is typically found on pages with:
1. Manufacturer/Brand pages: pages listing manufacturers, brands, or product lines
2. Product category pages: pages for specific equipment types (aerators, filters, pumps, etc.)
3. Application pages: pages organized by water/wastewater treatment processes
4. Equipment pages: pages with specific product listings
5. Catalog/Line sheet pages: direct product catalogs

Identify ALL URLs likely to contain detailed product information. Return the most relevant URLs, one per line, up to ${MAX_SELECTED_PAGES}. If unsure, include more rather than fewer. Prefer links with keywords like manufacturers, products, equipment, brands, catalog, line sheet. Do not return external links.`;
}

function dedupe(values: string[]): string[] {
  return [...new Set(values)];
}
