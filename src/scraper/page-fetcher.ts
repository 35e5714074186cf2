/**
 * Page Fetcher
 * Drives the rendering session to a URL and turns the rendered markup into
 * plain text, anchor and image metadata. No judgement logic lives here.
 */

import * as cheerio from 'cheerio';
import { logger } from '../utils/logger.js';
import type { AnchorMeta, FetchedPage, ImageMeta } from '../types/index.js';
import type { RenderingSession } from './rendering-session.js';

export interface PageFetcherOptions {
  /** Wait after navigation so client-rendered content can appear */
  settleDelayMs: number;
}

const BLOCK_ELEMENTS = [
  'address', 'article', 'aside', 'blockquote', 'dd', 'div', 'dl', 'dt', 'figcaption', 'figure',
  'footer', 'form', 'h1', 'h2', 'h3', 'h4', 'h5', 'h6', 'header', 'hr', 'li', 'main', 'nav',
  'ol', 'p', 'pre', 'section', 'table', 'td', 'th', 'tr', 'ul',
].join(', ');

/** Following siblings of an image's parent that contribute to its context */
const CONTEXT_SIBLINGS = 3;

export class PageFetcher {
  constructor(
    private readonly session: RenderingSession,
    private readonly options: PageFetcherOptions = { settleDelayMs: 3000 }
  ) {}

  async fetch(url: string): Promise<FetchedPage> {
    await this.session.navigate(url);

    if (this.options.settleDelayMs > 0) {
      await this.sleep(this.options.settleDelayMs);
    }

    const markup = await this.session.currentMarkup();
    const page = parseRenderedPage(url, markup);

    logger.debug('Page fetched', {
      url,
      textLength: page.plainText.length,
      anchors: page.anchors.length,
      images: page.imageElements.length,
    });

    return page;
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

/**
 * Parse rendered markup into a FetchedPage
 * href and src values are resolved against the page URL, as a browser reports them
 */
export function parseRenderedPage(url: string, markup: string): FetchedPage {
  const $ = cheerio.load(markup);
  $('script, style').remove();

  const anchors = extractAnchors($, url);
  const imageElements = extractImages($, url);

  return {
    url,
    plainText: toPlainText(renderedText($)),
    anchors,
    imageElements,
    rawMarkup: markup,
  };
}

/**
 * Body text with a line break around every block element, the way a browser
 * lays it out. Mutates the document, so it runs after the metadata passes.
 */
function renderedText($: cheerio.CheerioAPI): string {
  $('br').replaceWith('\n');
  $(BLOCK_ELEMENTS).before('\n').after('\n');
  return $('body').text();
}

/**
 * Collapse rendered text: trim every line, split on double spaces, join the
 * non-empty pieces with single spaces
 */
export function toPlainText(text: string): string {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .flatMap((line) => line.split('  '))
    .map((phrase) => phrase.trim())
    .filter((phrase) => phrase.length > 0)
    .join(' ');
}

function collapse(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function resolveUrl(raw: string | undefined, baseUrl: string): string | null {
  if (!raw || !raw.trim()) return null;
  try {
    return new URL(raw.trim(), baseUrl).href;
  } catch {
    return null;
  }
}

function parseDimension(raw: string | undefined): number | null {
  if (!raw) return null;
  const value = parseInt(raw, 10);
  return Number.isNaN(value) ? null : value;
}

function extractAnchors($: cheerio.CheerioAPI, pageUrl: string): AnchorMeta[] {
  const anchors: AnchorMeta[] = [];

  $('a[href]').each((_, el) => {
    const href = resolveUrl($(el).attr('href'), pageUrl);
    if (!href) return;
    anchors.push({ href, text: collapse($(el).text()) });
  });

  return anchors;
}

function extractImages($: cheerio.CheerioAPI, pageUrl: string): ImageMeta[] {
  const images: ImageMeta[] = [];

  $('img').each((_, el) => {
    const img = $(el);
    const parent = img.parent();
    const link = img.closest('a[href]');
    const linkTarget = link.length > 0 ? resolveUrl(link.attr('href'), pageUrl) ?? '' : '';

    const contextParts = [collapse(parent.text())];
    parent
      .nextAll()
      .slice(0, CONTEXT_SIBLINGS)
      .each((__, sibling) => {
        contextParts.push(collapse($(sibling).text()));
      });

    images.push({
      src: resolveUrl(img.attr('src') || img.attr('data-src'), pageUrl) ?? '',
      altText: (img.attr('alt') ?? '').trim(),
      titleText: (img.attr('title') ?? '').trim(),
      width: parseDimension(img.attr('width')),
      height: parseDimension(img.attr('height')),
      isClickable: linkTarget !== '',
      linkTarget,
      contextText: contextParts.filter((part) => part.length > 0).join(' '),
    });
  });

  return images;
}

/**
 * Anything that can produce a FetchedPage for a URL (the fetcher, or a test double)
 */
export type PageSource = Pick<PageFetcher, 'fetch'>;
