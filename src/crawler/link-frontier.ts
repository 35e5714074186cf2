/**
 * Link Frontier
 * Breadth-first crawl of one site that records every acceptable link it sees
 */

import { logger } from '../utils/logger.js';
import { isCrawlableHref, isInternalUrl, MAX_EXTERNAL_LINK_TEXT } from './url-patterns.js';
import type { AnchorMeta, CrawlResult, Link } from '../types/index.js';
import type { PageSource } from '../scraper/page-fetcher.js';

/**
 * Internal queue item for breadth-first crawling
 */
interface QueueItem {
  url: string;
  depth: number;
}

export class LinkFrontier {
  constructor(private readonly pages: PageSource) {}

  /**
   * Crawl from rootUrl down to maxDepth
   *
   * Pages at maxDepth are fetched and their links recorded, but not expanded.
   * Internal links are expanded; external links are recorded only when they carry
   * a short visible label. A page that fails to load contributes zero links.
   *
   * @param maxLinksPerPage - Cap on newly accepted links per page
   */
  async crawl(rootUrl: string, maxDepth: number, maxLinksPerPage: number): Promise<CrawlResult> {
    if (!Number.isInteger(maxDepth) || maxDepth < 0) {
      throw new RangeError(`maxDepth must be a non-negative integer, got ${maxDepth}`);
    }
    if (!Number.isInteger(maxLinksPerPage) || maxLinksPerPage < 0) {
      throw new RangeError(`maxLinksPerPage must be a non-negative integer, got ${maxLinksPerPage}`);
    }

    const root = resolveRoot(rootUrl);
    const visited = new Set<string>();
    const visitedPages: string[] = [];
    const queued = new Set<string>([root]);
    const queue: QueueItem[] = [{ url: root, depth: 0 }];
    const links: Link[] = [];
    const recorded = new Set<string>();
    const errors: CrawlResult['errors'] = [];

    logger.info('Starting link extraction', { rootUrl: root, maxDepth, maxLinksPerPage });

    while (queue.length > 0) {
      const item = queue.shift();
      if (!item) break;
      const { url, depth } = item;

      if (visited.has(url) || depth > maxDepth) {
        continue;
      }

      visited.add(url);
      visitedPages.push(url);

      let anchors: AnchorMeta[];
      try {
        anchors = (await this.pages.fetch(url)).anchors;
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.warn('Failed to extract links from page', { url, depth, error: message });
        errors.push({ url, error: message });
        continue;
      }

      let accepted = 0;

      for (const anchor of anchors) {
        if (accepted >= maxLinksPerPage) break;

        const href = anchor.href.trim();
        const text = anchor.text.trim();

        if (!isCrawlableHref(href)) continue;

        if (isInternalUrl(href, root)) {
          if (recorded.has(href)) continue;

          links.push({ href, displayText: text || `Link_${accepted}`, depth, sourcePage: url });
          recorded.add(href);
          accepted++;

          if (depth < maxDepth && !visited.has(href) && !queued.has(href)) {
            queue.push({ url: href, depth: depth + 1 });
            queued.add(href);
          }
        } else if (text.length > 0 && text.length < MAX_EXTERNAL_LINK_TEXT) {
          if (recorded.has(href)) continue;

          links.push({ href, displayText: text, depth, sourcePage: url });
          recorded.add(href);
          accepted++;
        }
      }

      logger.debug('Extracted links from page', {
        url,
        depth,
        accepted,
        queueSize: queue.length,
      });
    }

    logger.info('Link extraction completed', {
      rootUrl: root,
      links: links.length,
      pagesVisited: visitedPages.length,
      errorCount: errors.length,
    });

    return { rootUrl: root, links, visitedPages, errors };
  }
}

/**
 * Resolve the root the same way anchor hrefs are resolved, so the root and a
 * link back to it compare equal
 */
function resolveRoot(rootUrl: string): string {
  const trimmed = rootUrl.trim();
  try {
    return new URL(trimmed).href;
  } catch {
    return trimmed;
  }
}
