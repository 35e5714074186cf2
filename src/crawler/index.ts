/**
 * Crawler Module
 * Exports all crawler-related functionality
 */

// Breadth-first link discovery
export { LinkFrontier } from './link-frontier.js';

// Page selection
export { RelevanceSelector, MAX_SELECTED_PAGES, parseSelectedUrls } from './relevance-selector.js';

// URL pattern matching and filtering
export {
  RELEVANCE_KEYWORDS,
  BRAND_LINK_KEYWORDS,
  MAX_EXTERNAL_LINK_TEXT,
  isHttpUrl,
  isStaticAsset,
  isCrawlableHref,
  siteHost,
  isInternalUrl,
  matchesRelevanceKeyword,
} from './url-patterns.js';
