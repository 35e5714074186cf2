/**
 * URL Pattern Filtering
 * Link acceptance rules and the keyword lists used to judge relevance
 */

/**
 * Keywords that mark a link as a likely product / line sheet page
 * Used by the Relevance Selector's deterministic fallback
 */
export const RELEVANCE_KEYWORDS: readonly string[] = [
  'manufacturer',
  'product',
  'equipment',
  'brand',
  'catalog',
  'line sheet',
];

/**
 * Keywords that mark an image's link target as pointing at a brand page
 */
export const BRAND_LINK_KEYWORDS: readonly string[] = ['brand', 'manufacturer', 'company'];

/** External anchor text at or above this length is treated as body copy, not a link label */
export const MAX_EXTERNAL_LINK_TEXT = 100;

/**
 * Checks if a URL is an http(s) URL
 */
export function isHttpUrl(url: string): boolean {
  try {
    const { protocol } = new URL(url);
    return protocol === 'http:' || protocol === 'https:';
  } catch {
    return false;
  }
}

/**
 * Checks if a URL points at a binary asset (documents, images, archives, stylesheets, scripts)
 * @param url - Full URL to check
 * @returns true if the URL path ends in a non-page extension
 */
export function isStaticAsset(url: string): boolean {
  try {
    const path = new URL(url).pathname.toLowerCase();

    return /\.(pdf|doc|docx|xls|xlsx|ppt|pptx|jpg|jpeg|png|gif|svg|webp|bmp|ico|tif|tiff|zip|rar|7z|gz|tar|css|js|mjs|woff|woff2|ttf|eot|mp4|mp3|webm)$/i.test(
      path
    );
  } catch {
    return false;
  }
}

/**
 * Checks if an anchor target is worth recording at all
 */
export function isCrawlableHref(href: string): boolean {
  return isHttpUrl(href) && !isStaticAsset(href);
}

/**
 * Hostname with any leading "www." removed, lowercased
 * @returns Empty string for unparseable URLs
 */
export function siteHost(url: string): string {
  try {
    return new URL(url).hostname.toLowerCase().replace(/^www\./, '');
  } catch {
    return '';
  }
}

/**
 * Checks if a URL belongs to the same site as the root URL
 */
export function isInternalUrl(url: string, rootUrl: string): boolean {
  const host = siteHost(url);
  return host !== '' && host === siteHost(rootUrl);
}

/**
 * Checks if a link's href or text contains any of the relevance keywords
 */
export function matchesRelevanceKeyword(href: string, text: string): boolean {
  const haystackHref = href.toLowerCase();
  const haystackText = text.toLowerCase();
  return RELEVANCE_KEYWORDS.some(
    (keyword) => haystackHref.includes(keyword) || haystackText.includes(keyword)
  );
}
