import { describe, it, expect } from 'vitest';
import {
  isCrawlableHref,
  isInternalUrl,
  isStaticAsset,
  matchesRelevanceKeyword,
  siteHost,
} from './url-patterns.js';

describe('isCrawlableHref', () => {
  it('should accept http and https pages', () => {
    expect(isCrawlableHref('https://acme.com/products')).toBe(true);
    expect(isCrawlableHref('http://acme.com/')).toBe(true);
  });

  it('should reject non-http schemes', () => {
    expect(isCrawlableHref('mailto:sales@acme.com')).toBe(false);
    expect(isCrawlableHref('tel:+15555550100')).toBe(false);
    expect(isCrawlableHref('javascript:void(0)')).toBe(false);
  });

  it('should reject binary assets', () => {
    expect(isCrawlableHref('https://acme.com/files/line-card.pdf')).toBe(false);
    expect(isCrawlableHref('https://acme.com/img/logo.PNG')).toBe(false);
    expect(isCrawlableHref('https://acme.com/assets/site.css?v=3')).toBe(false);
  });
});

describe('isStaticAsset', () => {
  it('should look only at the path, not the query', () => {
    expect(isStaticAsset('https://acme.com/download?file=catalog.pdf')).toBe(false);
  });

  it('should return false for unparseable URLs', () => {
    expect(isStaticAsset('not a url')).toBe(false);
  });
});

describe('siteHost', () => {
  it('should lowercase and drop a leading www.', () => {
    expect(siteHost('https://WWW.Acme-Rep.com/about')).toBe('acme-rep.com');
  });

  it('should return an empty string for unparseable URLs', () => {
    expect(siteHost('acme.com')).toBe('');
  });
});

describe('isInternalUrl', () => {
  it('should treat www and bare hosts as the same site', () => {
    expect(isInternalUrl('https://www.acme.com/brands', 'https://acme.com/')).toBe(true);
  });

  it('should treat other hosts and subdomains as external', () => {
    expect(isInternalUrl('https://pumpco.com/', 'https://acme.com/')).toBe(false);
    expect(isInternalUrl('https://shop.acme.com/', 'https://acme.com/')).toBe(false);
  });
});

describe('matchesRelevanceKeyword', () => {
  it('should match on the href', () => {
    expect(matchesRelevanceKeyword('https://acme.com/our-brands', 'Partners')).toBe(true);
  });

  it('should match on the text, case-insensitively', () => {
    expect(matchesRelevanceKeyword('https://acme.com/page-7', 'Line Sheet')).toBe(true);
  });

  it('should not match unrelated links', () => {
    expect(matchesRelevanceKeyword('https://acme.com/contact', 'Contact Us')).toBe(false);
  });
});
