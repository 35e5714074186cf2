/**
 * Brand name probes
 * Ordered, independent guesses at the brand a logo image stands for.
 * The chain stops at the first probe that names something.
 */

import { logger } from '../utils/logger.js';
import { BRAND_LINK_KEYWORDS } from '../crawler/url-patterns.js';
import type { BrandCandidate, ImageMeta, Oracle } from '../types/index.js';

export interface ProbeHit {
  brandName: string;
  extractionMethod: BrandCandidate['extractionMethod'];
}

export interface BrandProbe {
  name: string;
  probe(image: ImageMeta): Promise<ProbeHit | null>;
}

/** Path segments that name the listing rather than a brand */
const GENERIC_SEGMENTS = new Set(['brand', 'brands', 'manufacturer', 'manufacturers', 'company', 'companies']);

const UNKNOWN_ANSWER = 'UNKNOWN';

export function titleCase(text: string): string {
  return text
    .replace(/[-_]+/g, ' ')
    .split(/\s+/)
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(' ');
}

function imageHit(brandName: string): ProbeHit | null {
  const trimmed = brandName.trim();
  return trimmed ? { brandName: trimmed, extractionMethod: 'IMAGE_ANALYSIS' } : null;
}

/**
 * Brand from the wrapping link, when that link points at a brand/manufacturer page
 * e.g. https://acme.com/manufacturers/blue-river-pumps/ -> "Blue River Pumps"
 */
export function brandFromLinkTarget(linkTarget: string): string | null {
  const lowered = linkTarget.toLowerCase();
  if (!BRAND_LINK_KEYWORDS.some((keyword) => lowered.includes(keyword))) {
    return null;
  }

  let segments: string[];
  try {
    segments = new URL(linkTarget).pathname.split('/');
  } catch {
    return null;
  }

  for (const segment of segments.reverse()) {
    const bare = decodeSegment(segment).replace(/\.[a-z0-9]+$/i, '');
    if (bare.length > 2 && !GENERIC_SEGMENTS.has(bare.toLowerCase())) {
      return titleCase(bare);
    }
  }
  return null;
}

/**
 * Brand from the image file name: last path part, up to its first dot
 * e.g. .../uploads/acme_pumps-logo.png -> "Acme Pumps Logo"
 */
export function brandFromFilename(src: string): string | null {
  const path = src.split(/[?#]/)[0] ?? '';
  const filename = decodeSegment(path.split('/').pop() ?? '').split('.')[0] ?? '';
  if (filename.length <= 2) return null;
  const cleaned = titleCase(filename);
  return cleaned || null;
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

export const linkSegmentProbe: BrandProbe = {
  name: 'link-segment',
  async probe(image) {
    if (!image.isClickable || !image.linkTarget) return null;
    const name = brandFromLinkTarget(image.linkTarget);
    return name ? imageHit(name) : null;
  },
};

export const altTextProbe: BrandProbe = {
  name: 'alt-text',
  async probe(image) {
    return imageHit(image.altText);
  },
};

export const titleTextProbe: BrandProbe = {
  name: 'title-text',
  async probe(image) {
    return imageHit(image.titleText);
  },
};

export const filenameProbe: BrandProbe = {
  name: 'filename',
  async probe(image) {
    if (!image.src) return null;
    const name = brandFromFilename(image.src);
    return name ? imageHit(name) : null;
  },
};

/**
 * Ask the oracle to name a manufacturer from the text around the image
 * Oracle failures count as "no match".
 */
export function createContextOracleProbe(oracle: Oracle): BrandProbe {
  return {
    name: 'context-oracle',
    async probe(image) {
      if (!image.contextText.trim()) return null;

      try {
        const answer = await oracle.complete({
          userPrompt: `I'm analyzing text surrounding a brand logo image on a rep firm website.

Surrounding text: "${image.contextText}"

Identify any brand name or manufacturer name in this text.
Return only the brand name, or "${UNKNOWN_ANSWER}" if no clear brand is mentioned.
Focus on water/wastewater treatment equipment manufacturers.`,
          maxOutputTokens: 50,
          temperature: 0.1,
        });

        const brandName = answer.trim();
        if (!brandName || brandName.toUpperCase() === UNKNOWN_ANSWER) return null;
        return { brandName, extractionMethod: 'OCR_AI' };
      } catch (error) {
        logger.warn('Brand context analysis failed', {
          imageUrl: image.src,
          error: error instanceof Error ? error.message : String(error),
        });
        return null;
      }
    },
  };
}

/** Link segment, alt, title, filename, then the oracle on surrounding text */
export function createBrandProbeChain(oracle: Oracle): BrandProbe[] {
  return [linkSegmentProbe, altTextProbe, titleTextProbe, filenameProbe, createContextOracleProbe(oracle)];
}

export async function runProbeChain(probes: BrandProbe[], image: ImageMeta): Promise<ProbeHit | null> {
  for (const probe of probes) {
    const hit = await probe.probe(image);
    if (hit) {
      logger.debug('Brand probe matched', { probe: probe.name, brand: hit.brandName, imageUrl: image.src });
      return hit;
    }
  }
  return null;
}
