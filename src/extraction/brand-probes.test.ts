import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  brandFromFilename,
  brandFromLinkTarget,
  createBrandProbeChain,
  runProbeChain,
  titleCase,
} from './brand-probes.js';
import { StubOracle, PROMPTS } from '../__fixtures__/stub-oracle.js';
import type { ImageMeta } from '../types/index.js';

// Mock logger to prevent console output during tests
vi.mock('../utils/logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

function image(overrides: Partial<ImageMeta>): ImageMeta {
  return {
    src: '',
    altText: '',
    titleText: '',
    width: 120,
    height: 60,
    isClickable: false,
    linkTarget: '',
    contextText: '',
    ...overrides,
  };
}

describe('titleCase', () => {
  it('should turn separators into spaces and capitalize each word', () => {
    expect(titleCase('blue-river_PUMPS')).toBe('Blue River Pumps');
  });
});

describe('brandFromLinkTarget', () => {
  it('should name the brand from the last meaningful path segment', () => {
    expect(brandFromLinkTarget('https://acme.com/manufacturers/blue-river-pumps/')).toBe('Blue River Pumps');
  });

  it('should skip bare listing segments', () => {
    expect(brandFromLinkTarget('https://acme.com/brands/')).toBeNull();
  });

  it('should ignore links that do not point at a brand page', () => {
    expect(brandFromLinkTarget('https://acme.com/products/clarifiers')).toBeNull();
  });

  it('should drop a page extension', () => {
    expect(brandFromLinkTarget('https://acme.com/company/delta_valves.html')).toBe('Delta Valves');
  });
});

describe('brandFromFilename', () => {
  it('should clean the file name up to its first dot', () => {
    expect(brandFromFilename('https://acme.com/uploads/ozone-systems.logo.png?w=200')).toBe('Ozone Systems');
  });

  it('should reject names of two characters or fewer', () => {
    expect(brandFromFilename('https://acme.com/img/ab.png')).toBeNull();
  });
});

describe('brand probe chain', () => {
  let oracle: StubOracle;

  beforeEach(() => {
    vi.clearAllMocks();
    oracle = new StubOracle();
  });

  it('should prefer the link segment over alt text', async () => {
    const hit = await runProbeChain(
      createBrandProbeChain(oracle),
      image({
        isClickable: true,
        linkTarget: 'https://acme.com/brands/blue-river',
        altText: 'Logo',
        src: 'https://acme.com/img/br.png',
      })
    );

    expect(hit).toEqual({ brandName: 'Blue River', extractionMethod: 'IMAGE_ANALYSIS' });
  });

  it('should use alt, then title, then filename', async () => {
    const probes = createBrandProbeChain(oracle);

    expect(await runProbeChain(probes, image({ altText: ' Delta Valves ', titleText: 'Other' }))).toEqual({
      brandName: 'Delta Valves',
      extractionMethod: 'IMAGE_ANALYSIS',
    });
    expect(await runProbeChain(probes, image({ titleText: 'Ozone Systems', src: 'https://acme.com/x.png' }))).toEqual({
      brandName: 'Ozone Systems',
      extractionMethod: 'IMAGE_ANALYSIS',
    });
    expect(await runProbeChain(probes, image({ src: 'https://acme.com/img/aqua_flow.jpg' }))).toEqual({
      brandName: 'Aqua Flow',
      extractionMethod: 'IMAGE_ANALYSIS',
    });
    expect(oracle.requests).toHaveLength(0);
  });

  it('should ask the oracle about the surrounding text as a last resort', async () => {
    oracle.on(PROMPTS.brandContext, 'Delta Valves');

    const hit = await runProbeChain(
      createBrandProbeChain(oracle),
      image({ src: 'https://acme.com/img/1.png', contextText: 'Delta Valves check valves' })
    );

    expect(hit).toEqual({ brandName: 'Delta Valves', extractionMethod: 'OCR_AI' });
    expect(oracle.requests[0]?.maxOutputTokens).toBe(50);
  });

  it('should treat an UNKNOWN answer as no match', async () => {
    oracle.on(PROMPTS.brandContext, 'unknown');

    const hit = await runProbeChain(createBrandProbeChain(oracle), image({ contextText: 'Call us today' }));

    expect(hit).toBeNull();
  });

  it('should treat an oracle failure as no match', async () => {
    oracle.on(PROMPTS.brandContext, new Error('Request timed out'));

    expect(await runProbeChain(createBrandProbeChain(oracle), image({ contextText: 'Call us today' }))).toBeNull();
  });

  it('should not ask the oracle when there is no surrounding text', async () => {
    expect(await runProbeChain(createBrandProbeChain(oracle), image({}))).toBeNull();
    expect(oracle.requests).toHaveLength(0);
  });
});
