import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ProductExtractor, UNAVAILABLE_BRAND, fallbackDraft, toDraft } from './product-extractor.js';
import { StubOracle, PROMPTS } from '../__fixtures__/stub-oracle.js';

// Mock logger to prevent console output during tests
vi.mock('../utils/logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

const FALLBACK = {
  repFirmName: 'Acme Rep',
  brandCarried: UNAVAILABLE_BRAND,
  productCovered: 'Water/Wastewater Treatment Equipment',
  productSpace: 'General',
};

describe('ProductExtractor', () => {
  let oracle: StubOracle;

  beforeEach(() => {
    vi.clearAllMocks();
    oracle = new StubOracle();
  });

  it('should return the rows of a JSON array answer', async () => {
    oracle.on(
      PROMPTS.extraction,
      `\`\`\`json
[
  {"Rep Firm Name": "Acme Rep", "Brand Carried": "Blue River", "Product Covered": "Clarifiers", "Product Space": "Clarification"},
  {"Rep Firm Name": "Acme Rep", "Brand Carried": "Delta Valves", "Product Covered": "Check Valves", "Space": "Flow Control"}
]
\`\`\``
    );

    const drafts = await new ProductExtractor(oracle).extract('Clarifiers and check valves', 'Acme Rep');

    expect(drafts).toEqual([
      { repFirmName: 'Acme Rep', brandCarried: 'Blue River', productCovered: 'Clarifiers', productSpace: 'Clarification' },
      { repFirmName: 'Acme Rep', brandCarried: 'Delta Valves', productCovered: 'Check Valves', productSpace: 'Flow Control' },
    ]);
  });

  it('should emit exactly one fallback row for an unstructured answer', async () => {
    oracle.on(PROMPTS.extraction, 'Brand A carries pumps, valves, and filters');

    expect(await new ProductExtractor(oracle).extract('Pumps, valves and filters', 'Acme Rep')).toEqual([FALLBACK]);
  });

  it('should emit the fallback row when the oracle fails', async () => {
    oracle.on(PROMPTS.extraction, new Error('Request timed out'));

    expect(await new ProductExtractor(oracle).extract('Pumps', 'Acme Rep')).toEqual([FALLBACK]);
  });

  it('should emit the fallback row when every row is invalid', async () => {
    oracle.on(PROMPTS.extraction, '[42, "pumps", {"Brand Carried": {"name": "X"}}]');

    expect(await new ProductExtractor(oracle).extract('Pumps', 'Acme Rep')).toEqual([FALLBACK]);
  });

  it('should drop invalid rows and keep the rest', async () => {
    oracle.on(
      PROMPTS.extraction,
      '[{"Brand Carried": ["X"]}, {"Brand Carried": "Blue River", "Product Covered": "Clarifiers", "Product Space": "Clarification"}]'
    );

    expect(await new ProductExtractor(oracle).extract('Clarifiers', 'Acme Rep')).toEqual([
      { repFirmName: 'Acme Rep', brandCarried: 'Blue River', productCovered: 'Clarifiers', productSpace: 'Clarification' },
    ]);
  });

  it('should send a bounded preview of the page text', async () => {
    oracle.on(PROMPTS.extraction, '[]');
    const text = 'a'.repeat(10000) + 'TAIL-MARKER';

    await new ProductExtractor(oracle).extract(text, 'Acme Rep');

    const request = oracle.requests[0];
    expect(request?.userPrompt).toContain('Rep Firm Name: Acme Rep');
    expect(request?.userPrompt).not.toContain('TAIL-MARKER');
    expect(request?.maxOutputTokens).toBe(2000);
    expect(request?.systemPrompt).toContain('JSON array');
  });
});

describe('toDraft', () => {
  it('should fill missing fields with empty strings and the firm name with the hint', () => {
    expect(toDraft({ 'Product Covered': 'Screens' }, 'Acme Rep')).toEqual({
      repFirmName: 'Acme Rep',
      brandCarried: '',
      productCovered: 'Screens',
      productSpace: '',
    });
  });

  it('should stringify numeric cells and treat null as missing', () => {
    expect(toDraft({ 'Brand Carried': 3000, 'Product Covered': null, 'Product Space': 'Filtration' }, 'Acme')).toEqual({
      repFirmName: 'Acme',
      brandCarried: '3000',
      productCovered: '',
      productSpace: 'Filtration',
    });
  });

  it('should reject rows with no product information', () => {
    expect(toDraft({ 'Rep Firm Name': 'Acme Rep' }, 'Acme Rep')).toBeNull();
    expect(toDraft('Clarifiers', 'Acme Rep')).toBeNull();
  });
});

describe('fallbackDraft', () => {
  it('should carry the firm name hint', () => {
    expect(fallbackDraft('Acme Rep')).toEqual(FALLBACK);
  });
});
