import { describe, it, expect } from 'vitest';
import { RecordAggregator, aggregate, normalize } from './normalizer.js';
import type { ProductSpaceRecord } from '../types/index.js';

function record(productCovered: string, productSpace: string, extra: Partial<ProductSpaceRecord> = {}): ProductSpaceRecord {
  return { repFirmName: 'Acme Rep', brandCarried: 'Blue River', productCovered, productSpace, ...extra };
}

describe('normalize', () => {
  it('should emit the product x space cartesian product', () => {
    const rows = normalize([record('Pumps, valves and filters', 'Flow Control/Filtration', { confidence: 'HIGH' })]);

    expect(rows.map((row) => [row.productCovered, row.productSpace])).toEqual([
      ['Pumps', 'Flow Control'],
      ['Pumps', 'Filtration'],
      ['valves', 'Flow Control'],
      ['valves', 'Filtration'],
      ['filters', 'Flow Control'],
      ['filters', 'Filtration'],
    ]);
    expect(rows.every((row) => row.brandCarried === 'Blue River' && row.confidence === 'HIGH')).toBe(true);
  });

  it('should split products on semicolons but not on slashes', () => {
    expect(normalize([record('Pumps; Mixers/Agitators', 'Mixing')]).map((row) => row.productCovered)).toEqual([
      'Pumps',
      'Mixers/Agitators',
    ]);
  });

  it('should split on "and" only as a separate word', () => {
    expect(normalize([record('Sand Filters', 'Filtration AND Screening')])).toEqual([
      record('Sand Filters', 'Filtration'),
      record('Sand Filters', 'Screening'),
    ]);
  });

  it('should drop tokens of two characters or fewer', () => {
    expect(normalize([record('UV and Ozone Systems', 'Disinfection')])).toEqual([
      record('Ozone Systems', 'Disinfection'),
    ]);
  });

  it('should keep the original value when no token survives', () => {
    expect(normalize([record('UV; RO', '')])).toEqual([record('UV; RO', '')]);
  });

  it('should be idempotent', () => {
    const once = normalize([
      record('Pumps, valves and filters', 'Flow Control/Filtration'),
      record('UV; RO', 'Disinfection; Membranes'),
    ]);

    expect(normalize(once)).toEqual(once);
  });
});

describe('aggregate', () => {
  it('should collapse identical rows found on two pages', () => {
    const row: ProductSpaceRecord = {
      repFirmName: 'Acme',
      brandCarried: 'Acme',
      productCovered: 'Filter',
      productSpace: 'Filtration',
    };

    expect(aggregate([[row], [{ ...row }]])).toEqual([row]);
  });

  it('should keep discovery order and rows that differ in an exported field', () => {
    const a = record('Pumps', 'Flow Control');
    const b = record('Pumps', 'Flow Control', { brandCarried: 'Red Rock' });
    const c = record('Valves', 'Flow Control');

    expect(aggregate([[a, b], [c, a]])).toEqual([a, b, c]);
  });

  it('should treat rows differing only in confidence as duplicates and keep the first', () => {
    const textOnly = record('Pumps', 'Flow Control');
    const fromFallback = record('Pumps', 'Flow Control', { confidence: 'LOW' });

    expect(aggregate([[textOnly], [fromFallback]])).toEqual([textOnly]);
    expect(aggregate([[fromFallback], [textOnly]])).toEqual([fromFallback]);
  });
});

describe('RecordAggregator', () => {
  it('should report how many rows were new', () => {
    const aggregator = new RecordAggregator();

    expect(aggregator.add([record('Pumps', 'Flow Control'), record('Valves', 'Flow Control')])).toBe(2);
    expect(aggregator.add([record('Pumps', 'Flow Control')])).toBe(0);
    expect(aggregator.size).toBe(2);
  });

  it('should hand out copies of its rows', () => {
    const aggregator = new RecordAggregator();
    aggregator.add([record('Pumps', 'Flow Control')]);

    const [first] = aggregator.records();
    if (first) first.productCovered = 'Changed';

    expect(aggregator.records()[0]?.productCovered).toBe('Pumps');
  });
});
