import { describe, it, expect } from 'vitest';
import { selectStrategy, DEFAULT_LIMIT, type BrokerQuery } from '../src/brokers/adapter.js';
import { ValidationError } from '../src/errors.js';

const lasair = { supportsFreeform: true, broker: 'Lasair' };
const alerce = { supportsFreeform: false, broker: 'ALeRCE' };

function fieldOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof ValidationError) return err.field;
    throw err;
  }
  return undefined;
}

describe('selectStrategy', () => {
  it('picks the identifier strategy and splits comma-separated ids', () => {
    expect(selectStrategy({ identifiers: ' ZTF21abc, ,ZTF22xyz ' }, lasair)).toEqual({
      strategy: 'identifier',
      identifiers: ['ZTF21abc', 'ZTF22xyz'],
      limit: DEFAULT_LIMIT,
      offset: 0,
    });
  });

  it('accepts an identifier list', () => {
    const resolved = selectStrategy({ identifiers: ['ZTF21abc', ''] }, lasair);
    expect(resolved).toMatchObject({ strategy: 'identifier', identifiers: ['ZTF21abc'] });
  });

  it('prefers identifiers over a time window and free text', () => {
    const query: BrokerQuery = { identifiers: 'ZTF21abc', mjdMin: 60000, mjdMax: 60010, freeform: 'x' };
    expect(selectStrategy(query, lasair).strategy).toBe('identifier');
  });

  it('prefers a complete time window over free text', () => {
    expect(selectStrategy({ mjdMin: 60000, mjdMax: 60010, freeform: 'x' }, lasair)).toEqual({
      strategy: 'time-window',
      mjdMin: 60000,
      mjdMax: 60010,
      limit: 20,
      offset: 0,
    });
  });

  it('falls through to free text when only one bound is set', () => {
    expect(selectStrategy({ mjdMin: 60000, freeform: ' objects.ncand > 3 ' }, lasair)).toEqual({
      strategy: 'freeform',
      text: 'objects.ncand > 3',
      limit: 20,
      offset: 0,
    });
  });

  it('treats blank identifiers as absent', () => {
    expect(selectStrategy({ identifiers: ' , ', mjdMin: 1, mjdMax: 2 }, lasair).strategy).toBe('time-window');
  });

  it('carries limit and offset through', () => {
    expect(selectStrategy({ identifiers: 'a', limit: 5, offset: 10 }, lasair)).toMatchObject({ limit: 5, offset: 10 });
  });

  it('rejects empty parameters', () => {
    expect(() => selectStrategy({}, lasair)).toThrow(ValidationError);
    expect(fieldOf(() => selectStrategy({ identifiers: '', freeform: '  ' }, lasair))).toBe('parameters');
  });

  it('rejects a window whose lower bound is not below the upper bound', () => {
    expect(() => selectStrategy({ mjdMin: 60010, mjdMax: 60010 }, lasair)).toThrow(
      'mjdMin (60010) must be less than mjdMax (60010)',
    );
    expect(fieldOf(() => selectStrategy({ mjdMin: 60011, mjdMax: 60010 }, lasair))).toBe('mjdMin');
  });

  it('rejects free text for brokers without free-form support', () => {
    expect(() => selectStrategy({ freeform: 'anything' }, alerce)).toThrow(
      'ALeRCE does not support free-form queries',
    );
    expect(fieldOf(() => selectStrategy({ freeform: 'anything' }, alerce))).toBe('freeform');
  });

  it('rejects out-of-range limits', () => {
    expect(fieldOf(() => selectStrategy({ identifiers: 'a', limit: 0 }, lasair))).toBe('limit');
    expect(fieldOf(() => selectStrategy({ identifiers: 'a', limit: 2.5 }, lasair))).toBe('limit');
  });

  it('rejects non-finite bounds', () => {
    expect(fieldOf(() => selectStrategy({ mjdMin: Number.NaN, mjdMax: 60010 }, lasair))).toBe('mjdMin');
  });
});
