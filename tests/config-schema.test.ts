import { describe, it, expect } from 'vitest';
import { TaxalertConfigSchema, BROKER_NAMES } from '../src/config/schema.js';

describe('TaxalertConfigSchema', () => {
  it('fills every default from an empty object', () => {
    expect(TaxalertConfigSchema.parse({})).toEqual({
      brokers: {
        Lasair: { enabled: true, timeoutMs: 10_000 },
        ALeRCE: { enabled: true, timeoutMs: 10_000 },
        Fink: { enabled: true, timeoutMs: 10_000 },
      },
      taxonomy: { maxHops: 32 },
      fetch: { maxConcurrency: 3 },
      logging: { level: 'info', console: true, file: true },
    });
  });

  it('knows the three brokers', () => {
    expect(BROKER_NAMES).toEqual(['Lasair', 'ALeRCE', 'Fink']);
  });

  it('accepts per-broker overrides', () => {
    const config = TaxalertConfigSchema.parse({
      brokers: { Fink: { enabled: false, baseUrl: 'https://fink.test/api/v1', timeoutMs: 2000 } },
    });
    expect(config.brokers.Fink).toEqual({ enabled: false, baseUrl: 'https://fink.test/api/v1', timeoutMs: 2000 });
    expect(config.brokers.Lasair.enabled).toBe(true);
  });

  it('rejects unknown broker names', () => {
    expect(TaxalertConfigSchema.safeParse({ brokers: { Antares: {} } }).success).toBe(false);
  });

  it('bounds the timeout', () => {
    expect(TaxalertConfigSchema.safeParse({ brokers: { Lasair: { timeoutMs: 50 } } }).success).toBe(false);
    expect(TaxalertConfigSchema.safeParse({ brokers: { Lasair: { timeoutMs: 300_001 } } }).success).toBe(false);
  });

  it('rejects a non-positive hop ceiling', () => {
    expect(TaxalertConfigSchema.safeParse({ taxonomy: { maxHops: 0 } }).success).toBe(false);
  });

  it('rejects an unknown log level', () => {
    expect(TaxalertConfigSchema.safeParse({ logging: { level: 'verbose' } }).success).toBe(false);
  });

  it('rejects an empty base URL', () => {
    expect(TaxalertConfigSchema.safeParse({ brokers: { ALeRCE: { baseUrl: '' } } }).success).toBe(false);
  });
});
