import { describe, it, expect, vi, afterEach } from 'vitest';
import { createBrokerAdapter, createBrokerRegistry } from '../src/brokers/factory.js';
import { LasairAdapter } from '../src/brokers/lasair-adapter.js';
import { AlerceAdapter } from '../src/brokers/alerce-adapter.js';
import { FinkAdapter } from '../src/brokers/fink-adapter.js';
import { parseConfig } from '../src/config/loader.js';
import { makeMockLogger } from './helpers/mock-logger.js';
import { okJson } from './helpers/fetch-stub.js';

describe('createBrokerAdapter', () => {
  const defaults = { enabled: true, timeoutMs: 5000 };

  it('builds the adapter for each broker name', () => {
    expect(createBrokerAdapter('Lasair', { ...defaults, token: 'test-token' })).toBeInstanceOf(LasairAdapter);
    expect(createBrokerAdapter('ALeRCE', defaults)).toBeInstanceOf(AlerceAdapter);
    expect(createBrokerAdapter('Fink', defaults)).toBeInstanceOf(FinkAdapter);
  });

  it('resolves ${VAR} references in the token and base URL', () => {
    const adapter = createBrokerAdapter(
      'Lasair',
      { ...defaults, token: '${LASAIR_TOKEN}', baseUrl: 'https://${LASAIR_HOST}/api' },
      undefined,
      { LASAIR_TOKEN: 'test-token', LASAIR_HOST: 'lasair.test' },
    );

    expect(adapter.query({ identifiers: 'ZTF21abc' }).url).toBe(
      'https://lasair.test/api/objects/?objectIds=ZTF21abc&format=json&token=test-token',
    );
  });

  it('warns when Lasair has no token', () => {
    const logger = makeMockLogger();

    createBrokerAdapter('Lasair', { ...defaults, token: '${UNSET_TOKEN}' }, logger, {});

    expect(logger.warn).toHaveBeenCalledWith(expect.stringContaining('No Lasair token configured'), {
      broker: 'Lasair',
    });
  });

  it('gives each adapter a broker-scoped child logger', () => {
    const logger = makeMockLogger();

    createBrokerAdapter('Fink', defaults, logger);

    expect(logger.child).toHaveBeenCalledWith('Fink');
  });
});

describe('createBrokerRegistry', () => {
  it('registers every enabled broker in a fixed order', () => {
    const config = parseConfig({ brokers: { Lasair: { token: 'test-token' } } }, null, '/tmp');

    expect(createBrokerRegistry(config, undefined, {}).names()).toEqual(['Lasair', 'ALeRCE', 'Fink']);
  });

  it('skips disabled brokers', () => {
    const config = parseConfig({ brokers: { Lasair: { enabled: false }, Fink: { enabled: false } } }, null, '/tmp');

    const registry = createBrokerRegistry(config, makeMockLogger(), {});

    expect(registry.names()).toEqual(['ALeRCE']);
  });

  describe('configured concurrency', () => {
    afterEach(() => {
      vi.unstubAllGlobals();
    });

    function trackingFetch() {
      const stats = { active: 0, peak: 0 };
      const fetchStub = vi.fn(async () => {
        stats.active++;
        stats.peak = Math.max(stats.peak, stats.active);
        await new Promise((resolve) => setTimeout(resolve, 5));
        stats.active--;
        return okJson([]);
      });
      return { stats, fetchStub };
    }

    const jobs = [
      { broker: 'Lasair', parameters: { identifiers: 'ZTF21abc' } },
      { broker: 'ALeRCE', parameters: { identifiers: 'ZTF21abc' } },
      { broker: 'Fink', parameters: { identifiers: 'ZTF21abc' } },
    ];

    it('bounds collectAlerts by fetch.maxConcurrency', async () => {
      const { stats, fetchStub } = trackingFetch();
      vi.stubGlobal('fetch', fetchStub);
      const config = parseConfig(
        { brokers: { Lasair: { token: 'test-token' } }, fetch: { maxConcurrency: 1 } },
        null,
        '/tmp',
      );

      const results = await createBrokerRegistry(config, undefined, {}).collectAlerts(jobs);

      expect(results.every((r) => r.ok)).toBe(true);
      expect(fetchStub).toHaveBeenCalledTimes(3);
      expect(stats.peak).toBe(1);
    });

    it('lets a per-call concurrency override the configured bound', async () => {
      const { stats, fetchStub } = trackingFetch();
      vi.stubGlobal('fetch', fetchStub);
      const config = parseConfig(
        { brokers: { Lasair: { token: 'test-token' } }, fetch: { maxConcurrency: 1 } },
        null,
        '/tmp',
      );

      await createBrokerRegistry(config, undefined, {}).collectAlerts(jobs, { concurrency: 3 });

      expect(stats.peak).toBe(3);
    });
  });
});
