import { describe, it, expect, vi, beforeAll, afterAll, beforeEach, afterEach, type MockInstance } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import chalk from 'chalk';
import { buildProgram } from '../src/cli/program.js';
import { FIXTURE_TAXONOMY } from './fixtures/taxonomy-fixtures.js';
import { okJson } from './helpers/fetch-stub.js';

describe('taxalert CLI', () => {
  let dir: string;
  let configPath: string;
  let taxonomyPath: string;
  let recordsPath: string;
  let logSpy: MockInstance<typeof console.log>;

  beforeAll(async () => {
    chalk.level = 0;
    dir = await mkdtemp(join(tmpdir(), 'taxalert-cli-'));
    taxonomyPath = join(dir, 'taxonomy.json');
    configPath = join(dir, 'taxalert.config.json');
    recordsPath = join(dir, 'records.json');

    await writeFile(taxonomyPath, JSON.stringify(FIXTURE_TAXONOMY), 'utf-8');
    await writeFile(
      configPath,
      JSON.stringify({
        brokers: { Lasair: { token: 'test-token' }, Fink: { enabled: false } },
        taxonomy: { path: 'taxonomy.json' },
        logging: { console: false, file: false },
      }),
      'utf-8',
    );
    await writeFile(
      recordsPath,
      JSON.stringify([
        { source: 'Lasair', level: 'sherlock', label: 'SN', confidence: 0.5 },
        { source: 'Fink', level: 'classification', classification: 'fink_sso', probability: 0.3 },
      ]),
      'utf-8',
    );
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllGlobals();
  });

  async function run(...args: string[]): Promise<string[]> {
    await buildProgram().exitOverride().parseAsync(['node', 'taxalert', ...args]);
    return logSpy.mock.calls.map((call) => String(call[0]));
  }

  it('lists the enabled brokers', async () => {
    expect(await run('brokers', '-c', configPath)).toEqual(['Lasair (free-form queries)', 'ALeRCE']);
  });

  it('prints the aggregated tree', async () => {
    expect(await run('aggregate', recordsPath, '-c', configPath)).toEqual([
      '~Root 0.80',
      '  Supernova 0.50',
      '    SNII 0.50',
      '  Other 0.30',
      '    SolarSystemObject 0.30',
      '      Asteroid 0.30',
    ]);
  });

  it('prints the node list as JSON', async () => {
    const [output] = await run('aggregate', recordsPath, '-c', configPath, '--json');

    expect(JSON.parse(output ?? '')).toEqual([
      { label: 'SNII', parent: 'Supernova', weight: 0.5 },
      { label: 'Supernova', parent: '~Root', weight: 0.5 },
      { label: '~Root', parent: '', weight: 0.8 },
      { label: 'Asteroid', parent: 'SolarSystemObject', weight: 0.3 },
      { label: 'SolarSystemObject', parent: 'Other', weight: 0.3 },
      { label: 'Other', parent: '~Root', weight: 0.3 },
    ]);
  });

  it('validates a taxonomy document', async () => {
    expect(await run('taxonomy', 'check', taxonomyPath, '-c', configPath)).toEqual([
      `✓ ${taxonomyPath} is valid`,
      '  codes:   11',
      '  brokers: Lasair, ALeRCE, Fink',
    ]);
  });

  it('fetches and prints alerts from a broker', async () => {
    const fetchStub = vi.fn().mockResolvedValue(
      okJson({
        items: [{ oid: 'ZTF20aaelulu', meanra: 185.7286, meandec: 15.8236, lastmjd: 60050.3 }],
      }),
    );
    vi.stubGlobal('fetch', fetchStub);

    const lines = await run('alerts', 'ALeRCE', '-c', configPath, '--ids', 'ZTF20aaelulu', '--json');

    expect(fetchStub).toHaveBeenCalledTimes(1);
    expect(fetchStub.mock.calls[0]?.[0]).toBe(
      'https://api.alerce.online/ztf/v1/objects?oid=ZTF20aaelulu&page_size=20&page=1',
    );
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? '')).toMatchObject({ broker: 'ALeRCE', sourceId: 'ZTF20aaelulu', score: 1 });
  });
});
