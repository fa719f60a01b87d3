import { fileURLToPath } from 'node:url';
import { ConfigurationError } from '../errors.js';
import type { Logger } from '../logging/logger.js';
import { readJSON } from '../util/fs.js';
import { TaxonomyTable } from './taxonomy-table.js';

/** The taxonomy shipped with the package, built from the brokers' published class lists. */
export const DEFAULT_TAXONOMY_PATH = fileURLToPath(
  new URL('../../taxonomy/default-taxonomy.json', import.meta.url),
);

/**
 * Read and validate a taxonomy document. Called once at startup; the
 * returned table is read-only for the life of the process.
 */
export async function loadTaxonomy(
  path: string = DEFAULT_TAXONOMY_PATH,
  opts: { maxHops?: number; logger?: Logger } = {},
): Promise<TaxonomyTable> {
  let raw: unknown;
  try {
    raw = await readJSON(path);
  } catch (err) {
    throw new ConfigurationError(
      `Failed to read taxonomy ${path}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  const table = TaxonomyTable.fromDocument(raw, { maxHops: opts.maxHops });

  opts.logger?.event({
    type: 'taxonomy-loaded',
    path,
    codes: table.codes().length,
    brokers: table.brokers(),
  });

  return table;
}
