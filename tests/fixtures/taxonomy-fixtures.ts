import type { TaxonomyDocumentInput } from '../../src/taxonomy/schema.js';

/**
 * Small taxonomy used across tests.
 *
 *   ~Root
 *   ├─ Supernova ─ SNII, SNIa
 *   ├─ AGN ─ Quasar
 *   ├─ Pulsating ─ RRLyrae
 *   └─ Other ─ Unknown, SolarSystemObject ─ Asteroid
 */
export const FIXTURE_TAXONOMY: TaxonomyDocumentInput = {
  ancestry: {
    Supernova: '~Root',
    AGN: '~Root',
    Pulsating: '~Root',
    Other: '~Root',
    SNII: 'Supernova',
    SNIa: 'Supernova',
    Quasar: 'AGN',
    RRLyrae: 'Pulsating',
    Unknown: 'Other',
    SolarSystemObject: 'Other',
    Asteroid: 'SolarSystemObject',
  },
  brokers: {
    Lasair: { labels: { VS: 'RRLyrae', SN: 'SNII', AGN: 'Quasar' } },
    ALeRCE: {
      labels: { SN: 'Supernova' },
      levels: {
        stamp: { SN: 'SNII', asteroid: 'Asteroid' },
        lc: { SNIa: 'SNIa', QSO: 'Quasar' },
      },
    },
    Fink: { labels: { fink_sso: 'Asteroid', QSO: 'Quasar' } },
  },
};

/** Copy of the fixture with a different ancestry map. */
export function withAncestry(
  ancestry: Record<string, string>,
  extra: Partial<TaxonomyDocumentInput> = {},
): TaxonomyDocumentInput {
  return { ...FIXTURE_TAXONOMY, brokers: {}, ...extra, ancestry };
}
