import { z } from 'zod';
import type { ClassificationRecord } from '../classification/types.js';
import type { Logger } from '../logging/logger.js';
import {
  MAGNITUDE_UNKNOWN,
  MJD_OFFSET,
  selectStrategy,
  type Alert,
  type BrokerAdapter,
  type BrokerQuery,
  type RawResponse,
  type RemoteRequest,
  type TargetSeed,
} from './adapter.js';
import { bodyItems, requestJson } from './http.js';
import { checkAlert, parseTwoShapes } from './shapes.js';

export const LASAIR_API_URL = 'https://lasair-ztf.lsst.ac.uk/api';
const LASAIR_WEB_URL = 'https://lasair-ztf.lsst.ac.uk';

const SELECTED_COLUMNS = [
  'objects.objectId',
  'objects.ramean',
  'objects.decmean',
  'objects.jdmax',
  'sherlock_classifications.classification',
  'sherlock_classifications.classificationReliability',
].join(', ');

const QUERY_TABLES = 'objects, sherlock_classifications';

/**
 * Configuration for connecting to Lasair.
 */
export interface LasairConfig {
  /** API base URL (defaults to LASAIR_API_URL). */
  baseUrl?: string;
  /** Lasair API token, sent as the `token` query parameter. */
  token?: string;
  timeoutMs: number;
}

// Object detail: `objectData` summary plus the candidate (detection) list.
const LasairDetailSchema = z.object({
  objectId: z.string(),
  objectData: z.object({
    ramean: z.number(),
    decmean: z.number(),
    jdmax: z.number(),
    glonmean: z.number().optional(),
    glatmean: z.number().optional(),
  }),
  candidates: z.array(
    z
      .object({
        candid: z.union([z.number(), z.string()]).optional(),
        magpsf: z.number().nullable().optional(),
      })
      .passthrough(),
  ),
  sherlock: z
    .object({
      classification: z.string().optional(),
      classificationReliability: z.number().nullable().optional(),
    })
    .passthrough()
    .optional(),
});

// Row from /query/ or /objects/: flat summary columns.
const LasairSummarySchema = z.object({
  objectId: z.string(),
  ramean: z.number(),
  decmean: z.number(),
  jdmax: z.number(),
  classification: z.string().nullable().optional(),
  classificationReliability: z.number().nullable().optional(),
});

/**
 * Lasair implementation of BrokerAdapter.
 *
 * Uses the Lasair REST API: `/objects/` for identifier lookups and `/query/`
 * for time-window and free-form queries against the objects and Sherlock
 * classification tables.
 */
export class LasairAdapter implements BrokerAdapter {
  readonly name = 'Lasair';
  readonly supportsFreeform = true;

  private readonly baseUrl: string;

  constructor(
    private readonly config: LasairConfig,
    private readonly logger?: Logger,
  ) {
    this.baseUrl = (config.baseUrl ?? LASAIR_API_URL).replace(/\/+$/, '');
  }

  query(parameters: BrokerQuery): RemoteRequest {
    const resolved = selectStrategy(parameters, { supportsFreeform: this.supportsFreeform, broker: this.name });

    switch (resolved.strategy) {
      case 'identifier':
        return this.get(resolved.strategy, '/objects/', {
          objectIds: resolved.identifiers.join(','),
          format: 'json',
        });

      case 'time-window':
        return this.get(resolved.strategy, '/query/', {
          selected: SELECTED_COLUMNS,
          tables: QUERY_TABLES,
          conditions: `objects.jdmax>${resolved.mjdMin + MJD_OFFSET} AND objects.jdmax<${resolved.mjdMax + MJD_OFFSET}`,
          limit: String(resolved.limit),
          offset: String(resolved.offset),
          format: 'json',
        });

      case 'freeform':
        return this.get(resolved.strategy, '/query/', {
          selected: SELECTED_COLUMNS,
          tables: QUERY_TABLES,
          conditions: resolved.text,
          limit: String(resolved.limit),
          offset: String(resolved.offset),
          format: 'json',
        });
    }
  }

  async fetch(request: RemoteRequest, signal?: AbortSignal): Promise<RawResponse> {
    const body = await requestJson(request, { timeoutMs: this.config.timeoutMs, signal, logger: this.logger });
    return { request, items: bodyItems(body, request) };
  }

  normalize(raw: unknown): Alert {
    const parsed = this.parse(raw);

    if (parsed.shape === 'rich') {
      const { objectId, objectData, candidates } = parsed.value;
      const magnitude = candidates.find((c) => typeof c.magpsf === 'number')?.magpsf;
      return checkAlert({
        broker: this.name,
        sourceId: objectId,
        displayUrl: this.displayUrl(objectId),
        name: objectId,
        ra: objectData.ramean,
        dec: objectData.decmean,
        detectionTime: objectData.jdmax - MJD_OFFSET,
        magnitude: magnitude ?? MAGNITUDE_UNKNOWN,
        score: 1,
      });
    }

    const row = parsed.value;
    return checkAlert({
      broker: this.name,
      sourceId: row.objectId,
      displayUrl: this.displayUrl(row.objectId),
      name: row.objectId,
      ra: row.ramean,
      dec: row.decmean,
      detectionTime: row.jdmax - MJD_OFFSET,
      magnitude: MAGNITUDE_UNKNOWN,
      score: 1,
    });
  }

  toTarget(raw: unknown): TargetSeed {
    const parsed = this.parse(raw);
    if (parsed.shape === 'rich') {
      const { objectId, objectData } = parsed.value;
      return {
        name: objectId,
        type: 'SIDEREAL',
        ra: objectData.ramean,
        dec: objectData.decmean,
        galacticLng: objectData.glonmean,
        galacticLat: objectData.glatmean,
      };
    }
    const row = parsed.value;
    return { name: row.objectId, type: 'SIDEREAL', ra: row.ramean, dec: row.decmean };
  }

  /**
   * Sherlock's contextual classification. Reliability 1 is the strongest
   * association, so confidence is its reciprocal; no reliability means 1.
   */
  extractClassifications(raw: unknown): ClassificationRecord[] {
    const parsed = this.parse(raw);
    const sherlock = parsed.shape === 'rich' ? parsed.value.sherlock : parsed.value;
    const label = sherlock?.classification;
    if (!label) return [];

    const reliability = sherlock?.classificationReliability;
    const confidence = typeof reliability === 'number' && reliability >= 1 ? 1 / reliability : 1;
    return [{ source: this.name, level: 'sherlock', label, confidence }];
  }

  private parse(raw: unknown) {
    return parseTwoShapes(raw, {
      broker: this.name,
      rich: LasairDetailSchema,
      flat: LasairSummarySchema,
      discriminators: ['objectData', 'candidates'],
    });
  }

  private displayUrl(objectId: string): string {
    return `${LASAIR_WEB_URL}/objects/${encodeURIComponent(objectId)}/`;
  }

  private get(strategy: RemoteRequest['strategy'], path: string, params: Record<string, string>): RemoteRequest {
    const search = new URLSearchParams(params);
    if (this.config.token) {
      search.set('token', this.config.token);
    }
    return {
      broker: this.name,
      strategy,
      method: 'GET',
      url: `${this.baseUrl}${path}?${search.toString()}`,
    };
  }
}
