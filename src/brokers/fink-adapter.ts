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

export const FINK_API_URL = 'https://api.fink-portal.org/api/v1';
const FINK_WEB_URL = 'https://fink-portal.org';

/** Unix epoch expressed as MJD. */
const MJD_UNIX_EPOCH = 40_587;

export interface FinkConfig {
  baseUrl?: string;
  token?: string;
  timeoutMs: number;
}

// Full alert row, candidate columns included.
const FinkAlertSchema = z
  .object({
    'i:objectId': z.string(),
    'i:ra': z.number(),
    'i:dec': z.number(),
    'i:jd': z.number(),
    'i:magpsf': z.number(),
    'v:classification': z.string().optional(),
  })
  .passthrough();

// Reduced row without photometry.
const FinkSummarySchema = z
  .object({
    'i:objectId': z.string(),
    'i:ra': z.number(),
    'i:dec': z.number(),
    'i:jd': z.number(),
    'v:classification': z.string().optional(),
  })
  .passthrough();

/** "YYYY-MM-DD hh:mm:ss" in UTC, the date format Fink's API accepts. */
export function mjdToFinkDate(mjd: number): string {
  const iso = new Date(Math.round((mjd - MJD_UNIX_EPOCH) * 86_400_000)).toISOString();
  return `${iso.slice(0, 10)} ${iso.slice(11, 19)}`;
}

/**
 * Fink implementation of BrokerAdapter.
 *
 * Identifier lookups POST to `/objects`; time windows POST to `/latests`
 * across all classes. Fink pages by count only, so `offset` is not sent.
 */
export class FinkAdapter implements BrokerAdapter {
  readonly name = 'Fink';
  readonly supportsFreeform = false;

  private readonly baseUrl: string;

  constructor(
    private readonly config: FinkConfig,
    private readonly logger?: Logger,
  ) {
    this.baseUrl = (config.baseUrl ?? FINK_API_URL).replace(/\/+$/, '');
  }

  query(parameters: BrokerQuery): RemoteRequest {
    const resolved = selectStrategy(parameters, { supportsFreeform: this.supportsFreeform, broker: this.name });

    if (resolved.strategy === 'identifier') {
      return this.post(resolved.strategy, '/objects', {
        objectId: resolved.identifiers.join(','),
        'output-format': 'json',
      });
    }

    if (resolved.strategy === 'time-window') {
      return this.post(resolved.strategy, '/latests', {
        class: 'allclasses',
        n: String(resolved.limit),
        startdate: mjdToFinkDate(resolved.mjdMin),
        stopdate: mjdToFinkDate(resolved.mjdMax),
        'output-format': 'json',
      });
    }

    // selectStrategy rejects free-form for this adapter
    throw new Error(`Unhandled ${this.name} strategy "${resolved.strategy}"`);
  }

  async fetch(request: RemoteRequest, signal?: AbortSignal): Promise<RawResponse> {
    const body = await requestJson(request, { timeoutMs: this.config.timeoutMs, signal, logger: this.logger });
    return { request, items: bodyItems(body, request) };
  }

  normalize(raw: unknown): Alert {
    const parsed = this.parse(raw);
    const row = parsed.value;
    const objectId = row['i:objectId'];

    return checkAlert({
      broker: this.name,
      sourceId: objectId,
      displayUrl: `${FINK_WEB_URL}/${encodeURIComponent(objectId)}`,
      name: objectId,
      ra: row['i:ra'],
      dec: row['i:dec'],
      detectionTime: row['i:jd'] - MJD_OFFSET,
      magnitude: parsed.shape === 'rich' ? parsed.value['i:magpsf'] : MAGNITUDE_UNKNOWN,
      score: 1,
    });
  }

  toTarget(raw: unknown): TargetSeed {
    const row = this.parse(raw).value;
    return { name: row['i:objectId'], type: 'SIDEREAL', ra: row['i:ra'], dec: row['i:dec'] };
  }

  /** Fink's consolidated classification carries no score; it counts as certain. */
  extractClassifications(raw: unknown): ClassificationRecord[] {
    const label = this.parse(raw).value['v:classification'];
    if (!label) return [];
    return [{ source: this.name, level: 'classification', label, confidence: 1 }];
  }

  private parse(raw: unknown) {
    return parseTwoShapes(raw, {
      broker: this.name,
      rich: FinkAlertSchema,
      flat: FinkSummarySchema,
      discriminators: ['i:magpsf'],
    });
  }

  private post(strategy: RemoteRequest['strategy'], path: string, form: Record<string, string>): RemoteRequest {
    const search = this.config.token ? `?${new URLSearchParams({ token: this.config.token }).toString()}` : '';
    return {
      broker: this.name,
      strategy,
      method: 'POST',
      url: `${this.baseUrl}${path}${search}`,
      form,
    };
  }
}
