import { z } from 'zod';
import type { ClassificationRecord } from '../classification/types.js';
import type { Logger } from '../logging/logger.js';
import {
  MAGNITUDE_UNKNOWN,
  selectStrategy,
  type Alert,
  type BrokerAdapter,
  type BrokerQuery,
  type RawResponse,
  type RemoteRequest,
  type TargetSeed,
} from './adapter.js';
import { ValidationError } from '../errors.js';
import { bodyItems, requestJson } from './http.js';
import { checkAlert, parseTwoShapes } from './shapes.js';

export const ALERCE_API_URL = 'https://api.alerce.online/ztf/v1';
const ALERCE_WEB_URL = 'https://alerce.online';

export interface AlerceConfig {
  baseUrl?: string;
  /** Optional token; ALeRCE's public API needs none. */
  token?: string;
  timeoutMs: number;
}

const ProbabilitySchema = z.object({
  classifier_name: z.string(),
  class_name: z.string(),
  probability: z.number(),
});

// Object detail with its detection list.
const AlerceDetailSchema = z.object({
  oid: z.string(),
  meanra: z.number(),
  meandec: z.number(),
  lastmjd: z.number(),
  detections: z.array(
    z
      .object({
        mjd: z.number(),
        magpsf: z.number().nullable().optional(),
      })
      .passthrough(),
  ),
  probabilities: z.array(ProbabilitySchema).optional(),
});

// Item of the /objects listing.
const AlerceSummarySchema = z.object({
  oid: z.string(),
  meanra: z.number(),
  meandec: z.number(),
  lastmjd: z.number(),
  class: z.string().nullable().optional(),
  classifier: z.string().nullable().optional(),
  probability: z.number().nullable().optional(),
});

/**
 * ALeRCE implementation of BrokerAdapter.
 *
 * Identifier and time-window queries both go through the `/objects` listing;
 * ALeRCE has no free-form query endpoint.
 */
export class AlerceAdapter implements BrokerAdapter {
  readonly name = 'ALeRCE';
  readonly supportsFreeform = false;

  private readonly baseUrl: string;

  constructor(
    private readonly config: AlerceConfig,
    private readonly logger?: Logger,
  ) {
    this.baseUrl = (config.baseUrl ?? ALERCE_API_URL).replace(/\/+$/, '');
  }

  query(parameters: BrokerQuery): RemoteRequest {
    const resolved = selectStrategy(parameters, { supportsFreeform: this.supportsFreeform, broker: this.name });
    const search = new URLSearchParams();

    if (resolved.strategy === 'identifier') {
      for (const oid of resolved.identifiers) search.append('oid', oid);
    } else if (resolved.strategy === 'time-window') {
      search.append('lastmjd', String(resolved.mjdMin));
      search.append('lastmjd', String(resolved.mjdMax));
      search.set('order_by', 'lastmjd');
      search.set('order_mode', 'DESC');
    }

    if (resolved.offset % resolved.limit !== 0) {
      throw new ValidationError(
        `ALeRCE pages by limit; offset (${resolved.offset}) must be a multiple of limit (${resolved.limit})`,
        'offset',
      );
    }
    search.set('page_size', String(resolved.limit));
    search.set('page', String(resolved.offset / resolved.limit + 1));
    if (this.config.token) {
      search.set('token', this.config.token);
    }

    return {
      broker: this.name,
      strategy: resolved.strategy,
      method: 'GET',
      url: `${this.baseUrl}/objects?${search.toString()}`,
    };
  }

  async fetch(request: RemoteRequest, signal?: AbortSignal): Promise<RawResponse> {
    const body = await requestJson(request, { timeoutMs: this.config.timeoutMs, signal, logger: this.logger });
    return { request, items: bodyItems(body, request, 'items') };
  }

  normalize(raw: unknown): Alert {
    const parsed = this.parse(raw);
    const { oid, meanra, meandec, lastmjd } = parsed.value;

    let magnitude: number = MAGNITUDE_UNKNOWN;
    let score = 1;
    if (parsed.shape === 'rich') {
      const latest = [...parsed.value.detections]
        .filter((d) => typeof d.magpsf === 'number')
        .sort((a, b) => b.mjd - a.mjd)[0];
      magnitude = latest?.magpsf ?? MAGNITUDE_UNKNOWN;
    } else if (typeof parsed.value.probability === 'number') {
      score = parsed.value.probability;
    }

    return checkAlert({
      broker: this.name,
      sourceId: oid,
      displayUrl: `${ALERCE_WEB_URL}/object/${encodeURIComponent(oid)}`,
      name: oid,
      ra: meanra,
      dec: meandec,
      detectionTime: lastmjd,
      magnitude,
      score,
    });
  }

  toTarget(raw: unknown): TargetSeed {
    const { oid, meanra, meandec } = this.parse(raw).value;
    return { name: oid, type: 'SIDEREAL', ra: meanra, dec: meandec };
  }

  extractClassifications(raw: unknown): ClassificationRecord[] {
    const parsed = this.parse(raw);

    if (parsed.shape === 'rich') {
      return (parsed.value.probabilities ?? []).map((p) => ({
        source: this.name,
        level: p.classifier_name,
        label: p.class_name,
        confidence: p.probability,
      }));
    }

    const { class: label, classifier, probability } = parsed.value;
    if (!label || !classifier) return [];
    return [{ source: this.name, level: classifier, label, confidence: probability ?? 1 }];
  }

  private parse(raw: unknown) {
    return parseTwoShapes(raw, {
      broker: this.name,
      rich: AlerceDetailSchema,
      flat: AlerceSummarySchema,
      discriminators: ['detections'],
    });
  }
}
