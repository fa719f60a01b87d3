import { z } from 'zod';
import type { ClassificationRecord } from '../classification/types.js';
import { ValidationError } from '../errors.js';

/** Sentinel magnitude for alerts whose payload carries none. */
export const MAGNITUDE_UNKNOWN = -999;

/** Julian date of MJD 0. */
export const MJD_OFFSET = 2_400_000.5;

/**
 * Broker-independent alert, ready for an external persistence collaborator.
 */
export interface Alert {
  broker: string;
  /** Broker-scoped identifier; never empty. */
  sourceId: string;
  displayUrl: string;
  name: string;
  /** Degrees, [0, 360). */
  ra: number;
  /** Degrees, [-90, 90]. */
  dec: number;
  /** Modified Julian date of the latest detection. */
  detectionTime: number;
  magnitude: number;
  score: number;
}

/**
 * Fields needed to create a sidereal target from an alert.
 */
export interface TargetSeed {
  name: string;
  type: 'SIDEREAL';
  ra: number;
  dec: number;
  galacticLng?: number;
  galacticLat?: number;
}

/**
 * Caller-supplied query parameters. At least one of `identifiers`,
 * both of `mjdMin`/`mjdMax`, or `freeform` must be populated.
 */
export interface BrokerQuery {
  /** Object identifiers; a single string may be comma separated. */
  identifiers?: string | string[];
  /** Lower bound on the latest detection, MJD. */
  mjdMin?: number;
  /** Upper bound on the latest detection, MJD. */
  mjdMax?: number;
  /** Broker-specific free query text. */
  freeform?: string;
  /** Result cap. Defaults to 20. */
  limit?: number;
  offset?: number;
}

export type QueryStrategy = 'identifier' | 'time-window' | 'freeform';

export type ResolvedQuery =
  | { strategy: 'identifier'; identifiers: string[]; limit: number; offset: number }
  | { strategy: 'time-window'; mjdMin: number; mjdMax: number; limit: number; offset: number }
  | { strategy: 'freeform'; text: string; limit: number; offset: number };

export interface RemoteRequest {
  broker: string;
  strategy: QueryStrategy;
  method: 'GET' | 'POST';
  url: string;
  /** Form-encoded body fields for POST requests. */
  form?: Record<string, string>;
}

export interface RawResponse {
  request: RemoteRequest;
  /** Raw items extracted from the JSON body, one per alert. */
  items: unknown[];
}

/**
 * One broker's capabilities. Implementations hold no mutable state, so a
 * single instance may serve concurrent fetches.
 */
export interface BrokerAdapter {
  readonly name: string;
  /** Whether the broker accepts the free-form strategy. */
  readonly supportsFreeform: boolean;

  /** Build the single request for these parameters. Throws ValidationError. */
  query(parameters: BrokerQuery): RemoteRequest;

  /** Perform the remote call. Throws RemoteError; never retries. */
  fetch(request: RemoteRequest, signal?: AbortSignal): Promise<RawResponse>;

  /** Convert one raw item to a canonical alert. Throws NormalizationError. */
  normalize(raw: unknown): Alert;

  /** Describe the sidereal target an alert refers to. Throws NormalizationError. */
  toTarget(raw: unknown): TargetSeed;

  /** Classifier verdicts carried inside a raw item; empty when it has none. */
  extractClassifications(raw: unknown): ClassificationRecord[];
}

export const DEFAULT_LIMIT = 20;

const BrokerQuerySchema = z.object({
  identifiers: z.union([z.string(), z.array(z.string())]).optional(),
  mjdMin: z.number().finite().min(0).optional(),
  mjdMax: z.number().finite().min(0).optional(),
  freeform: z.string().optional(),
  limit: z.number().int().min(1).max(10_000).optional(),
  offset: z.number().int().min(0).optional(),
});

function splitIdentifiers(value: string | string[] | undefined): string[] {
  if (value === undefined) return [];
  const parts = Array.isArray(value) ? value : value.split(',');
  return parts.map((p) => p.trim()).filter((p) => p.length > 0);
}

/**
 * Pick exactly one query strategy by fixed precedence:
 * identifier, then time window (both bounds), then free-form.
 *
 * Throws ValidationError when nothing usable is populated, before anything
 * touches the network.
 */
export function selectStrategy(
  parameters: BrokerQuery,
  opts: { supportsFreeform: boolean; broker: string },
): ResolvedQuery {
  const parsed = BrokerQuerySchema.safeParse(parameters);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue ? issue.path.join('.') : 'parameters';
    throw new ValidationError(`Invalid ${opts.broker} query parameter "${field}": ${issue?.message ?? 'invalid'}`, field);
  }

  const params = parsed.data;
  const limit = params.limit ?? DEFAULT_LIMIT;
  const offset = params.offset ?? 0;

  const identifiers = splitIdentifiers(params.identifiers);
  if (identifiers.length > 0) {
    return { strategy: 'identifier', identifiers, limit, offset };
  }

  if (params.mjdMin !== undefined && params.mjdMax !== undefined) {
    if (params.mjdMin >= params.mjdMax) {
      throw new ValidationError(
        `mjdMin (${params.mjdMin}) must be less than mjdMax (${params.mjdMax})`,
        'mjdMin',
      );
    }
    return { strategy: 'time-window', mjdMin: params.mjdMin, mjdMax: params.mjdMax, limit, offset };
  }

  const text = params.freeform?.trim() ?? '';
  if (text.length > 0) {
    if (!opts.supportsFreeform) {
      throw new ValidationError(`${opts.broker} does not support free-form queries`, 'freeform');
    }
    return { strategy: 'freeform', text, limit, offset };
  }

  throw new ValidationError(
    'One of the query methods must be populated: identifiers, both mjdMin and mjdMax, or freeform.',
    'parameters',
  );
}
