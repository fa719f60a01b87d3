import pLimit from 'p-limit';
import { NormalizationError, RemoteError, UnknownBrokerError } from '../errors.js';
import type { Logger } from '../logging/logger.js';
import type { Alert, BrokerAdapter, BrokerQuery } from './adapter.js';

export type AlertOutcome =
  | { ok: true; alert: Alert; raw: unknown }
  | { ok: false; error: NormalizationError; raw: unknown };

export interface AlertJob {
  broker: string;
  parameters: BrokerQuery;
}

export type AlertJobResult =
  | { broker: string; ok: true; outcomes: AlertOutcome[] }
  | { broker: string; ok: false; error: Error };

export const DEFAULT_MAX_CONCURRENCY = 3;

export interface BrokerRegistryOptions {
  /** Default bound on jobs in flight for collectAlerts. */
  maxConcurrency?: number;
}

/**
 * Lookup table from broker name to adapter. Callers fetch alerts by broker
 * name without knowing anything broker-specific.
 */
export class BrokerRegistry {
  private readonly adapters = new Map<string, BrokerAdapter>();
  private readonly maxConcurrency: number;

  constructor(
    private readonly logger?: Logger,
    opts: BrokerRegistryOptions = {},
  ) {
    this.maxConcurrency = opts.maxConcurrency ?? DEFAULT_MAX_CONCURRENCY;
  }

  register(adapter: BrokerAdapter): this {
    if (this.adapters.has(adapter.name)) {
      throw new Error(`Broker "${adapter.name}" is already registered`);
    }
    this.adapters.set(adapter.name, adapter);
    return this;
  }

  names(): string[] {
    return [...this.adapters.keys()];
  }

  get(name: string): BrokerAdapter {
    const adapter = this.adapters.get(name);
    if (!adapter) {
      throw new UnknownBrokerError(name, this.names());
    }
    return adapter;
  }

  /**
   * Query one broker and stream its alerts.
   *
   * The adapter lookup and query validation happen immediately, so
   * UnknownBrokerError and ValidationError are thrown before any remote
   * call. The fetch itself starts on first iteration. The returned sequence
   * is single-use. Items that fail normalization are yielded as failed
   * outcomes; the rest of the batch still arrives.
   */
  listAlerts(name: string, parameters: BrokerQuery, signal?: AbortSignal): AsyncGenerator<AlertOutcome, void, undefined> {
    const adapter = this.get(name);
    const request = adapter.query(parameters);
    const logger = this.logger;

    async function* stream(): AsyncGenerator<AlertOutcome, void, undefined> {
      const response = await adapter.fetch(request, signal);
      logger?.debug(`${adapter.name} returned ${response.items.length} item(s)`, {
        broker: adapter.name,
        strategy: request.strategy,
      });

      for (const raw of response.items) {
        let outcome: AlertOutcome;
        try {
          outcome = { ok: true, alert: adapter.normalize(raw), raw };
        } catch (err) {
          if (!(err instanceof NormalizationError)) throw err;
          logger?.event(
            { type: 'alert-normalization-failed', broker: adapter.name, error: err.message, issues: err.issues },
            'warn',
          );
          outcome = { ok: false, error: err, raw };
        }
        yield outcome;
      }
    }

    return stream();
  }

  /**
   * Fetch a single object by identifier: the first item that normalizes.
   */
  async getAlert(name: string, id: string, signal?: AbortSignal): Promise<Alert> {
    const adapter = this.get(name);
    const parameters: BrokerQuery = { identifiers: [id], limit: 1 };

    let firstFailure: NormalizationError | undefined;
    for await (const outcome of this.listAlerts(name, parameters, signal)) {
      if (outcome.ok) return outcome.alert;
      firstFailure ??= outcome.error;
    }
    if (firstFailure) throw firstFailure;

    throw new RemoteError(`${adapter.name} returned no object for "${id}"`, {
      broker: adapter.name,
      url: adapter.query(parameters).url,
    });
  }

  /**
   * Run several alert queries concurrently, at most `concurrency` at a time
   * (the registry's configured bound by default). Each job succeeds or fails
   * on its own; one broker's failure never disturbs another's fetch.
   */
  async collectAlerts(
    jobs: AlertJob[],
    opts: { concurrency?: number; signal?: AbortSignal } = {},
  ): Promise<AlertJobResult[]> {
    const limit = pLimit(opts.concurrency ?? this.maxConcurrency);

    return Promise.all(
      jobs.map((job) =>
        limit(async (): Promise<AlertJobResult> => {
          try {
            const outcomes: AlertOutcome[] = [];
            for await (const outcome of this.listAlerts(job.broker, job.parameters, opts.signal)) {
              outcomes.push(outcome);
            }
            return { broker: job.broker, ok: true, outcomes };
          } catch (err) {
            this.logger?.error(`Alert job for ${job.broker} failed: ${err instanceof Error ? err.message : String(err)}`, {
              broker: job.broker,
            });
            return { broker: job.broker, ok: false, error: err instanceof Error ? err : new Error(String(err)) };
          }
        }),
      ),
    );
  }
}
