import { RemoteError } from '../errors.js';
import type { Logger } from '../logging/logger.js';
import type { RemoteRequest } from './adapter.js';

export interface RequestOptions {
  /** Upper bound on the whole call, body included. */
  timeoutMs: number;
  /** Caller cancellation. */
  signal?: AbortSignal;
  logger?: Logger;
}

/**
 * Perform one broker HTTP call and parse its JSON body.
 *
 * Non-2xx status, transport failure, timeout, cancellation and malformed JSON
 * all surface as RemoteError. There is no retry.
 */
export async function requestJson(request: RemoteRequest, opts: RequestOptions): Promise<unknown> {
  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, opts.timeoutMs);

  const onAbort = (): void => controller.abort();
  if (opts.signal?.aborted) {
    controller.abort();
  } else {
    opts.signal?.addEventListener('abort', onAbort, { once: true });
  }

  opts.logger?.event(
    {
      type: 'broker-query-dispatched',
      broker: request.broker,
      strategy: request.strategy,
      method: request.method,
      url: request.url,
    },
    'debug',
  );

  try {
    const response = await globalThis.fetch(request.url, {
      method: request.method,
      headers: request.form
        ? { Accept: 'application/json', 'Content-Type': 'application/x-www-form-urlencoded' }
        : { Accept: 'application/json' },
      body: request.form ? new URLSearchParams(request.form).toString() : undefined,
      signal: controller.signal,
    });

    const text = await response.text();
    if (!response.ok) {
      throw new RemoteError(
        `${request.broker} API error: ${response.status} ${response.statusText} — ${text.slice(0, 200)}`,
        { broker: request.broker, url: request.url, status: response.status },
      );
    }

    try {
      const body: unknown = JSON.parse(text);
      return body;
    } catch (err) {
      throw new RemoteError(`${request.broker} returned malformed JSON`, {
        broker: request.broker,
        url: request.url,
        status: response.status,
        cause: err,
      });
    }
  } catch (err) {
    const remote =
      err instanceof RemoteError
        ? err
        : timedOut
          ? new RemoteError(`${request.broker} request timed out after ${opts.timeoutMs}ms`, {
              broker: request.broker,
              url: request.url,
              timedOut: true,
              cause: err,
            })
          : new RemoteError(
              `${request.broker} request failed: ${err instanceof Error ? err.message : String(err)}`,
              { broker: request.broker, url: request.url, cause: err },
            );

    opts.logger?.event(
      {
        type: 'broker-fetch-failed',
        broker: request.broker,
        url: request.url,
        status: remote.status,
        timedOut: remote.timedOut,
        error: remote.message,
      },
      'warn',
    );
    throw remote;
  } finally {
    clearTimeout(timer);
    opts.signal?.removeEventListener('abort', onAbort);
  }
}

/**
 * Split a JSON body into per-alert items: a list is taken as-is, an object
 * with a list under `listKey` yields that list, any other object is one item.
 */
export function bodyItems(body: unknown, request: RemoteRequest, listKey?: string): unknown[] {
  if (Array.isArray(body)) return body;
  if (body !== null && typeof body === 'object') {
    if (listKey !== undefined && listKey in body) {
      const list: unknown = Reflect.get(body, listKey);
      if (Array.isArray(list)) return list;
    }
    return [body];
  }
  throw new RemoteError(`${request.broker} returned a JSON ${body === null ? 'null' : typeof body}, expected an object or list`, {
    broker: request.broker,
    url: request.url,
  });
}
