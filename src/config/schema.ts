import { z } from 'zod';

export const BROKER_NAMES = ['Lasair', 'ALeRCE', 'Fink'] as const;
export type BrokerName = (typeof BROKER_NAMES)[number];

const BrokerConnectionSchema = z.object({
  /** Register this broker's adapter. */
  enabled: z.boolean().default(true),
  /** Override the adapter's default API base URL. Supports ${ENV_VAR} syntax. */
  baseUrl: z.string().min(1).optional(),
  /**
   * Broker-issued API token, sent as the `token` query parameter.
   * Supports ${ENV_VAR} syntax; never hard-code it in the adapter.
   */
  token: z.string().optional(),
  /** Timeout for a single remote call, in milliseconds. */
  timeoutMs: z.number().int().min(100).max(300_000).default(10_000),
});

export type BrokerConnectionConfig = z.infer<typeof BrokerConnectionSchema>;

export const TaxalertConfigSchema = z.object({
  /** Per-broker connection settings, keyed by broker name. */
  brokers: z
    .object({
      Lasair: BrokerConnectionSchema.default({}),
      ALeRCE: BrokerConnectionSchema.default({}),
      Fink: BrokerConnectionSchema.default({}),
    })
    .strict()
    .default({}),

  taxonomy: z
    .object({
      /** Taxonomy document path. Omit to use the bundled default taxonomy. */
      path: z.string().optional(),
      /** Ceiling on parent hops from any code to the root. */
      maxHops: z.number().int().min(1).max(256).default(32),
    })
    .default({}),

  fetch: z
    .object({
      /** Max broker jobs run concurrently by collectAlerts. */
      maxConcurrency: z.number().int().min(1).max(16).default(3),
    })
    .default({}),

  logging: z
    .object({
      level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
      console: z.boolean().default(true),
      /** Append JSON-lines log files. */
      file: z.boolean().default(true),
      /** Log directory. Defaults to ~/.taxalert/logs. */
      logDir: z.string().optional(),
    })
    .default({}),
});

export type TaxalertConfig = z.infer<typeof TaxalertConfigSchema>;
