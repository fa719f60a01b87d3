/**
 * Typed event definitions for taxalert's structured logging.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  broker?: string;
  strategy?: string;
  data?: Record<string, unknown>;
}

export interface LogEntry extends LogContext {
  timestamp: string;
  level: LogLevel;
  source: string;
  message: string;
}

// ── Broker events ──

export interface BrokerQueryDispatchedEvent {
  type: 'broker-query-dispatched';
  broker: string;
  strategy: string;
  method: string;
  url: string;
}

export interface BrokerFetchFailedEvent {
  type: 'broker-fetch-failed';
  broker: string;
  url: string;
  status?: number;
  timedOut: boolean;
  error: string;
}

export interface AlertNormalizationFailedEvent {
  type: 'alert-normalization-failed';
  broker: string;
  error: string;
  issues: string[];
}

// ── Taxonomy events ──

export interface TaxonomyLoadedEvent {
  type: 'taxonomy-loaded';
  path: string;
  codes: number;
  brokers: string[];
}

export interface AggregationCompletedEvent {
  type: 'aggregation-completed';
  records: number;
  nodes: number;
  unmapped: string[];
}

export type TaxalertEvent =
  | BrokerQueryDispatchedEvent
  | BrokerFetchFailedEvent
  | AlertNormalizationFailedEvent
  | TaxonomyLoadedEvent
  | AggregationCompletedEvent;
