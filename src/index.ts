export {
  ValidationError,
  RemoteError,
  NormalizationError,
  UnknownBrokerError,
  ConfigurationError,
} from './errors.js';

export type {
  Alert,
  BrokerAdapter,
  BrokerQuery,
  QueryStrategy,
  RawResponse,
  RemoteRequest,
  TargetSeed,
} from './brokers/adapter.js';
export { MAGNITUDE_UNKNOWN, selectStrategy } from './brokers/adapter.js';
export { LasairAdapter, type LasairConfig } from './brokers/lasair-adapter.js';
export { AlerceAdapter, type AlerceConfig } from './brokers/alerce-adapter.js';
export { FinkAdapter, type FinkConfig } from './brokers/fink-adapter.js';
export {
  BrokerRegistry,
  DEFAULT_MAX_CONCURRENCY,
  type AlertOutcome,
  type AlertJob,
  type AlertJobResult,
  type BrokerRegistryOptions,
} from './brokers/registry.js';
export { createBrokerRegistry, createBrokerAdapter } from './brokers/factory.js';

export { TaxonomyTable, type TaxonomyCode } from './taxonomy/taxonomy-table.js';
export { loadTaxonomy, DEFAULT_TAXONOMY_PATH } from './taxonomy/loader.js';
export { ROOT_CODE, type TaxonomyDocumentInput } from './taxonomy/schema.js';

export type {
  ClassificationRecord,
  AggregationNode,
  AggregationTree,
  Resolution,
} from './classification/types.js';
export { CONFIDENCE_FLOOR } from './classification/types.js';
export { ClassificationResolver } from './classification/resolver.js';
export { AncestryAggregator } from './classification/aggregator.js';
export { parseClassificationRecords } from './classification/records.js';

export { loadConfig, parseConfig, ConfigLoadError, type RuntimeConfig } from './config/loader.js';
export { Logger } from './logging/logger.js';
