import type { TaxonomyCode } from '../taxonomy/taxonomy-table.js';

/** Confidence below this is noise and never reaches the tree. */
export const CONFIDENCE_FLOOR = 0.01;

/**
 * One classifier verdict, as stored by the external collaborator.
 */
export interface ClassificationRecord {
  /** Broker name, e.g. "Lasair". */
  readonly source: string;
  /** Classifier stage or version tag, e.g. "stamp_classifier". */
  readonly level: string;
  /** Raw classifier-specific label. */
  readonly label: string;
  /** Classifier-defined confidence in [0, 1]; not a calibrated probability. */
  readonly confidence: number;
  /** Epoch milliseconds when the verdict was produced; orders superseding verdicts. */
  readonly producedAt?: number;
}

export interface Resolution {
  code: TaxonomyCode;
  /** False when the raw label had no mapping and became its own leaf. */
  mapped: boolean;
}

export interface AggregationNode {
  label: string;
  /** Immediate ancestor; empty string for the root. */
  parent: string;
  weight: number;
  /** False when an unmapped label landed on this node; such nodes are exactly `unmapped`. */
  mapped: boolean;
}

export interface AggregationTree {
  root: TaxonomyCode;
  /** One node per label, in first-seen order. */
  nodes: AggregationNode[];
  /** Labels of the nodes an unmapped verdict landed on, in first-seen order. */
  unmapped: string[];
}
