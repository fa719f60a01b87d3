import type { TaxonomyTable } from '../taxonomy/taxonomy-table.js';
import { ClassificationResolver } from './resolver.js';
import {
  CONFIDENCE_FLOOR,
  type AggregationNode,
  type AggregationTree,
  type ClassificationRecord,
  type Resolution,
} from './types.js';

interface Contribution {
  record: ClassificationRecord;
  resolution: Resolution;
  position: number;
}

function supersedes(record: ClassificationRecord, position: number, current: Contribution): boolean {
  const a = record.producedAt;
  const b = current.record.producedAt;
  if (a !== undefined && b !== undefined && a !== b) {
    return a > b;
  }
  return position > current.position;
}

/**
 * Merges classifier verdicts into one confidence-weighted taxonomy tree.
 *
 * Pure: reads only the immutable table and allocates per call, so one
 * instance can serve any number of concurrent callers.
 */
export class AncestryAggregator {
  private readonly resolver: ClassificationResolver;

  constructor(
    private readonly table: TaxonomyTable,
    resolver?: ClassificationResolver,
  ) {
    this.resolver = resolver ?? new ClassificationResolver(table);
  }

  aggregate(records: Iterable<ClassificationRecord>): AggregationTree {
    // Within one (source, level) group only the newest verdict per terminal code counts.
    const winners = new Map<string, Contribution>();
    let position = 0;
    for (const record of records) {
      const index = position++;
      if (!(record.confidence >= CONFIDENCE_FLOOR)) continue;

      const resolution = this.resolver.resolve(record);
      const key = JSON.stringify([record.source, record.level, resolution.code]);
      const current = winners.get(key);
      if (!current || supersedes(record, index, current)) {
        winners.set(key, { record, resolution, position: index });
      }
    }

    const nodes = new Map<string, AggregationNode>();

    for (const { record, resolution } of winners.values()) {
      const weight = Math.min(record.confidence, 1);
      const chain = this.resolver.chainOf(resolution);
      chain.forEach((label, i) => {
        let node = nodes.get(label);
        if (!node) {
          node = {
            label,
            parent: chain[i + 1] ?? '',
            weight: 0,
            mapped: this.table.isCode(label),
          };
          nodes.set(label, node);
        }
        if (i === 0 && !resolution.mapped) node.mapped = false;
        node.weight += weight;
      });
    }

    const list = [...nodes.values()];
    return {
      root: this.table.root,
      nodes: list,
      unmapped: list.filter((n) => !n.mapped).map((n) => n.label),
    };
  }
}
