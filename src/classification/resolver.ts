import type { TaxonomyTable } from '../taxonomy/taxonomy-table.js';
import type { ClassificationRecord, Resolution } from './types.js';

/**
 * Maps raw classifier verdicts onto canonical taxonomy codes.
 */
export class ClassificationResolver {
  constructor(private readonly table: TaxonomyTable) {}

  /**
   * Resolve a record's label.
   *
   * Lookup order is (source, level, label), then (source, label). A label
   * neither table knows is returned as-is with `mapped: false`; it becomes a
   * one-hop leaf under the root so configuration gaps show up in the output.
   * Blank labels and the root sentinel resolve to the unknown code, unmapped.
   * Never throws.
   */
  resolve(record: ClassificationRecord): Resolution {
    const label = record.label.trim();
    if (label === '' || label === this.table.root) {
      return { code: this.table.unknownCode, mapped: false };
    }

    const code = this.table.lookup(record.source, record.level, label);
    if (code !== undefined) {
      return { code, mapped: true };
    }
    return { code: label, mapped: false };
  }

  /**
   * Ancestor chain for a resolution, ending at the root.
   *
   * A fallback label that is not itself a canonical code gets `[label, root]`.
   */
  chainOf(resolution: Resolution): string[] {
    if (this.table.isCode(resolution.code)) {
      return this.table.ancestryOf(resolution.code);
    }
    return [resolution.code, this.table.root];
  }
}
