import { ConfigurationError } from '../errors.js';
import { TaxonomyDocumentSchema, type TaxonomyDocument } from './schema.js';

export const DEFAULT_MAX_HOPS = 32;

export type TaxonomyCode = string;

/**
 * Immutable lookup tables for the canonical taxonomy.
 *
 * Holds the per-broker label → code maps and the single code → parent
 * ancestry map. Everything is validated once at construction: every code,
 * and every code a broker label maps to, must reach the root within
 * `maxHops` parent links. A table that constructs successfully never raises
 * a ConfigurationError from a later walk.
 */
export class TaxonomyTable {
  readonly root: TaxonomyCode;
  readonly unknownCode: TaxonomyCode;
  readonly maxHops: number;

  private readonly ancestry: ReadonlyMap<TaxonomyCode, TaxonomyCode>;
  private readonly coarse: ReadonlyMap<string, ReadonlyMap<string, TaxonomyCode>>;
  private readonly byLevel: ReadonlyMap<string, ReadonlyMap<string, ReadonlyMap<string, TaxonomyCode>>>;

  private constructor(doc: TaxonomyDocument, maxHops: number) {
    this.root = doc.root;
    this.unknownCode = doc.unknown;
    this.maxHops = maxHops;
    this.ancestry = new Map(Object.entries(doc.ancestry));

    const coarse = new Map<string, ReadonlyMap<string, TaxonomyCode>>();
    const byLevel = new Map<string, ReadonlyMap<string, ReadonlyMap<string, TaxonomyCode>>>();
    for (const [broker, tables] of Object.entries(doc.brokers)) {
      coarse.set(broker, new Map(Object.entries(tables.labels)));
      byLevel.set(
        broker,
        new Map(
          Object.entries(tables.levels).map(([level, labels]) => [level, new Map(Object.entries(labels))]),
        ),
      );
    }
    this.coarse = coarse;
    this.byLevel = byLevel;

    this.validate();
  }

  /**
   * Validate a raw taxonomy document and build a table from it.
   */
  static fromDocument(raw: unknown, opts: { maxHops?: number } = {}): TaxonomyTable {
    const maxHops = opts.maxHops ?? DEFAULT_MAX_HOPS;
    if (!Number.isInteger(maxHops) || maxHops < 1) {
      throw new ConfigurationError(`maxHops must be a positive integer, got ${maxHops}`);
    }

    const result = TaxonomyDocumentSchema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `  - ${i.path.join('.')}: ${i.message}`)
        .join('\n');
      throw new ConfigurationError(`Invalid taxonomy document:\n${issues}`);
    }
    return new TaxonomyTable(result.data, maxHops);
  }

  private validate(): void {
    if (this.ancestry.has(this.root)) {
      throw new ConfigurationError(
        `Root "${this.root}" must not have a parent (found "${this.ancestry.get(this.root)}")`,
        this.root,
      );
    }

    for (const [code, parent] of this.ancestry) {
      if (parent !== this.root && !this.ancestry.has(parent)) {
        throw new ConfigurationError(
          `Code "${code}" has parent "${parent}", which is neither the root nor a known code`,
          code,
          [code, parent],
        );
      }
    }

    for (const code of this.ancestry.keys()) {
      this.ancestryOf(code);
    }

    if (!this.isCode(this.unknownCode)) {
      throw new ConfigurationError(`Unknown-label code "${this.unknownCode}" is not in the ancestry map`, this.unknownCode);
    }

    for (const [broker, labels] of this.coarse) {
      for (const [label, code] of labels) {
        this.assertMapped(code, `${broker} label "${label}"`);
      }
    }
    for (const [broker, levels] of this.byLevel) {
      for (const [level, labels] of levels) {
        for (const [label, code] of labels) {
          this.assertMapped(code, `${broker}/${level} label "${label}"`);
        }
      }
    }
  }

  private assertMapped(code: TaxonomyCode, where: string): void {
    if (!this.isCode(code)) {
      throw new ConfigurationError(`${where} maps to "${code}", which is not in the ancestry map`, code);
    }
  }

  /** Whether `code` is the root or has an ancestry entry. */
  isCode(code: string): boolean {
    return code === this.root || this.ancestry.has(code);
  }

  /** Immediate parent of a code; undefined for the root and for codes outside the taxonomy. */
  parentOf(code: TaxonomyCode): TaxonomyCode | undefined {
    return this.ancestry.get(code);
  }

  /**
   * Look up a classifier label. The level-specific table wins; the broker's
   * coarse table is the fallback. Returns undefined when neither maps it.
   */
  lookup(source: string, level: string, label: string): TaxonomyCode | undefined {
    return this.byLevel.get(source)?.get(level)?.get(label) ?? this.coarse.get(source)?.get(label);
  }

  /**
   * The ordered chain `[code, parent(code), …, root]`.
   *
   * The walk is bounded by `maxHops`; a cycle or an over-long chain is a
   * ConfigurationError, as is a code that has no parent and is not the root.
   */
  ancestryOf(code: TaxonomyCode): TaxonomyCode[] {
    const chain: TaxonomyCode[] = [code];
    let current = code;

    while (current !== this.root) {
      const parent = this.ancestry.get(current);
      if (parent === undefined) {
        throw new ConfigurationError(
          `Code "${current}" has no parent and is not the root "${this.root}"`,
          code,
          chain,
        );
      }
      if (chain.includes(parent)) {
        throw new ConfigurationError(
          `Ancestry cycle at "${code}": ${[...chain, parent].join(' -> ')}`,
          code,
          [...chain, parent],
        );
      }
      if (chain.length - 1 >= this.maxHops) {
        throw new ConfigurationError(
          `Ancestry of "${code}" exceeds ${this.maxHops} hops: ${chain.join(' -> ')} -> ...`,
          code,
          chain,
        );
      }
      chain.push(parent);
      current = parent;
    }

    return chain;
  }

  /** Every canonical code, root excluded. */
  codes(): TaxonomyCode[] {
    return [...this.ancestry.keys()];
  }

  /** Broker names with at least one label table. */
  brokers(): string[] {
    return [...new Set([...this.coarse.keys(), ...this.byLevel.keys()])];
  }
}
