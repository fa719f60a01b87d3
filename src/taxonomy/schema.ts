import { z } from 'zod';

export const ROOT_CODE = '~Root';

const LabelMapSchema = z.record(z.string(), z.string().min(1));

const BrokerLabelsSchema = z.object({
  /** Coarse label → code map, used when no level-specific entry exists. */
  labels: LabelMapSchema.default({}),
  /** Per classifier level (stage/version tag) label → code maps. */
  levels: z.record(z.string(), LabelMapSchema).default({}),
});

export const TaxonomyDocumentSchema = z.object({
  /** Root sentinel. Has no parent. */
  root: z.string().min(1).default(ROOT_CODE),
  /** Code that blank classifier labels resolve to. */
  unknown: z.string().min(1).default('Unknown'),
  /** Canonical code → parent code. Top-level categories point at the root. */
  ancestry: z.record(z.string(), z.string().min(1)),
  /** Per-broker label tables, keyed by broker name. */
  brokers: z.record(z.string(), BrokerLabelsSchema).default({}),
});

export type TaxonomyDocument = z.infer<typeof TaxonomyDocumentSchema>;
export type TaxonomyDocumentInput = z.input<typeof TaxonomyDocumentSchema>;
