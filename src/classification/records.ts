import { z } from 'zod';
import { ValidationError } from '../errors.js';
import type { ClassificationRecord } from './types.js';

/**
 * One stored verdict. Storage layers name the label and score differently,
 * so `classification` and `probability` are accepted as aliases.
 */
const StoredRecordSchema = z
  .object({
    source: z.string().min(1),
    level: z.string().default(''),
    label: z.string().optional(),
    classification: z.string().optional(),
    confidence: z.number().min(0).max(1).optional(),
    probability: z.number().min(0).max(1).optional(),
    producedAt: z.union([z.number(), z.string().datetime({ offset: true })]).optional(),
  })
  .refine((r) => r.label !== undefined || r.classification !== undefined, {
    message: 'either "label" or "classification" is required',
  })
  .refine((r) => r.confidence !== undefined || r.probability !== undefined, {
    message: 'either "confidence" or "probability" is required',
  })
  .transform(
    (r): ClassificationRecord => ({
      source: r.source,
      level: r.level,
      label: r.label ?? r.classification ?? '',
      confidence: r.confidence ?? r.probability ?? 0,
      producedAt: typeof r.producedAt === 'string' ? Date.parse(r.producedAt) : r.producedAt,
    }),
  );

export const ClassificationRecordsSchema = z.array(StoredRecordSchema);

/**
 * Validate a list of stored verdicts and convert it to ClassificationRecords.
 */
export function parseClassificationRecords(raw: unknown): ClassificationRecord[] {
  const result = ClassificationRecordsSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  - [${i.path.join('.')}] ${i.message}`)
      .join('\n');
    throw new ValidationError(`Invalid classification records:\n${issues}`, 'records');
  }
  return result.data;
}
