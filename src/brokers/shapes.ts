import { z } from 'zod';
import { NormalizationError } from '../errors.js';
import type { Alert } from './adapter.js';

export type ShapeParse<R extends z.ZodTypeAny, F extends z.ZodTypeAny> =
  | { shape: 'rich'; value: z.infer<R> }
  | { shape: 'flat'; value: z.infer<F> };

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((i) => `${i.path.length > 0 ? i.path.join('.') : '(root)'}: ${i.message}`);
}

/**
 * True when every issue is one of the enumerated top-level keys being absent,
 * i.e. the payload is the other shape rather than a corrupt one.
 */
function isShapeVariance(error: z.ZodError, discriminators: readonly string[]): boolean {
  return error.issues.every(
    (issue) =>
      issue.code === z.ZodIssueCode.invalid_type &&
      issue.received === 'undefined' &&
      issue.path.length === 1 &&
      discriminators.includes(String(issue.path[0])),
  );
}

/**
 * Parse a payload as the rich shape, falling back to the flat shape only when
 * the rich parse failed solely on missing `discriminators`. Any other failure
 * is a NormalizationError.
 */
export function parseTwoShapes<R extends z.ZodTypeAny, F extends z.ZodTypeAny>(
  raw: unknown,
  opts: { broker: string; rich: R; flat: F; discriminators: readonly string[] },
): ShapeParse<R, F> {
  const rich = opts.rich.safeParse(raw);
  if (rich.success) {
    return { shape: 'rich', value: rich.data };
  }

  if (!isShapeVariance(rich.error, opts.discriminators)) {
    const issues = describeIssues(rich.error);
    throw new NormalizationError(`Malformed ${opts.broker} payload: ${issues.join('; ')}`, opts.broker, issues);
  }

  const flat = opts.flat.safeParse(raw);
  if (flat.success) {
    return { shape: 'flat', value: flat.data };
  }

  const issues = describeIssues(flat.error);
  throw new NormalizationError(
    `Malformed ${opts.broker} payload (neither detail nor summary shape): ${issues.join('; ')}`,
    opts.broker,
    issues,
  );
}

/**
 * Enforce the canonical alert invariants.
 */
export function checkAlert(alert: Alert): Alert {
  const problems: string[] = [];
  if (alert.sourceId.trim() === '') problems.push('sourceId is empty');
  if (!Number.isFinite(alert.ra) || alert.ra < 0 || alert.ra >= 360) problems.push(`ra ${alert.ra} outside [0, 360)`);
  if (!Number.isFinite(alert.dec) || alert.dec < -90 || alert.dec > 90) problems.push(`dec ${alert.dec} outside [-90, 90]`);
  if (!Number.isFinite(alert.detectionTime)) problems.push(`detectionTime ${alert.detectionTime} is not finite`);

  if (problems.length > 0) {
    throw new NormalizationError(
      `Invalid ${alert.broker} alert "${alert.sourceId}": ${problems.join('; ')}`,
      alert.broker,
      problems,
    );
  }
  return alert;
}
