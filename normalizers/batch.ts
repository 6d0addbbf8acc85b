/**
 * Batch normalization shared by every source adapter
 *
 * Each raw item is validated against the source's item schema and converted
 * on its own. A malformed or unrecognized item becomes a warning; only a
 * batch in which every item fails is a request-level error.
 */

import { z } from 'zod';
import type { Activity, SourceId } from '../schemas/index.js';
import { formatValidationErrors } from '../schemas/index.js';
import { UpstreamFormatError } from '../src/errors.js';
import type { NormalizationWarning, NormalizeResult } from './types.js';

export type ItemSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/**
 * Parse a payload against a schema, raising a request-level error on mismatch
 */
export function parsePayload<T>(source: SourceId, schema: ItemSchema<T>, raw: unknown, what: string): T {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new UpstreamFormatError(
      `${source} ${what} is malformed: ${formatValidationErrors(result.error).join('; ')}`,
      source
    );
  }
  return result.data;
}

function toWarning(source: SourceId, itemIndex: number, error: unknown): NormalizationWarning {
  if (error instanceof UpstreamFormatError) {
    return { itemIndex, error: new UpstreamFormatError(error.message, source, itemIndex) };
  }
  if (error instanceof z.ZodError) {
    return {
      itemIndex,
      error: new UpstreamFormatError(formatValidationErrors(error).join('; '), source, itemIndex),
    };
  }
  throw error;
}

/**
 * Normalize a list of raw items, isolating per-item failures
 *
 * @param convert - Maps one validated item to an activity. May throw
 *   UpstreamFormatError (unrecognized kind) or ZodError (the canonical tree
 *   it built is invalid); both skip the item.
 * @throws UpstreamFormatError when a non-empty batch has no valid item
 */
export function normalizeBatch<T>(
  source: SourceId,
  items: readonly unknown[],
  schema: ItemSchema<T>,
  convert: (item: T) => Activity
): NormalizeResult {
  const activities: Activity[] = [];
  const warnings: NormalizationWarning[] = [];

  items.forEach((raw, index) => {
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      warnings.push(toWarning(source, index, parsed.error));
      return;
    }

    try {
      activities.push(convert(parsed.data));
    } catch (error) {
      warnings.push(toWarning(source, index, error));
    }
  });

  if (items.length > 0 && activities.length === 0) {
    const first = warnings[0]?.error.message ?? 'no valid items';
    throw new UpstreamFormatError(
      `All ${items.length} ${source} items failed to normalize (first: ${first})`,
      source
    );
  }

  return { source, activities, warnings };
}
