/**
 * Canonical JSON codec
 *
 * The reference serialization of envelopes and activities. Decoding
 * validates with the canonical zod schemas, so a decoded tree is exactly
 * what `createActivity` / `createEnvelope` would build.
 */

import { z } from 'zod';
import type { Activity, Envelope } from '../schemas/index.js';
import { createEnvelope, formatValidationErrors, safeValidateActivity } from '../schemas/index.js';
import { deepFreeze } from '../normalizers/utils.js';
import { DecodingError } from '../src/errors.js';

const EnvelopeShapeSchema = z.object({
  items: z.array(z.unknown()),
  startIndex: z.number().int().nonnegative(),
  itemsPerPage: z.number().int().nonnegative(),
  totalResults: z.number().int().nonnegative(),
});

function parseJson(input: string | unknown, what: string): unknown {
  if (typeof input !== 'string') {
    return input;
  }
  try {
    return JSON.parse(input);
  } catch (error) {
    throw new DecodingError(`Invalid ${what} JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
}

function issues(error: z.ZodError, prefix?: string): string {
  return formatValidationErrors(error)
    .map((issue) => (prefix ? `${prefix}.${issue}` : issue))
    .join('; ');
}

function decodeActivity(value: unknown, prefix?: string): Activity {
  const result = safeValidateActivity(value);
  if (!result.success) {
    throw new DecodingError(`Invalid activity: ${issues(result.error, prefix)}`);
  }
  return deepFreeze(result.data);
}

export function activityToJson(activity: Activity): string {
  return JSON.stringify(activity, null, 2);
}

/**
 * @param input - JSON text or an already-parsed value
 */
export function jsonToActivity(input: string | unknown): Activity {
  return decodeActivity(parseJson(input, 'activity'));
}

export function envelopeToJson(envelope: Envelope): string {
  return JSON.stringify(envelope, null, 2);
}

/**
 * @param input - JSON text or an already-parsed value
 */
export function jsonToEnvelope(input: string | unknown): Envelope {
  const shape = EnvelopeShapeSchema.safeParse(parseJson(input, 'envelope'));
  if (!shape.success) {
    throw new DecodingError(`Invalid envelope: ${issues(shape.error)}`);
  }

  const items = shape.data.items.map((item, index) => decodeActivity(item, `items.${index}`));
  if (shape.data.itemsPerPage !== items.length) {
    throw new DecodingError(
      `Invalid envelope: itemsPerPage: expected ${items.length}, got ${shape.data.itemsPerPage}`
    );
  }

  return createEnvelope({ ...shape.data, items });
}
