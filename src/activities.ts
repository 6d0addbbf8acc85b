/**
 * Request pipeline
 *
 * Validates request parameters, invokes the fetch collaborator once, maps
 * upstream failures to the error taxonomy, normalizes and pages.
 */

import { z } from 'zod';
import type { Activity, Actor, Envelope } from '../schemas/index.js';
import { GroupSelectorSchema, formatValidationErrors } from '../schemas/index.js';
import type {
  FetchCallback,
  FetchResponse,
  NormalizationWarning,
  SourceAdapter,
  WriteRequest,
} from '../normalizers/types.js';
import { assertSearchSupported, paginate } from './envelope.js';
import { BadRequestError, UpstreamFormatError, errorForStatus, unsupported } from './errors.js';

export const ActivitiesRequestSchema = z
  .object({
    userId: z.string().min(1).optional(),
    group: GroupSelectorSchema.default('@all'),
    query: z.string().min(1).optional(),
    startIndex: z.number().int().nonnegative().optional(),
    count: z.number().int().nonnegative().optional(),
  })
  .refine((request) => request.query === undefined || request.group === '@search', {
    message: 'q is only valid with the @search group',
    path: ['query'],
  });

export type ActivitiesRequest = z.input<typeof ActivitiesRequestSchema>;

export interface PipelineOptions {
  /** Page size used when the request gives no count */
  defaultCount?: number;
}

export interface ActivitiesResult {
  envelope: Envelope;
  /** Items skipped during normalization */
  warnings: NormalizationWarning[];
}

/**
 * Turn an upstream response into its body, or the matching request-level error
 */
export function checkResponse(adapter: SourceAdapter, response: FetchResponse): unknown {
  const upstream =
    adapter.detectError(response.body, response.status) ??
    (response.status >= 400 ? errorForStatus(adapter.source, response.status) : null);
  if (upstream) {
    throw upstream;
  }
  if (response.status >= 400) {
    throw new UpstreamFormatError(`${adapter.source} returned HTTP ${response.status}`, adapter.source);
  }
  return response.body;
}

/**
 * Fetch, normalize and page activities from one source
 */
export function getActivities(
  adapter: SourceAdapter,
  fetch: FetchCallback,
  request: ActivitiesRequest = {},
  options: PipelineOptions = {}
): ActivitiesResult {
  const parsed = ActivitiesRequestSchema.safeParse(request);
  if (!parsed.success) {
    throw new BadRequestError(formatValidationErrors(parsed.error).join('; '));
  }

  const params = {
    ...parsed.data,
    count: parsed.data.count ?? options.defaultCount,
  };
  assertSearchSupported(adapter.source, adapter.capabilities, params);

  const nativePaging = adapter.capabilities.has('paging');
  const response = fetch({
    source: adapter.source,
    group: params.group,
    userId: params.userId,
    query: params.query,
    ...(nativePaging ? { startIndex: params.startIndex, count: params.count } : {}),
  });

  const body = checkResponse(adapter, response);
  const result = adapter.normalize(body);

  for (const warning of result.warnings) {
    console.warn(`[${adapter.source}] Skipped item ${warning.itemIndex}: ${warning.error.message}`);
  }

  // Without native paging the source returned the full list
  const totalResults = adapter.totalResults(body) ?? (nativePaging ? undefined : result.activities.length);

  const envelope = paginate(result.activities, params, {
    source: adapter.source,
    capabilities: adapter.capabilities,
    totalResults,
  });

  return { envelope, warnings: result.warnings };
}

/**
 * Fetch and normalize one user's profile
 */
export function getActor(adapter: SourceAdapter, fetch: FetchCallback, userId?: string): Actor {
  const response = fetch({ source: adapter.source, group: '@self', userId });
  return adapter.normalizeActor(checkResponse(adapter, response));
}

/**
 * Native write request for a canonical activity. Nothing is sent.
 */
export function previewWrite(adapter: SourceAdapter, activity: Activity): WriteRequest {
  if (!adapter.capabilities.has('write')) {
    return unsupported(adapter.source, 'write');
  }
  return adapter.denormalize(activity);
}
