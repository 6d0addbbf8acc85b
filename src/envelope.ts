/**
 * Envelope paging
 *
 * Sources that page natively have already sliced their items upstream, so
 * their pages are wrapped as is. For all others the requested window is
 * sliced here.
 */

import type { Activity, Capability, Envelope, GroupSelector, SourceId } from '../schemas/index.js';
import { createEnvelope } from '../schemas/index.js';
import { BadRequestError, UnsupportedOperationError } from './errors.js';

export interface PageParams {
  /** First item to return, default 0 */
  startIndex?: number;
  /** Maximum number of items, default all remaining */
  count?: number;
  query?: string;
  group?: GroupSelector;
}

export interface PageOptions {
  source: SourceId;
  capabilities: ReadonlySet<Capability>;
  /** Result count reported by the source */
  totalResults?: number;
}

function requireIndex(name: string, value: number | undefined): void {
  if (value !== undefined && (!Number.isInteger(value) || value < 0)) {
    throw new BadRequestError(`${name} must be a non-negative integer, got ${value}`);
  }
}

/**
 * Reject searches against sources that cannot search
 */
export function assertSearchSupported(source: SourceId, capabilities: ReadonlySet<Capability>, params: PageParams): void {
  if ((params.group === '@search' || params.query) && !capabilities.has('search')) {
    throw new UnsupportedOperationError(`${source} does not support search`);
  }
}

/**
 * Wrap a list of activities in an envelope, slicing client-side when the
 * source does not page natively
 *
 * `totalResults` is the source-reported count when given, otherwise the
 * number of items in the page.
 */
export function paginate(items: readonly Activity[], params: PageParams, options: PageOptions): Envelope {
  requireIndex('startIndex', params.startIndex);
  requireIndex('count', params.count);
  assertSearchSupported(options.source, options.capabilities, params);

  const startIndex = params.startIndex ?? 0;
  const page = options.capabilities.has('paging')
    ? [...items]
    : items.slice(startIndex, params.count === undefined ? undefined : startIndex + params.count);

  return createEnvelope({
    items: page,
    startIndex,
    itemsPerPage: page.length,
    totalResults: options.totalResults ?? page.length,
  });
}
