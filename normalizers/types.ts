/**
 * Source-agnostic adapter types and interfaces
 */

import type {
  Activity,
  Actor,
  Capability,
  GroupSelector,
  ObjectType,
  SourceId,
  Verb,
} from '../schemas/index.js';
import type { UpstreamError, UpstreamFormatError } from '../src/errors.js';

/**
 * Item skipped during normalization
 */
export interface NormalizationWarning {
  /** Position of the item in the raw batch */
  itemIndex: number;
  error: UpstreamFormatError;
}

/**
 * Result of normalizing one raw payload
 */
export interface NormalizeResult {
  source: SourceId;
  /** Canonical activities in the source's order */
  activities: Activity[];
  warnings: NormalizationWarning[];
}

/**
 * Native request shape produced by `denormalize`. Nothing is sent; the
 * caller's HTTP client performs the write.
 */
export interface WriteRequest<TBody = unknown> {
  source: SourceId;
  method: 'POST';
  /** Endpoint path relative to the source's API root */
  endpoint: string;
  body: TBody;
}

/**
 * Common interface for all source adapters
 *
 * Operations a source does not support throw UnsupportedOperationError via
 * the shared `unsupported` helper.
 */
export interface SourceAdapter<TWrite extends WriteRequest = WriteRequest> {
  readonly source: SourceId;
  /** Domain used in tag URI ids */
  readonly domain: string;
  readonly capabilities: ReadonlySet<Capability>;
  /** Normalize a raw batch, skipping malformed items */
  normalize(raw: unknown): NormalizeResult;
  normalizeActor(raw: unknown): Actor;
  /** Map a canonical activity to the source's write request shape */
  denormalize(activity: Activity): TWrite;
  /**
   * Recognize an error-shaped payload, or a status code the source uses
   * in its own way
   */
  detectError(raw: unknown, status?: number): UpstreamError | null;
  /** Result count reported by the source, if any */
  totalResults(raw: unknown): number | undefined;
}

/**
 * What the fetch collaborator is asked to retrieve
 */
export interface FetchRequest {
  source: SourceId;
  group: GroupSelector;
  userId?: string;
  query?: string;
  /** Only set for sources that page natively */
  startIndex?: number;
  /** Only set for sources that page natively */
  count?: number;
}

/**
 * Already-retrieved upstream response
 */
export interface FetchResponse {
  status: number;
  body: unknown;
}

/**
 * Synchronous fetch collaborator, invoked once per request
 */
export type FetchCallback = (request: FetchRequest) => FetchResponse;

/**
 * Native item kind mapping entry
 */
export interface TypeMappingEntry {
  /** Item kind as the source names it */
  source: string;
  verb: Verb;
  objectType: ObjectType;
  /** Optional description */
  description?: string;
}

/**
 * Source type mapping table
 */
export interface SourceTypeMapping {
  source: SourceId;
  mappings: TypeMappingEntry[];
}
