/**
 * Normalization utility functions
 *
 * Common helpers shared by the source adapters and the canonical model
 * constructors.
 */

const ISO8601_UTC_REGEX = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d{3})?Z$/;
const NAIVE_DATETIME_REGEX = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?$/;
const COMPACT_OFFSET_REGEX = /([+-]\d{2})(\d{2})$/;

/**
 * Normalize a timestamp to UTC ISO8601 format
 *
 * Handles various input formats:
 * - Already UTC with second or millisecond precision: pass through
 * - With timezone offset (+HH:MM or +HHMM): convert to UTC
 * - Without timezone: read as UTC
 * - Date only (YYYY-MM-DD): use noon UTC
 * - Other formats Date can parse (e.g. "Wed Feb 22 20:26:41 +0000 2017")
 *
 * @returns ISO8601 UTC timestamp (ending with Z), or undefined if unparseable
 */
export function normalizeToUTC(timestamp: string): string | undefined {
  const trimmed = timestamp.trim();

  if (ISO8601_UTC_REGEX.test(trimmed)) {
    return trimmed;
  }

  // Date only - use noon UTC
  if (/^\d{4}-\d{2}-\d{2}$/.test(trimmed)) {
    return `${trimmed}T12:00:00Z`;
  }

  let parseable = trimmed;
  if (NAIVE_DATETIME_REGEX.test(parseable)) {
    parseable += 'Z';
  } else if (/T/.test(parseable) && COMPACT_OFFSET_REGEX.test(parseable)) {
    parseable = parseable.replace(COMPACT_OFFSET_REGEX, '$1:$2');
  }

  const date = new Date(parseable);
  if (isNaN(date.getTime())) {
    return undefined;
  }

  return date.toISOString();
}

/**
 * Generate a stable, source-namespaced id
 *
 * Format: tag:{domain}:{sourceId}
 *
 * @param domain - Source domain, e.g. twitter.com
 * @param sourceId - Source-native identifier
 */
export function tagUri(domain: string, sourceId: string): string {
  return `tag:${domain}:${sourceId}`;
}

/**
 * Extract the source-native id from a tag URI for the given domain
 *
 * @returns the native id, or undefined if the URI belongs to another domain
 */
export function parseTagUri(domain: string, uri: string): string | undefined {
  const prefix = `tag:${domain}:`;
  return uri.startsWith(prefix) ? uri.slice(prefix.length) : undefined;
}

/**
 * Truncate a string to a maximum length, appending an ellipsis when cut
 *
 * @param text - Input text
 * @param maxLength - Maximum length (default: 200)
 * @returns Truncated text or undefined if empty
 */
export function truncateText(text: string | undefined | null, maxLength: number = 200): string | undefined {
  if (!text) {
    return undefined;
  }

  const trimmed = text.trim();
  if (trimmed.length === 0) {
    return undefined;
  }

  const chars = Array.from(trimmed);
  if (chars.length <= maxLength) {
    return trimmed;
  }

  return `${chars.slice(0, maxLength - 1).join('').trimEnd()}…`;
}

/**
 * Extract first line from multiline text
 *
 * @param text - Input text
 * @param maxLength - Maximum length for the first line (default: 100)
 * @returns First line, truncated if necessary
 */
export function extractFirstLine(text: string | undefined | null, maxLength: number = 100): string | undefined {
  if (!text) {
    return undefined;
  }

  const firstLine = text.trim().split('\n')[0].trim();
  return truncateText(firstLine, maxLength);
}

/**
 * Recursively drop undefined values, empty strings, empty arrays and objects
 * left empty by that
 */
export function compact(value: unknown): unknown {
  if (Array.isArray(value)) {
    const items = value.map(compact).filter((item) => item !== undefined);
    return items.length > 0 ? items : undefined;
  }

  if (typeof value === 'object' && value !== null) {
    const result: Record<string, unknown> = {};
    for (const [key, child] of Object.entries(value)) {
      const compacted = compact(child);
      if (compacted !== undefined) {
        result[key] = compacted;
      }
    }
    return Object.keys(result).length > 0 ? result : undefined;
  }

  if (value === '' || value === null) {
    return undefined;
  }

  return value;
}

/**
 * Freeze an object tree in place
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Whether a URL is on one of the given hosts or their subdomains
 */
export function isUrlOnHost(url: string, hosts: readonly string[]): boolean {
  let host: string;
  try {
    host = new URL(url).hostname.toLowerCase();
  } catch {
    return false;
  }
  return hosts.some((candidate) => host === candidate || host.endsWith(`.${candidate}`));
}

/**
 * Native id of a referenced object, from its tag URI or the last segment of
 * its URL. URLs on other hosts belong to other sites and give nothing.
 */
export function nativeId(
  domain: string,
  ref: { id?: string; url?: string } | undefined,
  hosts: readonly string[] = [domain]
): string | undefined {
  if (!ref) {
    return undefined;
  }
  const fromId = ref.id ? parseTagUri(domain, ref.id) : undefined;
  if (fromId) {
    return fromId;
  }
  if (ref.url && isUrlOnHost(ref.url, hosts)) {
    const segments = new URL(ref.url).pathname.split('/').filter(Boolean);
    return segments[segments.length - 1];
  }
  return undefined;
}

/**
 * Native id of the first reference that has one
 */
export function firstNativeId(
  domain: string,
  refs: readonly { id?: string; url?: string }[] | undefined,
  hosts: readonly string[] = [domain]
): string | undefined {
  for (const ref of refs ?? []) {
    const id = nativeId(domain, ref, hosts);
    if (id) return id;
  }
  return undefined;
}
