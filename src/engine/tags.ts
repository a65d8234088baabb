/**
 * Tag resolution: which tag set of a change is checked
 *
 * `tags_all` already holds the provider's default tags merged with the
 * resource's own, so when it is present it is the set that will actually be
 * applied and `tags` is ignored.
 */

import type { ResourceChange, TagMap } from './types.js';

function isMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Normalise one tag value to a string.
 * `null` and non-scalar values become '' so they are reported as empty.
 */
function tagValueToString(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return '';
}

/**
 * Convert a raw plan value to a tag map, or `undefined` if it is not a mapping
 */
export function toTagMap(value: unknown): TagMap | undefined {
  if (!isMapping(value)) {
    return undefined;
  }
  const tags: Record<string, string> = {};
  for (const [key, raw] of Object.entries(value)) {
    tags[key] = tagValueToString(raw);
  }
  return tags;
}

/**
 * Effective tag set for a change: resolved tags, else declared tags, else empty
 */
export function effectiveTags(change: ResourceChange): TagMap {
  return toTagMap(change.resolvedTags) ?? toTagMap(change.declaredTags) ?? {};
}
