import { DEFAULT_IGNORED_PREFIXES } from './types.js';

export const FALLBACK_TAG = 'general';

const VERSION_SEGMENT = /^v\d+$/i;

export interface TaggableOperation {
  method: string;
  path: string;
  declaredTags?: readonly string[];
}

export function isPlaceholder(segment: string): boolean {
  return segment.startsWith('{') && segment.endsWith('}');
}

export function isIgnoredPrefix(segment: string, ignoredPrefixes: readonly string[] = DEFAULT_IGNORED_PREFIXES): boolean {
  const s = segment.toLowerCase();
  return VERSION_SEGMENT.test(s) || ignoredPrefixes.some(p => p.toLowerCase() === s);
}

/** Path segments with the leading "/api/v3"-style prefix removed */
export function meaningfulSegments(path: string, ignoredPrefixes: readonly string[] = DEFAULT_IGNORED_PREFIXES): string[] {
  const segments = path.split('/').filter(Boolean);
  let start = 0;
  while (start < segments.length && isIgnoredPrefix(segments[start], ignoredPrefixes)) start++;
  return segments.slice(start);
}

/**
 * Category labels for one operation: the first meaningful path segment plus
 * whatever tags the document declares, all lower-cased. Pure; the same input
 * always gives the same sorted list.
 */
export function tagOperation(
  operation: TaggableOperation,
  ignoredPrefixes: readonly string[] = DEFAULT_IGNORED_PREFIXES,
): string[] {
  const tags = new Set<string>();

  const first = meaningfulSegments(operation.path, ignoredPrefixes).find(s => !isPlaceholder(s));
  if (first) tags.add(first.toLowerCase());

  for (const declared of operation.declaredTags ?? []) {
    const tag = declared.trim().toLowerCase();
    if (tag) tags.add(tag);
  }

  if (tags.size === 0) tags.add(FALLBACK_TAG);
  return Array.from(tags).sort();
}
