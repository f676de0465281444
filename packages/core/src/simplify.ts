import type { SimplificationPolicy, SimplifyRule } from './types.js';

export const TRUNCATED_VALUE = '[truncated]';

export const DEFAULT_SIMPLIFICATION_POLICY: SimplificationPolicy = {
  default: {
    dropFields: ['_links'],
    maxDepth: 8,
  },
  categories: {
    series: {
      dropFields: ['images', 'alternateTitles', 'ratings', 'cleanTitle', 'sortTitle', 'titleSlug'],
      truncate: { overview: 200 },
    },
    episode: {
      dropFields: ['images', 'mediaInfo'],
    },
    calendar: {
      dropFields: ['images'],
    },
    queue: {
      dropFields: ['sortKey', 'sortDirection', 'pageSize'],
    },
    history: {
      dropFields: ['sortKey', 'sortDirection', 'pageSize'],
    },
  },
};

export interface ResolvedRule {
  dropFields: Set<string>;
  maxDepth: number;
  truncate: Map<string, number>;
}

/**
 * Combine the default rule with the rules of every tag the tool carries:
 * dropped fields and truncations add up, the shallowest depth wins.
 */
export function resolveRule(policy: SimplificationPolicy, tags: readonly string[]): ResolvedRule {
  const rules: SimplifyRule[] = [policy.default];
  for (const tag of tags) {
    const rule = policy.categories[tag];
    if (rule) rules.push(rule);
  }

  const resolved: ResolvedRule = { dropFields: new Set(), maxDepth: Infinity, truncate: new Map() };
  for (const rule of rules) {
    for (const field of rule.dropFields ?? []) resolved.dropFields.add(field);
    if (rule.maxDepth !== undefined) resolved.maxDepth = Math.min(resolved.maxDepth, rule.maxDepth);
    for (const [field, length] of Object.entries(rule.truncate ?? {})) {
      const current = resolved.truncate.get(field);
      resolved.truncate.set(field, current === undefined ? length : Math.min(current, length));
    }
  }
  return resolved;
}

function simplifyValue(value: unknown, rule: ResolvedRule, depth: number): unknown {
  if (value === null || typeof value !== 'object') return value;
  if (depth >= rule.maxDepth) return TRUNCATED_VALUE;

  if (Array.isArray(value)) {
    return value.map(item => simplifyValue(item, rule, depth + 1));
  }

  const out: Record<string, unknown> = {};
  for (const [key, raw] of Object.entries(value)) {
    if (rule.dropFields.has(key)) continue;
    const limit = rule.truncate.get(key);
    if (limit !== undefined && typeof raw === 'string' && raw.length > limit) {
      out[key] = `${raw.slice(0, limit)}...`;
      continue;
    }
    out[key] = simplifyValue(raw, rule, depth + 1);
  }
  return out;
}

/**
 * Strip bookkeeping the agent does not need from an upstream payload.
 * The shape of what remains is unchanged: lists stay lists, objects stay objects.
 */
export function simplifyResponse(data: unknown, tags: readonly string[], policy: SimplificationPolicy = DEFAULT_SIMPLIFICATION_POLICY): unknown {
  return simplifyValue(data, resolveRule(policy, tags), 0);
}
