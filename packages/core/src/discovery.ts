import { coreTools, getMetaTool } from './bootstrap.js';
import type {
  CatalogIndex,
  DiscoveredTool,
  DiscoveryQuery,
  DiscoveryResult,
  ToolDescriptor,
} from './types.js';

export const DEFAULT_MAX_RESULTS = 10;
export const MAX_RESULTS_CEILING = 50;

export interface DiscoveryOptions {
  defaultMaxResults?: number;
  maxResultsCeiling?: number;
  /** Operations exposed in the bootstrap set */
  coreOperations?: readonly string[];
}

const SCORE_EXACT_NAME = 100;
const SCORE_TAG_EQUALS = 50;
const SCORE_TAG_CONTAINS = 25;
const SCORE_NAME_CONTAINS = 20;
const SCORE_SUMMARY_CONTAINS = 10;
const SCORE_TOKEN = 5;

const STOPWORDS = new Set([
  'the', 'a', 'an', 'to', 'for', 'with', 'and', 'or', 'of', 'in', 'on', 'at', 'is', 'are',
  'by', 'from', 'via', 'all', 'me', 'my', 'it', 'this', 'that',
]);

/**
 * Lower-case word tokens, stopwords removed. Trailing plural "s" also yields
 * the singular form so "profiles" finds "profile".
 */
export function tokenize(text: string): string[] {
  const tokens = (text.toLowerCase().match(/[a-z0-9]+/g) ?? []).filter(t => !STOPWORDS.has(t));
  const out = new Set<string>();
  for (const token of tokens) {
    out.add(token);
    if (token.endsWith('s') && token.length > 3) out.add(token.slice(0, -1));
  }
  return Array.from(out);
}

export function normalizeKeyword(keyword: string | undefined): string {
  return (keyword ?? '').trim().toLowerCase();
}

export function normalizeCategory(category: string | undefined): string | undefined {
  const c = (category ?? '').trim().toLowerCase();
  if (!c || c === 'all') return undefined;
  return c;
}

export function clampMaxResults(requested: number | undefined, options: DiscoveryOptions = {}): number {
  const ceiling = options.maxResultsCeiling ?? MAX_RESULTS_CEILING;
  const fallback = Math.min(options.defaultMaxResults ?? DEFAULT_MAX_RESULTS, ceiling);
  if (requested === undefined || !Number.isFinite(requested)) return fallback;
  return Math.max(1, Math.min(Math.floor(requested), ceiling));
}

/**
 * Relevance of one tool for a normalized keyword. Pure and total:
 * the same tool and keyword always give the same score.
 */
export function scoreTool(tool: ToolDescriptor, keyword: string, tokenHits = 0): number {
  if (!keyword) return 0;

  const name = tool.name.toLowerCase();
  const summary = tool.summary.toLowerCase();
  let score = 0;

  if (name === keyword.replace(/\s+/g, '_')) score += SCORE_EXACT_NAME;
  else if (name.includes(keyword)) score += SCORE_NAME_CONTAINS;

  if (tool.tags.includes(keyword)) score += SCORE_TAG_EQUALS;
  else if (tool.tags.some(tag => tag.includes(keyword))) score += SCORE_TAG_CONTAINS;

  if (summary.includes(keyword)) score += SCORE_SUMMARY_CONTAINS;

  if (score === 0) score = tokenHits * SCORE_TOKEN;

  return score;
}

function byScoreThenName(a: DiscoveredTool, b: DiscoveredTool): number {
  return b.matchScore - a.matchScore || (a.name < b.name ? -1 : a.name > b.name ? 1 : 0);
}

function toDiscovered(tool: ToolDescriptor, matchScore: number): DiscoveredTool {
  return { name: tool.name, summary: tool.summary, tags: [...tool.tags], matchScore };
}

/** How many of the keyword's tokens each tool carries, via the keyword index */
function countTokenHits(index: CatalogIndex, tokens: readonly string[]): Map<string, number> {
  const hits = new Map<string, number>();
  for (const token of tokens) {
    for (const name of index.byKeyword.get(token) ?? []) {
      hits.set(name, (hits.get(name) ?? 0) + 1);
    }
  }
  return hits;
}

/** Tool names to score: the category's members, or the whole catalog */
function candidateNames(index: CatalogIndex, category: string | undefined): string[] {
  if (category === undefined) return Array.from(index.tools.keys());
  return Array.from(index.byTag.get(category) ?? []);
}

function bootstrapResult(index: CatalogIndex, options: DiscoveryOptions): DiscoveryResult {
  const tools: DiscoveredTool[] = [];
  for (const name of coreTools(index, options.coreOperations)) {
    const meta = getMetaTool(name);
    if (meta) {
      tools.push({ name: meta.name, summary: meta.summary, tags: [...meta.tags], matchScore: 0 });
      continue;
    }
    const tool = index.tools.get(name);
    if (tool) tools.push(toDiscovered(tool, 0));
  }
  return { tools, total: tools.length };
}

/**
 * Answer a discovery query with a bounded, ranked slice of the catalog.
 * Without any filter or explicit limit only the bootstrap set is returned;
 * the full catalog is never handed over unless asked for with a limit.
 */
export function discover(index: CatalogIndex, query: DiscoveryQuery, options: DiscoveryOptions = {}): DiscoveryResult {
  const category = normalizeCategory(query.category);
  const keyword = normalizeKeyword(query.keyword);

  if (category === undefined && !keyword && query.maxResults === undefined) {
    return bootstrapResult(index, options);
  }

  const limit = clampMaxResults(query.maxResults, options);
  const tokenHits = countTokenHits(index, tokenize(keyword));
  const matches: DiscoveredTool[] = [];

  for (const name of candidateNames(index, category)) {
    const tool = index.tools.get(name);
    if (!tool) continue;
    if (!keyword) {
      matches.push(toDiscovered(tool, 0));
      continue;
    }
    const score = scoreTool(tool, keyword, tokenHits.get(name));
    if (score > 0) matches.push(toDiscovered(tool, score));
  }

  matches.sort(byScoreThenName);
  return { tools: matches.slice(0, limit), total: matches.length };
}

/** Tag names with the number of tools carrying each, most populated first */
export function listCategories(index: CatalogIndex): Array<{ tag: string; count: number }> {
  return Array.from(index.byTag.entries())
    .map(([tag, names]) => ({ tag, count: names.size }))
    .sort((a, b) => b.count - a.count || (a.tag < b.tag ? -1 : a.tag > b.tag ? 1 : 0));
}
