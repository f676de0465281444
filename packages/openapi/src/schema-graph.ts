import { SchemaError } from '@openapi-scout/core';

export const TRUNCATED_DESCRIPTION = 'schema truncated';

const SCHEMA_PREFIXES = ['#/components/schemas/', '#/definitions/'];

// Values under these keys are sample payloads, not schemas
const OPAQUE_KEYS = new Set(['example', 'examples', 'x-example']);

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function truncatedMarker(ref: string): Record<string, unknown> {
  return { type: 'object', description: TRUNCATED_DESCRIPTION, 'x-truncated-ref': ref };
}

function encodeSegment(segment: string): string {
  return segment.replace(/~/g, '~0').replace(/\//g, '~1');
}

function decodeSegment(segment: string): string {
  let decoded = segment;
  try {
    decoded = decodeURIComponent(segment);
  } catch {
    // not percent-encoded; use as written
  }
  return decoded.replace(/~1/g, '/').replace(/~0/g, '~');
}

/** Look up a local JSON pointer ("#/a/b") inside the document */
export function resolvePointer(root: unknown, ref: string): unknown {
  if (ref === '#') return root;
  if (!ref.startsWith('#/')) return undefined;

  let current: unknown = root;
  for (const raw of ref.slice(2).split('/')) {
    const segment = decodeSegment(raw);
    if (Array.isArray(current)) {
      const i = Number(segment);
      current = Number.isInteger(i) ? current[i] : undefined;
    } else if (isRecord(current) && Object.prototype.hasOwnProperty.call(current, segment)) {
      current = current[segment];
    } else {
      return undefined;
    }
  }
  return current;
}

/** The component schema a reference lands in, e.g. "#/components/schemas/Series/properties/x" → Series */
function schemaNodeOf(ref: string): string | undefined {
  for (const prefix of SCHEMA_PREFIXES) {
    if (!ref.startsWith(prefix)) continue;
    const name = ref.slice(prefix.length).split('/')[0];
    return name ? prefix + name : undefined;
  }
  return undefined;
}

/**
 * Every component schema as a node, every $ref between them as an edge.
 * Building the graph validates all references in the document, so later
 * expansion never meets a dangling one.
 */
export class SchemaGraph {
  private readonly root: Record<string, unknown>;
  readonly nodes: ReadonlyMap<string, unknown>;
  readonly edges: ReadonlyMap<string, ReadonlySet<string>>;

  private constructor(
    root: Record<string, unknown>,
    nodes: Map<string, unknown>,
    edges: Map<string, Set<string>>,
  ) {
    this.root = root;
    this.nodes = nodes;
    this.edges = edges;
  }

  static build(root: Record<string, unknown>): SchemaGraph {
    const nodes = new Map<string, unknown>();
    const components = root.components;
    const collections: Array<[string, unknown]> = [
      ['#/components/schemas/', isRecord(components) ? components.schemas : undefined],
      ['#/definitions/', root.definitions],
    ];
    for (const [prefix, collection] of collections) {
      if (!isRecord(collection)) continue;
      for (const [name, schema] of Object.entries(collection)) {
        nodes.set(prefix + encodeSegment(name), schema);
      }
    }

    validateRefs(root, root, '#');

    const edges = new Map<string, Set<string>>();
    for (const [node, schema] of nodes) {
      const targets = new Set<string>();
      collectRefs(schema, ref => {
        const target = schemaNodeOf(ref);
        if (target) targets.add(target);
      });
      edges.set(node, targets);
    }

    return new SchemaGraph(root, nodes, edges);
  }

  resolveRef(ref: string): unknown {
    const target = resolvePointer(this.root, ref);
    if (target === undefined) throw new SchemaError(`Unresolvable $ref "${ref}"`, { ref });
    return target;
  }

  /** Component schema names that sit on a reference cycle, sorted */
  cyclicSchemas(): string[] {
    const cyclic = new Set<string>();
    for (const component of stronglyConnected(this.edges)) {
      const [only] = component;
      if (component.length > 1 || this.edges.get(only)?.has(only)) {
        for (const node of component) cyclic.add(node);
      }
    }
    return Array.from(cyclic, node => decodeSegment(node.slice(node.lastIndexOf('/') + 1))).sort();
  }

  /**
   * Inline references up to `maxRefDepth` hops. A reference past the limit,
   * or one that re-enters a schema already being expanded, becomes the
   * truncation marker.
   */
  expand(value: unknown, maxRefDepth: number, stack: readonly string[] = []): unknown {
    if (Array.isArray(value)) return value.map(item => this.expand(item, maxRefDepth, stack));
    if (!isRecord(value)) return value;

    const ref = value.$ref;
    if (typeof ref === 'string') {
      if (stack.includes(ref) || stack.length >= maxRefDepth) return truncatedMarker(ref);
      const expanded = this.expand(this.resolveRef(ref), maxRefDepth, [...stack, ref]);
      const siblings = Object.entries(value).filter(([key]) => key !== '$ref');
      if (siblings.length === 0 || !isRecord(expanded)) return expanded;
      const merged: Record<string, unknown> = { ...expanded };
      for (const [key, sibling] of siblings) merged[key] = this.expand(sibling, maxRefDepth, stack);
      return merged;
    }

    const out: Record<string, unknown> = {};
    for (const [key, child] of Object.entries(value)) {
      out[key] = OPAQUE_KEYS.has(key) ? structuredClone(child) : this.expand(child, maxRefDepth, stack);
    }
    return out;
  }
}

function validateRefs(root: Record<string, unknown>, value: unknown, location: string): void {
  if (Array.isArray(value)) {
    value.forEach((item, i) => validateRefs(root, item, `${location}/${i}`));
    return;
  }
  if (!isRecord(value)) return;

  if ('$ref' in value) {
    const ref = value.$ref;
    if (typeof ref !== 'string') {
      throw new SchemaError(`$ref at ${location} is not a string`, { location });
    }
    if (!ref.startsWith('#')) {
      throw new SchemaError(`$ref "${ref}" at ${location} is not a local reference`, { location, ref });
    }
    if (resolvePointer(root, ref) === undefined) {
      throw new SchemaError(`Unresolvable $ref "${ref}" at ${location}`, { location, ref });
    }
  }

  for (const [key, child] of Object.entries(value)) {
    if (OPAQUE_KEYS.has(key)) continue;
    validateRefs(root, child, `${location}/${encodeSegment(key)}`);
  }
}

function collectRefs(value: unknown, visit: (ref: string) => void): void {
  if (Array.isArray(value)) {
    for (const item of value) collectRefs(item, visit);
    return;
  }
  if (!isRecord(value)) return;
  if (typeof value.$ref === 'string') visit(value.$ref);
  for (const [key, child] of Object.entries(value)) {
    if (!OPAQUE_KEYS.has(key)) collectRefs(child, visit);
  }
}

/** Tarjan's algorithm; returns every strongly connected component */
function stronglyConnected(edges: ReadonlyMap<string, ReadonlySet<string>>): string[][] {
  let counter = 0;
  const index = new Map<string, number>();
  const low = new Map<string, number>();
  const onStack = new Set<string>();
  const stack: string[] = [];
  const components: string[][] = [];

  const visit = (node: string): void => {
    index.set(node, counter);
    low.set(node, counter);
    counter++;
    stack.push(node);
    onStack.add(node);

    for (const next of edges.get(node) ?? []) {
      if (!edges.has(next)) continue;
      if (!index.has(next)) {
        visit(next);
        low.set(node, Math.min(low.get(node) ?? 0, low.get(next) ?? 0));
      } else if (onStack.has(next)) {
        low.set(node, Math.min(low.get(node) ?? 0, index.get(next) ?? 0));
      }
    }

    if (low.get(node) === index.get(node)) {
      const component: string[] = [];
      let member: string | undefined;
      do {
        member = stack.pop();
        if (member === undefined) break;
        onStack.delete(member);
        component.push(member);
      } while (member !== node);
      components.push(component);
    }
  };

  for (const node of edges.keys()) {
    if (!index.has(node)) visit(node);
  }
  return components;
}
