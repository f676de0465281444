import { describe, it, expect } from 'vitest';
import { SchemaError } from '@openapi-scout/core';
import { SchemaGraph, resolvePointer, truncatedMarker } from '../src/schema-graph.js';

const root = {
  components: {
    schemas: {
      Series: {
        type: 'object',
        properties: {
          title: { type: 'string' },
          seasons: { type: 'array', items: { $ref: '#/components/schemas/Season' } },
        },
      },
      Season: {
        type: 'object',
        properties: { seasonNumber: { type: 'integer' } },
        example: { $ref: 'left as written' },
      },
      'a/b': { type: 'string' },
      Node: {
        type: 'object',
        properties: { children: { type: 'array', items: { $ref: '#/components/schemas/Node' } } },
      },
    },
  },
};

describe('resolvePointer', () => {
  it('follows escaped segments and array indexes', () => {
    expect(resolvePointer(root, '#/components/schemas/a~1b')).toEqual({ type: 'string' });
    expect(resolvePointer({ list: ['x', 'y'] }, '#/list/1')).toBe('y');
    expect(resolvePointer(root, '#')).toBe(root);
  });

  it('returns undefined for missing or foreign pointers', () => {
    expect(resolvePointer(root, '#/components/schemas/Missing')).toBeUndefined();
    expect(resolvePointer(root, 'other.yaml#/x')).toBeUndefined();
  });
});

describe('SchemaGraph', () => {
  const graph = SchemaGraph.build(root);

  it('has a node per component schema and an edge per reference', () => {
    expect(Array.from(graph.nodes.keys())).toEqual([
      '#/components/schemas/Series',
      '#/components/schemas/Season',
      '#/components/schemas/a~1b',
      '#/components/schemas/Node',
    ]);
    expect(Array.from(graph.edges.get('#/components/schemas/Series') ?? [])).toEqual(['#/components/schemas/Season']);
    expect(graph.edges.get('#/components/schemas/Season')?.size).toBe(0);
  });

  it('finds self-referencing schemas', () => {
    expect(graph.cyclicSchemas()).toEqual(['Node']);
  });

  it('inlines references and leaves examples alone', () => {
    expect(graph.expand({ $ref: '#/components/schemas/Series' }, 4)).toEqual({
      type: 'object',
      properties: {
        title: { type: 'string' },
        seasons: {
          type: 'array',
          items: {
            type: 'object',
            properties: { seasonNumber: { type: 'integer' } },
            example: { $ref: 'left as written' },
          },
        },
      },
    });
  });

  it('lets sibling keys override the referenced schema', () => {
    expect(graph.expand({ $ref: '#/components/schemas/a~1b', description: 'Slug' }, 4)).toEqual({
      type: 'string',
      description: 'Slug',
    });
  });

  it('stops at cycles and at the depth limit', () => {
    expect(graph.expand({ $ref: '#/components/schemas/Node' }, 4)).toEqual({
      type: 'object',
      properties: { children: { type: 'array', items: truncatedMarker('#/components/schemas/Node') } },
    });
    expect(graph.expand({ $ref: '#/components/schemas/Series' }, 0)).toEqual(
      truncatedMarker('#/components/schemas/Series'),
    );
  });

  it('rejects a $ref that is not a string', () => {
    expect(() => SchemaGraph.build({ paths: { '/a': { $ref: 7 } } })).toThrow(SchemaError);
  });
});
