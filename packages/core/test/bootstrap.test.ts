import { describe, it, expect } from 'vitest';
import {
  CORE_TOOL_LIMIT,
  META_TOOLS,
  coreTools,
  describeMetaTool,
  isMetaTool,
  missingCoreOperations,
} from '../src/bootstrap.js';
import type { ToolDescriptor } from '../src/types.js';
import { makeIndex } from './fixtures.js';

const index = makeIndex();

describe('coreTools', () => {
  it('lists the meta-tools first, then the default core operations', () => {
    expect(coreTools(index)).toEqual([
      'discover_tools',
      'get_tool_schema',
      'call_tool',
      'search_series',
      'get_series',
      'get_calendar',
      'get_quality_profiles',
    ]);
  });

  it('skips configured operations the catalog lacks', () => {
    expect(coreTools(index, ['get_system_status', 'reboot_server'])).toEqual([
      'discover_tools',
      'get_tool_schema',
      'call_tool',
      'get_system_status',
    ]);
  });

  it('never grows past the limit', () => {
    const many: ToolDescriptor[] = Array.from({ length: 12 }, (_, i) => ({
      name: `op_${i}`,
      summary: `Operation ${i}`,
      method: 'GET',
      path: `/op/${i}`,
      parameters: [],
      tags: ['general'],
    }));
    const names = coreTools(makeIndex(many), many.map(t => t.name));
    expect(names).toHaveLength(CORE_TOOL_LIMIT);
    expect(names.slice(3)).toEqual(['op_0', 'op_1', 'op_2', 'op_3', 'op_4']);
  });
});

describe('meta-tools', () => {
  it('are recognised by name', () => {
    expect(META_TOOLS.map(t => t.name)).toEqual(['discover_tools', 'get_tool_schema', 'call_tool']);
    expect(isMetaTool('get_tool_schema')).toBe(true);
    expect(isMetaTool('get_series')).toBe(false);
  });

  it('describe their own input', () => {
    expect(describeMetaTool('get_tool_schema')).toEqual({
      type: 'object',
      properties: {
        tool_name: { type: 'string', description: 'Name returned by discover_tools' },
      },
      required: ['tool_name'],
    });
    expect(describeMetaTool('get_series')).toBeUndefined();
  });
});

describe('missingCoreOperations', () => {
  it('names configured operations absent from the catalog', () => {
    expect(missingCoreOperations(index, ['get_series', 'reboot_server'])).toEqual(['reboot_server']);
  });
});
