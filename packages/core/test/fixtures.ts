import { tokenize } from '../src/discovery.js';
import type {
  CatalogIndex,
  ToolDescriptor,
  UpstreamClient,
  UpstreamRequest,
  UpstreamResponse,
} from '../src/types.js';

export const TOOLS: ToolDescriptor[] = [
  {
    name: 'search_series',
    summary: 'Search for a series by title, e.g. "Breaking Bad"',
    method: 'GET',
    path: '/api/v3/series/lookup',
    parameters: [
      { name: 'term', location: 'query', type: 'string', required: true, description: 'Title to look up' },
    ],
    tags: ['series'],
  },
  {
    name: 'get_series',
    summary: 'List all series in the library',
    method: 'GET',
    path: '/api/v3/series',
    parameters: [],
    tags: ['series'],
  },
  {
    name: 'get_series_by_id',
    summary: 'Get one series',
    method: 'GET',
    path: '/api/v3/series/{id}',
    parameters: [
      { name: 'id', location: 'path', type: 'integer', required: true, description: 'Series id' },
    ],
    tags: ['series'],
  },
  {
    name: 'add_series',
    summary: 'Add a series to the library',
    method: 'POST',
    path: '/api/v3/series',
    parameters: [
      { name: 'tvdbId', location: 'body', type: 'integer', required: true, description: 'TVDB id' },
      { name: 'title', location: 'body', type: 'string', required: true, description: 'Title' },
      { name: 'monitored', location: 'body', type: 'boolean', required: false, description: 'Monitor new episodes' },
    ],
    requestBodySchema: {
      type: 'object',
      required: ['tvdbId', 'title'],
      properties: { tvdbId: { type: 'integer' }, title: { type: 'string' }, monitored: { type: 'boolean' } },
    },
    tags: ['series'],
  },
  {
    name: 'delete_series',
    summary: 'Delete a series',
    method: 'DELETE',
    path: '/api/v3/series/{id}',
    parameters: [
      { name: 'id', location: 'path', type: 'integer', required: true, description: 'Series id' },
      { name: 'deleteFiles', location: 'query', type: 'boolean', required: false, description: 'Delete files too' },
    ],
    tags: ['series'],
  },
  {
    name: 'get_calendar',
    summary: 'List episodes airing between two dates',
    method: 'GET',
    path: '/api/v3/calendar',
    parameters: [
      { name: 'start', location: 'query', type: 'string', required: false, description: 'Start date' },
      { name: 'unmonitored', location: 'query', type: 'boolean', required: false, description: 'Include unmonitored' },
    ],
    tags: ['calendar'],
  },
  {
    name: 'get_quality_profiles',
    summary: 'List quality profiles',
    method: 'GET',
    path: '/api/v3/qualityprofile',
    parameters: [],
    tags: ['quality'],
  },
  {
    name: 'get_system_status',
    summary: 'Get system status',
    method: 'GET',
    path: '/api/v3/system/status',
    parameters: [],
    tags: ['system'],
  },
  {
    name: 'run_command',
    summary: 'Start a background command',
    method: 'POST',
    path: '/api/v3/command',
    parameters: [
      {
        name: 'name',
        location: 'body',
        type: 'string',
        required: true,
        description: 'Command name',
        schema: { type: 'string', enum: ['RssSync', 'RefreshSeries'] },
      },
      {
        name: 'series_id',
        location: 'body',
        type: 'integer',
        required: false,
        description: 'Series to act on',
        wireName: 'seriesId',
      },
    ],
    requestBodySchema: { type: 'object', properties: { name: { type: 'string' }, seriesId: { type: 'integer' } } },
    tags: ['command'],
  },
  {
    name: 'update_tags',
    summary: 'Replace the tag list',
    method: 'PUT',
    path: '/api/v3/tag/bulk',
    parameters: [
      { name: 'body', location: 'body', type: 'array', required: true, description: 'Tag ids' },
    ],
    requestBodySchema: { type: 'array', items: { type: 'integer' } },
    wholeBody: true,
    tags: ['tag'],
  },
  {
    name: 'get_tag_by_label',
    summary: 'Get a tag by its label',
    method: 'GET',
    path: '/api/v3/tag/{label}',
    parameters: [
      { name: 'label', location: 'path', type: 'string', required: true, description: 'Tag label' },
    ],
    tags: ['tag'],
  },
];

/** Same shape buildCatalogIndex produces, without going through an OpenAPI document */
export function makeIndex(tools: ToolDescriptor[] = TOOLS, title = 'Media Server'): CatalogIndex {
  const byName = new Map<string, ToolDescriptor>();
  const byTag = new Map<string, Set<string>>();
  const byKeyword = new Map<string, Set<string>>();
  const add = (map: Map<string, Set<string>>, key: string, name: string) => {
    const set = map.get(key) ?? new Set<string>();
    set.add(name);
    map.set(key, set);
  };

  for (const tool of tools) {
    byName.set(tool.name, tool);
    for (const tag of tool.tags) add(byTag, tag, tool.name);
    for (const token of tokenize([tool.name, tool.summary, ...tool.tags].join(' '))) add(byKeyword, token, tool.name);
  }

  return {
    title,
    version: '3.0.0',
    tools: byName,
    byTag,
    byKeyword,
    stats: { operationCount: byName.size, tagCount: byTag.size, cyclicSchemas: [] },
  };
}

export interface FakeClient extends UpstreamClient {
  requests: UpstreamRequest[];
  signals: AbortSignal[];
}

/** Records every request and answers with the given handler */
export function fakeClient(
  handler: (request: UpstreamRequest) => Promise<UpstreamResponse> | UpstreamResponse = () => ({ status: 200, data: null }),
): FakeClient {
  const requests: UpstreamRequest[] = [];
  const signals: AbortSignal[] = [];
  return {
    requests,
    signals,
    async send(request, { signal }) {
      requests.push(request);
      signals.push(signal);
      return handler(request);
    },
  };
}
