import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect } from 'vitest';
import { DEFAULT_SIMPLIFICATION_POLICY } from '@openapi-scout/core';
import {
  BUNDLED_DOCUMENT,
  ConfigError,
  interpolateEnv,
  loadConfig,
  mergeLayers,
  parseServerArgs,
  simplificationPolicy,
} from '../src/config.js';

function configFile(contents: string): string {
  const dir = mkdtempSync(join(tmpdir(), 'openapi-scout-config-'));
  const path = join(dir, 'scout.yaml');
  writeFileSync(path, contents);
  return path;
}

function configFailure(fn: () => unknown): ConfigError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigError) return error;
    throw error;
  }
  throw new Error('expected a ConfigError');
}

describe('loadConfig', () => {
  it('falls back to defaults and the bundled document', () => {
    const config = loadConfig({ env: {} });
    expect(config.upstream).toEqual({ baseUrl: 'http://localhost:8989', apiKeyHeader: 'X-Api-Key', timeoutMs: 30000 });
    expect(config.openapi.source).toBe(BUNDLED_DOCUMENT);
    expect(config.discovery).toEqual({
      defaultMaxResults: 10,
      maxResultsCeiling: 50,
      maxRefDepth: 4,
      ignoredPrefixes: ['api'],
    });
    expect(config.coreOperations).toEqual(['search_series', 'get_series', 'get_calendar', 'get_quality_profiles']);
    expect(config.logLevel).toBe('info');
    expect(config.simplification).toBeUndefined();
  });

  it('reads the environment', () => {
    const config = loadConfig({
      env: {
        UPSTREAM_URL: 'http://media.test:8989',
        UPSTREAM_API_KEY: 'test-secret',
        UPSTREAM_TIMEOUT_MS: '5000',
        OPENAPI_SOURCE: './api.yaml',
        LOG_LEVEL: 'DEBUG',
      },
    });
    expect(config.upstream).toEqual({
      baseUrl: 'http://media.test:8989',
      apiKey: 'test-secret',
      apiKeyHeader: 'X-Api-Key',
      timeoutMs: 5000,
    });
    expect(config.openapi.source).toBe('./api.yaml');
    expect(config.logLevel).toBe('debug');
  });

  it('lets overrides win over the environment', () => {
    const config = loadConfig({
      env: { UPSTREAM_URL: 'http://media.test:8989', UPSTREAM_API_KEY: 'test-secret' },
      overrides: { baseUrl: 'http://other.test' },
    });
    expect(config.upstream.baseUrl).toBe('http://other.test');
    expect(config.upstream.apiKey).toBe('test-secret');
  });

  it('reads a config file with environment references', () => {
    const path = configFile(
      [
        'upstream:',
        '  apiKey: ${MEDIA_KEY}',
        'discovery:',
        '  defaultMaxResults: 5',
        'coreOperations: [get_series]',
        'simplification:',
        '  categories:',
        '    series:',
        '      truncate:',
        '        overview: 80',
        '',
      ].join('\n'),
    );
    const config = loadConfig({ configPath: path, env: { MEDIA_KEY: 'test-secret' } });
    expect(config.upstream.apiKey).toBe('test-secret');
    expect(config.discovery.defaultMaxResults).toBe(5);
    expect(config.coreOperations).toEqual(['get_series']);
    expect(config.simplification).toEqual({ categories: { series: { truncate: { overview: 80 } } } });
  });

  it('finds the config file through OPENAPI_SCOUT_CONFIG', () => {
    const path = configFile('logLevel: warn\n');
    expect(loadConfig({ env: { OPENAPI_SCOUT_CONFIG: path } }).logLevel).toBe('warn');
  });

  it('lets the environment win over the config file', () => {
    const path = configFile('upstream:\n  baseUrl: http://file.test\n');
    expect(loadConfig({ configPath: path, env: { UPSTREAM_URL: 'http://env.test' } }).upstream.baseUrl).toBe(
      'http://env.test',
    );
  });

  it('lists every invalid field', () => {
    const error = configFailure(() => loadConfig({ env: { UPSTREAM_URL: 'not a url', LOG_LEVEL: 'loud' } }));
    expect(error.issues).toHaveLength(2);
    expect(error.issues[0]).toMatch(/^upstream\.baseUrl: /);
    expect(error.issues[1]).toMatch(/^logLevel: /);
    expect(error.message.startsWith('Invalid configuration\n  upstream.baseUrl: ')).toBe(true);
  });

  it('rejects a default result count above the ceiling', () => {
    const path = configFile('discovery:\n  defaultMaxResults: 60\n');
    const error = configFailure(() => loadConfig({ configPath: path, env: {} }));
    expect(error.issues).toEqual(['discovery.defaultMaxResults: must not exceed discovery.maxResultsCeiling']);
  });

  it('rejects unknown simplification keys', () => {
    const path = configFile('simplification:\n  categories:\n    series:\n      drop: [images]\n');
    expect(() => loadConfig({ configPath: path, env: {} })).toThrow(ConfigError);
  });

  it('rejects a config file that is not an object', () => {
    const path = configFile('- a\n- b\n');
    expect(() => loadConfig({ configPath: path, env: {} })).toThrow(`Config file ${path} must contain an object`);
  });

  it('reports an unreadable config file', () => {
    expect(() => loadConfig({ configPath: '/nonexistent/scout.yaml', env: {} })).toThrow(
      'Could not read config file /nonexistent/scout.yaml',
    );
  });
});

describe('config layering helpers', () => {
  it('merges nested objects and replaces arrays', () => {
    expect(mergeLayers({ a: { b: 1, c: 2 }, l: [1] }, { a: { b: 3 }, l: [2] }, { a: undefined })).toEqual({
      a: { b: 3, c: 2 },
      l: [2],
    });
  });

  it('substitutes environment variables, blank when unset', () => {
    expect(interpolateEnv({ url: '${HOST}:${PORT}', list: ['${HOST}'], n: 1 }, { HOST: 'media.test' })).toEqual({
      url: 'media.test:',
      list: ['media.test'],
      n: 1,
    });
  });
});

describe('parseServerArgs', () => {
  it('reads every flag', () => {
    expect(
      parseServerArgs(['--openapi', './api.yaml', '-u', 'http://media.test', '-k', 'test-secret', '--log-level', 'debug', '-c', 'scout.yaml']),
    ).toEqual({
      configPath: 'scout.yaml',
      overrides: {
        openapiSource: './api.yaml',
        baseUrl: 'http://media.test',
        apiKey: 'test-secret',
        logLevel: 'debug',
      },
      help: false,
    });
    expect(parseServerArgs(['-h']).help).toBe(true);
  });

  it('rejects missing values and unknown flags', () => {
    expect(() => parseServerArgs(['--url'])).toThrow('Missing value for --url');
    expect(() => parseServerArgs(['--url', '--openapi', 'x'])).toThrow('Missing value for --url');
    expect(() => parseServerArgs(['--verbose'])).toThrow('Unknown argument: --verbose');
  });
});

describe('simplificationPolicy', () => {
  it('is the shipped policy when nothing is configured', () => {
    expect(simplificationPolicy(loadConfig({ env: {} }))).toBe(DEFAULT_SIMPLIFICATION_POLICY);
  });

  it('lays configured rules over the shipped ones', () => {
    const path = configFile(
      'simplification:\n  default:\n    maxDepth: 4\n  categories:\n    series:\n      truncate:\n        overview: 80\n    tag:\n      dropFields: [label]\n',
    );
    const policy = simplificationPolicy(loadConfig({ configPath: path, env: {} }));
    expect(policy.default).toEqual({ dropFields: ['_links'], maxDepth: 4 });
    expect(policy.categories.series).toEqual({
      dropFields: ['images', 'alternateTitles', 'ratings', 'cleanTitle', 'sortTitle', 'titleSlug'],
      truncate: { overview: 80 },
    });
    expect(policy.categories.tag).toEqual({ dropFields: ['label'] });
    expect(policy.categories.episode).toEqual({ dropFields: ['images', 'mediaInfo'] });
  });
});
