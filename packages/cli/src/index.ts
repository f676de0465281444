#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { errorMessage, isScoutError, type CatalogEngine } from '@openapi-scout/core';
import { createCatalogRuntime, loadConfig, serveStdio, type ConfigOverrides } from '@openapi-scout/mcp';
import {
  runCall,
  runCategories,
  runConfigGet,
  runConfigList,
  runConfigSet,
  runConfigUnset,
  runDiscover,
  runSchema,
} from './commands.js';
import { createSettingsStore, type SettingsStore } from './settings.js';
import { CLI_VERSION } from './version.js';

interface GlobalOptions {
  openapi?: string;
  url?: string;
  apiKey?: string;
  config?: string;
  json?: boolean;
}

const program = new Command();
let settings: SettingsStore | undefined;

function savedSettings(): SettingsStore {
  settings ??= createSettingsStore();
  return settings;
}

/** Flags first, then values saved with `config set` */
function overridesFrom(opts: GlobalOptions): ConfigOverrides {
  const saved = savedSettings();
  return {
    openapiSource: opts.openapi ?? saved.get('openapiSource'),
    baseUrl: opts.url ?? saved.get('upstreamUrl'),
    apiKey: opts.apiKey ?? saved.get('apiKey'),
  };
}

async function openEngine(): Promise<CatalogEngine> {
  const opts = program.opts<GlobalOptions>();
  // Keep the terminal quiet unless LOG_LEVEL asks for more
  const config = loadConfig({
    configPath: opts.config,
    overrides: { logLevel: process.env.LOG_LEVEL ?? 'warn', ...overridesFrom(opts) },
  });
  const runtime = await createCatalogRuntime(config);
  return runtime.engine;
}

function fail(error: unknown): never {
  if (isScoutError(error)) {
    console.error(chalk.red(`${error.code}: ${error.message}`));
  } else {
    console.error(chalk.red(errorMessage(error)));
  }
  process.exit(1);
}

program
  .name('openapi-scout')
  .description('Browse and call an OpenAPI-described API the way an MCP agent does')
  .version(CLI_VERSION)
  .option('--openapi <source>', 'OpenAPI document file or URL')
  .option('--url <url>', 'Upstream API base URL')
  .option('--api-key <key>', 'Upstream API key')
  .option('--config <file>', 'YAML or JSON config file')
  .option('--json', 'Print JSON instead of formatted text');

program
  .command('categories')
  .description('List tool categories and how many tools each holds')
  .action(async () => {
    try {
      runCategories(await openEngine(), { json: program.opts<GlobalOptions>().json });
    } catch (err) {
      fail(err);
    }
  });

program
  .command('discover [keyword]')
  .description('Search tools by keyword and/or category')
  .option('-c, --category <category>', 'Only tools in this category')
  .option('-n, --limit <n>', 'Maximum number of results', v => parseInt(v, 10))
  .action(async (keyword: string | undefined, opts: { category?: string; limit?: number }) => {
    try {
      await runDiscover(await openEngine(), keyword, { ...opts, json: program.opts<GlobalOptions>().json });
    } catch (err) {
      fail(err);
    }
  });

program
  .command('schema <tool>')
  .description('Show the parameters of one tool')
  .action(async (tool: string) => {
    try {
      runSchema(await openEngine(), tool, { json: program.opts<GlobalOptions>().json });
    } catch (err) {
      fail(err);
    }
  });

program
  .command('call <tool>')
  .description('Call a tool against the upstream API')
  .option('-a, --args <json>', 'Arguments as a JSON object', '{}')
  .action(async (tool: string, opts: { args?: string }) => {
    try {
      await runCall(await openEngine(), tool, { ...opts, json: program.opts<GlobalOptions>().json });
    } catch (err) {
      fail(err);
    }
  });

program
  .command('serve')
  .description('Start the MCP server on stdio')
  .action(async () => {
    try {
      const opts = program.opts<GlobalOptions>();
      const config = loadConfig({ configPath: opts.config, overrides: overridesFrom(opts) });
      await serveStdio(await createCatalogRuntime(config));
    } catch (err) {
      fail(err);
    }
  });

const configCommand = program.command('config').description('Manage saved settings (upstreamUrl, apiKey, openapiSource)');

configCommand
  .command('set <key> <value>')
  .description('Save a setting')
  .action((key: string, value: string) => {
    try {
      runConfigSet(savedSettings(), key, value);
    } catch (err) {
      fail(err);
    }
  });

configCommand
  .command('get <key>')
  .description('Show a saved setting')
  .action((key: string) => {
    try {
      runConfigGet(savedSettings(), key);
    } catch (err) {
      fail(err);
    }
  });

configCommand
  .command('unset <key>')
  .description('Remove a saved setting')
  .action((key: string) => {
    try {
      runConfigUnset(savedSettings(), key);
    } catch (err) {
      fail(err);
    }
  });

configCommand
  .command('list')
  .description('Show all saved settings')
  .action(() => runConfigList(savedSettings(), { json: program.opts<GlobalOptions>().json }));

program.parseAsync(process.argv).catch(fail);
