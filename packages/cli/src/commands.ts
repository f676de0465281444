import chalk from 'chalk';
import ora from 'ora';
import { listCategories, type CatalogEngine } from '@openapi-scout/core';
import { formatOutcome, toolSchemaView } from '@openapi-scout/mcp';
import { formatCategories, formatDiscovery, formatJson, formatSchema, parseArgsOption } from './format.js';
import { isSettingKey, listSettings, SETTING_KEYS, type SettingsStore } from './settings.js';

export interface OutputOptions {
  json?: boolean;
  /** Where lines go; console.log by default */
  write?: (text: string) => void;
}

export interface DiscoverOptions extends OutputOptions {
  category?: string;
  limit?: number;
}

export interface CallOptions extends OutputOptions {
  args?: string;
}

function writer(options: OutputOptions): (text: string) => void {
  return options.write ?? (text => console.log(text));
}

export function runCategories(engine: CatalogEngine, options: OutputOptions = {}): void {
  const index = engine.snapshot();
  const categories = listCategories(index);
  const write = writer(options);
  if (options.json) write(formatJson(categories));
  else write(formatCategories(`${index.title} ${index.version}`, categories));
}

export async function runDiscover(engine: CatalogEngine, keyword: string | undefined, options: DiscoverOptions = {}): Promise<void> {
  const outcome = await engine.execute({
    kind: 'discover',
    query: { keyword, category: options.category, maxResults: options.limit },
  });
  const write = writer(options);
  if (outcome.kind !== 'discover') return;
  write(options.json ? formatJson(formatOutcome(outcome)) : formatDiscovery(outcome.result));
}

export function runSchema(engine: CatalogEngine, toolName: string, options: OutputOptions = {}): void {
  const view = toolSchemaView(engine.describe(toolName));
  writer(options)(options.json ? formatJson(view) : formatSchema(view));
}

export async function runCall(engine: CatalogEngine, toolName: string, options: CallOptions = {}): Promise<void> {
  const args = parseArgsOption(options.args);
  const spinner = options.json ? undefined : ora({ text: `Calling ${toolName}...`, indent: 2 }).start();
  try {
    const outcome = await engine.execute({ kind: 'dispatch', invocation: { toolName, arguments: args } });
    spinner?.succeed(`${toolName} done`);
    writer(options)(formatJson(formatOutcome(outcome)));
  } catch (error) {
    spinner?.fail(`${toolName} failed`);
    throw error;
  }
}

export function runConfigSet(store: SettingsStore, key: string, value: string, options: OutputOptions = {}): void {
  if (!isSettingKey(key)) {
    throw new Error(`Unknown setting "${key}". Known settings: ${SETTING_KEYS.join(', ')}`);
  }
  store.set(key, value);
  writer(options)(chalk.green(`Saved ${key}`));
}

export function runConfigGet(store: SettingsStore, key: string, options: OutputOptions = {}): void {
  if (!isSettingKey(key)) {
    throw new Error(`Unknown setting "${key}". Known settings: ${SETTING_KEYS.join(', ')}`);
  }
  const entry = listSettings(store).find(s => s.key === key);
  writer(options)(entry ? entry.value : chalk.gray('(not set)'));
}

export function runConfigUnset(store: SettingsStore, key: string, options: OutputOptions = {}): void {
  if (!isSettingKey(key)) {
    throw new Error(`Unknown setting "${key}". Known settings: ${SETTING_KEYS.join(', ')}`);
  }
  store.delete(key);
  writer(options)(chalk.green(`Removed ${key}`));
}

export function runConfigList(store: SettingsStore, options: OutputOptions = {}): void {
  const settings = listSettings(store);
  const write = writer(options);
  if (options.json) {
    write(formatJson(Object.fromEntries(settings.map(s => [s.key, s.value]))));
    return;
  }
  if (settings.length === 0) {
    write(chalk.gray('No saved settings. Use: openapi-scout config set <key> <value>'));
    return;
  }
  for (const { key, value } of settings) write(`  ${chalk.cyan(key)}  ${value}`);
}
