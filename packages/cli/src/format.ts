import chalk from 'chalk';
import type { DiscoveryResult } from '@openapi-scout/core';
import type { ToolSchemaView } from '@openapi-scout/mcp';

export function formatJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

export function formatCategories(title: string, categories: Array<{ tag: string; count: number }>): string {
  const width = Math.max(0, ...categories.map(c => c.tag.length));
  const lines = [chalk.bold(title), ''];
  for (const { tag, count } of categories) {
    lines.push(`  ${chalk.cyan(tag.padEnd(width))}  ${chalk.gray(String(count))}`);
  }
  return lines.join('\n');
}

export function formatDiscovery(result: DiscoveryResult): string {
  if (result.tools.length === 0) return chalk.yellow('No matching tools.');

  const lines = result.tools.map(tool => {
    const score = tool.matchScore > 0 ? chalk.gray(` (${tool.matchScore})`) : '';
    return `  ${chalk.cyan(tool.name)}${score}  ${tool.summary}  ${chalk.gray(`[${tool.tags.join(', ')}]`)}`;
  });
  if (result.tools.length < result.total) {
    lines.push(chalk.gray(`\n  Showing ${result.tools.length} of ${result.total}. Use --limit to see more.`));
  }
  return lines.join('\n');
}

function describeProperty(name: string, schema: unknown, required: boolean): string {
  const record = typeof schema === 'object' && schema !== null ? Object.entries(schema) : [];
  const field = (key: string): unknown => record.find(([k]) => k === key)?.[1];
  const type = typeof field('type') === 'string' ? String(field('type')) : 'any';
  const location = typeof field('x-in') === 'string' ? chalk.gray(` in ${String(field('x-in'))}`) : '';
  const description = typeof field('description') === 'string' ? ` ${String(field('description'))}` : '';
  const marker = required ? chalk.red('*') : ' ';
  return `  ${marker} ${chalk.cyan(name)} ${chalk.gray(type)}${location}${description}`;
}

export function formatSchema(view: ToolSchemaView): string {
  const lines = [chalk.bold(view.name)];
  if (view.method && view.path) lines.push(chalk.gray(`${view.method} ${view.path}`));
  lines.push(view.description, chalk.gray(`tags: ${view.tags.join(', ')}`), '');

  const properties = view.parameters.properties;
  const required = Array.isArray(view.parameters.required) ? view.parameters.required : [];
  const entries = typeof properties === 'object' && properties !== null ? Object.entries(properties) : [];
  if (entries.length === 0) {
    lines.push(chalk.gray('  (no parameters)'));
  } else {
    for (const [name, schema] of entries) lines.push(describeProperty(name, schema, required.includes(name)));
  }
  return lines.join('\n');
}

/** Show only the first and last characters of a secret */
export function maskSecret(value: string): string {
  if (value.length <= 8) return '*'.repeat(value.length);
  return `${value.slice(0, 4)}${'*'.repeat(value.length - 8)}${value.slice(-4)}`;
}

/** Parse the --args option; must be a JSON object */
export function parseArgsOption(text: string | undefined): Record<string, unknown> {
  if (!text) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw new Error(`--args must be valid JSON, got: ${text}`);
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error('--args must be a JSON object');
  }
  return Object.fromEntries(Object.entries(parsed));
}
