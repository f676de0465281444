import { readFileSync } from 'node:fs';

const FALLBACK_VERSION = '0.3.0';

export function readPackageVersion(packageJsonUrl: URL = new URL('../package.json', import.meta.url)): string {
  try {
    const parsed: unknown = JSON.parse(readFileSync(packageJsonUrl, 'utf-8'));
    if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
      return parsed.version;
    }
    return FALLBACK_VERSION;
  } catch {
    return FALLBACK_VERSION;
  }
}

export const CLI_VERSION = readPackageVersion();
