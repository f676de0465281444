import Conf from 'conf';
import { maskSecret } from './format.js';

export interface CliSettings {
  upstreamUrl?: string;
  apiKey?: string;
  openapiSource?: string;
}

export const SETTING_KEYS = ['upstreamUrl', 'apiKey', 'openapiSource'] as const;
export type SettingKey = (typeof SETTING_KEYS)[number];

/** The slice of conf the CLI uses */
export interface SettingsStore {
  get(key: SettingKey): string | undefined;
  set(key: SettingKey, value: string): void;
  delete(key: SettingKey): void;
}

export function createSettingsStore(): SettingsStore {
  const conf = new Conf<CliSettings>({ projectName: 'openapi-scout' });
  return {
    get: key => conf.get(key),
    set: (key, value) => conf.set(key, value),
    delete: key => conf.delete(key),
  };
}

export function isSettingKey(key: string): key is SettingKey {
  return SETTING_KEYS.some(k => k === key);
}

/** Saved settings for display, with the API key masked */
export function listSettings(store: SettingsStore): Array<{ key: SettingKey; value: string }> {
  const out: Array<{ key: SettingKey; value: string }> = [];
  for (const key of SETTING_KEYS) {
    const value = store.get(key);
    if (value === undefined) continue;
    out.push({ key, value: key === 'apiKey' ? maskSecret(value) : value });
  }
  return out;
}
