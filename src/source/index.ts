// src/source/index.ts
import { readFileSync } from 'node:fs';
import { parse } from 'dotenv';
import { ConfigurationSourceError, MissingConfigurationError } from '../errors.js';
import type { LoadedSettings, SettingsMap } from '../types.js';

export function readSettings(path: string): LoadedSettings {
  let raw: string;
  try {
    raw = readFileSync(path, 'utf8');
  } catch (err) {
    const detail = (err as NodeJS.ErrnoException).code === 'ENOENT'
      ? 'file not found'
      : (err as Error).message;
    throw new ConfigurationSourceError(path, detail);
  }
  return { path, values: parseSettings(raw) };
}

const ASSIGNMENT = /^\s*(?:export\s+)?([\w.-]+)\s*=(.*)$/;
const INLINE_COMMENT = /\s+#.*$/;

// Splits on the first `=`. Unquoted values keep `#` unless it follows whitespace.
export function parseSettings(raw: string): SettingsMap {
  const values: Record<string, string> = {};
  for (const line of raw.split(/\r?\n/)) {
    const match = ASSIGNMENT.exec(line);
    if (!match) continue;
    const [, key, rest] = match;
    values[key] = parseValue(key, rest.trim());
  }
  return values;
}

function parseValue(key: string, value: string): string {
  // Quoted values go through dotenv: one layer of quotes is stripped and
  // \n / \r escapes are expanded inside double quotes
  if (/^["'`]/.test(value)) return parse(`${key}=${value}`)[key] ?? '';
  return value.replace(INLINE_COMMENT, '');
}

export function optionalSetting(settings: LoadedSettings, key: string): string | undefined {
  const value = settings.values[key];
  return value ? value : undefined;
}

export function requireSetting(settings: LoadedSettings, key: string, service: string): string {
  const value = optionalSetting(settings, key);
  if (value === undefined) throw new MissingConfigurationError(key, service, settings.path);
  return value;
}
