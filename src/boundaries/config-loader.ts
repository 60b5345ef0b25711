import { existsSync, readFileSync } from 'fs';
import * as path from 'path';
import { CONFIG_SCHEMA, type Config } from '../schemas/config-schemas';
import { ConfigError, handleUnknownError } from '../errors/index';
import { DEFAULT_CONFIG_FILENAME } from '../config/constants';

enum ConfigKey {
  MIN_PRIORITY = 'MinPriority',
  FAIL_ON = 'FailOn',
  MAX_LINES = 'MaxLines',
  MAX_COMPLEXITY = 'MaxComplexity',
  MAX_FUNCTION_LINES = 'MaxFunctionLines',
  MERGE_ISSUES = 'MergeIssues',
}

// Keys may sit at the top of the file or under this section
const CONFIG_SECTION = 'pyreview';

const TRUE_VALUES = new Set(['true', 'yes', 'on', '1']);
const FALSE_VALUES = new Set(['false', 'no', 'off', '0']);

const stripQuotes = (str: string): string => str.replace(/^"|"$/g, '').replace(/^'|'$/g, '');

function parseInteger(key: string, value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new ConfigError(`Invalid ${key} value: ${value}`);
  }
  return parseInt(value, 10);
}

function parseBoolean(key: string, value: string): boolean {
  const lower = value.toLowerCase();
  if (TRUE_VALUES.has(lower)) return true;
  if (FALSE_VALUES.has(lower)) return false;
  throw new ConfigError(`Invalid ${key} value: ${value}`);
}

/**
 * Parse the INI text of a pyreview config file into raw settings.
 * Unknown keys and other sections are ignored.
 */
export function parseConfigText(raw: string): Record<string, unknown> {
  const settings: Record<string, unknown> = {};
  let currentSection: string | null = null;

  for (const rawLine of raw.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#') || line.startsWith(';')) continue;

    // Section header
    const sectionMatch = line.match(/^\[(.*)\]$/);
    if (sectionMatch && sectionMatch[1] !== undefined) {
      currentSection = sectionMatch[1].trim();
      continue;
    }
    if (currentSection !== null && currentSection !== CONFIG_SECTION) continue;

    const m = line.match(/^([A-Za-z0-9_.-]+)\s*=\s*(.*)$/);
    if (!m || !m[1]) continue;
    const key = m[1];
    const val = stripQuotes((m[2] ?? '').trim());

    switch (key) {
      case ConfigKey.MIN_PRIORITY as string:
        settings.minPriority = val.toUpperCase();
        break;
      case ConfigKey.FAIL_ON as string:
        settings.failOn = val.toUpperCase();
        break;
      case ConfigKey.MAX_LINES as string:
        settings.maxLines = parseInteger(key, val);
        break;
      case ConfigKey.MAX_COMPLEXITY as string:
        settings.maxComplexity = parseInteger(key, val);
        break;
      case ConfigKey.MAX_FUNCTION_LINES as string:
        settings.maxFunctionLines = parseInteger(key, val);
        break;
      case ConfigKey.MERGE_ISSUES as string:
        settings.mergeIssues = parseBoolean(key, val);
        break;
    }
  }
  return settings;
}

/**
 * Load and validate configuration from .pyreview.ini.
 * Without an explicit path a missing file means built-in defaults.
 */
export function loadConfig(cwd: string = process.cwd(), configPath?: string): Config {
  const iniPath = configPath
    ? path.resolve(cwd, configPath)
    : path.resolve(cwd, DEFAULT_CONFIG_FILENAME);

  let settings: Record<string, unknown> = {};
  if (existsSync(iniPath)) {
    let raw: string;
    try {
      raw = readFileSync(iniPath, 'utf-8');
    } catch (e: unknown) {
      const err = handleUnknownError(e, 'Reading config file');
      throw new ConfigError(`Failed to read config file: ${err.message}`);
    }
    settings = parseConfigText(raw);
  } else if (configPath) {
    throw new ConfigError(`Missing configuration file at ${iniPath}`);
  }

  const result = CONFIG_SCHEMA.safeParse(settings);
  if (!result.success) {
    const detail = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid configuration in ${iniPath}: ${detail}`);
  }
  return result.data;
}
