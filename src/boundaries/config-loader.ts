import { existsSync, readFileSync } from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { CONFIG_SCHEMA, type Config } from '../schemas/config-schemas';
import { ConfigError, ValidationError, handleUnknownError } from '../errors/index';
import { DEFAULT_CONFIG_FILENAME, LEGACY_CONFIG_FILENAME } from '../config/constants';
import { validateChunkBounds } from '../chunking/accumulator';
import { warn } from '../output/logger';

function parseBracketList(value: string): string[] {
  const v = value.trim();
  const m = v.match(/^\[(.*)\]$/);
  if (!m) return v ? [stripQuotes(v)] : [];
  const inner = m[1] ?? '';
  return inner
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0)
    .map(stripQuotes);
}

function stripQuotes(str: string): string {
  return str.replace(/^"|"$/g, '').replace(/^'|'$/g, '');
}

function parseNumber(key: string, value: string): number {
  const parsed = Number(value.trim());
  if (value.trim() === '' || Number.isNaN(parsed)) {
    throw new ConfigError(`Invalid ${key} value: ${value}`);
  }
  return parsed;
}

function parseBoolean(key: string, value: string): boolean {
  switch (value.trim().toLowerCase()) {
    case 'true':
    case 'yes':
    case '1':
      return true;
    case 'false':
    case 'no':
    case '0':
      return false;
    default:
      throw new ConfigError(`Invalid ${key} value: ${value} (expected true or false)`);
  }
}

enum ConfigSection {
  CHUNKING = 'chunking',
  EXTRACTION = 'extraction',
  SCORING = 'scoring',
}

type ValueKind = 'number' | 'boolean' | 'list' | 'string';

interface KeySpec {
  section: ConfigSection;
  field: string;
  kind: ValueKind;
}

const KEY_SPECS: Readonly<Record<string, KeySpec>> = {
  MinChunkSize: { section: ConfigSection.CHUNKING, field: 'minChunkSize', kind: 'number' },
  TargetChunkSize: { section: ConfigSection.CHUNKING, field: 'targetChunkSize', kind: 'number' },
  MaxChunkSize: { section: ConfigSection.CHUNKING, field: 'maxChunkSize', kind: 'number' },
  OverlapPercentage: { section: ConfigSection.CHUNKING, field: 'overlapPercentage', kind: 'number' },
  ContentSelectors: { section: ConfigSection.EXTRACTION, field: 'contentSelectors', kind: 'list' },
  RemoveClassNames: { section: ConfigSection.EXTRACTION, field: 'removeClassNames', kind: 'list' },
  RemoveIds: { section: ConfigSection.EXTRACTION, field: 'removeIds', kind: 'list' },
  RemoveSelectors: { section: ConfigSection.EXTRACTION, field: 'removeSelectors', kind: 'list' },
  MinConfidenceThreshold: { section: ConfigSection.EXTRACTION, field: 'minConfidenceThreshold', kind: 'number' },
  MaxLinkDensity: { section: ConfigSection.EXTRACTION, field: 'maxLinkDensity', kind: 'number' },
  MinTextLength: { section: ConfigSection.EXTRACTION, field: 'minTextLength', kind: 'number' },
  RemovePageChrome: { section: ConfigSection.EXTRACTION, field: 'removePageChrome', kind: 'boolean' },
  AggressiveCleaning: { section: ConfigSection.EXTRACTION, field: 'aggressiveCleaning', kind: 'boolean' },
  ResolveRelativeUrls: { section: ConfigSection.EXTRACTION, field: 'resolveRelativeUrls', kind: 'boolean' },
  BaseUrl: { section: ConfigSection.EXTRACTION, field: 'baseUrl', kind: 'string' },
  NegativePattern: { section: ConfigSection.SCORING, field: 'negativePattern', kind: 'string' },
  PositivePattern: { section: ConfigSection.SCORING, field: 'positivePattern', kind: 'string' },
};

function convertValue(key: string, kind: ValueKind, raw: string): unknown {
  switch (kind) {
    case 'number':
      return parseNumber(key, raw);
    case 'boolean':
      return parseBoolean(key, raw);
    case 'list':
      return parseBracketList(raw);
    case 'string':
      return stripQuotes(raw.trim());
  }
}

function resolveConfigPath(cwd: string, configPath?: string): string | null {
  if (configPath) {
    const explicit = path.resolve(cwd, configPath);
    if (!existsSync(explicit)) {
      throw new ConfigError(`Missing configuration file at ${explicit}`);
    }
    return explicit;
  }

  for (const filename of [DEFAULT_CONFIG_FILENAME, LEGACY_CONFIG_FILENAME]) {
    const candidate = path.resolve(cwd, filename);
    if (existsSync(candidate)) return candidate;
  }
  return null;
}

/**
 * Parses INI text into the raw object validated by CONFIG_SCHEMA.
 */
export function parseConfigText(raw: string, source = 'config'): Record<ConfigSection, Record<string, unknown>> {
  const sections: Record<ConfigSection, Record<string, unknown>> = {
    [ConfigSection.CHUNKING]: {},
    [ConfigSection.EXTRACTION]: {},
    [ConfigSection.SCORING]: {},
  };
  let currentSection: string | null = null;

  for (const rawLine of raw.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#') || line.startsWith(';')) continue;

    const sectionMatch = line.match(/^\[(.*)\]$/);
    if (sectionMatch) {
      currentSection = (sectionMatch[1] ?? '').trim().toLowerCase();
      if (!Object.values<string>(ConfigSection).includes(currentSection)) {
        warn(`Unknown section [${currentSection}] in ${source} (ignored)`);
      }
      continue;
    }

    const m = line.match(/^([A-Za-z0-9_.-]+)\s*=\s*(.*)$/);
    if (!m || !m[1]) continue;

    const key = m[1];
    const spec = KEY_SPECS[key];
    if (!spec) {
      warn(`Unknown key ${key} in ${source} (ignored)`);
      continue;
    }
    if (currentSection !== spec.section) {
      throw new ConfigError(`${key} belongs in the [${spec.section}] section`);
    }

    sections[spec.section][spec.field] = convertValue(key, spec.kind, m[2] ?? '');
  }

  return sections;
}

/**
 * Load and validate configuration from .ragprep.ini (or ragprep.ini).
 * Without a config file the defaults apply; an explicit path must exist.
 */
export function loadConfig(cwd: string = process.cwd(), configPath?: string): Config {
  const iniPath = resolveConfigPath(cwd, configPath);

  let rawConfigObj: Record<string, unknown> = {};
  if (iniPath) {
    try {
      rawConfigObj = { ...parseConfigText(readFileSync(iniPath, 'utf-8'), iniPath), configPath: iniPath };
    } catch (e: unknown) {
      if (e instanceof ConfigError) throw e;
      const err = handleUnknownError(e, 'Reading config file');
      throw new ConfigError(`Failed to read config file: ${err.message}`);
    }
  }

  let config: Config;
  try {
    config = CONFIG_SCHEMA.parse(rawConfigObj);
  } catch (e: unknown) {
    if (e instanceof z.ZodError) {
      throw new ValidationError(`Invalid configuration: ${e.message}`);
    }
    const err = handleUnknownError(e, 'Config validation');
    throw new ConfigError(`Configuration validation failed: ${err.message}`);
  }

  validateChunkBounds(config.chunking);
  return config;
}
