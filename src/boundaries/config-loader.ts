import { z } from 'zod';
import { existsSync, readFileSync } from 'fs';
import * as path from 'path';
import { CONFIG_SCHEMA, type Config } from '../schemas/config-schemas';
import { ConfigError, ValidationError, handleUnknownError } from '../errors/index';
import { DEFAULT_CONFIG_FILENAME, DEFAULT_DATA_ROOT, DEFAULT_IO_ROOT, DEFAULT_OUTPUT_ROOT } from '../config/constants';

enum ConfigKey {
  OUTPUT_ROOT = 'OutputRoot',
  IO_ROOT = 'IoRoot',
  DATA_ROOT = 'DataRoot',
  CONCURRENCY = 'Concurrency',
  OUTLINE = 'Outline',
  QUALITY_THRESHOLD = 'QualityThreshold',
}

const SECTION_KEYS: Record<string, Record<string, string>> = {
  'fact-check': {
    Strictness: 'strictness',
    HighRiskEvidenceRatio: 'highRisk',
    MediumRiskEvidenceRatio: 'mediumRisk',
    NamedEntityEvidenceRatio: 'namedEntity',
  },
  citations: {
    BackReferences: 'backReferences',
  },
};

const SECTION_FIELDS: Record<string, string> = {
  'fact-check': 'factCheck',
  citations: 'citations',
};

type IniDocument = { globals: Record<string, string>; sections: Record<string, Record<string, string>> };

const stripQuotes = (str: string): string => str.replace(/^"|"$/g, '').replace(/^'|'$/g, '');

export function parseIni(raw: string): IniDocument {
  const doc: IniDocument = { globals: {}, sections: {} };
  let currentSection: string | null = null;

  for (const rawLine of raw.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#') || line.startsWith(';')) continue;

    // Section header
    const sectionMatch = line.match(/^\[(.*)\]$/);
    if (sectionMatch && sectionMatch[1]) {
      currentSection = sectionMatch[1].trim();
      doc.sections[currentSection] ??= {};
      continue;
    }

    const m = line.match(/^([A-Za-z0-9_.-]+)\s*=\s*(.*)$/);
    if (!m || !m[1]) continue;

    const value = stripQuotes((m[2] ?? '').trim());
    if (currentSection) {
      const section = (doc.sections[currentSection] ??= {});
      section[m[1]] = value;
    } else {
      doc.globals[m[1]] = value;
    }
  }
  return doc;
}

function resolveFrom(configDir: string, value: string): string {
  return path.isAbsolute(value) ? value : path.resolve(configDir, value);
}

/**
 * Load and validate configuration from .memoforge.ini. The file is
 * optional unless a path is given explicitly; without one every setting
 * takes its default and paths resolve against `cwd`.
 */
export function loadConfig(cwd: string = process.cwd(), configPath?: string): Config {
  const iniPath = configPath ? path.resolve(cwd, configPath) : path.resolve(cwd, DEFAULT_CONFIG_FILENAME);

  let doc: IniDocument = { globals: {}, sections: {} };
  if (existsSync(iniPath)) {
    try {
      doc = parseIni(readFileSync(iniPath, 'utf-8'));
    } catch (e: unknown) {
      const err = handleUnknownError(e, 'Reading config file');
      throw new ConfigError(`Failed to read config file: ${err.message}`);
    }
  } else if (configPath) {
    throw new ConfigError(`Missing configuration file at ${iniPath}`);
  }

  const configDir = existsSync(iniPath) ? path.dirname(iniPath) : path.resolve(cwd);
  const g = doc.globals;

  const configData: Record<string, unknown> = {
    configDir,
    outputRoot: resolveFrom(configDir, g[ConfigKey.OUTPUT_ROOT] ?? DEFAULT_OUTPUT_ROOT),
    ioRoot: resolveFrom(configDir, g[ConfigKey.IO_ROOT] ?? DEFAULT_IO_ROOT),
    dataRoot: resolveFrom(configDir, g[ConfigKey.DATA_ROOT] ?? DEFAULT_DATA_ROOT),
  };
  if (g[ConfigKey.CONCURRENCY] !== undefined) configData.concurrency = g[ConfigKey.CONCURRENCY];
  if (g[ConfigKey.QUALITY_THRESHOLD] !== undefined) configData.qualityThreshold = g[ConfigKey.QUALITY_THRESHOLD];
  const outline = g[ConfigKey.OUTLINE];
  // a YAML path, or the name of a built-in outline
  if (outline !== undefined) configData.outline = /\.ya?ml$/i.test(outline) ? resolveFrom(configDir, outline) : outline;

  for (const [sectionName, keys] of Object.entries(SECTION_KEYS)) {
    const section = doc.sections[sectionName];
    const field = SECTION_FIELDS[sectionName];
    if (!section || !field) continue;
    const values: Record<string, string> = {};
    for (const [iniKey, value] of Object.entries(section)) {
      const target = keys[iniKey];
      if (!target) continue;
      // enum-like values are case-insensitive
      values[target] = target === 'strictness' || target === 'backReferences' ? value.toLowerCase() : value;
    }
    configData[field] = values;
  }

  try {
    return CONFIG_SCHEMA.parse(configData);
  } catch (e: unknown) {
    if (e instanceof z.ZodError) {
      throw new ValidationError(`Invalid configuration in ${iniPath}: ${e.message}`);
    }
    const err = handleUnknownError(e, 'Config validation');
    throw new ConfigError(`Configuration validation failed: ${err.message}`);
  }
}
