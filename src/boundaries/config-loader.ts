import { existsSync, readFileSync } from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { CONFIG_SCHEMA, type Config } from '../schemas/config-schemas';
import { ConfigError, ValidationError, handleUnknownError } from '../errors/index';
import {
  DEFAULT_CONFIG_FILENAME,
  DEFAULT_OUTPUT_DIR,
  DEFAULT_PATTERNS_PATH,
  DEFAULT_PROBES_PATH,
  DEFAULT_TAXONOMY_PATH,
  FALLBACK_CONFIG_FILENAME,
} from '../config/constants';

function parseBracketList(value: string): string[] {
  const v = value.trim();
  const m = v.match(/^\[(.*)\]$/);
  if (!m || m[1] === undefined) {
    throw new ConfigError(`Expected a bracketed list like ["a", "b"], got: ${value}`);
  }
  return m[1]
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0)
    .map(stripQuotes);
}

function stripQuotes(str: string): string {
  return str.replace(/^"|"$/g, '').replace(/^'|'$/g, '');
}

enum ConfigKey {
  MANIFEST = 'Manifest',
  OUTPUT_DIR = 'OutputDir',
  TAXONOMY_PATH = 'TaxonomyPath',
  PATTERNS_PATH = 'PatternsPath',
  PROBES_PATH = 'ProbesPath',
  CONCURRENCY = 'Concurrency',
}

// INI key -> config field, per section
const SECTION_KEYS: Record<string, Record<string, string>> = {
  retrieval: { K: 'k', Similarity: 'similarity', Embedding: 'embedding' },
  chunking: {
    MaxChars: 'maxChars',
    Overlap: 'overlap',
    RepeatedLineThreshold: 'repeatedLineThreshold',
    BoilerplatePatterns: 'boilerplatePatterns',
  },
  generation: {
    Enabled: 'enabled',
    Deterministic: 'deterministic',
    Concurrency: 'concurrency',
    TimeoutMs: 'timeoutMs',
    MaxAttempts: 'maxAttempts',
    InputPricePerMillion: 'inputPricePerMillion',
    OutputPricePerMillion: 'outputPricePerMillion',
  },
  verification: {
    OverlapThreshold: 'overlapThreshold',
    ReviewFraction: 'reviewFraction',
    ReviewSeed: 'reviewSeed',
  },
};

const LIST_FIELDS = new Set(['boilerplatePatterns']);

interface RawConfig {
  globals: Partial<Record<ConfigKey, string>>;
  sections: Record<string, Record<string, string | string[]>>;
}

function parseIni(raw: string, iniPath: string): RawConfig {
  const result: RawConfig = { globals: {}, sections: {} };
  let currentSection: string | null = null;

  raw.split(/\r?\n/).forEach((rawLine, index) => {
    const line = rawLine.trim();
    if (!line || line.startsWith('#') || line.startsWith(';')) return;

    // Section header
    const sectionMatch = line.match(/^\[(.*)\]$/);
    if (sectionMatch && sectionMatch[1] !== undefined) {
      const name = sectionMatch[1].trim().toLowerCase();
      if (!(name in SECTION_KEYS)) {
        throw new ConfigError(`Unknown section [${sectionMatch[1]}] in ${iniPath}:${index + 1}`);
      }
      currentSection = name;
      result.sections[name] ??= {};
      return;
    }

    const m = line.match(/^([A-Za-z0-9_.-]+)\s*=\s*(.*)$/);
    if (!m || !m[1]) {
      throw new ConfigError(`Cannot parse line ${index + 1} of ${iniPath}: ${line}`);
    }
    const key = m[1];
    const val = m[2] ?? '';

    if (currentSection) {
      const field = SECTION_KEYS[currentSection]?.[key];
      if (!field) {
        throw new ConfigError(`Unknown key ${key} in [${currentSection}] of ${iniPath}`);
      }
      const section = result.sections[currentSection] ?? {};
      section[field] = LIST_FIELDS.has(field) ? parseBracketList(val) : stripQuotes(val.trim());
      result.sections[currentSection] = section;
      return;
    }

    // Global property
    const globalKey = Object.values(ConfigKey).find((k) => k === key);
    if (globalKey) result.globals[globalKey] = stripQuotes(val.trim());
  });

  return result;
}

/**
 * Finds the configuration file: an explicit path must exist; otherwise
 * `.claimtrace.ini` then `claimtrace.ini` in `cwd`, or none.
 */
export function resolveConfigPath(cwd: string, configPath?: string): string | null {
  if (configPath) {
    const explicit = path.resolve(cwd, configPath);
    if (!existsSync(explicit)) {
      throw new ConfigError(`Missing configuration file at ${explicit}`);
    }
    return explicit;
  }
  for (const name of [DEFAULT_CONFIG_FILENAME, FALLBACK_CONFIG_FILENAME]) {
    const candidate = path.resolve(cwd, name);
    if (existsSync(candidate)) return candidate;
  }
  return null;
}

/**
 * Load and validate configuration from claimtrace.ini. Without a config file
 * every setting takes its default and the bundled catalogs are used.
 */
export function loadConfig(cwd: string = process.cwd(), configPath?: string): Config {
  const iniPath = resolveConfigPath(cwd, configPath);
  const configDir = iniPath ? path.dirname(iniPath) : path.resolve(cwd);

  let parsed: RawConfig = { globals: {}, sections: {} };
  if (iniPath) {
    let raw: string;
    try {
      raw = readFileSync(iniPath, 'utf-8');
    } catch (e: unknown) {
      const err = handleUnknownError(e, 'Reading config file');
      throw new ConfigError(`Failed to read config file: ${err.message}`);
    }
    parsed = parseIni(raw, iniPath);
  }

  const resolvePath = (value: string | undefined, fallback: string): string =>
    value ? path.resolve(configDir, value) : fallback;
  const { globals, sections } = parsed;

  // Create config object and validate with schema
  const configData = {
    configDir,
    ...(globals.Manifest && { manifestPath: path.resolve(configDir, globals.Manifest) }),
    outputDir: resolvePath(globals.OutputDir, path.resolve(configDir, DEFAULT_OUTPUT_DIR)),
    taxonomyPath: resolvePath(globals.TaxonomyPath, DEFAULT_TAXONOMY_PATH),
    patternsPath: resolvePath(globals.PatternsPath, DEFAULT_PATTERNS_PATH),
    probesPath: resolvePath(globals.ProbesPath, DEFAULT_PROBES_PATH),
    ...(globals.Concurrency !== undefined && { concurrency: globals.Concurrency }),
    ...sections,
  };

  const result = CONFIG_SCHEMA.safeParse(configData);
  if (!result.success) {
    throw new ValidationError(`Invalid configuration${iniPath ? ` in ${iniPath}` : ''}: ${formatIssues(result.error)}`, result.error);
  }
  return result.data;
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
}
