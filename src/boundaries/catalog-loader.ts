import { readFileSync } from 'fs';
import * as YAML from 'yaml';
import { z } from 'zod';
import {
  PATTERN_CATALOG_SCHEMA,
  PROBE_CATALOG_SCHEMA,
  TAXONOMY_SCHEMA,
} from '../schemas/catalog-schemas';
import { findDomain, themeBelongsTo, type PatternCatalog, type Probe, type Taxonomy } from '../claims/catalog';
import { ConfigError, ValidationError, handleUnknownError } from '../errors/index';

/**
 * Reads a YAML file and validates it against a schema.
 */
export function parseYamlFile<T extends z.ZodTypeAny>(filePath: string, schema: T, label: string): z.infer<T> {
  let raw: unknown;
  try {
    raw = YAML.parse(readFileSync(filePath, 'utf-8'));
  } catch (e: unknown) {
    const err = handleUnknownError(e, `Reading ${label}`);
    throw new ConfigError(`Failed to load ${label} from ${filePath}: ${err.message}`);
  }

  const result = schema.safeParse(raw ?? {});
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ValidationError(`Invalid ${label} (${filePath}): ${details}`, result.error);
  }
  return result.data;
}

/**
 * Recursively freezes plain objects and arrays. Compiled RegExps are left
 * alone; they are only used through non-global exec/test.
 */
export function deepFreeze<T>(value: T): T {
  if (value === null || typeof value !== 'object' || value instanceof RegExp || Object.isFrozen(value)) {
    return value;
  }
  for (const key of Object.keys(value)) {
    deepFreeze(Reflect.get(value, key));
  }
  return Object.freeze(value);
}

function compilePattern(source: string, flags: string, where: string): RegExp {
  try {
    return new RegExp(source, flags);
  } catch (e: unknown) {
    const err = handleUnknownError(e, 'Compiling pattern');
    throw new ConfigError(`Invalid regular expression in ${where}: ${err.message}`);
  }
}

function assertUnique(codes: readonly string[], what: string, filePath: string): void {
  const seen = new Set<string>();
  for (const code of codes) {
    if (seen.has(code)) throw new ConfigError(`Duplicate ${what} '${code}' in ${filePath}`);
    seen.add(code);
  }
}

export function loadTaxonomy(filePath: string): Taxonomy {
  const file = parseYamlFile(filePath, TAXONOMY_SCHEMA, 'taxonomy');
  assertUnique(file.domains.map((d) => d.code), 'domain code', filePath);
  assertUnique(file.domains.flatMap((d) => d.themes.map((t) => t.code)), 'theme code', filePath);
  assertUnique(file.clinicalAreas.map((c) => c.code), 'clinical area code', filePath);

  return deepFreeze({
    domains: file.domains,
    clinicalAreas: file.clinicalAreas,
    regions: file.regions,
  });
}

export function loadPatternCatalog(filePath: string, taxonomy: Taxonomy): PatternCatalog {
  const file = parseYamlFile(filePath, PATTERN_CATALOG_SCHEMA, 'pattern catalog');
  assertUnique(file.rules.map((r) => r.id), 'rule id', filePath);

  const rules = file.rules.map((rule) => {
    if (!findDomain(taxonomy, rule.domain)) {
      throw new ConfigError(`Rule '${rule.id}' names unknown domain '${rule.domain}'`);
    }
    return {
      id: rule.id,
      ...(rule.description !== undefined && { description: rule.description }),
      regex: compilePattern(rule.pattern, rule.flags ?? 'i', `rule '${rule.id}'`),
      claimType: rule.claimType,
      quantification: rule.quantification ?? null,
      domain: rule.domain,
    };
  });

  return deepFreeze({
    rules,
    metricKeywords: file.metricKeywords,
    evidenceCues: file.evidenceCues,
    partnerships: {
      patterns: file.partnerships.patterns.map((p, i) => {
        const regex = compilePattern(p, '', `partnership pattern #${i + 1}`);
        if (!regex.source.includes('(?<name>')) {
          throw new ConfigError(`Partnership pattern #${i + 1} must capture the partner as (?<name>...)`);
        }
        return regex;
      }),
      outcomeVerbs: file.partnerships.outcomeVerbs,
      types: file.partnerships.types,
      defaultType: file.partnerships.defaultType,
    },
  });
}

export function loadProbes(filePath: string, taxonomy: Taxonomy): readonly Probe[] {
  const file = parseYamlFile(filePath, PROBE_CATALOG_SCHEMA, 'probe catalog');
  assertUnique(file.probes.map((p) => p.id), 'probe id', filePath);

  for (const probe of file.probes) {
    if (probe.theme && !probe.domain) {
      throw new ConfigError(`Probe '${probe.id}' sets a theme without a domain`);
    }
    if (probe.domain && !findDomain(taxonomy, probe.domain)) {
      throw new ConfigError(`Probe '${probe.id}' names unknown domain '${probe.domain}'`);
    }
    if (probe.domain && probe.theme && !themeBelongsTo(taxonomy, probe.domain, probe.theme)) {
      throw new ConfigError(`Probe '${probe.id}': theme '${probe.theme}' is not in domain '${probe.domain}'`);
    }
  }
  return deepFreeze(file.probes);
}
