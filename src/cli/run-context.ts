import * as path from 'path';
import type { PatternCatalog, Probe, Taxonomy } from '../claims/catalog';
import type { ChunkingOptions } from '../chunking/types';
import type { ChunkingConfig, Config } from '../schemas/config-schemas';
import { DEFAULT_BOILERPLATE_PATTERNS } from '../chunking/chunker';
import { loadConfig } from '../boundaries/config-loader';
import { loadPatternCatalog, loadProbes, loadTaxonomy } from '../boundaries/catalog-loader';
import { ConfigError, handleUnknownError } from '../errors/index';
import { setSilentMode, setVerboseMode } from '../output/logger';

export interface RunContext {
  config: Config;
  taxonomy: Taxonomy;
  patterns: PatternCatalog;
  probes: readonly Probe[];
}

export interface ContextOptions {
  config?: string;
  verbose: boolean;
  quiet: boolean;
}

export function applyLogMode(options: { verbose: boolean; quiet: boolean }): void {
  setVerboseMode(options.verbose);
  setSilentMode(options.quiet);
}

/**
 * Loads configuration and the three catalogs. Catalogs are validated
 * against the taxonomy, so the taxonomy loads first.
 */
export function loadRunContext(options: ContextOptions, cwd: string = process.cwd()): RunContext {
  const config = loadConfig(cwd, options.config);
  const taxonomy = loadTaxonomy(config.taxonomyPath);
  const patterns = loadPatternCatalog(config.patternsPath, taxonomy);
  const probes = loadProbes(config.probesPath, taxonomy);
  return { config, taxonomy, patterns, probes };
}

export function resolveManifestPath(config: Config, manifest: string | undefined, cwd: string = process.cwd()): string {
  if (manifest) return path.resolve(cwd, manifest);
  if (config.manifestPath) return config.manifestPath;
  throw new ConfigError('No manifest given: pass --manifest <path> or set Manifest in claimtrace.ini');
}

/** Configured boilerplate patterns extend the defaults; they match case-insensitively. */
export function toChunkingOptions(chunking: ChunkingConfig): ChunkingOptions {
  const extra = chunking.boilerplatePatterns.map((source) => {
    try {
      return new RegExp(source, 'i');
    } catch (e: unknown) {
      const err = handleUnknownError(e, 'Compiling boilerplate pattern');
      throw new ConfigError(`Invalid BoilerplatePatterns entry ${source}: ${err.message}`);
    }
  });
  return {
    maxChars: chunking.maxChars,
    overlap: chunking.overlap,
    repeatedLineThreshold: chunking.repeatedLineThreshold,
    boilerplatePatterns: [...DEFAULT_BOILERPLATE_PATTERNS, ...extra],
  };
}
