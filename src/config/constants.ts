import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';

/**
 * Configuration constants
 */

export const DEFAULT_CONFIG_FILENAME = '.claimtrace.ini';
export const FALLBACK_CONFIG_FILENAME = 'claimtrace.ini';

// Bundled catalogs and prompts live beside src/ in the package root
export const PACKAGE_ROOT = resolve(dirname(fileURLToPath(import.meta.url)), '..', '..');
export const BUNDLED_CONFIG_DIR = resolve(PACKAGE_ROOT, 'config');
export const BUNDLED_PROMPTS_DIR = resolve(PACKAGE_ROOT, 'prompts');

export const DEFAULT_TAXONOMY_PATH = resolve(BUNDLED_CONFIG_DIR, 'taxonomy.yaml');
export const DEFAULT_PATTERNS_PATH = resolve(BUNDLED_CONFIG_DIR, 'patterns.yaml');
export const DEFAULT_PROBES_PATH = resolve(BUNDLED_CONFIG_DIR, 'probes.yaml');
export const CLAIM_PROMPT_TEMPLATE = 'claim-extraction.md';

export const DEFAULT_OUTPUT_DIR = 'claimtrace-output';
export const CACHE_DIR = '.claimtrace';
export const CACHE_FILENAME = 'cache.json';
