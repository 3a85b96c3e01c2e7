import { readFileSync } from 'fs';
import * as path from 'path';
import fg from 'fast-glob';
import micromatch from 'micromatch';
import * as YAML from 'yaml';
import { MANIFEST_SCHEMA, type Manifest, type ManifestEntry } from '../schemas/manifest-schemas';
import type { DocumentMeta, SourceDocument } from '../claims/types';
import { ConfigError, ValidationError, handleUnknownError } from '../errors/index';

export interface UnavailableInput {
  path: string;
  reason: string;
}

export interface LoadedCorpus {
  documents: SourceDocument[];
  unavailable: UnavailableInput[];
}

// Invalid byte sequences become U+FFFD; the chunker discards those lines
const decoder = new TextDecoder('utf-8', { fatal: false });

export function readDocumentText(filePath: string): string {
  return decoder.decode(readFileSync(filePath));
}

export function parseManifest(filePath: string): Manifest {
  let raw: unknown;
  try {
    const text = readFileSync(filePath, 'utf-8');
    raw = /\.json$/i.test(filePath) ? JSON.parse(text) : YAML.parse(text);
  } catch (e: unknown) {
    const err = handleUnknownError(e, 'Reading manifest');
    throw new ConfigError(`Failed to load manifest from ${filePath}: ${err.message}`);
  }

  const result = MANIFEST_SCHEMA.safeParse(raw ?? {});
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ValidationError(`Invalid manifest (${filePath}): ${details}`, result.error);
  }
  return result.data;
}

function toPosix(p: string): string {
  return p.replace(/\\/g, '/');
}

function expandEntry(entry: ManifestEntry, baseDir: string, exclude: readonly string[]): string[] {
  const pattern = toPosix(entry.path);
  const files = fg.isDynamicPattern(pattern)
    ? fg.sync(pattern, { cwd: baseDir, dot: false, onlyFiles: true }).sort()
    : [pattern];
  return files.filter((file) => exclude.length === 0 || !micromatch.isMatch(file, [...exclude]));
}

function defaultId(filePath: string): string {
  return path.basename(filePath, path.extname(filePath)).replace(/[^A-Za-z0-9._-]+/g, '-');
}

export interface ManifestDocument extends DocumentMeta {
  id: string;
  sourcePath: string;
}

export interface ResolvedManifest {
  documents: ManifestDocument[];
  unavailable: UnavailableInput[];
}

/**
 * Expands a manifest into document identities and metadata without reading
 * any document text.
 */
export function resolveManifest(manifestPath: string): ResolvedManifest {
  const manifest = parseManifest(manifestPath);
  const baseDir = path.dirname(path.resolve(manifestPath));
  const resolved: ResolvedManifest = { documents: [], unavailable: [] };
  const seen = new Map<string, string>();

  for (const entry of manifest.documents) {
    const files = expandEntry(entry, baseDir, manifest.exclude);
    if (files.length === 0) {
      resolved.unavailable.push({ path: entry.path, reason: 'no files match' });
      continue;
    }
    if (entry.id && files.length > 1) {
      throw new ConfigError(`Manifest entry ${entry.path} sets id '${entry.id}' but matches ${files.length} files`);
    }

    for (const file of files) {
      const sourcePath = path.resolve(baseDir, file);
      const id = entry.id ?? defaultId(file);
      const previous = seen.get(id);
      if (previous) {
        throw new ConfigError(`Duplicate document id '${id}' (${previous} and ${sourcePath})`);
      }
      seen.set(id, sourcePath);
      resolved.documents.push({
        id,
        sourcePath,
        state: entry.state,
        organization: entry.organization,
        year: entry.year,
        documentType: entry.documentType,
      });
    }
  }
  return resolved;
}

/**
 * Reads every document a manifest lists. Files that cannot be read are
 * reported, not thrown; the caller decides whether an empty corpus is fatal.
 */
export function loadCorpus(manifestPath: string): LoadedCorpus {
  const resolved = resolveManifest(manifestPath);
  const corpus: LoadedCorpus = { documents: [], unavailable: [...resolved.unavailable] };

  for (const entry of resolved.documents) {
    let text: string;
    try {
      text = readDocumentText(entry.sourcePath);
    } catch (e: unknown) {
      const err = handleUnknownError(e, `Reading ${entry.sourcePath}`);
      corpus.unavailable.push({ path: entry.sourcePath, reason: err.message });
      continue;
    }
    corpus.documents.push({ ...entry, text });
  }
  return corpus;
}
