import type { Command } from 'commander';
import { writeFileSync, mkdirSync } from 'fs';
import * as path from 'path';
import { parseExhibitsOptions } from '../boundaries/cli-parser';
import { resolveManifest } from '../boundaries/manifest-loader';
import { computeExhibits } from '../aggregation/exhibits';
import { computeDocumentAnalyses } from '../aggregation/document-analysis';
import { OUTPUT_FILES, readClaimRecords, toJsonl } from '../output/record-writer';
import { error, log } from '../output/logger';
import { handleUnknownError } from '../errors/index';
import { applyLogMode, loadRunContext, resolveManifestPath } from './run-context';

/*
 * Registers the exhibits command: recomputes exhibits.json and the
 * per-document code frequencies from stored claims and manifest metadata,
 * without running extraction.
 */
export function registerExhibitsCommand(program: Command): void {
  program
    .command('exhibits')
    .description('Recompute aggregate exhibits from claims_extracted.jsonl')
    .option('--config <path>', 'Path to a claimtrace.ini config file')
    .option('--manifest <path>', 'Manifest listing the documents')
    .option('--claims <path>', 'Claims file (default: claims_extracted.jsonl in the output directory)')
    .option('--output <dir>', 'Directory to write exhibits.json and document_analyses.jsonl to')
    .option('-v, --verbose', 'Enable verbose logging')
    .option('-q, --quiet', 'Print errors only')
    .action((rawOpts: unknown) => {
      try {
        const options = parseExhibitsOptions(rawOpts);
        applyLogMode(options);

        const { config, taxonomy } = loadRunContext(options);
        const manifest = resolveManifest(resolveManifestPath(config, options.manifest));
        const outputDir = options.output ? path.resolve(process.cwd(), options.output) : config.outputDir;
        const claimsPath = options.claims
          ? path.resolve(process.cwd(), options.claims)
          : path.join(outputDir, OUTPUT_FILES.claims);

        const claims = readClaimRecords(claimsPath);
        const exhibits = computeExhibits(claims, manifest.documents, taxonomy.regions);
        const analyses = computeDocumentAnalyses(claims, manifest.documents, taxonomy);

        mkdirSync(outputDir, { recursive: true });
        const target = path.join(outputDir, OUTPUT_FILES.exhibits);
        writeFileSync(target, JSON.stringify(exhibits, null, 2) + '\n', 'utf-8');
        writeFileSync(path.join(outputDir, OUTPUT_FILES.analyses), toJsonl(analyses), 'utf-8');
        log(`Exhibits for ${exhibits.totals.claims} claim(s) in ${exhibits.totals.documents} document(s) written to ${target}`);
      } catch (e: unknown) {
        const err = handleUnknownError(e, 'Computing exhibits');
        error(`Error: ${err.message}`);
        process.exit(1);
      }
    });
}
