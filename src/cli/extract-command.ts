import type { Command } from 'commander';
import * as path from 'path';
import { parseExtractOptions } from '../boundaries/cli-parser';
import { parseEnvironment } from '../boundaries/env-parser';
import { loadCorpus } from '../boundaries/manifest-loader';
import { createEmbeddingProvider, createProvider } from '../providers/provider-factory';
import { DefaultRequestBuilder } from '../providers/request-builder';
import type { LLMProvider } from '../providers/llm-provider';
import { CacheStore } from '../cache/cache-store';
import { runCorpus } from '../pipeline/corpus-runner';
import { writeRunOutputs } from '../output/record-writer';
import { printDocumentRow, printIssueRow, printRunSummary, printTokenUsage } from '../output/reporter';
import { error, log, warn, LOG_PREFIX, isVerboseMode } from '../output/logger';
import { InputUnavailableError, handleUnknownError } from '../errors/index';
import { applyLogMode, loadRunContext, resolveManifestPath, toChunkingOptions } from './run-context';

const EXIT_INTERRUPTED = 130;

/**
 * Saves the response cache once the run settles, before any error reaches a
 * handler that calls process.exit (which would skip a later finally).
 */
export async function runPersistingCache<T>(cache: CacheStore | undefined, run: () => Promise<T>): Promise<T> {
  try {
    return await run();
  } finally {
    cache?.save();
  }
}

/*
 * Registers the extract command: the full run from manifest to output files.
 *
 * Note: process.exit is intentional in CLI commands to set proper exit codes.
 */
export function registerExtractCommand(program: Command): void {
  program
    .command('extract')
    .description('Extract, verify and deduplicate claims for every document in a manifest')
    .option('--config <path>', 'Path to a claimtrace.ini config file')
    .option('--manifest <path>', 'Manifest listing the documents (overrides Manifest in the config)')
    .option('--output <dir>', 'Directory for output files (overrides OutputDir in the config)')
    .option('--pattern-only', 'Skip the model-based extractor; no credentials needed')
    .option('--no-cache', 'Ignore and do not update the response cache')
    .option('--concurrency <n>', 'Documents processed at once')
    .option('-v, --verbose', 'Enable verbose logging')
    .option('-q, --quiet', 'Print errors only')
    .option('--show-prompt', 'Print full prompt and injected content')
    .option('--show-prompt-trunc', 'Print truncated prompt/content previews (500 chars)')
    .option('--debug-json', 'Print full JSON response from the API')
    .action(async (rawOpts: unknown) => {
      // Parse and validate CLI options
      let options;
      try {
        options = parseExtractOptions(rawOpts);
      } catch (e: unknown) {
        const err = handleUnknownError(e, 'Parsing CLI options');
        error(`Error: ${err.message}`);
        process.exit(1);
      }
      applyLogMode(options);

      let context;
      let manifestPath;
      try {
        context = loadRunContext(options);
        manifestPath = resolveManifestPath(context.config, options.manifest);
      } catch (e: unknown) {
        const err = handleUnknownError(e, 'Loading configuration');
        error(`Error: ${err.message}`);
        process.exit(1);
      }
      const { config, taxonomy, patterns, probes } = context;

      let provider: LLMProvider | undefined;
      let embedder;
      try {
        if (!options.patternOnly && config.generation.enabled) {
          const env = parseEnvironment();
          provider = createProvider(
            env,
            {
              debug: options.verbose,
              showPrompt: options.showPrompt,
              showPromptTrunc: options.showPromptTrunc,
              debugJson: options.debugJson,
              deterministic: config.generation.deterministic,
            },
            new DefaultRequestBuilder()
          );
        }
        embedder = createEmbeddingProvider(config.retrieval.embedding);
      } catch (e: unknown) {
        const err = handleUnknownError(e, 'Creating providers');
        error(`Error: ${err.message}`);
        error('Set the variables in your .env file or environment, or pass --pattern-only.');
        process.exit(1);
      }

      let corpus;
      let chunking;
      try {
        corpus = loadCorpus(manifestPath);
        chunking = toChunkingOptions(config.chunking);
      } catch (e: unknown) {
        const err = handleUnknownError(e, 'Loading manifest');
        error(`Error: ${err.message}`);
        process.exit(1);
      }
      for (const missing of corpus.unavailable) {
        warn(`${LOG_PREFIX} Warning: ${missing.path}: ${missing.reason}`);
      }

      const cache = options.cache && provider ? new CacheStore(config.configDir) : undefined;

      // First SIGINT stops new requests; in-flight ones finish and outputs are still written
      const controller = new AbortController();
      process.once('SIGINT', () => {
        warn(`\n${LOG_PREFIX} Interrupted: finishing in-flight requests, no new ones will start`);
        controller.abort();
      });

      log(
        `${LOG_PREFIX} ${corpus.documents.length} document(s), ` +
          (provider ? `${probes.length} probe(s) on ${provider.id}` : 'pattern extraction only')
      );

      let result;
      try {
        result = await runPersistingCache(cache, () =>
          runCorpus(
            corpus,
            { taxonomy, patterns, probes, embedder, ...(provider && { provider }), ...(cache && { cache }) },
            {
              concurrency: options.concurrency ?? config.concurrency,
              chunking,
              retrieval: { k: config.retrieval.k, similarity: config.retrieval.similarity },
              generation: {
                concurrency: config.generation.concurrency,
                timeoutMs: config.generation.timeoutMs,
                maxAttempts: config.generation.maxAttempts,
                pricing: {
                  inputPricePerMillion: config.generation.inputPricePerMillion,
                  outputPricePerMillion: config.generation.outputPricePerMillion,
                },
              },
              overlapThreshold: config.verification.overlapThreshold,
              review: { fraction: config.verification.reviewFraction, seed: config.verification.reviewSeed },
              signal: controller.signal,
            }
          )
        );
      } catch (e: unknown) {
        const err = handleUnknownError(e, 'Running extraction');
        error(`Error: ${err.message}`);
        process.exit(e instanceof InputUnavailableError ? 2 : 1);
      }

      const outputDir = options.output ? path.resolve(process.cwd(), options.output) : config.outputDir;
      try {
        writeRunOutputs(outputDir, result);
      } catch (e: unknown) {
        const err = handleUnknownError(e, 'Writing outputs');
        error(`Error: ${err.message}`);
        process.exit(1);
      }

      for (const report of result.reports) {
        printDocumentRow(report);
        if (isVerboseMode()) {
          for (const issue of report.issues) printIssueRow(issue.toAuditEntry());
        }
      }
      printRunSummary(result.summary, outputDir);
      if (provider) {
        printTokenUsage(result.summary.generation, isVerboseMode());
      }

      process.exit(result.summary.aborted ? EXIT_INTERRUPTED : 0);
    });
}
