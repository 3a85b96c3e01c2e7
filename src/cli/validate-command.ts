import type { Command } from 'commander';
import { existsSync } from 'fs';
import { parseValidateOptions } from '../boundaries/cli-parser';
import { parseEnvironment } from '../boundaries/env-parser';
import { resolveManifest } from '../boundaries/manifest-loader';
import { TemplateRenderer } from '../prompts/template-renderer';
import { CLAIM_PROMPT_TEMPLATE } from '../config/constants';
import { handleUnknownError } from '../errors/index';
import { error, log } from '../output/logger';
import { printValidationRow } from '../output/reporter';
import type { ValidateOptions } from '../schemas/cli-schemas';
import { applyLogMode, loadRunContext, resolveManifestPath, toChunkingOptions } from './run-context';

/*
 * Registers the 'validate' command with Commander.
 * Checks configuration, catalogs, the prompt template, the manifest and the
 * environment without reading documents or calling any API.
 *
 * Note: process.exit is intentional in CLI commands to set proper exit codes.
 */
export function registerValidateCommand(program: Command): void {
  program
    .command('validate')
    .description('Validate configuration, catalogs and manifest without extracting')
    .option('--config <path>', 'Path to a claimtrace.ini config file')
    .option('--manifest <path>', 'Manifest listing the documents')
    .option('-v, --verbose', 'Enable verbose logging')
    .option('-q, --quiet', 'Print errors only')
    .action((rawOpts: unknown) => {
      let parsed: ValidateOptions;
      try {
        parsed = parseValidateOptions(rawOpts);
      } catch (e: unknown) {
        const err = handleUnknownError(e, 'Parsing validate command options');
        error(`Error: ${err.message}`);
        process.exit(1);
      }
      const options = parsed;
      applyLogMode(options);

      let errors = 0;
      let warnings = 0;
      const check = <T>(label: string, fn: () => T, describe: (value: T) => string): T | undefined => {
        try {
          const value = fn();
          printValidationRow('ok', `${label}: ${describe(value)}`);
          return value;
        } catch (e: unknown) {
          errors++;
          const err = handleUnknownError(e, label);
          printValidationRow('error', `${label}: ${err.message}`);
          return undefined;
        }
      };

      const context = check(
        'catalogs',
        () => loadRunContext(options),
        ({ taxonomy, patterns, probes }) =>
          `${taxonomy.domains.length} domains, ${taxonomy.clinicalAreas.length} clinical areas, ` +
          `${patterns.rules.length} pattern rules, ${probes.length} probes`
      );

      if (context) {
        const { config } = context;
        check(
          'chunking',
          () => toChunkingOptions(config.chunking),
          (opts) => `maxChars ${opts.maxChars ?? '-'}, overlap ${opts.overlap ?? '-'}, ${opts.boilerplatePatterns?.length ?? 0} boilerplate patterns`
        );

        check(
          'prompt template',
          () => new TemplateRenderer().source(CLAIM_PROMPT_TEMPLATE),
          (source) => `${CLAIM_PROMPT_TEMPLATE} (${source.length} chars)`
        );

        check('manifest', () => {
          const manifest = resolveManifest(resolveManifestPath(config, options.manifest));
          const missing = manifest.documents.filter((d) => !existsSync(d.sourcePath));
          for (const m of [...manifest.unavailable, ...missing.map((d) => ({ path: d.sourcePath, reason: 'not found' }))]) {
            warnings++;
            printValidationRow('warning', `${m.path}: ${m.reason}`);
          }
          if (manifest.documents.length === missing.length) {
            throw new Error('no readable documents');
          }
          return manifest.documents.length - missing.length;
        }, (readable) => `${readable} readable document(s)`);

        if (config.generation.enabled) {
          try {
            const env = parseEnvironment();
            printValidationRow('ok', `environment: LLM_PROVIDER=${env.LLM_PROVIDER}`);
          } catch (e: unknown) {
            // Pattern-only runs need no credentials
            warnings++;
            const err = handleUnknownError(e, 'Validating environment');
            printValidationRow('warning', `environment: ${err.message}`);
          }
        }
      }

      log('');
      log(`${errors} error(s), ${warnings} warning(s)`);
      process.exit(errors > 0 ? 1 : 0);
    });
}
