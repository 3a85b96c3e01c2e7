import chalk from 'chalk';
import stripAnsi from 'strip-ansi';
import type { AuditEntry, AuditKind } from '../errors/pipeline-errors';
import type { DocumentReport } from '../pipeline/types';
import type { RunSummary } from '../pipeline/corpus-runner';
import { log } from './logger';

const KIND_LABELS: Record<AuditKind, string> = {
  PartialExtractionWarning: 'partial',
  SchemaViolation: 'schema',
  UnverifiedClaim: 'unverified',
  ExtractionFailed: 'failed',
  DuplicateConflict: 'conflict',
};

function kindLabel(kind: AuditKind): string {
  const label = KIND_LABELS[kind];
  switch (kind) {
    case 'ExtractionFailed':
      return chalk.red(label);
    case 'SchemaViolation':
    case 'UnverifiedClaim':
      return chalk.yellow(label);
    case 'PartialExtractionWarning':
    case 'DuplicateConflict':
      return chalk.dim(label);
  }
}

function plural(n: number, word: string): string {
  return `${n.toLocaleString()} ${word}${n === 1 ? '' : 's'}`;
}

export function printDocumentRow(report: DocumentReport, width: number = 28) {
  const failed = report.issues.some((i) => i.kind === 'ExtractionFailed');
  const mark = failed ? chalk.red('✖') : chalk.green('✓');
  const idCell = report.documentId.length > width ? `${report.documentId.slice(0, width - 1)}…` : report.documentId;
  const candidates = report.candidates.pattern + report.candidates.llm;
  log(
    `${mark} ${chalk.underline(idCell)}${' '.repeat(Math.max(1, width - idCell.length + 1))}` +
      `${plural(report.chunks, 'chunk')}, ${plural(candidates, 'candidate')} → ` +
      `${chalk.bold(plural(report.claims, 'claim'))}` +
      (report.unverified > 0 ? chalk.yellow(` (${report.unverified} unverified)`) : '')
  );
}

export function printIssueRow(entry: AuditEntry, opts: { kindWidth?: number; messageWidth?: number } = {}) {
  const kindWidth = opts.kindWidth ?? 11;
  const termCols = process.stdout.columns || 100;
  const messageWidth = opts.messageWidth ?? Math.max(40, termCols - kindWidth - 6);

  const colored = kindLabel(entry.kind);
  const pad = Math.max(0, kindWidth - stripAnsi(colored).length);
  const prefix = `    ${colored}${' '.repeat(pad)} `;
  const where = [entry.chunkId ?? entry.documentId, entry.probeId].filter(Boolean).join(' ');
  const text = `${entry.reason} ${chalk.dim(where)}`;

  const visible = stripAnsi(text);
  const line = visible.length > messageWidth ? `${visible.slice(0, messageWidth - 1)}…` : text;
  log(`${prefix}${line}`);
}

export function printRunSummary(summary: RunSummary, outputDir: string) {
  const { documents, candidates } = summary;
  const failures = summary.issues.ExtractionFailed ?? 0;
  const okMark = failures === 0 ? chalk.green('✓') : chalk.red('✖');

  log('');
  log(
    `${okMark} ${chalk.bold(plural(summary.claims, 'claim'))} from ${plural(candidates.total, 'candidate')} ` +
      `in ${plural(documents.processed, 'document')}.`
  );
  log(
    `  ${plural(summary.verified, 'verified candidate')}, ` +
      `${summary.unverified > 0 ? chalk.yellow(`${summary.unverified} unverified`) : '0 unverified'}, ` +
      `${plural(summary.partnerships, 'partnership')}, ${plural(summary.commitments, 'commitment')}, ` +
      `${summary.reviewQueue} queued for review`
  );
  if (documents.unavailable > 0) {
    log(chalk.yellow(`  ${plural(documents.unavailable, 'input')} unavailable`));
  }
  if (failures > 0) {
    log(chalk.red(`✖ ${plural(failures, 'extraction failure')}`));
  }
  if (summary.aborted) {
    log(chalk.yellow('  Run was interrupted; outputs cover completed work only.'));
  }
  if (summary.generation.provider) {
    log(
      chalk.dim(
        `  ${summary.generation.provider}: ${plural(summary.generation.requests, 'request')}, ` +
          `${summary.generation.cacheHits} cached`
      )
    );
  }
  log(chalk.dim(`  Output written to ${outputDir}`));
}

export function printTokenUsage(generation: RunSummary['generation'], perProbe: boolean = false) {
  log(chalk.bold('\nToken Usage:'));
  log(`  - Input tokens: ${generation.usage.inputTokens.toLocaleString()}`);
  log(`  - Output tokens: ${generation.usage.outputTokens.toLocaleString()}`);
  if (generation.cost !== undefined) {
    log(`  - Total cost: $${generation.cost.toFixed(4)}`);
  }
  if (!perProbe) return;
  for (const [probeId, entry] of Object.entries(generation.byProbe)) {
    const cost = entry.cost !== undefined ? `, $${entry.cost.toFixed(4)}` : '';
    log(
      chalk.dim(
        `    ${probeId}: ${entry.requests} request(s), ` +
          `${entry.inputTokens.toLocaleString()} in / ${entry.outputTokens.toLocaleString()} out${cost}`
      )
    );
  }
}

export function printValidationRow(level: 'error' | 'warning' | 'ok', message: string) {
  const label =
    level === 'error' ? chalk.red('error') : level === 'warning' ? chalk.yellow('warning') : chalk.green('ok');
  log(`  ${label}  ${message}`);
}
