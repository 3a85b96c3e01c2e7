import { ClaimtraceError } from './index';

export type AuditKind =
  | 'PartialExtractionWarning'
  | 'SchemaViolation'
  | 'UnverifiedClaim'
  | 'ExtractionFailed'
  | 'DuplicateConflict';

export interface IssueScope {
  documentId: string;
  chunkId?: string;
  candidateId?: string;
  probeId?: string;
}

export interface AuditEntry extends IssueScope {
  kind: AuditKind;
  reason: string;
  detail: Record<string, unknown>;
}

/**
 * Document- or claim-scoped problem. Issues are never thrown past the
 * document pipeline; they are collected and written to the audit log.
 */
export abstract class PipelineIssue extends ClaimtraceError {
  abstract readonly kind: AuditKind;

  constructor(
    public readonly scope: IssueScope,
    public readonly reason: string,
    public readonly detail: Record<string, unknown> = {}
  ) {
    super(`${scope.documentId}: ${reason}`, 'PIPELINE_ISSUE');
    this.name = 'PipelineIssue';
  }

  toAuditEntry(): AuditEntry {
    return {
      kind: this.kind,
      ...this.scope,
      reason: this.reason,
      detail: this.detail,
    };
  }
}

export class PartialExtractionWarning extends PipelineIssue {
  readonly kind = 'PartialExtractionWarning';
}

export class SchemaViolation extends PipelineIssue {
  readonly kind = 'SchemaViolation';
}

export class UnverifiedClaim extends PipelineIssue {
  readonly kind = 'UnverifiedClaim';
}

export class ExtractionFailed extends PipelineIssue {
  readonly kind = 'ExtractionFailed';
}

export class DuplicateConflict extends PipelineIssue {
  readonly kind = 'DuplicateConflict';
}
