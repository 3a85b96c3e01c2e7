import type { AuditEntry, AuditKind, PipelineIssue } from '../errors/pipeline-errors';
import { debug } from '../output/logger';

/**
 * Collects the issues of a run. Entries keep insertion order; document
 * pipelines append their issues in one batch, so a document's entries are
 * contiguous.
 */
export class AuditLog {
  private readonly items: AuditEntry[] = [];

  record(issues: readonly PipelineIssue[]): void {
    for (const issue of issues) {
      debug(`${issue.kind} ${issue.message}`);
      this.items.push(issue.toAuditEntry());
    }
  }

  entries(): readonly AuditEntry[] {
    return this.items;
  }

  get size(): number {
    return this.items.length;
  }

  countByKind(): Partial<Record<AuditKind, number>> {
    const counts: Partial<Record<AuditKind, number>> = {};
    for (const entry of this.items) {
      counts[entry.kind] = (counts[entry.kind] ?? 0) + 1;
    }
    return counts;
  }
}
