import type { Claim, ExtractionRecord, Partnership } from '../claims/types';
import { ProcessingError } from '../errors/index';

export interface DocumentCommit {
  claims: readonly Claim[];
  partnerships: readonly Partnership[];
  records: readonly ExtractionRecord[];
}

/**
 * Canonical claims of a run, committed one document at a time. A commit
 * replaces everything previously held for that document; commits never
 * interleave.
 */
export class CanonicalClaimSet {
  private readonly documents = new Map<string, DocumentCommit>();
  private queue: Promise<void> = Promise.resolve();

  commit(documentId: string, entry: DocumentCommit): Promise<void> {
    const run = this.queue.then(() => {
      const foreign = [...entry.claims, ...entry.partnerships, ...entry.records].find(
        (item) => item.documentId !== documentId
      );
      if (foreign) {
        throw new ProcessingError(`Commit for ${documentId} contains an item of ${foreign.documentId}`);
      }
      this.documents.set(
        documentId,
        Object.freeze({
          claims: Object.freeze([...entry.claims]),
          partnerships: Object.freeze([...entry.partnerships]),
          records: Object.freeze([...entry.records]),
        })
      );
    });
    // A rejected commit must not block later ones; the caller still sees the rejection
    this.queue = run.catch(() => undefined);
    return run;
  }

  has(documentId: string): boolean {
    return this.documents.has(documentId);
  }

  documentIds(): string[] {
    return [...this.documents.keys()].sort();
  }

  claims(): Claim[] {
    return this.collect((commit) => commit.claims);
  }

  partnerships(): Partnership[] {
    return this.collect((commit) => commit.partnerships);
  }

  records(): ExtractionRecord[] {
    return this.collect((commit) => commit.records);
  }

  private collect<T>(select: (commit: DocumentCommit) => readonly T[]): T[] {
    return this.documentIds().flatMap((id) => {
      const commit = this.documents.get(id);
      return commit ? [...select(commit)] : [];
    });
  }
}
