/**
 * Document write guard.
 *
 * Serializes index writes per document and lets readers detect whether a
 * document was written while they were reading. Every entry to and exit
 * from an exclusive section stamps the document with a new value of a
 * global sequence; a reader records the sequence before searching and
 * treats a document as stable only if it is not locked now and carries no
 * stamp newer than that record.
 */

import { KeyedMutex } from './keyed-mutex';

export interface ConsistencyCheck {
  snapshot(): number;
  isStable(documentId: string, since: number): boolean;
}

export class DocumentWriteGuard implements ConsistencyCheck {
  private mutex = new KeyedMutex();
  private sequence = 0;
  private lastWrite = new Map<string, number>();
  private active = new Set<string>();

  async runExclusive<T>(documentId: string, fn: () => Promise<T>): Promise<T> {
    return this.mutex.runExclusive(documentId, async () => {
      this.active.add(documentId);
      this.stamp(documentId);
      try {
        return await fn();
      } finally {
        this.stamp(documentId);
        this.active.delete(documentId);
      }
    });
  }

  snapshot(): number {
    return this.sequence;
  }

  isStable(documentId: string, since: number): boolean {
    if (this.active.has(documentId)) {
      return false;
    }
    return (this.lastWrite.get(documentId) ?? 0) <= since;
  }

  isLocked(documentId: string): boolean {
    return this.mutex.isLocked(documentId);
  }

  private stamp(documentId: string): void {
    this.sequence += 1;
    this.lastWrite.set(documentId, this.sequence);
  }
}
