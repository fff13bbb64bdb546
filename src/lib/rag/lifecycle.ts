/**
 * Document lifecycle.
 *
 *   uploaded -> extracting -> chunking -> embedding -> indexed
 *
 * Any non-terminal status may also move to failed. Within one revision a
 * document only moves forward.
 */

import type { DocumentStatus } from '@/types/rag';

const PIPELINE: readonly DocumentStatus[] = ['uploaded', 'extracting', 'chunking', 'embedding', 'indexed'];

export function isTerminalStatus(status: DocumentStatus): boolean {
  return status === 'indexed' || status === 'failed';
}

export function canTransition(from: DocumentStatus, to: DocumentStatus): boolean {
  if (isTerminalStatus(from)) {
    return false;
  }
  if (to === 'failed') {
    return true;
  }
  return PIPELINE.indexOf(to) === PIPELINE.indexOf(from) + 1;
}

export function assertTransition(from: DocumentStatus, to: DocumentStatus): void {
  if (!canTransition(from, to)) {
    throw new Error(`Illegal document transition ${from} -> ${to}`);
  }
}
