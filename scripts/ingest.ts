/**
 * Ingest documents
 *
 * Usage:
 *   npm run ingest -- docs/handbook.md docs/policy.docx
 *
 * Backends come from the environment (see loadRAGConfig). With the default
 * in-memory index the result only lives for the run, so point
 * VECTOR_INDEX_BACKEND=pgvector and DOCUMENT_STORE_BACKEND=postgres at a
 * database to keep it.
 */

import { readFile } from 'fs/promises';
import { basename } from 'path';
import { createRAGContext, loadRAGConfig, RAGOrchestrator, type IngestionHandle } from '@/lib/rag';
import { getErrorMessage } from '@/lib/errors';

async function main() {
  const files = process.argv.slice(2);
  if (files.length === 0) {
    throw new Error('Usage: npm run ingest -- <file> [file...]');
  }

  const config = loadRAGConfig();
  const orchestrator = new RAGOrchestrator(await createRAGContext(config));
  await orchestrator.init();

  try {
    const handles: IngestionHandle[] = [];
    for (const file of files) {
      const bytes = await readFile(file);
      handles.push(await orchestrator.ingest({ documentId: basename(file), filename: basename(file), bytes }));
    }

    console.log(`Ingesting ${handles.length} document(s)...\n`);

    let failed = 0;
    for (const handle of handles) {
      const document = await handle.done;
      if (document.status === 'indexed') {
        console.log(`  ✓ ${document.filename}: ${document.chunkIds.length} chunks (revision ${document.revision})`);
      } else {
        failed++;
        console.log(`  ✗ ${document.filename}: ${document.failure?.stage} - ${document.failure?.reason}`);
      }
    }

    if (failed > 0) {
      process.exitCode = 1;
    }
  } finally {
    await orchestrator.shutdown();
  }
}

main().catch((err: unknown) => {
  console.error('Error:', getErrorMessage(err));
  process.exit(1);
});
