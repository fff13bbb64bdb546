/**
 * Ask a question
 *
 * Usage:
 *   npm run ask -- "What color is the sky?" [file...]
 *
 * Files given after the question are ingested first, which makes the
 * script usable with the default in-memory backends.
 */

import { readFile } from 'fs/promises';
import { basename } from 'path';
import { createRAGContext, formatSourcesSection, loadRAGConfig, RAGOrchestrator } from '@/lib/rag';
import { getErrorMessage } from '@/lib/errors';

async function main() {
  const [question, ...files] = process.argv.slice(2);
  if (!question) {
    throw new Error('Usage: npm run ask -- "<question>" [file...]');
  }

  const config = loadRAGConfig();
  const context = await createRAGContext(config);
  const orchestrator = new RAGOrchestrator(context);
  await orchestrator.init();

  try {
    for (const file of files) {
      const handle = await orchestrator.ingest({
        documentId: basename(file),
        filename: basename(file),
        bytes: await readFile(file),
      });
      const document = await handle.done;
      if (document.status !== 'indexed') {
        console.warn(`Skipping ${file}: ${document.failure?.stage} - ${document.failure?.reason}`);
      }
    }

    const conversation = await context.conversations.create();
    const turn = await orchestrator.ask(conversation.id, question);

    if (turn.status.state === 'failed') {
      console.error(`Answer failed: ${turn.status.reason}`);
      process.exitCode = 1;
      return;
    }

    console.log(turn.text);
    const sources = formatSourcesSection(turn.citations);
    if (sources) {
      console.log(`\n${sources}`);
    }
  } finally {
    await orchestrator.shutdown();
  }
}

main().catch((err: unknown) => {
  console.error('Error:', getErrorMessage(err));
  process.exit(1);
});
