/**
 * Ingest local files into the index.
 *
 * Usage:
 *   npm run ingest -- ./docs/handbook.pdf ./docs/faq.md
 *   npm run ingest -- ./docs/handbook.pdf --id=handbook
 *
 * Options:
 *   --id=<documentId>  Document id to use (single file only). Re-ingesting
 *                      an id replaces its chunks.
 *
 * Environment:
 *   OPENAI_API_KEY, VECTOR_STORE=pgvector, DATABASE_URL
 */

import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { loadRAGConfig } from '../src/lib/rag/config';
import { createRAGEngineFromConfig, type IngestDocumentInput } from '../src/lib/rag/engine';
import { getErrorMessage } from '../src/lib/errors';

interface Options {
  files: string[];
  documentId: string | null;
}

function parseArgs(): Options {
  const args = process.argv.slice(2);
  return {
    files: args.filter((a) => !a.startsWith('--')),
    documentId: args.find((a) => a.startsWith('--id='))?.split('=')[1] ?? null,
  };
}

async function main() {
  const options = parseArgs();

  if (options.files.length === 0) {
    console.error('Usage: npm run ingest -- <file...> [--id=documentId]');
    process.exit(1);
  }
  if (options.documentId && options.files.length > 1) {
    console.error('✗ --id can only be used with a single file');
    process.exit(1);
  }

  const config = loadRAGConfig();
  if (config.vectorStore === 'memory') {
    console.warn('⚠ VECTOR_STORE=memory: ingested chunks are discarded when this script exits\n');
  }

  const inputs: IngestDocumentInput[] = [];
  for (const file of options.files) {
    inputs.push({
      bytes: await readFile(file),
      filename: basename(file),
      documentId: options.documentId ?? undefined,
      metadata: { source: file },
    });
  }

  const { engine, close } = createRAGEngineFromConfig(config);

  try {
    const outcomes = await engine.ingestBatch(inputs);

    for (const outcome of outcomes) {
      if (outcome.ok) {
        console.log(`✓ ${outcome.filename} → ${outcome.documentId} (${outcome.chunkCount} chunks)`);
      } else {
        console.log(`✗ ${outcome.filename}: ${getErrorMessage(outcome.error)}`);
      }
    }

    const failed = outcomes.filter((o) => !o.ok).length;
    console.log(`\n${outcomes.length - failed}/${outcomes.length} files ingested`);
    if (failed > 0) {
      process.exitCode = 1;
    }
  } finally {
    await close();
  }
}

main().catch((error) => {
  console.error('Ingestion failed:', getErrorMessage(error));
  process.exit(1);
});
