/**
 * Ask a question against the index from the command line.
 *
 * Usage:
 *   npm run ask -- "How do I reset the router?"
 *   npm run ask -- "Summarize the warranty" --mode=auto --stream
 *
 * Options:
 *   --mode=rag|simple|auto  Chat mode (default rag)
 *   --top-k=<n>             Chunks to retrieve
 *   --stream                Print the answer as it is generated
 */

import { loadRAGConfig } from '../src/lib/rag/config';
import { createRAGEngineFromConfig } from '../src/lib/rag/engine';
import type { ChatResponse } from '../src/lib/rag/orchestrator';
import { formatSourcesSection } from '../src/lib/rag/citations';
import { getErrorMessage } from '../src/lib/errors';
import type { ChatMode } from '../src/types/rag';

const MODES: readonly ChatMode[] = ['rag', 'simple', 'auto'];

interface Options {
  question: string;
  mode: ChatMode;
  topK: number | undefined;
  stream: boolean;
}

function parseArgs(): Options {
  const args = process.argv.slice(2);
  const modeArg = args.find((a) => a.startsWith('--mode='))?.split('=')[1];
  const topKArg = args.find((a) => a.startsWith('--top-k='))?.split('=')[1];

  return {
    question: args.filter((a) => !a.startsWith('--')).join(' '),
    mode: MODES.find((m) => m === modeArg) ?? 'rag',
    topK: topKArg ? Number.parseInt(topKArg, 10) : undefined,
    stream: args.includes('--stream'),
  };
}

function printSources(question: string, response: ChatResponse) {
  if (response.degraded) {
    console.log('\n(retrieval unavailable, answered without documents)');
  }
  if (response.curated) {
    const similarity = (response.curated.similarity * 100).toFixed(0);
    console.log(`\n(curated answer for "${response.curated.question}", ${similarity}% match)`);
  }
  if (response.searchQuery !== question) {
    console.log(`\n(searched for: ${response.searchQuery})`);
  }
  const sources = formatSourcesSection(response.citations);
  if (sources) {
    console.log(`\n${sources}`);
  }
  console.log(`\n${response.timing.total_ms}ms, ${response.usage.totalTokens} tokens`);
}

async function main() {
  const options = parseArgs();

  if (!options.question) {
    console.error('Usage: npm run ask -- "<question>" [--mode=rag|simple|auto] [--top-k=n] [--stream]');
    process.exit(1);
  }

  const { engine, close } = createRAGEngineFromConfig(loadRAGConfig());
  const request = {
    query: options.question,
    sessionId: 'cli',
    mode: options.mode,
    topK: options.topK,
  };

  try {
    if (options.stream) {
      const result: { error?: Error } = {};
      await engine.chatStream(request, {
        onChunk: (chunk) => process.stdout.write(chunk),
        onComplete: (response) => {
          process.stdout.write('\n');
          printSources(options.question, response);
        },
        onError: (error) => {
          result.error = error;
        },
      });
      if (result.error) throw result.error;
    } else {
      const response = await engine.chat(request);
      console.log(response.answer);
      printSources(options.question, response);
    }
  } finally {
    await close();
  }
}

main().catch((error) => {
  console.error('✗', getErrorMessage(error));
  process.exit(1);
});
