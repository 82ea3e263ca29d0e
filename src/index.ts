/**
 * Public entry point.
 */

export * from './lib/rag';
export * from './lib/errors';
export { logger, loggers, createRequestContext, createLayerLogger, type Logger } from './lib/logger';
export { createLLMAdapter, createLLMAdapterFromConfig, OpenAIAdapter } from './lib/llm';
export { createDb, runMigrations, buildMigrationStatements, type Database } from './db';
export type * from './types/rag';
export type { LLMAdapter, LLMMessage, LLMCompletionOptions, LLMStreamChunk } from './types/llm';
