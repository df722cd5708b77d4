import { GeminiAnswerGenerator, type AnswerGenerator } from './answer/generator';
import { AnswerRouter } from './answer/router';
import type { AppConfig } from './config';
import { GeminiEmbedder, HashingEmbedder, type Embedder } from './retrieve/embed';
import { RetrievalEngine } from './retrieve/engine';
import { SqliteVectorStore, type VectorStore } from './retrieve/vectorStore';
import { readAnalysisResult } from './store';
import { createLogger } from './utils/logger';

const log = createLogger('context');

export type AppContext = {
  config: AppConfig;
  store: VectorStore;
  engine: RetrievalEngine;
  router: AnswerRouter;
};

export type ContextOverrides = {
  store?: VectorStore;
  embedder?: Embedder;
  generator?: AnswerGenerator | null;
};

export const createEmbedder = (config: AppConfig): Embedder => {
  if (config.embeddingProvider === 'gemini' && config.geminiApiKey) {
    return new GeminiEmbedder(config.geminiApiKey, config.embeddingModel);
  }
  return new HashingEmbedder();
};

export const createGenerator = (config: AppConfig): AnswerGenerator | null => {
  if (!config.geminiApiKey) {
    log.warn('GEMINI_API_KEY not set; answers will list the retrieved documents without generated prose');
    return null;
  }
  return new GeminiAnswerGenerator(config.geminiApiKey, config.generationModel, config.generationTimeoutMs);
};

/** Wires the store, retrieval engine and router, loading the previous analysis result if present. */
export const createContext = async (config: AppConfig, overrides: ContextOverrides = {}): Promise<AppContext> => {
  const store = overrides.store ?? new SqliteVectorStore(config.vectorDbPath, overrides.embedder ?? createEmbedder(config));
  const engine = new RetrievalEngine(store, config.collectionName);
  const analysis = await readAnalysisResult(config.analysisResultPath);
  if (analysis) log.info('Loaded previous analysis results', { path: config.analysisResultPath });

  const generator = overrides.generator !== undefined ? overrides.generator : createGenerator(config);
  const router = new AnswerRouter({ engine, generator, analysis, topK: config.topK });
  return { config, store, engine, router };
};
