import path from 'path';
import { z } from 'zod';
import { ValidationError } from './errors';

const optionalString = z
  .string()
  .optional()
  .transform(v => (v && v.trim() ? v.trim() : undefined));

const envSchema = z.object({
  DATA_DIR: z.string().default('data'),
  VECTOR_DB_PATH: optionalString,
  COLLECTION_NAME: z.string().min(1).default('bim_elements'),
  ANALYSIS_RESULT_PATH: z.string().default('analysis_results.json'),
  REPORT_PATH: z.string().default('bim_analysis_report.html'),
  GEMINI_API_KEY: optionalString,
  GOOGLE_API_KEY: optionalString,
  GEMINI_MODEL: z.string().default('gemini-2.5-flash'),
  GEMINI_EMBEDDING_MODEL: z.string().default('text-embedding-004'),
  EMBEDDING_PROVIDER: z.enum(['gemini', 'local']).optional(),
  GENERATION_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  TOP_K: z.coerce.number().int().positive().default(5),
  DOCUMENT_ID_COLUMN: optionalString,
  PORT: z.coerce.number().int().positive().default(8080)
});

export type AppConfig = {
  dataDir: string;
  vectorDbPath: string;
  collectionName: string;
  analysisResultPath: string;
  reportPath: string;
  geminiApiKey?: string;
  generationModel: string;
  embeddingModel: string;
  embeddingProvider: 'gemini' | 'local';
  generationTimeoutMs: number;
  topK: number;
  documentIdColumn?: string;
  port: number;
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(`Invalid configuration: ${issue.path.join('.')} ${issue.message}`, {
      operation: 'loadConfig'
    });
  }

  const values = parsed.data;
  const geminiApiKey = values.GEMINI_API_KEY ?? values.GOOGLE_API_KEY;
  // The local embedder keeps `convert` usable offline; a key alone switches to Gemini.
  const embeddingProvider = values.EMBEDDING_PROVIDER ?? (geminiApiKey ? 'gemini' : 'local');
  if (embeddingProvider === 'gemini' && !geminiApiKey) {
    throw new ValidationError('EMBEDDING_PROVIDER=gemini requires GEMINI_API_KEY', { operation: 'loadConfig' });
  }

  return {
    dataDir: values.DATA_DIR,
    vectorDbPath: values.VECTOR_DB_PATH ?? path.join(values.DATA_DIR, 'vectors.db'),
    collectionName: values.COLLECTION_NAME,
    analysisResultPath: values.ANALYSIS_RESULT_PATH,
    reportPath: values.REPORT_PATH,
    geminiApiKey,
    generationModel: values.GEMINI_MODEL,
    embeddingModel: values.GEMINI_EMBEDDING_MODEL,
    embeddingProvider,
    generationTimeoutMs: values.GENERATION_TIMEOUT_MS,
    topK: values.TOP_K,
    documentIdColumn: values.DOCUMENT_ID_COLUMN,
    port: values.PORT
  };
};
