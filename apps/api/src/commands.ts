import { runAnalysis, loadTables } from './analyze';
import type { AppContext } from './context';
import { ValidationError } from './errors';
import { discoverExportFiles } from './ingest/tabular';
import { buildDocuments, upsertCollection, type IngestionReport, type OnExists } from './retrieve/documents';
import type { AnalysisResult, ElementTable } from './types/schema';
import { createLogger } from './utils/logger';

const log = createLogger('commands');

export type ConvertOptions = {
  /** Tables already parsed (e.g. uploads); the data folder is scanned when omitted. */
  tables?: ElementTable[];
  dataDir?: string;
  onExists?: OnExists;
};

export const convertExports = async (ctx: AppContext, options: ConvertOptions = {}): Promise<IngestionReport> => {
  const dataDir = options.dataDir ?? ctx.config.dataDir;
  const tables = options.tables ?? (await loadTables(await discoverExportFiles(dataDir)));
  if (!tables.length) throw new ValidationError(`No export files found in ${dataDir}`, { path: dataDir });

  const documents = tables.flatMap(table => {
    const docs = buildDocuments(table, { idColumn: ctx.config.documentIdColumn });
    log.info(`Extracted ${docs.length} documents`, { elementType: table.elementType, source: table.sourcePath });
    return docs;
  });

  return upsertCollection(ctx.store, ctx.config.collectionName, documents, { onExists: options.onExists });
};

export type AnalyzeOptions = {
  dataDir?: string;
  expectedSchemaPath?: string;
  synthesize?: boolean;
  saveSchemaPath?: string;
  reportPath?: string;
};

/** Runs an analysis, persists it and hands the new snapshot to the router. */
export const analyzeExports = async (ctx: AppContext, options: AnalyzeOptions = {}): Promise<AnalysisResult> => {
  const result = await runAnalysis({
    dataDir: options.dataDir ?? ctx.config.dataDir,
    expectedSchemaPath: options.expectedSchemaPath,
    synthesizeExpectedSchema: options.synthesize,
    saveSchemaPath: options.saveSchemaPath,
    reportPath: options.reportPath ?? ctx.config.reportPath,
    resultPath: ctx.config.analysisResultPath
  });
  ctx.router.replaceAnalysis(result);
  return result;
};
