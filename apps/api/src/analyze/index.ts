import { isBimInsightError, errorMessage, ValidationError } from '../errors';
import { discoverExportFiles, readElementTable } from '../ingest/tabular';
import { writeAnalysisResult } from '../store';
import type { AnalysisResult, ElementTable, ExpectedSchema, SchemaDescriptor } from '../types/schema';
import { createLogger } from '../utils/logger';
import { profileTable } from '../utils/profile';
import { compareSchemas, emptyComparison } from './compare';
import { loadExpectedSchema, saveExpectedSchema, synthesizeExpectedSchema, type ExpectedSchemaDocument } from './expected';
import { writeReport } from './report';

const log = createLogger('analyze');

export type AnalysisOptions = {
  dataDir: string;
  /** Explicit export files; discovered in `dataDir` when omitted. */
  files?: string[];
  expectedSchemaPath?: string;
  /** Derive an expected schema from the data when none is supplied or it cannot be found. */
  synthesizeExpectedSchema?: boolean;
  saveSchemaPath?: string;
  reportPath: string;
  /** Where the result is persisted; nothing is written when omitted. */
  resultPath?: string;
};

const mergeTables = (into: ElementTable, next: ElementTable): ElementTable => ({
  ...into,
  columns: Array.from(new Set([...into.columns, ...next.columns])),
  records: [...into.records, ...next.records]
});

/** Loads every readable export. Unreadable files are logged and skipped. */
export const loadTables = async (files: string[]) => {
  const byType = new Map<string, ElementTable>();
  for (const file of files) {
    try {
      const table = await readElementTable(file);
      const existing = byType.get(table.elementType);
      if (existing) log.warn('Merging exports that share an element type', { elementType: table.elementType, file });
      byType.set(table.elementType, existing ? mergeTables(existing, table) : table);
      log.info(`Loaded ${table.elementType} data: ${table.records.length} records`, { file });
    } catch (err) {
      if (!isBimInsightError(err)) throw err;
      log.warn('Skipping export', { file, error: err.message });
    }
  }
  return Array.from(byType.values());
};

export const profileTables = (tables: ElementTable[]) => {
  const schemas: Record<string, SchemaDescriptor> = {};
  for (const table of tables) schemas[table.elementType] = profileTable(table);
  return schemas;
};

const resolveExpectedSchema = async (
  options: AnalysisOptions,
  schemas: Record<string, SchemaDescriptor>
): Promise<ExpectedSchema | ExpectedSchemaDocument | null> => {
  if (options.expectedSchemaPath) {
    try {
      const expected = await loadExpectedSchema(options.expectedSchemaPath);
      log.info('Loaded expected schema', { path: options.expectedSchemaPath });
      if (options.saveSchemaPath) {
        log.warn('Expected schema was loaded, nothing synthesized to save', { saveSchemaPath: options.saveSchemaPath });
      }
      return expected;
    } catch (err) {
      if (!isBimInsightError(err)) throw err;
      log.warn('Could not load expected schema', { path: options.expectedSchemaPath, error: errorMessage(err) });
    }
  }

  if (!options.synthesizeExpectedSchema) return null;

  const synthesized = synthesizeExpectedSchema(schemas);
  if (options.saveSchemaPath) {
    await saveExpectedSchema(options.saveSchemaPath, synthesized);
    log.info('Saved synthesized expected schema', { path: options.saveSchemaPath });
  }
  return synthesized;
};

/**
 * Profiles the exports, compares them with the expected schema when one is available,
 * writes the HTML report and finally persists the result. The previous result file is
 * only replaced once every step has succeeded.
 */
export const runAnalysis = async (options: AnalysisOptions): Promise<AnalysisResult> => {
  if (options.saveSchemaPath && !options.synthesizeExpectedSchema) {
    throw new ValidationError('Saving an expected schema requires synthesizing one', {
      operation: 'analyze',
      path: options.saveSchemaPath
    });
  }
  const files = options.files ?? (await discoverExportFiles(options.dataDir));
  const tables = await loadTables(files);
  const schemas = profileTables(tables);

  const expected = await resolveExpectedSchema(options, schemas);
  const comparison = expected ? compareSchemas(schemas, expected) : emptyComparison();
  if (!expected) log.info('No expected schema available; skipping comparison');

  const reportPath = await writeReport(options.reportPath, {
    schemas,
    comparison,
    dataSource: options.dataDir
  });

  const result: AnalysisResult = {
    schemas,
    comparison,
    reportPath,
    generatedAt: new Date().toISOString()
  };

  if (options.resultPath) {
    await writeAnalysisResult(options.resultPath, result);
    log.info('Analysis results saved', { path: options.resultPath });
  }
  return result;
};
