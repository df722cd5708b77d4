import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import type { AnalysisResult, ComparisonResult, LowFillEntry, SchemaDescriptor } from './types/schema';
import { errorMessage } from './errors';
import { createLogger } from './utils/logger';

const log = createLogger('store');

const dataTypeSchema = z.enum(['string', 'number', 'boolean', 'date', 'uuid', 'currency', 'unknown']);

const schemaEntrySchema = z.object({
  record_count: z.number().int().nonnegative(),
  columns: z.array(z.string()),
  data_types: z.record(z.string(), dataTypeSchema),
  null_counts: z.record(z.string(), z.number()),
  null_percentages: z.record(z.string(), z.number()),
  unique_values: z.record(z.string(), z.number()),
  fill_rates: z.record(z.string(), z.number())
});

const analysisFileSchema = z.object({
  schemas: z.record(z.string(), schemaEntrySchema),
  comparison: z.object({
    missing_parameters: z.record(z.string(), z.array(z.string())).default({}),
    extra_parameters: z.record(z.string(), z.array(z.string())).default({}),
    low_fill_required: z.record(z.string(), z.array(z.tuple([z.string(), z.number()]))).default({}),
    possible_renames: z
      .record(z.string(), z.array(z.object({ missing: z.string(), extra: z.string(), similarity: z.number() })))
      .default({}),
    diagnostics: z
      .array(
        z.object({
          elementType: z.string(),
          reason: z.enum(['not_in_data', 'malformed_schema']),
          message: z.string()
        })
      )
      .default([])
  }),
  report_path: z.string(),
  generated_at: z.string().default('')
});

/** On-disk envelope of an analysis run. */
export type AnalysisFile = z.infer<typeof analysisFileSchema>;

const schemaToFile = (d: SchemaDescriptor): AnalysisFile['schemas'][string] => {
  const byColumn = <T>(pick: (c: SchemaDescriptor['columns'][number]) => T) =>
    Object.fromEntries(d.columns.map(c => [c.name, pick(c)] as const));
  return {
    record_count: d.recordCount,
    columns: d.columns.map(c => c.name),
    data_types: byColumn(c => c.dataType),
    null_counts: byColumn(c => c.nullCount),
    null_percentages: byColumn(c => c.nullPercentage),
    unique_values: byColumn(c => c.distinctCount),
    fill_rates: byColumn(c => c.fillRate)
  };
};

const schemaFromFile = (elementType: string, entry: AnalysisFile['schemas'][string]): SchemaDescriptor => ({
  elementType,
  recordCount: entry.record_count,
  columns: entry.columns.map(name => ({
    name,
    dataType: entry.data_types[name] ?? 'unknown',
    nullCount: entry.null_counts[name] ?? 0,
    nullPercentage: entry.null_percentages[name] ?? 0,
    distinctCount: entry.unique_values[name] ?? 0,
    fillRate: entry.fill_rates[name] ?? 0
  }))
});

const comparisonToFile = (comparison: ComparisonResult): AnalysisFile['comparison'] => {
  const file: AnalysisFile['comparison'] = {
    missing_parameters: {},
    extra_parameters: {},
    low_fill_required: {},
    possible_renames: {},
    diagnostics: comparison.diagnostics
  };
  for (const [elementType, c] of Object.entries(comparison.byElementType)) {
    file.missing_parameters[elementType] = c.missingParameters;
    file.extra_parameters[elementType] = c.extraParameters;
    file.low_fill_required[elementType] = c.lowFillRequired;
    file.possible_renames[elementType] = c.possibleRenames;
  }
  return file;
};

const comparisonFromFile = (file: AnalysisFile['comparison']): ComparisonResult => {
  const elementTypes = new Set([
    ...Object.keys(file.missing_parameters),
    ...Object.keys(file.extra_parameters),
    ...Object.keys(file.low_fill_required)
  ]);
  const result: ComparisonResult = { byElementType: {}, diagnostics: file.diagnostics };
  for (const elementType of elementTypes) {
    const lowFill: LowFillEntry[] = (file.low_fill_required[elementType] ?? []).map(([p, r]) => [p, r]);
    result.byElementType[elementType] = {
      missingParameters: file.missing_parameters[elementType] ?? [],
      extraParameters: file.extra_parameters[elementType] ?? [],
      lowFillRequired: lowFill,
      possibleRenames: file.possible_renames[elementType] ?? []
    };
  }
  return result;
};

export const toAnalysisFile = (result: AnalysisResult): AnalysisFile => ({
  schemas: Object.fromEntries(Object.entries(result.schemas).map(([type, d]) => [type, schemaToFile(d)] as const)),
  comparison: comparisonToFile(result.comparison),
  report_path: result.reportPath,
  generated_at: result.generatedAt
});

export const fromAnalysisFile = (file: AnalysisFile): AnalysisResult => ({
  schemas: Object.fromEntries(Object.entries(file.schemas).map(([type, entry]) => [type, schemaFromFile(type, entry)] as const)),
  comparison: comparisonFromFile(file.comparison),
  reportPath: file.report_path,
  generatedAt: file.generated_at
});

/**
 * Reads a persisted analysis result. A missing file is not an error; an unreadable or
 * invalid one is logged and treated as absent.
 */
export const readAnalysisResult = async (filePath: string): Promise<AnalysisResult | null> => {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return null;
    log.warn('Could not read previous analysis results', { path: filePath, error: errorMessage(err) });
    return null;
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    log.warn('Could not parse previous analysis results', { path: filePath });
    return null;
  }

  const parsed = analysisFileSchema.safeParse(json);
  if (!parsed.success) {
    log.warn('Ignoring invalid analysis results file', { path: filePath, issue: parsed.error.issues[0]?.message });
    return null;
  }
  return fromAnalysisFile(parsed.data);
};

/** Replaces the result file wholesale: the new content is written beside it, then renamed over it. */
export const writeAnalysisResult = async (filePath: string, result: AnalysisResult) => {
  const dir = path.dirname(filePath);
  await fs.mkdir(dir, { recursive: true });
  const tmpPath = path.join(dir, `.${path.basename(filePath)}.${process.pid}.tmp`);
  await fs.writeFile(tmpPath, `${JSON.stringify(toAnalysisFile(result), null, 2)}\n`, 'utf-8');
  await fs.rename(tmpPath, filePath);
};
