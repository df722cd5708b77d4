import { isBimInsightError, errorMessage } from '../errors';
import type {
  ComparisonResult,
  ElementComparison,
  ExpectedElementSchema,
  ExpectedSchema,
  LowFillEntry,
  RenameCandidate,
  SchemaDescriptor
} from '../types/schema';
import { createLogger } from '../utils/logger';
import { fillRateTable } from '../utils/profile';
import { nameSimilarity } from '../utils/similarity';
import { parseExpectedEntry, type ExpectedSchemaDocument } from './expected';

const log = createLogger('compare');

/** Required parameters filled in fewer than this share of records are flagged. */
export const LOW_FILL_PERCENT = 90;
const RENAME_SIMILARITY = 0.8;

const findRenames = (missing: string[], extra: string[]): RenameCandidate[] => {
  const candidates: RenameCandidate[] = [];
  for (const m of missing) {
    let best: RenameCandidate | null = null;
    for (const e of extra) {
      const similarity = nameSimilarity(m, e);
      if (similarity < RENAME_SIMILARITY) continue;
      if (!best || similarity > best.similarity) {
        best = { missing: m, extra: e, similarity: Number(similarity.toFixed(2)) };
      }
    }
    if (best) candidates.push(best);
  }
  return candidates;
};

export const compareElement = (actual: SchemaDescriptor, expected: ExpectedElementSchema): ElementComparison => {
  const expectedParams = new Set(expected.parameters);
  const actualParams = new Set(actual.columns.map(c => c.name));

  const missingParameters = Array.from(expectedParams).filter(p => !actualParams.has(p));
  const extraParameters = Array.from(actualParams).filter(p => !expectedParams.has(p));

  const lowFillRequired: LowFillEntry[] = [];
  if (expected.requiredParameters.length) {
    const fillRates = fillRateTable(actual);
    for (const param of new Set(expected.requiredParameters)) {
      const fillRate = fillRates.get(param);
      if (fillRate === undefined) continue;
      const percent = fillRate * 100;
      if (percent < LOW_FILL_PERCENT) lowFillRequired.push([param, percent]);
    }
  }

  return {
    missingParameters,
    extraParameters,
    lowFillRequired,
    possibleRenames: findRenames(missingParameters, extraParameters)
  };
};

/**
 * Diffs observed descriptors against an expected schema. Element types missing from the
 * data, or whose expected entry is malformed, are reported as diagnostics and skipped;
 * the remaining types are still compared.
 */
export const compareSchemas = (
  actual: Record<string, SchemaDescriptor>,
  expected: ExpectedSchema | ExpectedSchemaDocument
): ComparisonResult => {
  const result: ComparisonResult = { byElementType: {}, diagnostics: [] };

  for (const [elementType, rawEntry] of Object.entries(expected)) {
    const descriptor = Object.hasOwn(actual, elementType) ? actual[elementType] : undefined;
    if (!descriptor) {
      const message = `Element type ${elementType} not found in actual data`;
      log.warn(message);
      result.diagnostics.push({ elementType, reason: 'not_in_data', message });
      continue;
    }

    try {
      const entry = isExpectedElementSchema(rawEntry) ? rawEntry : parseExpectedEntry(elementType, rawEntry);
      result.byElementType[elementType] = compareElement(descriptor, entry);
    } catch (err) {
      if (!isBimInsightError(err)) throw err;
      log.warn('Skipping element type with malformed expected schema', { elementType, error: errorMessage(err) });
      result.diagnostics.push({ elementType, reason: 'malformed_schema', message: err.message });
    }
  }

  return result;
};

const isExpectedElementSchema = (value: unknown): value is ExpectedElementSchema =>
  typeof value === 'object' &&
  value !== null &&
  'requiredParameters' in value &&
  Array.isArray(value.requiredParameters) &&
  'parameters' in value &&
  Array.isArray(value.parameters) &&
  'description' in value &&
  typeof value.description === 'string';

/** Lowest fill rate first, for presentation. The stored order is left untouched. */
export const sortLowFill = (entries: readonly LowFillEntry[]): LowFillEntry[] =>
  [...entries].sort((a, b) => a[1] - b[1]);

export const emptyComparison = (): ComparisonResult => ({ byElementType: {}, diagnostics: [] });
