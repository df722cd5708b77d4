import { CollectionExistsError, IngestionError, ValidationError } from '../errors';
import { cellToString, isEmptyCell } from '../ingest/tabular';
import type { Document, ElementTable, MetadataValue } from '../types/schema';
import { createLogger } from '../utils/logger';
import type { DistanceMetric, VectorStore } from './vectorStore';

const log = createLogger('documents');

export const ELEMENT_TYPE_FIELD = 'ElementType';
export const INGEST_BATCH_SIZE = 100;

export type BuildDocumentOptions = {
  /** Column carrying a stable element identity (e.g. `GlobalId`); row position is used when absent. */
  idColumn?: string;
};

export type OnExists = 'reuse' | 'replace';

export type UpsertOptions = {
  onExists?: OnExists;
  batchSize?: number;
  metric?: DistanceMetric;
};

export type IngestionReport = {
  collection: string;
  action: 'created' | 'replaced' | 'reused';
  documentCount: number;
  batches: number;
};

const fieldOrder = (columns: string[]) =>
  columns.includes(ELEMENT_TYPE_FIELD) ? columns : [...columns, ELEMENT_TYPE_FIELD];

/**
 * One document per record. The content is the space-joined `key: value` list of the
 * record's non-empty fields in column order, with the element type injected as the
 * `ElementType` field; it is the text that gets embedded and must stay stable.
 */
export const buildDocuments = (table: ElementTable, options: BuildDocumentOptions = {}): Document[] => {
  const order = fieldOrder(table.columns);

  return table.records.map((record, index) => {
    const metadata: Record<string, MetadataValue> = {};
    const parts: string[] = [];

    for (const key of order) {
      const cell = record.fields[key];
      const value: MetadataValue =
        key === ELEMENT_TYPE_FIELD ? table.elementType : !cell || cell.kind === 'empty' ? '' : cell.value;
      metadata[key] = value;
      if (String(value).trim()) parts.push(`${key}: ${value}`);
    }

    const identity = options.idColumn ? record.fields[options.idColumn] : undefined;
    const id = !isEmptyCell(identity)
      ? `${table.elementType}_${cellToString(identity)}`
      : `${table.elementType}_${index}`;

    return { id, content: parts.join(' '), metadata };
  });
};

const assertUniqueIds = (documents: readonly Document[]) => {
  const seen = new Set<string>();
  for (const doc of documents) {
    if (seen.has(doc.id)) throw new ValidationError(`Duplicate document id '${doc.id}'`, { operation: 'ingest' });
    seen.add(doc.id);
  }
};

/**
 * Creates (or rebuilds) a collection and adds the documents in fixed-size batches. An
 * existing collection is only touched when the caller chose `replace`; `reuse` leaves it as
 * is and no choice at all is refused.
 */
export const upsertCollection = async (
  store: VectorStore,
  name: string,
  documents: readonly Document[],
  options: UpsertOptions = {}
): Promise<IngestionReport> => {
  const batchSize = options.batchSize ?? INGEST_BATCH_SIZE;
  if (!Number.isInteger(batchSize) || batchSize <= 0) {
    throw new ValidationError('batchSize must be a positive integer', { operation: 'ingest' });
  }

  let action: IngestionReport['action'] = 'created';
  if (await store.hasCollection(name)) {
    if (options.onExists === 'reuse') {
      log.info(`Using existing collection: ${name}`);
      return { collection: name, action: 'reused', documentCount: await store.count(name), batches: 0 };
    }
    if (options.onExists !== 'replace') throw new CollectionExistsError(name);
    action = 'replaced';
  }

  assertUniqueIds(documents);

  if (action === 'replaced') {
    await store.deleteCollection(name);
    log.info(`Deleted existing collection: ${name}`);
  }
  await store.createCollection(name, { metric: options.metric });
  log.info(`Creating new collection: ${name}`, { documents: documents.length });

  let committed = 0;
  let batches = 0;
  for (let i = 0; i < documents.length; i += batchSize) {
    const batch = documents.slice(i, i + batchSize);
    try {
      await store.add(name, batch);
    } catch (err) {
      log.error(`Batch ${batches + 1} failed`, { collection: name, committed });
      throw new IngestionError(name, committed, err);
    }
    committed += batch.length;
    batches++;
    log.debug(`Added batch ${batches}`, { size: batch.length, committed });
  }

  log.info(`Added ${committed} documents to collection ${name}`);
  return { collection: name, action, documentCount: committed, batches };
};
