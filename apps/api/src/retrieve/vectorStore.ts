import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import { CollectionNotFoundError, ValidationError } from '../errors';
import type { Document, MetadataValue } from '../types/schema';
import { cosineDistance, euclideanDistance } from '../utils/similarity';
import type { Embedder } from './embed';

export type DistanceMetric = 'cosine' | 'l2';

export type Neighbor = {
  id: string;
  content: string;
  metadata: Record<string, MetadataValue>;
  distance: number;
};

/** The embedding collection store the ingestor writes to and the retrieval engine reads from. */
export interface VectorStore {
  listCollections(): Promise<string[]>;
  hasCollection(name: string): Promise<boolean>;
  createCollection(name: string, options?: { metric?: DistanceMetric }): Promise<void>;
  deleteCollection(name: string): Promise<void>;
  add(name: string, documents: readonly Document[]): Promise<void>;
  count(name: string): Promise<number>;
  query(name: string, text: string, k: number): Promise<Neighbor[]>;
}

type CollectionRow = { name: string; metric: DistanceMetric; embedder: string; dimension: number | null };
type DocumentRow = { id: string; content: string; metadata: string; embedding: string };

const parseMetadata = (json: string): Record<string, MetadataValue> => {
  const parsed: unknown = JSON.parse(json);
  const metadata: Record<string, MetadataValue> = {};
  if (typeof parsed !== 'object' || parsed === null) return metadata;
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') metadata[key] = value;
  }
  return metadata;
};

const parseEmbedding = (json: string): number[] => {
  const parsed: unknown = JSON.parse(json);
  return Array.isArray(parsed) ? parsed.map(Number) : [];
};

/**
 * Embedding collections persisted in SQLite. Nearest neighbours are found by a full scan,
 * which is fine for the few thousand elements of a building model.
 */
export class SqliteVectorStore implements VectorStore {
  private readonly db: Database.Database;

  constructor(filename: string, private readonly embedder: Embedder) {
    if (filename !== ':memory:') fs.mkdirSync(path.dirname(filename), { recursive: true });
    this.db = new Database(filename);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS collections (
        name TEXT PRIMARY KEY,
        metric TEXT NOT NULL,
        embedder TEXT NOT NULL,
        dimension INTEGER,
        created_at TEXT NOT NULL
      );
      CREATE TABLE IF NOT EXISTS documents (
        seq INTEGER PRIMARY KEY AUTOINCREMENT,
        collection TEXT NOT NULL REFERENCES collections(name) ON DELETE CASCADE,
        id TEXT NOT NULL,
        content TEXT NOT NULL,
        metadata TEXT NOT NULL,
        embedding TEXT NOT NULL,
        UNIQUE (collection, id)
      );
    `);
  }

  private getCollection(name: string): CollectionRow {
    const row = this.db.prepare('SELECT name, metric, embedder, dimension FROM collections WHERE name = ?').get(name) as
      | CollectionRow
      | undefined;
    if (!row) throw new CollectionNotFoundError(name);
    if (row.embedder !== this.embedder.name) {
      throw new ValidationError(
        `Collection '${name}' was built with embedder ${row.embedder}, not ${this.embedder.name}. Re-run 'convert' with replace.`,
        { collection: name }
      );
    }
    return row;
  }

  async listCollections() {
    const rows = this.db.prepare('SELECT name FROM collections ORDER BY name').all() as { name: string }[];
    return rows.map(r => r.name);
  }

  async hasCollection(name: string) {
    return Boolean(this.db.prepare('SELECT 1 FROM collections WHERE name = ?').get(name));
  }

  async createCollection(name: string, options: { metric?: DistanceMetric } = {}) {
    this.db
      .prepare('INSERT INTO collections (name, metric, embedder, dimension, created_at) VALUES (?, ?, ?, NULL, ?)')
      .run(name, options.metric ?? 'cosine', this.embedder.name, new Date().toISOString());
  }

  async deleteCollection(name: string) {
    const result = this.db.prepare('DELETE FROM collections WHERE name = ?').run(name);
    if (!result.changes) throw new CollectionNotFoundError(name);
  }

  async count(name: string) {
    this.getCollection(name);
    const row = this.db.prepare('SELECT COUNT(*) AS n FROM documents WHERE collection = ?').get(name) as { n: number };
    return row.n;
  }

  async add(name: string, documents: readonly Document[]) {
    const collection = this.getCollection(name);
    if (!documents.length) return;

    const vectors = await this.embedder.embed(documents.map(d => d.content));
    const dimension = collection.dimension ?? vectors[0]?.length ?? 0;
    if (vectors.some(v => v.length !== dimension)) {
      throw new Error(`Embedding dimension mismatch for collection '${name}' (expected ${dimension})`);
    }

    const insert = this.db.prepare(
      'INSERT INTO documents (collection, id, content, metadata, embedding) VALUES (?, ?, ?, ?, ?)'
    );
    const insertAll = this.db.transaction(() => {
      documents.forEach((doc, i) => {
        insert.run(name, doc.id, doc.content, JSON.stringify(doc.metadata), JSON.stringify(vectors[i]));
      });
      if (collection.dimension === null) {
        this.db.prepare('UPDATE collections SET dimension = ? WHERE name = ?').run(dimension, name);
      }
    });
    insertAll();
  }

  async query(name: string, text: string, k: number): Promise<Neighbor[]> {
    const collection = this.getCollection(name);
    const [queryVector] = await this.embedder.embed([text]);
    const distance = collection.metric === 'l2' ? euclideanDistance : cosineDistance;

    const rows = this.db
      .prepare('SELECT id, content, metadata, embedding FROM documents WHERE collection = ? ORDER BY seq')
      .all(name) as DocumentRow[];

    return rows
      .map(row => ({
        id: row.id,
        content: row.content,
        metadata: parseMetadata(row.metadata),
        distance: distance(queryVector, parseEmbedding(row.embedding))
      }))
      .sort((a, b) => a.distance - b.distance)
      .slice(0, k);
  }

  close() {
    this.db.close();
  }
}
