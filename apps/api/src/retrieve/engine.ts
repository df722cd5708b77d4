import { CollectionNotFoundError, ValidationError } from '../errors';
import type { RetrievedHit } from '../types/schema';
import { normalizeRelevance } from '../utils/similarity';
import type { VectorStore } from './vectorStore';

export class RetrievalEngine {
  constructor(private readonly store: VectorStore, readonly collection: string) {}

  /** Nearest `k` documents, best first. Fails instead of returning nothing when the collection is absent. */
  async query(text: string, k: number): Promise<RetrievedHit[]> {
    if (!Number.isInteger(k) || k <= 0) throw new ValidationError('k must be a positive integer', { k });
    if (!text.trim()) throw new ValidationError('Query text is empty');
    if (!(await this.store.hasCollection(this.collection))) throw new CollectionNotFoundError(this.collection);

    const neighbors = await this.store.query(this.collection, text, k);
    return neighbors
      .map(n => ({ ...n, score: normalizeRelevance(n.distance) }))
      .sort((a, b) => b.score - a.score);
  }
}
