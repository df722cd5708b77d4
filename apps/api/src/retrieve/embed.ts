import { GoogleGenAI } from '@google/genai';
import { createLogger } from '../utils/logger';

const log = createLogger('embed');

export interface Embedder {
  readonly name: string;
  embed(texts: string[]): Promise<number[][]>;
}

const GEMINI_BATCH_LIMIT = 100;

export class GeminiEmbedder implements Embedder {
  readonly name: string;
  private readonly ai: GoogleGenAI;

  constructor(apiKey: string, private readonly model = 'text-embedding-004') {
    this.ai = new GoogleGenAI({ apiKey });
    this.name = `gemini:${model}`;
  }

  async embed(texts: string[]): Promise<number[][]> {
    const vectors: number[][] = [];
    for (let i = 0; i < texts.length; i += GEMINI_BATCH_LIMIT) {
      const batch = texts.slice(i, i + GEMINI_BATCH_LIMIT);
      const response = await this.ai.models.embedContent({ model: this.model, contents: batch });
      const embeddings = response.embeddings ?? [];
      if (embeddings.length !== batch.length) {
        throw new Error(`Embedding response returned ${embeddings.length} vectors for ${batch.length} inputs`);
      }
      for (const embedding of embeddings) {
        if (!embedding.values?.length) throw new Error('Embedding response contained an empty vector');
        vectors.push(embedding.values);
      }
      log.debug('Embedded batch', { size: batch.length });
    }
    return vectors;
  }
}

const tokenize = (text: string) => text.toLowerCase().match(/[a-z0-9]+(?:\.[0-9]+)?/g) ?? [];

const fnv1a = (token: string) => {
  let hash = 0x811c9dc5;
  for (let i = 0; i < token.length; i++) {
    hash ^= token.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
};

/**
 * Offline feature-hashing embedder: each token adds ±1 to one of `dimension` buckets and
 * the vector is L2-normalized. Deterministic, so the same text always embeds the same way.
 */
export class HashingEmbedder implements Embedder {
  readonly name: string;

  constructor(private readonly dimension = 512) {
    this.name = `hashing:${dimension}`;
  }

  embedOne(text: string): number[] {
    const vector = new Array<number>(this.dimension).fill(0);
    for (const token of tokenize(text)) {
      const hash = fnv1a(token);
      const sign = hash & 0x80000000 ? -1 : 1;
      vector[hash % this.dimension] += sign;
    }
    const length = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
    return length ? vector.map(v => v / length) : vector;
  }

  async embed(texts: string[]): Promise<number[][]> {
    return texts.map(t => this.embedOne(t));
  }
}
