/**
 * Similarity search over table descriptions and intent exemplars.
 *
 * Documents are bags of lexical features (see `tokenize`) compared with
 * cosine similarity. The corpus is tiny and fixed, so vectors are built
 * once in the constructor.
 */

import type { Category, IntentExemplar, TableDescriptor } from '../types/models.js';
import { tokenize } from '../utils/text.js';

type SparseVector = ReadonlyMap<string, number>;

export interface IndexHit {
  readonly source: 'intent' | 'table';
  readonly description: string;
  readonly category: Category;
  readonly table?: string;
  readonly score: number;
}

interface IndexedDocument {
  readonly source: 'intent' | 'table';
  readonly description: string;
  readonly category: Category;
  readonly table?: string;
  readonly vector: SparseVector;
}

function vectorize(text: string): SparseVector {
  const counts = new Map<string, number>();
  for (const token of tokenize(text)) {
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }
  return counts;
}

/**
 * Cosine similarity of two sparse vectors; 0 when either is empty.
 */
export function cosineSimilarity(a: SparseVector, b: SparseVector): number {
  let dotProduct = 0;
  let magnitudeA = 0;
  let magnitudeB = 0;

  for (const [term, weight] of a) {
    magnitudeA += weight * weight;
    dotProduct += weight * (b.get(term) ?? 0);
  }
  for (const weight of b.values()) {
    magnitudeB += weight * weight;
  }

  const magnitude = Math.sqrt(magnitudeA) * Math.sqrt(magnitudeB);
  if (magnitude === 0) return 0;

  return dotProduct / magnitude;
}

export class SchemaIndex {
  private readonly documents: readonly IndexedDocument[];

  constructor(tables: readonly TableDescriptor[], intents: readonly IntentExemplar[]) {
    const documents: IndexedDocument[] = intents.map((intent) => ({
      source: 'intent',
      description: intent.description,
      category: intent.category,
      table: intent.table,
      vector: vectorize(intent.keywords.join(' ')),
    }));

    for (const table of tables) {
      documents.push({
        source: 'table',
        description: table.description,
        category: 'GenericQuery',
        table: table.name,
        vector: vectorize([table.name.replace(/_/g, ' '), ...table.keywords].join(' ')),
      });
    }

    this.documents = documents;
  }

  /**
   * Best-scoring documents for a question, highest first.
   */
  search(question: string, limit = 3): IndexHit[] {
    const query = vectorize(question);
    return this.documents
      .map(({ vector, ...doc }) => ({ ...doc, score: cosineSimilarity(query, vector) }))
      .filter((hit) => hit.score > 0)
      .sort((a, b) => b.score - a.score)
      .slice(0, limit);
  }

  /**
   * The table most similar to the question, or null below the threshold.
   */
  tableHint(question: string, threshold: number): { table: string; score: number } | null {
    for (const hit of this.search(question, this.documents.length)) {
      if (hit.table === undefined) continue;
      return hit.score >= threshold ? { table: hit.table, score: hit.score } : null;
    }
    return null;
  }
}
