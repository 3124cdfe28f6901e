import fs from 'node:fs/promises';
import path from 'node:path';
import type { z } from 'zod';

import { EmptyCorpusError, NotFittedError, NotFoundError } from '../errors';
import {
  chunksArtifactSchema,
  indexArtifactSchema,
  vectorizerArtifactSchema,
} from './schema';
import type { IndexArtifact, RetrievedChunk, SearchResult, SparseVector, VectorizerArtifact } from './schema';
import { countTerms, extractTerms } from './tokenizer';

export const VECTORIZER_FILE = 'vectorizer.json';
export const CHUNKS_FILE = 'chunks.json';
export const INDEX_FILE = 'index.json';

const DEFAULT_MAX_FEATURES = 5000;

export type ChunkIndexOptions = {
  maxFeatures?: number;
};

type FittedSpace = {
  vocabulary: Map<string, number>;
  idf: number[];
  vectors: SparseVector[];
  chunks: string[];
};

const clampScore = (value: number): number => Math.max(-1, Math.min(1, value));

function normalize(entries: SparseVector): SparseVector {
  let norm = 0;
  for (const [, weight] of entries) norm += weight * weight;
  if (norm === 0) return entries;
  const length = Math.sqrt(norm);
  return entries.map(([column, weight]) => [column, weight / length]);
}

/**
 * Keeps the `maxFeatures` terms with the highest corpus-wide count; ties go to the
 * alphabetically smaller term. Columns follow alphabetical order of the kept terms.
 */
function buildVocabulary(termCounts: Map<string, number>[], maxFeatures: number): Map<string, number> {
  const totals = new Map<string, number>();
  for (const counts of termCounts) {
    for (const [term, count] of counts) totals.set(term, (totals.get(term) ?? 0) + count);
  }

  const kept = Array.from(totals.entries())
    .sort((a, b) => b[1] - a[1] || (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0))
    .slice(0, maxFeatures)
    .map(([term]) => term)
    .sort();

  return new Map(kept.map((term, column) => [term, column]));
}

const readArtifact = async <T>(directory: string, file: string, schema: z.ZodType<T>): Promise<T> => {
  const artifactPath = path.join(directory, file);
  let raw: string;

  try {
    raw = await fs.readFile(artifactPath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new NotFoundError(`Index artifact ${file} is missing from ${directory}`);
    }
    throw error;
  }

  return schema.parse(JSON.parse(raw));
};

/**
 * TF-IDF vector space over an ordered list of text chunks, ranked by cosine similarity.
 * Read-only after `fit`; `fit`, `save` and `load` must not overlap.
 */
export class ChunkIndex {
  private readonly maxFeatures: number;

  private space: FittedSpace | null = null;

  constructor({ maxFeatures = DEFAULT_MAX_FEATURES }: ChunkIndexOptions = {}) {
    this.maxFeatures = Math.max(1, maxFeatures);
  }

  get isFitted(): boolean {
    return this.space !== null;
  }

  get size(): number {
    return this.space?.chunks.length ?? 0;
  }

  get vocabularySize(): number {
    return this.space?.vocabulary.size ?? 0;
  }

  fit(chunks: string[]): void {
    if (!chunks.length) {
      throw new EmptyCorpusError();
    }

    const termCounts = chunks.map((chunk) => countTerms(extractTerms(chunk)));
    const vocabulary = buildVocabulary(termCounts, this.maxFeatures);

    const documentFrequency = new Array<number>(vocabulary.size).fill(0);
    for (const counts of termCounts) {
      for (const term of counts.keys()) {
        const column = vocabulary.get(term);
        if (column !== undefined) documentFrequency[column] += 1;
      }
    }

    const total = chunks.length;
    const idf = documentFrequency.map((df) => Math.log((1 + total) / (1 + df)) + 1);

    this.space = {
      vocabulary,
      idf,
      chunks: [...chunks],
      vectors: termCounts.map((counts) => this.weigh(counts, vocabulary, idf)),
    };
  }

  /** Vector for arbitrary text in the fitted space; unknown terms are dropped. */
  transform(text: string): SparseVector {
    const space = this.requireSpace();
    return this.weigh(countTerms(extractTerms(text)), space.vocabulary, space.idf);
  }

  search(query: string, k = 5): SearchResult {
    const hits = this.rank(query, k);
    return {
      chunks: hits.map((hit) => hit.content),
      scores: hits.map((hit) => hit.score),
    };
  }

  rank(query: string, k = 5): RetrievedChunk[] {
    const space = this.requireSpace();
    const limit = Math.max(0, Math.min(Math.floor(k), space.chunks.length));
    if (limit === 0) return [];

    const queryWeights = new Map(this.transform(query));

    const hits = space.vectors.map<RetrievedChunk>((vector, index) => {
      let dot = 0;
      for (const [column, weight] of vector) {
        const queryWeight = queryWeights.get(column);
        if (queryWeight !== undefined) dot += weight * queryWeight;
      }
      return { index, content: space.chunks[index], score: clampScore(dot) };
    });

    hits.sort((a, b) => b.score - a.score || a.index - b.index);
    return hits.slice(0, limit);
  }

  /**
   * Joins chunks with a blank line until `maxLength` would be exceeded. The first
   * chunk is always kept, even when it alone is longer than `maxLength`.
   */
  static combineChunks(chunks: string[], maxLength = 4000): string {
    if (!chunks.length) return '';

    let combined = chunks[0];
    for (const chunk of chunks.slice(1)) {
      if (combined.length + chunk.length + 2 > maxLength) break;
      combined += `\n\n${chunk}`;
    }
    return combined;
  }

  retrieveForTopic(topic: string, k = 5, maxLength = 4000): string {
    return ChunkIndex.combineChunks(this.search(topic, k).chunks, maxLength);
  }

  async save(directory: string): Promise<void> {
    const space = this.requireSpace();

    const vectorizer: VectorizerArtifact = {
      version: 1,
      maxFeatures: this.maxFeatures,
      vocabulary: Object.fromEntries(space.vocabulary),
      idf: space.idf,
    };
    const index: IndexArtifact = {
      dimension: space.vocabulary.size,
      vectors: space.vectors,
    };

    await fs.mkdir(directory, { recursive: true });
    await Promise.all([
      fs.writeFile(path.join(directory, VECTORIZER_FILE), JSON.stringify(vectorizer)),
      fs.writeFile(path.join(directory, CHUNKS_FILE), JSON.stringify(space.chunks)),
      fs.writeFile(path.join(directory, INDEX_FILE), JSON.stringify(index)),
    ]);

    console.info(`[INDEX] Saved ${space.chunks.length} chunk(s) to ${directory}.`);
  }

  static async load(directory: string): Promise<ChunkIndex> {
    try {
      await fs.access(directory);
    } catch {
      throw new NotFoundError(`Index directory ${directory} does not exist`);
    }

    const [vectorizer, chunks, index] = await Promise.all([
      readArtifact(directory, VECTORIZER_FILE, vectorizerArtifactSchema),
      readArtifact(directory, CHUNKS_FILE, chunksArtifactSchema),
      readArtifact(directory, INDEX_FILE, indexArtifactSchema),
    ]);

    if (index.vectors.length !== chunks.length) {
      throw new Error(
        `Index at ${directory} holds ${index.vectors.length} vector(s) for ${chunks.length} chunk(s).`,
      );
    }

    const loaded = new ChunkIndex({ maxFeatures: vectorizer.maxFeatures });
    loaded.space = {
      vocabulary: new Map(Object.entries(vectorizer.vocabulary)),
      idf: vectorizer.idf,
      chunks,
      vectors: index.vectors,
    };

    return loaded;
  }

  private weigh(counts: Map<string, number>, vocabulary: Map<string, number>, idf: number[]): SparseVector {
    const entries: SparseVector = [];
    for (const [term, count] of counts) {
      const column = vocabulary.get(term);
      if (column !== undefined) entries.push([column, count * idf[column]]);
    }
    entries.sort((a, b) => a[0] - b[0]);
    return normalize(entries);
  }

  private requireSpace(): FittedSpace {
    if (!this.space) {
      throw new NotFittedError();
    }
    return this.space;
  }
}
