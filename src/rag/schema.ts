import { z } from 'zod';

export type Chunk = {
  index: number;
  content: string;
};

export interface RetrievedChunk extends Chunk {
  score: number;
}

export type SearchResult = {
  chunks: string[];
  scores: number[];
};

/** Sparse vector as `[column, weight]` pairs sorted by column. */
export type SparseVector = Array<[number, number]>;

export const vectorizerArtifactSchema = z.object({
  version: z.literal(1),
  maxFeatures: z.number().int().positive(),
  vocabulary: z.record(z.string(), z.number().int().nonnegative()),
  idf: z.array(z.number()),
});

export const chunksArtifactSchema = z.array(z.string());

export const indexArtifactSchema = z.object({
  dimension: z.number().int().nonnegative(),
  vectors: z.array(z.array(z.tuple([z.number().int().nonnegative(), z.number()]))),
});

export type VectorizerArtifact = z.infer<typeof vectorizerArtifactSchema>;
export type IndexArtifact = z.infer<typeof indexArtifactSchema>;
