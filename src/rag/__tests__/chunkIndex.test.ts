import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { EmptyCorpusError, NotFittedError, NotFoundError } from '../../errors';
import { SAMPLE_CORPUS } from '../../test/fixtures/sampleCorpus';
import { CHUNKS_FILE, ChunkIndex } from '../chunkIndex';

describe('ChunkIndex', () => {
  let index: ChunkIndex;

  beforeEach(() => {
    index = new ChunkIndex();
    index.fit(SAMPLE_CORPUS);
  });

  describe('fit', () => {
    it('should reject an empty corpus', () => {
      expect(() => new ChunkIndex().fit([])).toThrow(EmptyCorpusError);
    });

    it('should report size and fitted state', () => {
      expect(index.isFitted).toBe(true);
      expect(index.size).toBe(10);
    });

    it('should cap the vocabulary at maxFeatures', () => {
      const small = new ChunkIndex({ maxFeatures: 3 });
      small.fit(SAMPLE_CORPUS);

      expect(small.vocabularySize).toBe(3);
    });
  });

  describe('search', () => {
    it('should fail before fit', () => {
      const unfitted = new ChunkIndex();

      expect(unfitted.isFitted).toBe(false);
      expect(() => unfitted.search('neural networks')).toThrow(NotFittedError);
      expect(() => unfitted.transform('neural networks')).toThrow(NotFittedError);
    });

    it('should rank the neural network notes first', () => {
      const { chunks, scores } = index.search('neural networks', 3);

      expect(chunks).toHaveLength(3);
      expect([...chunks.slice(0, 2)].sort()).toEqual([SAMPLE_CORPUS[0], SAMPLE_CORPUS[1]].sort());
      expect(scores[0]).toBeGreaterThanOrEqual(scores[1]);
      expect(scores[1]).toBeGreaterThan(0);
      expect(scores[2]).toBe(0);
    });

    it('should keep scores within [-1, 1] and sorted descending', () => {
      const { scores } = index.search('raw data features', 10);

      scores.forEach((score, i) => {
        expect(score).toBeGreaterThanOrEqual(-1);
        expect(score).toBeLessThanOrEqual(1);
        if (i > 0) expect(scores[i - 1]).toBeGreaterThanOrEqual(score);
      });
    });

    it('should score a chunk against itself as 1', () => {
      const { chunks, scores } = index.search(SAMPLE_CORPUS[3], 1);

      expect(chunks).toEqual([SAMPLE_CORPUS[3]]);
      expect(scores[0]).toBeCloseTo(1, 10);
    });

    it('should break ties by corpus order', () => {
      const { chunks, scores } = index.search('zebra', 3);

      expect(chunks).toEqual(SAMPLE_CORPUS.slice(0, 3));
      expect(scores).toEqual([0, 0, 0]);
    });

    it('should clamp k to the corpus size', () => {
      expect(index.search('neural', 50).chunks).toHaveLength(10);
      expect(index.search('neural', 0).chunks).toEqual([]);
    });
  });

  describe('combineChunks', () => {
    it('should join chunks until the length limit', () => {
      expect(ChunkIndex.combineChunks(['aaa', 'bbb', 'ccc'], 8)).toBe('aaa\n\nbbb');
    });

    it('should always keep the first chunk', () => {
      expect(ChunkIndex.combineChunks(['toolong', 'x'], 3)).toBe('toolong');
    });

    it('should return an empty string for no chunks', () => {
      expect(ChunkIndex.combineChunks([])).toBe('');
    });
  });

  describe('retrieveForTopic', () => {
    it('should combine the top chunks for a topic', () => {
      const content = index.retrieveForTopic('neural networks', 2);

      expect(content.split('\n\n').sort()).toEqual([SAMPLE_CORPUS[0], SAMPLE_CORPUS[1]].sort());
    });
  });

  describe('persistence', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), 'chunk-index-'));
      vi.spyOn(console, 'info').mockImplementation(() => undefined);
    });

    afterEach(async () => {
      vi.restoreAllMocks();
      await fs.rm(dir, { recursive: true, force: true });
    });

    it('should refuse to save an unfitted index', async () => {
      await expect(new ChunkIndex().save(dir)).rejects.toBeInstanceOf(NotFittedError);
    });

    it('should answer queries identically after a round trip', async () => {
      await index.save(dir);
      const loaded = await ChunkIndex.load(dir);

      expect(loaded.size).toBe(10);
      expect(loaded.vocabularySize).toBe(index.vocabularySize);
      expect(loaded.search('neural networks', 4)).toEqual(index.search('neural networks', 4));
    });

    it('should report a missing directory', async () => {
      await expect(ChunkIndex.load(path.join(dir, 'absent'))).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should report a missing artifact', async () => {
      await index.save(dir);
      await fs.rm(path.join(dir, CHUNKS_FILE));

      await expect(ChunkIndex.load(dir)).rejects.toBeInstanceOf(NotFoundError);
    });
  });
});
