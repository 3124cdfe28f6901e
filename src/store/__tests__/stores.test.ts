import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { createFileStore } from '../files';
import { INTERRUPTED_JOB_ERROR, createJobStore } from '../jobs';

describe('stores', () => {
  let dataDir: string;

  beforeEach(async () => {
    dataDir = await fs.mkdtemp(path.join(os.tmpdir(), 'quiz-stores-'));
  });

  afterEach(async () => {
    await fs.rm(dataDir, { recursive: true, force: true });
  });

  describe('createFileStore', () => {
    it('should persist uploaded files across instances', () => {
      createFileStore(dataDir).saveFile({ id: 'doc_1', name: 'notes.pdf', path: '/uploads/notes.pdf' });

      const reloaded = createFileStore(dataDir);
      expect(reloaded.getFilePathById('doc_1')).toBe('/uploads/notes.pdf');
      expect(reloaded.getFileById('doc_1')?.name).toBe('notes.pdf');
      expect(reloaded.getFilePathById('doc_2')).toBeUndefined();
    });
  });

  describe('createJobStore', () => {
    const now = (): Date => new Date('2024-03-04T05:06:07.000Z');

    it('should create queued jobs and apply updates', () => {
      const jobs = createJobStore(dataDir, now);
      const job = jobs.createJob();

      expect(job.status).toBe('queued');
      expect(job.createdAt).toBe('2024-03-04T05:06:07.000Z');
      expect(jobs.updateJob(job.id, { status: 'failed', error: 'boom' })).toMatchObject({ status: 'failed', error: 'boom' });
      expect(jobs.getJob(job.id)?.error).toBe('boom');
    });

    it('should ignore updates to unknown jobs', () => {
      expect(createJobStore(dataDir, now).updateJob('missing', { status: 'processing' })).toBeUndefined();
    });

    it('should fail jobs left unfinished by a previous process', () => {
      const first = createJobStore(dataDir, now);
      const running = first.createJob();
      first.updateJob(running.id, { status: 'processing' });
      const failed = first.createJob();
      first.updateJob(failed.id, { status: 'failed', error: 'boom' });

      const reloaded = createJobStore(dataDir, now);

      expect(reloaded.getJob(running.id)).toMatchObject({ status: 'failed', error: INTERRUPTED_JOB_ERROR });
      expect(reloaded.getJob(failed.id)).toMatchObject({ status: 'failed', error: 'boom' });
    });
  });
});
