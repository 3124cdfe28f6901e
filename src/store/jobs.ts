import fs from 'node:fs';
import path from 'node:path';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';

import { questionRecordSchema } from '../questions/schema';
import { generationMetadataSchema, qualityAnalysisSchema } from '../quality/schema';
import type { GenerationJobResult, JobStatus } from '../types';

export type JobRecord = {
  id: string;
  status: JobStatus;
  createdAt: string;
  updatedAt: string;
  result?: GenerationJobResult;
  error?: string;
};

export type JobPatch = Partial<Pick<JobRecord, 'status' | 'result' | 'error'>>;

const jobRecordSchema: z.ZodType<JobRecord> = z.object({
  id: z.string().min(1),
  status: z.enum(['queued', 'processing', 'completed', 'failed']),
  createdAt: z.string(),
  updatedAt: z.string(),
  result: z
    .object({
      questions: z.array(questionRecordSchema),
      metadata: generationMetadataSchema,
      quality_analysis: qualityAnalysisSchema,
    })
    .optional(),
  error: z.string().optional(),
});

export type JobStore = {
  createJob(): JobRecord;
  updateJob(id: string, patch: JobPatch): JobRecord | undefined;
  getJob(id: string): JobRecord | undefined;
};

export const INTERRUPTED_JOB_ERROR = 'Job was interrupted by a server restart.';

/**
 * Generation jobs, mirrored to `<dataDir>/jobs.json`. Jobs still queued or processing
 * when the store is loaded belonged to a previous process and are marked failed.
 */
export const createJobStore = (dataDir: string, now: () => Date = () => new Date()): JobStore => {
  const storePath = path.join(dataDir, 'jobs.json');
  const jobsById = new Map<string, JobRecord>();

  const persistStore = (): void => {
    fs.mkdirSync(dataDir, { recursive: true });
    const payload = JSON.stringify(Array.from(jobsById.values()), null, 2);
    fs.writeFileSync(storePath, payload);
  };

  const persistQuietly = (): void => {
    try {
      persistStore();
    } catch (error) {
      console.error('[STORE] Failed to persist job store:', error);
    }
  };

  const loadStoreFromDisk = (): void => {
    if (!fs.existsSync(storePath)) {
      return;
    }

    try {
      const raw = fs.readFileSync(storePath, 'utf-8');
      if (!raw.trim()) {
        return;
      }

      let interrupted = 0;
      z.array(z.unknown()).parse(JSON.parse(raw)).forEach((entry) => {
        const result = jobRecordSchema.safeParse(entry);
        if (!result.success) {
          return;
        }

        const job = result.data;
        if (job.status === 'queued' || job.status === 'processing') {
          interrupted += 1;
          jobsById.set(job.id, { ...job, status: 'failed', error: INTERRUPTED_JOB_ERROR });
        } else {
          jobsById.set(job.id, job);
        }
      });

      if (interrupted) {
        persistQuietly();
      }
    } catch (error) {
      console.error('[STORE] Failed to load job store from disk:', error);
    }
  };

  loadStoreFromDisk();

  return {
    createJob() {
      const timestamp = now().toISOString();
      const job: JobRecord = {
        id: uuidv4(),
        status: 'queued',
        createdAt: timestamp,
        updatedAt: timestamp,
      };

      jobsById.set(job.id, job);
      persistQuietly();

      return job;
    },

    updateJob(id, patch) {
      const existing = jobsById.get(id);
      if (!existing) {
        return undefined;
      }

      const updated: JobRecord = {
        ...existing,
        ...patch,
        updatedAt: now().toISOString(),
      };

      jobsById.set(id, updated);
      persistQuietly();

      return updated;
    },

    getJob: (id) => jobsById.get(id),
  };
};
