import { Router } from 'express';

import type { JobStore } from '../store/jobs';
import type { JobStatusResponse } from '../types';

export const createResultRouter = (jobs: JobStore): Router => {
  const router = Router();

  router.get('/:id', (req, res) => {
    const job = jobs.getJob(req.params.id);

    if (!job) {
      res.status(404).json({ error: 'Job not found' });
      return;
    }

    let body: JobStatusResponse;

    if (job.status === 'completed' && job.result) {
      body = { id: job.id, status: job.status, result: job.result };
    } else if (job.status === 'failed') {
      body = { id: job.id, status: job.status, error: job.error ?? 'Unknown error' };
    } else if (job.status === 'queued' || job.status === 'processing') {
      body = { id: job.id, status: job.status };
    } else {
      body = { id: job.id, status: 'failed', error: 'Job completed without a result.' };
    }

    res.json(body);
  });

  return router;
};
