import express from 'express';
import type { ErrorRequestHandler, Express } from 'express';
import multer from 'multer';

import { getErrorMessage } from './errors';
import type { QuestionGenerator } from './pipeline/generateQuestions';
import type { QuestionMonitor } from './quality/monitor';
import { createGenerateRouter } from './routes/generate';
import { createMetricsRouter } from './routes/metrics';
import { createModelsRouter } from './routes/models';
import { createResultRouter } from './routes/result';
import { createUploadRouter } from './routes/upload';
import type { FileStore } from './store/files';
import type { JobStore } from './store/jobs';

export type AppDeps = {
  generator: QuestionGenerator;
  monitor: QuestionMonitor;
  files: FileStore;
  jobs: JobStore;
  uploadDir: string;
  defaultModel: string;
};

const errorHandler: ErrorRequestHandler = (error: unknown, _req, res, _next) => {
  if (error instanceof multer.MulterError) {
    res.status(400).json({ error: error.message });
    return;
  }

  if (error instanceof SyntaxError) {
    res.status(400).json({ error: 'Request body is not valid JSON.' });
    return;
  }

  console.error('[HTTP] Unhandled error:', error);
  res.status(500).json({ error: getErrorMessage(error) });
};

export const createApp = (deps: AppDeps): Express => {
  const app = express();
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  app.use('/upload', createUploadRouter(deps.files, deps.uploadDir));
  app.use('/generate', createGenerateRouter(deps));
  app.use('/result', createResultRouter(deps.jobs));
  app.use('/metrics', createMetricsRouter(deps.monitor));
  app.use('/models', createModelsRouter(deps.defaultModel));

  app.use(errorHandler);

  return app;
};
