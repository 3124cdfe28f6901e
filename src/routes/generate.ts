import { Router } from 'express';
import { z } from 'zod';

import { getErrorMessage } from '../errors';
import { MAX_QUESTIONS_PER_REQUEST } from '../pipeline/generateQuestions';
import type { GenerationRequestInput, QuestionGenerator } from '../pipeline/generateQuestions';
import type { QuestionMonitor } from '../quality/monitor';
import { DIFFICULTIES, QUESTION_TYPES } from '../questions/types';
import type { FileStore } from '../store/files';
import type { JobStore } from '../store/jobs';
import type { GenerationQueued, StartGenerationRequest } from '../types';

export type GenerateRouterDeps = {
  generator: QuestionGenerator;
  monitor: QuestionMonitor;
  files: FileStore;
  jobs: JobStore;
};

const generateSchema = z.object({
  file_id: z.string().min(1, 'file_id is required'),
  question_type: z.enum(QUESTION_TYPES),
  num_questions: z.number().int().min(1).max(MAX_QUESTIONS_PER_REQUEST),
  topic: z.string().trim().min(1).optional(),
  difficulty: z.enum(DIFFICULTIES).optional(),
  language: z.string().trim().min(1).optional(),
  temperature: z.number().min(0).max(2).optional(),
  model: z.string().trim().min(1).optional(),
}) satisfies z.ZodType<StartGenerationRequest>;

const toGenerationRequest = (payload: StartGenerationRequest): GenerationRequestInput => ({
  questionType: payload.question_type,
  count: payload.num_questions,
  topic: payload.topic,
  difficulty: payload.difficulty,
  language: payload.language,
  temperature: payload.temperature,
  model: payload.model,
});

const runJob = async (
  jobId: string,
  filePath: string,
  payload: StartGenerationRequest,
  { generator, monitor, jobs }: GenerateRouterDeps,
): Promise<void> => {
  jobs.updateJob(jobId, { status: 'processing' });

  try {
    const { questions, metadata } = await generator.generateQuestions(filePath, toGenerationRequest(payload));
    await monitor.logGeneration(questions, metadata);

    jobs.updateJob(jobId, {
      status: 'completed',
      result: {
        questions,
        metadata,
        quality_analysis: monitor.analyzeQuality(questions),
      },
    });
    console.info(`[JOB] ${jobId} completed with ${questions.length} question(s).`);
  } catch (error) {
    console.error(`[JOB] ${jobId} failed:`, error);
    jobs.updateJob(jobId, { status: 'failed', error: getErrorMessage(error) });
  }
};

export const createGenerateRouter = (deps: GenerateRouterDeps): Router => {
  const router = Router();

  router.post('/', (req, res) => {
    const validation = generateSchema.safeParse(req.body);

    if (!validation.success) {
      const issues = validation.error.issues.map((issue) => ({
        path: issue.path.join('.') || undefined,
        message: issue.message,
      }));

      res.status(400).json({ errors: issues });
      return;
    }

    const filePath = deps.files.getFilePathById(validation.data.file_id);
    if (!filePath) {
      res.status(404).json({ error: 'File not found' });
      return;
    }

    const job = deps.jobs.createJob();

    setImmediate(() => {
      runJob(job.id, filePath, validation.data, deps).catch((error: unknown) => {
        console.error(`[JOB] ${job.id} could not be recorded:`, error);
      });
    });

    const body: GenerationQueued = { id: job.id, status: 'queued' };
    res.status(202).json(body);
  });

  return router;
};
