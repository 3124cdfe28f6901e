import fs from 'node:fs/promises';
import path from 'node:path';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';

import { questionRecordSchema } from '../questions/schema';
import type { QuestionRecord } from '../questions/types';
import { MetricsAccumulator, calculateBatchMetrics } from './metrics';
import type { BatchMetrics, GenerationMetadata, MetricsSnapshot } from './metrics';
import { batchMetricsSchema, generationMetadataSchema } from './schema';
import { scoreQuestions } from './score';
import type { QualityAnalysis } from './score';
import { QuestionVerifier } from './verifier';
import type { VerificationResult } from './verifier';

export type QualityLogRecord = {
  timestamp: string;
  metadata: GenerationMetadata;
  questions: QuestionRecord[];
  metrics: BatchMetrics;
};

export type QuestionMonitorOptions = {
  logDir: string;
  verifier?: QuestionVerifier;
  now?: () => Date;
};

const LOG_FILE_PATTERN = /^questions_.*\.json$/;

const logRecordSchema = z.object({
  timestamp: z.string(),
  metadata: generationMetadataSchema,
  questions: z.array(questionRecordSchema),
  metrics: batchMetricsSchema,
});

const pad = (value: number): string => String(value).padStart(2, '0');

export const formatTimestamp = (date: Date): string =>
  `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} `
  + `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;

const fileStamp = (date: Date): string =>
  `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_`
  + `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;

/**
 * Logs every generation as a JSON record, keeps running metrics and exposes the
 * verifier and scorer. Writers are serialised through `queue`.
 */
export class QuestionMonitor {
  private readonly logDir: string;

  private readonly verifier: QuestionVerifier;

  private readonly metrics = new MetricsAccumulator();

  private readonly now: () => Date;

  private queue: Promise<unknown> = Promise.resolve();

  constructor({ logDir, verifier = new QuestionVerifier(), now = () => new Date() }: QuestionMonitorOptions) {
    this.logDir = logDir;
    this.verifier = verifier;
    this.now = now;
  }

  /** Writes the log record, folds its metrics into the running totals, returns the file path. */
  logGeneration(questions: QuestionRecord[], metadata: GenerationMetadata): Promise<string> {
    const task = this.queue.then(async () => {
      const date = this.now();
      const record: QualityLogRecord = {
        timestamp: formatTimestamp(date),
        metadata,
        questions,
        metrics: calculateBatchMetrics(questions, metadata),
      };

      await fs.mkdir(this.logDir, { recursive: true });
      const logPath = path.join(this.logDir, `questions_${fileStamp(date)}_${uuidv4().slice(0, 8)}.json`);
      await fs.writeFile(logPath, JSON.stringify(record, null, 2));

      this.metrics.record(record.metrics);
      console.info(`[MONITOR] Logged ${questions.length} question(s) to ${logPath}.`);

      return logPath;
    });

    // Failures reach the caller through `task`; the queue only needs to keep moving.
    this.queue = task.catch(() => undefined);
    return task;
  }

  getMetrics(): MetricsSnapshot {
    return this.metrics.snapshot();
  }

  async getRecentLogs(limit = 10): Promise<QualityLogRecord[]> {
    let files: string[];

    try {
      files = await fs.readdir(this.logDir);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return [];
      }
      throw error;
    }

    const newest = files
      .filter((file) => LOG_FILE_PATTERN.test(file))
      .sort()
      .reverse()
      .slice(0, Math.max(0, limit));

    const logs: QualityLogRecord[] = [];

    for (const file of newest) {
      try {
        const raw = await fs.readFile(path.join(this.logDir, file), 'utf-8');
        const parsed = logRecordSchema.safeParse(JSON.parse(raw));
        if (!parsed.success) {
          console.error(`[MONITOR] Skipping malformed log file ${file}.`);
          continue;
        }
        logs.push(parsed.data);
      } catch (error) {
        console.error(`[MONITOR] Error loading log file ${file}:`, error);
      }
    }

    return logs;
  }

  verifyQuestion(question: QuestionRecord, content?: string): Promise<VerificationResult> {
    return this.verifier.verify(question, content);
  }

  filterQuestions(questions: QuestionRecord[], content: string): Promise<QuestionRecord[]> {
    return this.verifier.filter(questions, content);
  }

  analyzeQuality(questions: QuestionRecord[]): QualityAnalysis {
    return scoreQuestions(questions);
  }
}
