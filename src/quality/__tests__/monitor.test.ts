import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { generateMockQuestions } from '../../llm/mockQuestions';
import type { GenerationMetadata } from '../metrics';
import { QuestionMonitor, formatTimestamp } from '../monitor';

const metadata: GenerationMetadata = {
  documentName: 'notes.pdf',
  questionType: 'true_false',
  topic: null,
  difficulty: 'low',
  language: 'English',
  requestedCount: 3,
  generatedCount: 3,
  filteredCount: 3,
  usedFallback: false,
  timestamp: '2024-01-02T03:04:05.000Z',
};

describe('formatTimestamp', () => {
  it('should format local time with seconds', () => {
    expect(formatTimestamp(new Date(2024, 0, 2, 3, 4, 5))).toBe('2024-01-02 03:04:05');
  });
});

describe('QuestionMonitor', () => {
  let logDir: string;
  let tick: number;
  let monitor: QuestionMonitor;

  beforeEach(async () => {
    logDir = path.join(await fs.mkdtemp(path.join(os.tmpdir(), 'question-monitor-')), 'logs');
    tick = 0;
    monitor = new QuestionMonitor({
      logDir,
      now: () => {
        tick += 1;
        return new Date(2024, 0, 2, 3, 4, tick);
      },
    });
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(path.dirname(logDir), { recursive: true, force: true });
  });

  it('should write a timestamped log record', async () => {
    const questions = generateMockQuestions('true_false', 3, 'tides');
    const logPath = await monitor.logGeneration(questions, metadata);

    expect(path.basename(logPath)).toMatch(/^questions_20240102_030401_[0-9a-f]{8}\.json$/);

    const record: unknown = JSON.parse(await fs.readFile(logPath, 'utf-8'));
    expect(record).toMatchObject({
      timestamp: '2024-01-02 03:04:01',
      metadata,
      questions,
      metrics: { questionCount: 3, generationSuccessRate: 1, filterPassRate: 1 },
    });
  });

  it('should accumulate metrics across concurrent writers', async () => {
    await Promise.all([
      monitor.logGeneration(generateMockQuestions('true_false', 3, 'tides'), metadata),
      monitor.logGeneration(generateMockQuestions('true_false', 2, 'waves'), metadata),
      monitor.logGeneration(generateMockQuestions('true_false', 1, 'winds'), metadata),
    ]);

    const snapshot = monitor.getMetrics();
    expect(snapshot.totalQuestionsGenerated).toBe(6);
    expect(snapshot.questionsByType).toEqual({ true_false: 6 });
    expect(snapshot.questionsByDifficulty).toEqual({ low: 6 });
  });

  it('should read the newest logs first', async () => {
    await monitor.logGeneration(generateMockQuestions('true_false', 1, 'first'), metadata);
    await monitor.logGeneration(generateMockQuestions('true_false', 1, 'second'), metadata);

    const logs = await monitor.getRecentLogs(1);

    expect(logs).toHaveLength(1);
    expect(logs[0].timestamp).toBe('2024-01-02 03:04:02');
    expect(logs[0].questions[0].text).toBe('Sample true/false statement 1 about second');
  });

  it('should skip malformed and unrelated files', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    await monitor.logGeneration(generateMockQuestions('true_false', 1, 'kept'), metadata);
    await fs.writeFile(path.join(logDir, 'questions_99999999_999999_shape.json'), '{}');
    await fs.writeFile(path.join(logDir, 'questions_99999999_999998_syntax.json'), 'not json');
    await fs.writeFile(path.join(logDir, 'notes.txt'), 'ignored');

    const logs = await monitor.getRecentLogs();

    expect(logs.map((log) => log.questions[0].text)).toEqual(['Sample true/false statement 1 about kept']);
    expect(error).toHaveBeenCalledTimes(2);
  });

  it('should return no logs before anything was written', async () => {
    expect(await monitor.getRecentLogs()).toEqual([]);
  });

  it('should delegate quality analysis to the scorer', () => {
    expect(monitor.analyzeQuality([]).overallQuality).toBe(0);
  });

  it('should verify questions against content', async () => {
    const [question] = generateMockQuestions('true_false', 1, 'tides');
    const result = await monitor.verifyQuestion(question, 'Sample statement about tides.');

    expect(result.method).toBe('content');
    expect(await monitor.filterQuestions([question], 'Unrelated content.')).toEqual([]);
  });
});
