import { describe, expect, it } from 'vitest';

import { generateMockQuestions } from '../../llm/mockQuestions';
import { MetricsAccumulator, calculateBatchMetrics } from '../metrics';
import type { BatchMetrics, GenerationMetadata } from '../metrics';

const metadata = (overrides: Partial<GenerationMetadata> = {}): GenerationMetadata => ({
  questionType: 'multiple_choice',
  difficulty: 'medium',
  language: 'English',
  requestedCount: 4,
  generatedCount: 2,
  filteredCount: 2,
  timestamp: '2024-01-01T00:00:00.000Z',
  ...overrides,
});

const batch = (overrides: Partial<BatchMetrics>): BatchMetrics => ({
  questionCount: 0,
  questionType: 'multiple_choice',
  difficulty: 'medium',
  language: 'English',
  generationSuccessRate: 0,
  filterPassRate: 0,
  averageQuestionLength: 0,
  averageOptionsPerQuestion: 0,
  ...overrides,
});

describe('calculateBatchMetrics', () => {
  it('should derive rates and length statistics', () => {
    expect(calculateBatchMetrics(generateMockQuestions('multiple_choice', 2, 'cells'), metadata())).toEqual({
      questionCount: 2,
      questionType: 'multiple_choice',
      difficulty: 'medium',
      language: 'English',
      generationSuccessRate: 0.5,
      filterPassRate: 1,
      averageQuestionLength: 45,
      minQuestionLength: 45,
      maxQuestionLength: 45,
      averageOptionsPerQuestion: 4,
      averageOptionLength: 23,
      minOptionLength: 23,
      maxOptionLength: 23,
    });
  });

  it('should report zero rates when nothing was requested or generated', () => {
    const metrics = calculateBatchMetrics([], metadata({ requestedCount: 0, generatedCount: 0, filteredCount: 0 }));

    expect(metrics.generationSuccessRate).toBe(0);
    expect(metrics.filterPassRate).toBe(0);
    expect(metrics.averageQuestionLength).toBe(0);
  });
});

describe('MetricsAccumulator', () => {
  it('should start empty', () => {
    expect(new MetricsAccumulator().snapshot()).toEqual({
      totalQuestionsGenerated: 0,
      questionsByType: {},
      questionsByDifficulty: {},
      questionsByLanguage: {},
      averageQuestionLength: 0,
      averageOptionsPerQuestion: 0,
      generationSuccessRate: 0,
      filterPassRate: 0,
    });
  });

  it('should weight averages by question count', () => {
    const accumulator = new MetricsAccumulator();
    accumulator.record(batch({ questionCount: 2, averageQuestionLength: 10, filterPassRate: 1 }));
    accumulator.record(batch({ questionCount: 6, averageQuestionLength: 20, filterPassRate: 0.5, questionType: 'true_false', language: 'German' }));

    const snapshot = accumulator.snapshot();
    expect(snapshot.totalQuestionsGenerated).toBe(8);
    expect(snapshot.averageQuestionLength).toBe(17.5);
    expect(snapshot.filterPassRate).toBe(0.625);
    expect(snapshot.questionsByType).toEqual({ multiple_choice: 2, true_false: 6 });
    expect(snapshot.questionsByLanguage).toEqual({ English: 2, German: 6 });
    expect(snapshot.questionsByDifficulty).toEqual({ medium: 8 });
  });

  it('should leave averages untouched for an empty batch', () => {
    const accumulator = new MetricsAccumulator();
    accumulator.record(batch({ questionCount: 4, averageQuestionLength: 30 }));
    accumulator.record(batch({ questionCount: 0, averageQuestionLength: 999 }));

    expect(accumulator.snapshot().averageQuestionLength).toBe(30);
  });
});
