import { isChoiceQuestion } from '../questions/types';
import type { QuestionRecord } from '../questions/types';

export type GenerationMetadata = {
  documentName?: string;
  questionType: string;
  topic?: string | null;
  difficulty: string;
  language: string;
  model?: string;
  requestedCount: number;
  generatedCount: number;
  filteredCount: number;
  usedFallback?: boolean;
  timestamp: string;
};

export type BatchMetrics = {
  questionCount: number;
  questionType: string;
  difficulty: string;
  language: string;
  generationSuccessRate: number;
  filterPassRate: number;
  averageQuestionLength: number;
  minQuestionLength?: number;
  maxQuestionLength?: number;
  averageOptionsPerQuestion: number;
  averageOptionLength?: number;
  minOptionLength?: number;
  maxOptionLength?: number;
};

export type MetricsSnapshot = {
  totalQuestionsGenerated: number;
  questionsByType: Record<string, number>;
  questionsByDifficulty: Record<string, number>;
  questionsByLanguage: Record<string, number>;
  averageQuestionLength: number;
  averageOptionsPerQuestion: number;
  generationSuccessRate: number;
  filterPassRate: number;
};

const AVERAGED_FIELDS = [
  'averageQuestionLength',
  'averageOptionsPerQuestion',
  'generationSuccessRate',
  'filterPassRate',
] as const;

type AveragedField = (typeof AVERAGED_FIELDS)[number];

const ratio = (numerator: number, denominator: number): number => (denominator > 0 ? numerator / denominator : 0);

export const calculateBatchMetrics = (questions: QuestionRecord[], metadata: GenerationMetadata): BatchMetrics => {
  const metrics: BatchMetrics = {
    questionCount: questions.length,
    questionType: metadata.questionType,
    difficulty: metadata.difficulty,
    language: metadata.language,
    generationSuccessRate: ratio(metadata.generatedCount, metadata.requestedCount),
    filterPassRate: ratio(metadata.filteredCount, metadata.generatedCount),
    averageQuestionLength: 0,
    averageOptionsPerQuestion: 0,
  };

  if (!questions.length) {
    return metrics;
  }

  const lengths = questions.map((question) => question.text.length);
  metrics.averageQuestionLength = lengths.reduce((sum, value) => sum + value, 0) / lengths.length;
  metrics.minQuestionLength = Math.min(...lengths);
  metrics.maxQuestionLength = Math.max(...lengths);

  const choiceQuestions = questions.filter(isChoiceQuestion);
  if (choiceQuestions.length) {
    const optionCount = choiceQuestions.reduce((sum, question) => sum + question.options.length, 0);
    metrics.averageOptionsPerQuestion = optionCount / questions.length;

    const optionLengths = choiceQuestions.flatMap((question) => question.options.map((option) => option.text.length));
    if (optionLengths.length) {
      metrics.averageOptionLength = optionLengths.reduce((sum, value) => sum + value, 0) / optionLengths.length;
      metrics.minOptionLength = Math.min(...optionLengths);
      metrics.maxOptionLength = Math.max(...optionLengths);
    }
  }

  return metrics;
};

/**
 * Running corpus-wide metrics. Averages are weighted by each batch's question count.
 * `record` reads then writes the averages, so a single writer must own the instance
 * (the monitor funnels every update through one queue).
 */
export class MetricsAccumulator {
  private totalQuestionsGenerated = 0;

  private readonly byType = new Map<string, number>();

  private readonly byDifficulty = new Map<string, number>();

  private readonly byLanguage = new Map<string, number>();

  private readonly averages: Record<AveragedField, number> = {
    averageQuestionLength: 0,
    averageOptionsPerQuestion: 0,
    generationSuccessRate: 0,
    filterPassRate: 0,
  };

  record(batch: BatchMetrics): void {
    const count = batch.questionCount;

    this.totalQuestionsGenerated += count;
    this.byType.set(batch.questionType, (this.byType.get(batch.questionType) ?? 0) + count);
    this.byDifficulty.set(batch.difficulty, (this.byDifficulty.get(batch.difficulty) ?? 0) + count);
    this.byLanguage.set(batch.language, (this.byLanguage.get(batch.language) ?? 0) + count);

    if (count <= 0) {
      return;
    }

    const total = this.totalQuestionsGenerated;
    const previousTotal = total - count;

    AVERAGED_FIELDS.forEach((field) => {
      this.averages[field] = previousTotal > 0
        ? (this.averages[field] * previousTotal + batch[field] * count) / total
        : batch[field];
    });
  }

  snapshot(): MetricsSnapshot {
    return {
      totalQuestionsGenerated: this.totalQuestionsGenerated,
      questionsByType: Object.fromEntries(this.byType),
      questionsByDifficulty: Object.fromEntries(this.byDifficulty),
      questionsByLanguage: Object.fromEntries(this.byLanguage),
      ...this.averages,
    };
  }
}
