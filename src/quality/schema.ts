import { z } from 'zod';

import type { BatchMetrics, GenerationMetadata } from './metrics';
import type { QualityAnalysis } from './score';

export const generationMetadataSchema: z.ZodType<GenerationMetadata> = z.object({
  documentName: z.string().optional(),
  questionType: z.string(),
  topic: z.string().nullable().optional(),
  difficulty: z.string(),
  language: z.string(),
  model: z.string().optional(),
  requestedCount: z.number(),
  generatedCount: z.number(),
  filteredCount: z.number(),
  usedFallback: z.boolean().optional(),
  timestamp: z.string(),
});

export const batchMetricsSchema: z.ZodType<BatchMetrics> = z.object({
  questionCount: z.number(),
  questionType: z.string(),
  difficulty: z.string(),
  language: z.string(),
  generationSuccessRate: z.number(),
  filterPassRate: z.number(),
  averageQuestionLength: z.number(),
  minQuestionLength: z.number().optional(),
  maxQuestionLength: z.number().optional(),
  averageOptionsPerQuestion: z.number(),
  averageOptionLength: z.number().optional(),
  minOptionLength: z.number().optional(),
  maxOptionLength: z.number().optional(),
});

export const qualityAnalysisSchema: z.ZodType<QualityAnalysis> = z.object({
  overallQuality: z.number(),
  questionTypeDistribution: z.object({
    multiple_choice: z.number().optional(),
    multiple_selection: z.number().optional(),
    true_false: z.number().optional(),
    short_answer: z.number().optional(),
  }),
  averageQuestionLength: z.number(),
  optionQuality: z
    .object({
      averageLength: z.number(),
      minLength: z.number(),
      maxLength: z.number(),
      lengthVariance: z.number(),
    })
    .nullable(),
  breakdown: z.object({
    questionLengthScore: z.number(),
    optionQualityScore: z.number(),
    diversityScore: z.number(),
    structureScore: z.number(),
  }),
  improvementSuggestions: z.array(z.string()),
});
