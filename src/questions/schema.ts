import { z } from 'zod';

import type { QuestionRecord } from './types';

const optionLabel = z.enum(['A', 'B', 'C', 'D', 'E']);

const questionOption = z.object({
  label: optionLabel,
  text: z.string(),
});

export const questionRecordSchema: z.ZodType<QuestionRecord> = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('multiple_choice'),
    text: z.string(),
    options: z.array(questionOption),
    correctAnswer: optionLabel.optional(),
  }),
  z.object({
    type: z.literal('multiple_selection'),
    text: z.string(),
    options: z.array(questionOption),
    correctAnswers: z.array(optionLabel),
  }),
  z.object({
    type: z.literal('true_false'),
    text: z.string(),
    correctAnswer: z.boolean().optional(),
  }),
  z.object({
    type: z.literal('short_answer'),
    text: z.string(),
    modelAnswer: z.string().optional(),
  }),
]);
