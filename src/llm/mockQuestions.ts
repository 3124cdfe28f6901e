import type { QuestionRecord, QuestionType } from '../questions/types';

export const MAX_MOCK_QUESTIONS = 10;

const mockQuestion = (type: QuestionType, n: number, topic: string): QuestionRecord => {
  switch (type) {
    case 'multiple_choice':
      return {
        type,
        text: `Sample multiple choice question ${n} about ${topic}`,
        options: (['A', 'B', 'C', 'D'] as const).map((label) => ({ label, text: `Option ${label} for question ${n}` })),
        correctAnswer: 'A',
      };
    case 'multiple_selection':
      return {
        type,
        text: `Sample multiple selection question ${n} about ${topic}`,
        options: (['A', 'B', 'C', 'D', 'E'] as const).map((label) => ({ label, text: `Option ${label} for question ${n}` })),
        correctAnswers: ['A', 'C'],
      };
    case 'true_false':
      return { type, text: `Sample true/false statement ${n} about ${topic}`, correctAnswer: true };
    case 'short_answer':
      return {
        type,
        text: `Sample short answer question ${n} about ${topic}`,
        modelAnswer: `This is a sample answer for question ${n} about ${topic}.`,
      };
    default: {
      const exhaustive: never = type;
      return exhaustive;
    }
  }
};

/** Deterministic placeholders used when the generation service is unreachable. */
export const generateMockQuestions = (type: QuestionType, count: number, topic: string): QuestionRecord[] =>
  Array.from({ length: Math.max(0, Math.min(count, MAX_MOCK_QUESTIONS)) }, (_, i) => mockQuestion(type, i + 1, topic));
