import type { QuestionRecord } from './types';

const EXPECTED_OPTION_COUNT = {
  multiple_choice: 4,
  multiple_selection: 5,
} as const;

const hasText = (value: string | undefined): boolean => Boolean(value && value.trim());

/**
 * A record is structurally valid when its variant's cardinality holds and every
 * required field is non-empty.
 */
export const isStructurallyValid = (question: QuestionRecord): boolean => {
  if (!hasText(question.text)) {
    return false;
  }

  switch (question.type) {
    case 'multiple_choice':
      return (
        question.options.length === EXPECTED_OPTION_COUNT.multiple_choice
        && question.options.every((option) => hasText(option.text))
        && question.correctAnswer !== undefined
      );
    case 'multiple_selection':
      return (
        question.options.length === EXPECTED_OPTION_COUNT.multiple_selection
        && question.options.every((option) => hasText(option.text))
        && question.correctAnswers.length > 0
      );
    case 'true_false':
      return question.correctAnswer !== undefined;
    case 'short_answer':
      return hasText(question.modelAnswer);
    default: {
      const exhaustive: never = question;
      return exhaustive;
    }
  }
};
