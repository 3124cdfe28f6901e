export const QUESTION_TYPES = [
  'multiple_choice',
  'multiple_selection',
  'true_false',
  'short_answer',
] as const;

export type QuestionType = (typeof QUESTION_TYPES)[number];

export const DIFFICULTIES = ['low', 'medium', 'high'] as const;

export type Difficulty = (typeof DIFFICULTIES)[number];

export type OptionLabel = 'A' | 'B' | 'C' | 'D' | 'E';

export interface QuestionOption {
  label: OptionLabel;
  text: string;
}

export interface MultipleChoiceQuestion {
  type: 'multiple_choice';
  text: string;
  options: QuestionOption[];
  correctAnswer?: OptionLabel;
}

export interface MultipleSelectionQuestion {
  type: 'multiple_selection';
  text: string;
  options: QuestionOption[];
  correctAnswers: OptionLabel[];
}

export interface TrueFalseQuestion {
  type: 'true_false';
  text: string;
  correctAnswer?: boolean;
}

export interface ShortAnswerQuestion {
  type: 'short_answer';
  text: string;
  modelAnswer?: string;
}

export type QuestionRecord =
  | MultipleChoiceQuestion
  | MultipleSelectionQuestion
  | TrueFalseQuestion
  | ShortAnswerQuestion;

export const isQuestionType = (value: string): value is QuestionType =>
  QUESTION_TYPES.some((type) => type === value);

export const isChoiceQuestion = (
  question: QuestionRecord,
): question is MultipleChoiceQuestion | MultipleSelectionQuestion =>
  question.type === 'multiple_choice' || question.type === 'multiple_selection';
