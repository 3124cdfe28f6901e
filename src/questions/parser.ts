import { UnsupportedTypeError } from '../errors';
import { isQuestionType } from './types';
import type { OptionLabel, QuestionOption, QuestionRecord, QuestionType } from './types';

const PARAGRAPH_BREAK = /\r?\n[ \t]*\r?\n/;
const QUESTION_HEADER = /^Q\d+\.(.*)$/;
const OPTION_LINE = /^([A-E])[.)]\s*(.*)$/;
const CORRECT_ANSWER_LINE = /^Correct Answers?:\s*(.*)$/i;
const MODEL_ANSWER_LINE = /^Model Answer:\s*(.*)$/i;

const CHOICE_LABELS: Record<'multiple_choice' | 'multiple_selection', readonly OptionLabel[]> = {
  multiple_choice: ['A', 'B', 'C', 'D'],
  multiple_selection: ['A', 'B', 'C', 'D', 'E'],
};

const isLabel = (value: string, allowed: readonly OptionLabel[]): value is OptionLabel =>
  allowed.some((label) => label === value);

const stripBrackets = (value: string): string => value.replace(/^\[|\]$/g, '').trim();

const parseOption = (line: string, allowed: readonly OptionLabel[]): QuestionOption | undefined => {
  const match = OPTION_LINE.exec(line);
  if (!match || !isLabel(match[1], allowed)) {
    return undefined;
  }

  return { label: match[1], text: match[2].trim() };
};

const parseLabel = (value: string, allowed: readonly OptionLabel[]): OptionLabel | undefined => {
  const candidate = stripBrackets(value).charAt(0).toUpperCase();
  return isLabel(candidate, allowed) ? candidate : undefined;
};

const parseLabelSet = (value: string, allowed: readonly OptionLabel[]): OptionLabel[] => {
  const labels: OptionLabel[] = [];

  stripBrackets(value)
    .split(/[,\s]+/)
    .map((part) => part.replace(/[^A-Za-z]/g, '').toUpperCase())
    .forEach((part) => {
      if (part.length === 1 && isLabel(part, allowed) && !labels.includes(part)) {
        labels.push(part);
      }
    });

  return labels;
};

const parseTruthValue = (value: string): boolean | undefined => {
  const normalized = stripBrackets(value).toLowerCase();

  if (normalized.startsWith('true')) {
    return true;
  }

  if (normalized.startsWith('false')) {
    return false;
  }

  return undefined;
};

const createQuestion = (type: QuestionType, text: string): QuestionRecord => {
  switch (type) {
    case 'multiple_choice':
      return { type, text, options: [] };
    case 'multiple_selection':
      return { type, text, options: [], correctAnswers: [] };
    case 'true_false':
      return { type, text };
    case 'short_answer':
      return { type, text };
    default: {
      const exhaustive: never = type;
      throw new UnsupportedTypeError(String(exhaustive));
    }
  }
};

const applyLine = (question: QuestionRecord, rawLine: string): void => {
  const line = rawLine.trim();
  if (!line) {
    return;
  }

  switch (question.type) {
    case 'multiple_choice':
    case 'multiple_selection': {
      const allowed = CHOICE_LABELS[question.type];
      const option = parseOption(line, allowed);
      if (option) {
        question.options.push(option);
        return;
      }

      const answer = CORRECT_ANSWER_LINE.exec(line);
      if (!answer) {
        return;
      }

      if (question.type === 'multiple_choice') {
        question.correctAnswer = parseLabel(answer[1], allowed);
      } else {
        question.correctAnswers = parseLabelSet(answer[1], allowed);
      }
      return;
    }
    case 'true_false': {
      const answer = CORRECT_ANSWER_LINE.exec(line);
      if (answer) {
        question.correctAnswer = parseTruthValue(answer[1]);
      }
      return;
    }
    case 'short_answer': {
      const answer = MODEL_ANSWER_LINE.exec(line);
      if (answer) {
        question.modelAnswer = answer[1].trim();
      }
      return;
    }
    default: {
      const exhaustive: never = question;
      throw new UnsupportedTypeError(String(exhaustive));
    }
  }
};

/**
 * Recovers question records from raw model output.
 *
 * Paragraphs are separated by blank lines; a paragraph whose first line reads
 * `Q<n>. <text>` opens a new question and the remaining lines (including those of
 * following paragraphs without a header) are read with the grammar of `type`.
 * Incomplete questions are still returned, validity is checked downstream.
 */
export const parseQuestions = (rawText: string, type: string): QuestionRecord[] => {
  if (!isQuestionType(type)) {
    throw new UnsupportedTypeError(type);
  }

  const questions: QuestionRecord[] = [];
  let current: QuestionRecord | undefined;

  for (const paragraph of rawText.split(PARAGRAPH_BREAK)) {
    const lines = paragraph.trim().split(/\r?\n/);
    const header = QUESTION_HEADER.exec(lines[0].trim());

    if (header) {
      if (current) {
        questions.push(current);
      }
      const question = createQuestion(type, header[1].trim());
      lines.slice(1).forEach((line) => applyLine(question, line));
      current = question;
      continue;
    }

    if (current) {
      const question = current;
      lines.forEach((line) => applyLine(question, line));
    }
  }

  if (current) {
    questions.push(current);
  }

  return questions;
};
