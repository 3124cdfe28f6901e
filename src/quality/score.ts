import { isStructurallyValid } from '../questions/validity';
import { isChoiceQuestion } from '../questions/types';
import type { QuestionRecord, QuestionType } from '../questions/types';

const SUB_SCORE_MAX = 25;
const HALF_CREDIT = SUB_SCORE_MAX / 2;
const NON_CHOICE_OPTION_SCORE = 15;
const DIVERSITY_PER_TYPE = 6.25;
const SHORT_OPTION_LENGTH = 5;

export type OptionQuality = {
  averageLength: number;
  minLength: number;
  maxLength: number;
  lengthVariance: number;
};

export type QualityBreakdown = {
  questionLengthScore: number;
  optionQualityScore: number;
  diversityScore: number;
  structureScore: number;
};

export type QualityAnalysis = {
  overallQuality: number;
  questionTypeDistribution: Partial<Record<QuestionType, number>>;
  averageQuestionLength: number;
  optionQuality: OptionQuality | null;
  breakdown: QualityBreakdown;
  improvementSuggestions: string[];
};

const round1 = (value: number): number => Math.round(value * 10) / 10;

const mean = (values: number[]): number => values.reduce((sum, value) => sum + value, 0) / values.length;

/** Population variance. */
const variance = (values: number[]): number => {
  if (values.length < 2) return 0;
  const avg = mean(values);
  return mean(values.map((value) => (value - avg) ** 2));
};

/** Full credit for 20-200 characters, linear ramp below, gentle penalty above. */
export const scoreQuestionLength = (averageLength: number): number => {
  if (averageLength < 20) return (averageLength / 20) * SUB_SCORE_MAX;
  if (averageLength > 200) return Math.max(0, SUB_SCORE_MAX - ((averageLength - 200) / 100) * 10);
  return SUB_SCORE_MAX;
};

const scoreOptionLength = (averageLength: number): number => {
  if (averageLength < 5) return (averageLength / 5) * 15;
  if (averageLength > 100) return Math.max(0, 15 - ((averageLength - 100) / 50) * 5);
  return 15;
};

const scoreOptionVariance = (lengthVariance: number): number => {
  if (lengthVariance < 5) return (lengthVariance / 5) * 10;
  if (lengthVariance > 500) return Math.max(0, 10 - ((lengthVariance - 500) / 500) * 5);
  return 10;
};

const analyzeOptions = (questions: QuestionRecord[]): OptionQuality | null => {
  const lengths = questions.filter(isChoiceQuestion).flatMap((question) => question.options.map((option) => option.text.length));

  if (!lengths.length) {
    return null;
  }

  return {
    averageLength: mean(lengths),
    minLength: Math.min(...lengths),
    maxLength: Math.max(...lengths),
    lengthVariance: variance(lengths),
  };
};

/**
 * 0-100 quality estimate: the sum of length, option, diversity and structure
 * sub-scores, each worth at most 25 points.
 */
export const scoreQuestions = (questions: QuestionRecord[]): QualityAnalysis => {
  if (!questions.length) {
    return {
      overallQuality: 0,
      questionTypeDistribution: {},
      averageQuestionLength: 0,
      optionQuality: null,
      breakdown: { questionLengthScore: 0, optionQualityScore: 0, diversityScore: 0, structureScore: 0 },
      improvementSuggestions: ['No questions to analyze.'],
    };
  }

  const total = questions.length;
  const suggestions: string[] = [];

  const distribution: Partial<Record<QuestionType, number>> = {};
  for (const question of questions) {
    distribution[question.type] = (distribution[question.type] ?? 0) + 1 / total;
  }

  const averageQuestionLength = mean(questions.map((question) => question.text.length));
  const lengthScore = scoreQuestionLength(averageQuestionLength);

  const optionQuality = analyzeOptions(questions);
  const optionScore = optionQuality
    ? scoreOptionLength(optionQuality.averageLength) + scoreOptionVariance(optionQuality.lengthVariance)
    : NON_CHOICE_OPTION_SCORE;

  const diversityScore = Math.min(SUB_SCORE_MAX, Object.keys(distribution).length * DIVERSITY_PER_TYPE);

  const validCount = questions.filter(isStructurallyValid).length;
  const structureScore = (validCount / total) * SUB_SCORE_MAX;

  if (optionQuality) {
    const shortOptions = questions
      .filter(isChoiceQuestion)
      .flatMap((question) => question.options)
      .filter((option) => option.text.length < SHORT_OPTION_LENGTH).length;
    if (shortOptions) {
      suggestions.push(
        `Found ${shortOptions} very short option(s) (less than ${SHORT_OPTION_LENGTH} characters). Consider making options more descriptive.`,
      );
    }
  }

  if (lengthScore < HALF_CREDIT) {
    suggestions.push(
      averageQuestionLength < 20
        ? 'Questions are too short. Consider adjusting prompts to generate more detailed questions.'
        : 'Questions are too long. Consider adjusting prompts to generate more concise questions.',
    );
  }

  if (optionQuality && optionScore < HALF_CREDIT) {
    suggestions.push('Option quality could be improved. Ensure options are descriptive and have appropriate length.');
  }

  if (diversityScore < HALF_CREDIT) {
    suggestions.push('Question type diversity is low. Consider generating a mix of different question types.');
  }

  if (structureScore < HALF_CREDIT) {
    suggestions.push('Many questions have structural issues. Check for missing options or answers.');
  }

  return {
    overallQuality: Math.round(lengthScore + optionScore + diversityScore + structureScore),
    questionTypeDistribution: distribution,
    averageQuestionLength,
    optionQuality,
    breakdown: {
      questionLengthScore: round1(lengthScore),
      optionQualityScore: round1(optionScore),
      diversityScore: round1(diversityScore),
      structureScore: round1(structureScore),
    },
    improvementSuggestions: suggestions,
  };
};
