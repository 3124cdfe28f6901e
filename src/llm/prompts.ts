import { UnsupportedTypeError } from '../errors';
import { isQuestionType } from '../questions/types';
import type { QuestionType } from '../questions/types';

export type PromptParams = {
  num_questions: number;
  difficulty: string;
  language: string;
  topic: string;
};

const DIFFICULTY_GUIDE = `For "low" difficulty:
- Focus on basic recall and understanding
- Use straightforward language

For "medium" difficulty:
- Test application and analysis
- Include some nuance in the questions

For "high" difficulty:
- Test evaluation and synthesis
- Use precise language where small details matter`;

const CLOSING = `Separate questions with a blank line and do not add any other text.
Ensure questions are non-duplicative, clear, and test understanding rather than mere recall.
Focus specifically on the topic: {topic}`;

export const SYSTEM_PROMPTS: Record<QuestionType, string> = {
  multiple_choice: `You are an expert question writer creating high-quality multiple-choice questions.
Write {num_questions} multiple-choice questions based on the provided content.
Each question must:
1. Be directly based on the provided content
2. Have exactly 4 options (A, B, C, D)
3. Have exactly one correct answer
4. Have plausible but clearly incorrect distractors
5. Be at {difficulty} difficulty level
6. Be written in {language}

${DIFFICULTY_GUIDE}

Format each question exactly as follows:
Q1. [Question text]
A. [Option A]
B. [Option B]
C. [Option C]
D. [Option D]
Correct Answer: [A/B/C/D]

${CLOSING}`,

  multiple_selection: `You are an expert question writer creating high-quality multiple-selection questions.
Write {num_questions} multiple-selection questions based on the provided content.
Each question must:
1. Be directly based on the provided content
2. Have exactly 5 options (A, B, C, D, E)
3. Have 2-3 correct answers
4. Have plausible but clearly incorrect wrong options
5. Be at {difficulty} difficulty level
6. Be written in {language}

${DIFFICULTY_GUIDE}

Format each question exactly as follows:
Q1. [Question text] (Select all that apply)
A. [Option A]
B. [Option B]
C. [Option C]
D. [Option D]
E. [Option E]
Correct Answers: [List all correct options, e.g., A, C, E]

${CLOSING}`,

  true_false: `You are an expert question writer creating high-quality true/false statements.
Write {num_questions} true/false statements based on the provided content.
Each statement must:
1. Be directly based on the provided content
2. Have a clear true or false answer
3. Be at {difficulty} difficulty level
4. Be written in {language}

${DIFFICULTY_GUIDE}

Format each statement exactly as follows:
Q1. [Statement]
Correct Answer: [True/False]

${CLOSING}`,

  short_answer: `You are an expert question writer creating high-quality short answer questions.
Write {num_questions} short answer questions based on the provided content.
Each question must:
1. Be directly based on the provided content
2. Be answerable in 1-3 sentences
3. Be at {difficulty} difficulty level
4. Be written in {language}

${DIFFICULTY_GUIDE}

Format each question exactly as follows:
Q1. [Question text]
Model Answer: [Brief expected answer]

${CLOSING}`,
};

const PLACEHOLDER = /\{(num_questions|difficulty|language|topic)\}/g;

export const renderSystemPrompt = (questionType: string, params: PromptParams): string => {
  if (!isQuestionType(questionType)) {
    throw new UnsupportedTypeError(questionType);
  }

  return SYSTEM_PROMPTS[questionType].replace(PLACEHOLDER, (_match, key: keyof PromptParams) => String(params[key]));
};

export const buildUserPrompt = (count: number, questionType: QuestionType, content: string): string =>
  `Generate ${count} ${questionType} questions based on the following content:\n\n${content}`;
