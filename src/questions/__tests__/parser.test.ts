import { describe, expect, it } from 'vitest';

import { UnsupportedTypeError } from '../../errors';
import { parseQuestions } from '../parser';

const MULTIPLE_CHOICE_BLOCK = `Q1. Which organelle produces most of a cell's energy?
A. Nucleus
B. Mitochondrion
C. Ribosome
D. Golgi apparatus
Correct Answer: B

Q2. Which pigment absorbs light in plants?
A. Keratin
B. Melanin
C. Hemoglobin
D. Chlorophyll
Correct Answer: D

Q3. What gas do plants release during photosynthesis?
A. Nitrogen
B. Carbon dioxide
C. Oxygen
D. Methane
Correct Answer: C`;

describe('parseQuestions', () => {
  describe('multiple_choice', () => {
    it('should parse every question with its options and answer', () => {
      const questions = parseQuestions(MULTIPLE_CHOICE_BLOCK, 'multiple_choice');

      expect(questions).toHaveLength(3);
      expect(questions[0]).toEqual({
        type: 'multiple_choice',
        text: "Which organelle produces most of a cell's energy?",
        options: [
          { label: 'A', text: 'Nucleus' },
          { label: 'B', text: 'Mitochondrion' },
          { label: 'C', text: 'Ribosome' },
          { label: 'D', text: 'Golgi apparatus' },
        ],
        correctAnswer: 'B',
      });
      expect(questions.map((question) => (question.type === 'multiple_choice' ? question.correctAnswer : null))).toEqual([
        'B',
        'D',
        'C',
      ]);
    });

    it('should ignore an E option and read bracketed lowercase answers', () => {
      const [question] = parseQuestions(
        'Q1. Pick one\nA) one\nB) two\nC) three\nD) four\nE) five\ncorrect answer: [c]',
        'multiple_choice',
      );

      expect(question).toEqual({
        type: 'multiple_choice',
        text: 'Pick one',
        options: [
          { label: 'A', text: 'one' },
          { label: 'B', text: 'two' },
          { label: 'C', text: 'three' },
          { label: 'D', text: 'four' },
        ],
        correctAnswer: 'C',
      });
    });

    it('should keep a question without an answer line', () => {
      const [question] = parseQuestions('Q1. Unanswered\nA. yes\nB. no', 'multiple_choice');

      expect(question).toEqual({
        type: 'multiple_choice',
        text: 'Unanswered',
        options: [
          { label: 'A', text: 'yes' },
          { label: 'B', text: 'no' },
        ],
      });
    });
  });

  describe('multiple_selection', () => {
    it('should read every listed answer once', () => {
      const [first, second] = parseQuestions(
        'Q1. Which are primes?\nA. 2\nB. 3\nC. 4\nD. 5\nE. 6\nCorrect Answers: A, B, D\n\n'
        + 'Q2. Which are even?\nA. 2\nB. 3\nC. 4\nD. 5\nE. 6\nCorrect Answers: [A, A, C E]',
        'multiple_selection',
      );

      expect(first.type === 'multiple_selection' && first.correctAnswers).toEqual(['A', 'B', 'D']);
      expect(first.type === 'multiple_selection' && first.options.map((option) => option.label)).toEqual([
        'A',
        'B',
        'C',
        'D',
        'E',
      ]);
      expect(second.type === 'multiple_selection' && second.correctAnswers).toEqual(['A', 'C', 'E']);
    });
  });

  describe('true_false', () => {
    it('should read true and false answers', () => {
      const questions = parseQuestions(
        'Q1. Water boils at 100 C at sea level.\nCorrect Answer: True\n\n'
        + 'Q2. The sun orbits the earth.\nCorrect Answer: [False]\n\n'
        + 'Q3. Unclear statement.\nCorrect Answer: maybe',
        'true_false',
      );

      expect(questions).toEqual([
        { type: 'true_false', text: 'Water boils at 100 C at sea level.', correctAnswer: true },
        { type: 'true_false', text: 'The sun orbits the earth.', correctAnswer: false },
        { type: 'true_false', text: 'Unclear statement.', correctAnswer: undefined },
      ]);
    });

    it('should attach a following paragraph to the current question', () => {
      expect(parseQuestions('Q1. Ice floats on water.\n\nCorrect Answer: True', 'true_false')).toEqual([
        { type: 'true_false', text: 'Ice floats on water.', correctAnswer: true },
      ]);
    });
  });

  describe('short_answer', () => {
    it('should read the model answer', () => {
      expect(
        parseQuestions('Q1. What does chlorophyll do?\r\nModel Answer: It absorbs light energy.', 'short_answer'),
      ).toEqual([{ type: 'short_answer', text: 'What does chlorophyll do?', modelAnswer: 'It absorbs light energy.' }]);
    });
  });

  it('should skip text before the first question', () => {
    const questions = parseQuestions('Here are your questions:\n\nQ1. Is the sky blue?\nCorrect Answer: True', 'true_false');

    expect(questions).toEqual([{ type: 'true_false', text: 'Is the sky blue?', correctAnswer: true }]);
  });

  it('should return nothing for text without questions', () => {
    expect(parseQuestions('', 'short_answer')).toEqual([]);
    expect(parseQuestions('No questions today.', 'short_answer')).toEqual([]);
  });

  it('should reject unknown question types', () => {
    expect(() => parseQuestions(MULTIPLE_CHOICE_BLOCK, 'essay')).toThrow(UnsupportedTypeError);
    expect(() => parseQuestions(MULTIPLE_CHOICE_BLOCK, 'essay')).toThrow('Unsupported question type: essay');
  });
});
