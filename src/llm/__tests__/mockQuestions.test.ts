import { describe, expect, it } from 'vitest';

import { MAX_MOCK_QUESTIONS, generateMockQuestions } from '../mockQuestions';

describe('generateMockQuestions', () => {
  it('should cap the number of placeholders', () => {
    expect(generateMockQuestions('short_answer', 25, 'cells')).toHaveLength(MAX_MOCK_QUESTIONS);
    expect(generateMockQuestions('short_answer', 0, 'cells')).toEqual([]);
  });

  it('should mention the topic', () => {
    expect(generateMockQuestions('short_answer', 1, 'cells')).toEqual([
      {
        type: 'short_answer',
        text: 'Sample short answer question 1 about cells',
        modelAnswer: 'This is a sample answer for question 1 about cells.',
      },
    ]);
  });

  it('should mark answers for choice questions', () => {
    const [question] = generateMockQuestions('multiple_selection', 1, 'cells');

    expect(question.type === 'multiple_selection' && question.correctAnswers).toEqual(['A', 'C']);
    expect(question.type === 'multiple_selection' && question.options[4]).toEqual({
      label: 'E',
      text: 'Option E for question 1',
    });
  });
});
