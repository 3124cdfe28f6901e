import { VerificationError, getErrorMessage } from '../errors';
import type { QuestionRecord } from '../questions/types';

export const VERIFIED_THRESHOLD = 0.7;
export const FALLBACK_THRESHOLD = 0.8;

const CONTEXT_RADIUS = 50;

export type CheckResult = {
  verified: boolean;
  confidence: number;
};

/** Secondary verification source consulted when the content check is unsure. */
export interface VerificationFallback {
  check(question: QuestionRecord): Promise<CheckResult>;
}

export type ContentMatch = {
  word: string;
  context: string;
};

export type VerificationResult = CheckResult & {
  method: 'none' | 'content' | 'fallback';
  matches: ContentMatch[];
  fallbackError?: string;
};

export type QuestionVerifierOptions = {
  fallback?: VerificationFallback;
  acceptanceThreshold?: number;
};

/** Letters-only words longer than four characters, lowercased, edge punctuation removed. */
export const extractImportantWords = (text: string): string[] =>
  text
    .toLowerCase()
    .split(/\s+/)
    .map((word) => word.replace(/^[^\p{L}]+|[^\p{L}]+$/gu, ''))
    .filter((word) => word.length > 4 && /^\p{L}+$/u.test(word));

export const verifyAgainstContent = (question: QuestionRecord, content: string): VerificationResult => {
  const words = extractImportantWords(question.text);
  const lowered = content.toLowerCase();
  const matches: ContentMatch[] = [];

  for (const word of words) {
    const position = lowered.indexOf(word);
    if (position >= 0) {
      matches.push({
        word,
        context: content.slice(Math.max(0, position - CONTEXT_RADIUS), position + word.length + CONTEXT_RADIUS),
      });
    }
  }

  const confidence = words.length ? matches.length / words.length : 0;

  return {
    verified: confidence > VERIFIED_THRESHOLD,
    confidence,
    method: 'content',
    matches,
  };
};

export class QuestionVerifier {
  private readonly fallback?: VerificationFallback;

  private readonly acceptanceThreshold: number;

  constructor({ fallback, acceptanceThreshold = VERIFIED_THRESHOLD }: QuestionVerifierOptions = {}) {
    this.fallback = fallback;
    this.acceptanceThreshold = acceptanceThreshold;
  }

  /**
   * Checks the question against `content`; below `FALLBACK_THRESHOLD` the fallback is
   * asked and wins only with a strictly higher confidence. Fallback failures end up in
   * `fallbackError` and never reject.
   */
  async verify(question: QuestionRecord, content?: string): Promise<VerificationResult> {
    let result: VerificationResult = content
      ? verifyAgainstContent(question, content)
      : { verified: false, confidence: 0, method: 'none', matches: [] };

    if (result.confidence >= FALLBACK_THRESHOLD || !this.fallback) {
      return result;
    }

    try {
      const checked = await this.fallback.check(question);
      if (checked.confidence > result.confidence) {
        result = { ...result, verified: checked.verified, confidence: checked.confidence, method: 'fallback' };
      }
    } catch (error) {
      const failure = new VerificationError(`Fallback verification failed: ${getErrorMessage(error)}`, { cause: error });
      console.warn(`[VERIFY] ${failure.message}`);
      result = { ...result, fallbackError: failure.message };
    }

    return result;
  }

  accepts(result: VerificationResult): boolean {
    return result.confidence > this.acceptanceThreshold;
  }

  /** Questions whose verification confidence clears the acceptance threshold, in order. */
  async filter(questions: QuestionRecord[], content: string): Promise<QuestionRecord[]> {
    const kept: QuestionRecord[] = [];

    for (const question of questions) {
      const result = await this.verify(question, content);
      if (this.accepts(result)) {
        kept.push(question);
      }
    }

    return kept;
  }
}
