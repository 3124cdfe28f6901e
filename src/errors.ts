type QuizErrorOptions = { cause?: unknown };

class QuizForgeError extends Error {
  constructor(message: string, options: QuizErrorOptions = {}) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Index used before `fit` or `load`. */
export class NotFittedError extends QuizForgeError {
  constructor(message = 'Chunk index is not fitted yet. Call fit() first.') {
    super(message);
  }
}

export class EmptyCorpusError extends QuizForgeError {
  constructor(message = 'Cannot fit the chunk index on an empty list of chunks.') {
    super(message);
  }
}

export class NotFoundError extends QuizForgeError {}

export class UnsupportedTypeError extends QuizForgeError {
  readonly questionType: string;

  constructor(questionType: string) {
    super(`Unsupported question type: ${questionType}`);
    this.questionType = questionType;
  }
}

/** Network or response failure of the text-generation service. */
export class GenerationServiceError extends QuizForgeError {
  readonly status?: number;

  constructor(message: string, options: QuizErrorOptions & { status?: number } = {}) {
    super(message, { cause: options.cause });
    this.status = options.status;
  }
}

export class VerificationError extends QuizForgeError {}

export const getErrorMessage = (error: unknown): string => {
  if (error instanceof Error && error.message) {
    return error.message;
  }

  return typeof error === 'string' ? error : 'Unknown error';
};
