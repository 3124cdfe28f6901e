import { GenerationServiceError, getErrorMessage } from '../errors';
import type { TextGenerationService } from '../llm/client';
import { generateMockQuestions } from '../llm/mockQuestions';
import { buildUserPrompt, renderSystemPrompt } from '../llm/prompts';
import { parseQuestions } from '../questions/parser';
import type { QuestionRecord, QuestionType } from '../questions/types';
import { wait } from '../util/retry';

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

/** Largest number of questions requested from the service in one call, per type. */
export const BATCH_SIZES: Record<QuestionType, number> = {
  multiple_choice: 10,
  multiple_selection: 8,
  true_false: 15,
  short_answer: 12,
};

export const DEFAULT_BATCH_SIZE = 10;

export const DEFAULT_PACING_DELAY_MS = 1000;

export type SynthesisRequest = {
  sections: string[];
  questionType: QuestionType;
  totalCount: number;
  difficulty: string;
  language: string;
  topic: string;
  temperature: number;
  model?: string;
  signal?: AbortSignal;
};

export type SynthesisOutcome = {
  questions: QuestionRecord[];
  usedFallback: boolean;
  aborted: boolean;
  batchCount: number;
  failedBatchCount: number;
};

export type BatchInput = {
  section: string;
  count: number;
};

export type QuestionSynthesizerOptions = {
  pacingDelayMs?: number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
};

const getBatchSize = (questionType: QuestionType): number => BATCH_SIZES[questionType] ?? DEFAULT_BATCH_SIZE;

/**
 * Drives the generation service section by section, batch by batch, keeping only
 * questions whose text has not been seen before. Calls are strictly sequential.
 */
export class QuestionSynthesizer {
  private readonly pacingDelayMs: number;

  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(
    private readonly service: TextGenerationService,
    { pacingDelayMs = DEFAULT_PACING_DELAY_MS, sleep = wait }: QuestionSynthesizerOptions = {},
  ) {
    this.pacingDelayMs = Math.max(0, pacingDelayMs);
    this.sleep = sleep;
  }

  async runBatch(
    { section, count }: BatchInput,
    request: SynthesisRequest,
  ): Promise<Result<QuestionRecord[], GenerationServiceError>> {
    const { questionType, difficulty, language, topic, temperature, model, signal } = request;

    const systemPrompt = renderSystemPrompt(questionType, {
      num_questions: count,
      difficulty,
      language,
      topic,
    });

    let raw: string;

    try {
      raw = await this.service.complete({
        systemPrompt,
        userPrompt: buildUserPrompt(count, questionType, section),
        temperature,
        model,
        signal,
      });
    } catch (error) {
      return {
        ok: false,
        error: error instanceof GenerationServiceError
          ? error
          : new GenerationServiceError(`Generation request failed: ${getErrorMessage(error)}`, { cause: error }),
      };
    }

    const questions = parseQuestions(raw, questionType);

    if (!questions.length) {
      return { ok: false, error: new GenerationServiceError('Generation response contained no parsable questions.') };
    }

    return { ok: true, value: questions };
  }

  async generate(request: SynthesisRequest): Promise<SynthesisOutcome> {
    const { sections, questionType, totalCount, topic, signal } = request;
    const outcome: SynthesisOutcome = {
      questions: [],
      usedFallback: false,
      aborted: false,
      batchCount: 0,
      failedBatchCount: 0,
    };

    if (totalCount <= 0 || !sections.length) {
      return outcome;
    }

    const accepted: QuestionRecord[] = [];
    const seen = new Set<string>();
    const batchSize = getBatchSize(questionType);
    const perSection = Math.ceil(totalCount / sections.length);
    const batchesPerSection = Math.ceil(perSection / batchSize);

    sectionLoop: for (const [sectionIndex, section] of sections.entries()) {
      let addedFromSection = 0;

      for (let batch = 0; batch < batchesPerSection; batch += 1) {
        if (signal?.aborted) {
          outcome.aborted = true;
          break sectionLoop;
        }

        const count = Math.min(batchSize, perSection - addedFromSection, totalCount - accepted.length);
        const result = await this.runBatch({ section, count }, request);
        const isFirstBatch = outcome.batchCount === 0;
        outcome.batchCount += 1;

        if (!result.ok) {
          outcome.failedBatchCount += 1;

          if (signal?.aborted) {
            outcome.aborted = true;
            break sectionLoop;
          }

          if (isFirstBatch) {
            console.warn(`[SYNTH] First batch failed (${result.error.message}). Falling back to mock questions.`);
            accepted.push(...generateMockQuestions(questionType, totalCount, topic));
            outcome.usedFallback = true;
            break sectionLoop;
          }

          console.warn(
            `[SYNTH] Batch ${batch + 1} of section ${sectionIndex + 1} failed (${result.error.message}). `
            + 'Moving on to the next section.',
          );
          break;
        }

        for (const question of result.value) {
          if (!seen.has(question.text)) {
            seen.add(question.text);
            accepted.push(question);
            addedFromSection += 1;
          }
        }

        if (accepted.length >= totalCount) {
          break sectionLoop;
        }

        if (addedFromSection >= perSection) {
          break;
        }

        if (batch < batchesPerSection - 1) {
          await this.sleep(this.pacingDelayMs, signal);
        }
      }

      console.info(`[SYNTH] Section ${sectionIndex + 1}/${sections.length}: ${addedFromSection} new question(s).`);
    }

    outcome.questions = accepted.slice(0, totalCount);
    return outcome;
  }
}
