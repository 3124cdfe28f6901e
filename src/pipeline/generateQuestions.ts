import { z } from 'zod';

import { NotFittedError } from '../errors';
import type { TextGenerationService } from '../llm/client';
import type { GenerationMetadata } from '../quality/metrics';
import type { QuestionVerifier } from '../quality/verifier';
import { DIFFICULTIES, QUESTION_TYPES } from '../questions/types';
import type { QuestionRecord } from '../questions/types';
import { ChunkIndex } from '../rag/chunkIndex';
import { chunkText } from './chunkText';
import type { ChunkTextOptions } from './chunkText';
import type { DocumentExtractor } from './parsePdf';
import { SectionPlanner } from './planSections';
import type { SectionPlannerOptions } from './planSections';
import { QuestionSynthesizer } from './synthesize';
import type { QuestionSynthesizerOptions } from './synthesize';

export const MAX_QUESTIONS_PER_REQUEST = 100;

const DEFAULT_TOPIC = 'the key concepts of the content';

export const generationRequestSchema = z.object({
  questionType: z.enum(QUESTION_TYPES),
  count: z.number().int().min(1).max(MAX_QUESTIONS_PER_REQUEST),
  topic: z.string().trim().min(1).optional(),
  difficulty: z.enum(DIFFICULTIES).default('medium'),
  language: z.string().trim().min(1).default('English'),
  temperature: z.number().min(0).max(2).default(0.7),
  model: z.string().trim().min(1).optional(),
});

export type GenerationRequestInput = z.input<typeof generationRequestSchema>;
export type GenerationRequest = z.output<typeof generationRequestSchema>;

export type GenerationResult = {
  questions: QuestionRecord[];
  metadata: GenerationMetadata;
};

export type QuestionGeneratorDeps = {
  service: TextGenerationService;
  extractor?: DocumentExtractor;
  verifier?: QuestionVerifier;
  chunking?: ChunkTextOptions;
  maxFeatures?: number;
  planner?: SectionPlannerOptions;
  synthesizer?: QuestionSynthesizerOptions;
  defaultModel?: string;
  now?: () => Date;
};

/**
 * End-to-end generation for one document: chunk, index, plan sections, synthesize and
 * filter. The most recently fitted or loaded index is kept on the instance.
 */
export class QuestionGenerator {
  private index: ChunkIndex | null = null;

  private readonly synthesizer: QuestionSynthesizer;

  constructor(private readonly deps: QuestionGeneratorDeps) {
    this.synthesizer = new QuestionSynthesizer(deps.service, deps.synthesizer);
  }

  async generateQuestions(
    filePath: string,
    request: GenerationRequestInput,
    signal?: AbortSignal,
  ): Promise<GenerationResult> {
    if (!this.deps.extractor) {
      throw new Error('QuestionGenerator was created without a document extractor.');
    }

    const document = await this.deps.extractor.extract(filePath);
    console.info(
      `[JOB] Extracted ${document.fullText.length} character(s) from ${document.metadata.filename} `
      + `(${document.metadata.pageCount} page(s)).`,
    );

    return this.generateFromText(document.fullText, request, document.metadata.filename, signal);
  }

  async generateFromText(
    fullText: string,
    input: GenerationRequestInput,
    documentName?: string,
    signal?: AbortSignal,
  ): Promise<GenerationResult> {
    const request = generationRequestSchema.parse(input);

    this.index = this.buildIndex(fullText);

    const planner = new SectionPlanner(this.index, this.deps.planner);
    const sections = planner
      .plan({ fullText, topic: request.topic, requestedCount: request.count })
      .filter((section) => section.trim().length > 0);

    console.info(`[JOB] Planned ${sections.length} section(s) for ${request.count} ${request.questionType} question(s).`);

    const outcome = await this.synthesizer.generate({
      sections,
      questionType: request.questionType,
      totalCount: request.count,
      difficulty: request.difficulty,
      language: request.language,
      topic: request.topic ?? DEFAULT_TOPIC,
      temperature: request.temperature,
      model: request.model,
      signal,
    });

    // Questions are checked against what the model was shown. Placeholder questions
    // share no vocabulary with the document.
    const questions = this.deps.verifier && !outcome.usedFallback
      ? await this.deps.verifier.filter(outcome.questions, sections.join(' '))
      : outcome.questions;

    const now = this.deps.now ?? (() => new Date());

    return {
      questions,
      metadata: {
        documentName,
        questionType: request.questionType,
        topic: request.topic ?? null,
        difficulty: request.difficulty,
        language: request.language,
        model: request.model ?? this.deps.defaultModel,
        requestedCount: request.count,
        generatedCount: outcome.questions.length,
        filteredCount: questions.length,
        usedFallback: outcome.usedFallback,
        timestamp: now().toISOString(),
      },
    };
  }

  async saveIndex(directory: string): Promise<void> {
    if (!this.index) {
      throw new NotFittedError('No index has been built or loaded yet.');
    }
    await this.index.save(directory);
  }

  async loadIndex(directory: string): Promise<ChunkIndex> {
    this.index = await ChunkIndex.load(directory);
    return this.index;
  }

  private buildIndex(fullText: string): ChunkIndex | null {
    const chunks = chunkText(fullText, this.deps.chunking);

    if (!chunks.length) {
      return null;
    }

    const index = new ChunkIndex({ maxFeatures: this.deps.maxFeatures });
    index.fit(chunks);
    console.info(`[INDEX] Fitted on ${index.size} chunk(s) with ${index.vocabularySize} term(s).`);

    return index;
  }
}
