import { ChunkIndex } from '../rag/chunkIndex';

export const QUESTIONS_PER_SECTION = 10;
export const CHUNKS_PER_SECTION = 5;
export const SECTION_OVERLAP = 200;
export const SENTENCE_LOOKBACK = 100;

export type SectionPlannerOptions = {
  maxSectionLength?: number;
  maxCombinedLength?: number;
  overlap?: number;
};

export type PlanInput = {
  fullText: string;
  topic?: string | null;
  requestedCount: number;
};

const isSentenceEnd = (text: string, position: number): boolean => {
  const char = text[position];
  if (char !== '.' && char !== '!' && char !== '?') {
    return false;
  }
  return position + 1 === text.length || /\s/.test(text[position + 1]);
};

/**
 * Moves a cut at `end` back to just after the nearest sentence terminator found in
 * the previous `SENTENCE_LOOKBACK` characters (never at or before `start`). The cut
 * stays where it was when no terminator is in range.
 */
export const snapToSentence = (text: string, start: number, end: number): number => {
  const floor = Math.max(start, end - SENTENCE_LOOKBACK);

  for (let position = end - 1; position > floor; position -= 1) {
    if (isSentenceEnd(text, position)) {
      return position + 1;
    }
  }

  return end;
};

export const countSections = (requestedCount: number): number =>
  Math.max(1, Math.ceil(requestedCount / QUESTIONS_PER_SECTION));

/**
 * Decides which text feeds the generator and slices it into sections of at most
 * `maxSectionLength` characters.
 */
export class SectionPlanner {
  private readonly maxSectionLength: number;

  private readonly maxCombinedLength: number;

  private readonly overlap: number;

  constructor(
    private readonly index: ChunkIndex | null = null,
    { maxSectionLength = 4000, maxCombinedLength = 4000, overlap = SECTION_OVERLAP }: SectionPlannerOptions = {},
  ) {
    this.maxSectionLength = Math.max(1, maxSectionLength);
    this.maxCombinedLength = Math.max(1, maxCombinedLength);
    this.overlap = Math.max(0, Math.min(overlap, this.maxSectionLength - 1));
  }

  plan({ fullText, topic, requestedCount }: PlanInput): string[] {
    const numSections = countSections(requestedCount);
    const retrieved = this.retrieve(topic, numSections);

    if (retrieved) {
      // A lone retrieved chunk larger than the bound is passed through whole.
      return numSections > 1 ? this.split(retrieved, numSections) : [retrieved];
    }

    return this.split(fullText, numSections);
  }

  /**
   * `numSections` slices of near-equal length; each slice after the first repeats the
   * last `overlap` characters of its predecessor. The final slice runs to the end of
   * the text unless that would exceed `maxSectionLength`.
   */
  split(text: string, numSections: number): string[] {
    if (text.length <= this.maxSectionLength) {
      return [text];
    }

    const count = Math.max(1, numSections);
    const baseLength = Math.min(this.maxSectionLength, Math.ceil(text.length / count));
    const sections: string[] = [];
    let previousEnd = 0;

    for (let i = 0; i < count; i += 1) {
      const start = i === 0 ? 0 : Math.max(0, previousEnd - this.overlap);
      const isLast = i === count - 1;
      const span = isLast ? this.maxSectionLength : Math.min(this.maxSectionLength, baseLength + (i === 0 ? 0 : this.overlap));

      let end = Math.min(text.length, start + span);
      if (end < text.length) {
        end = snapToSentence(text, start, end);
      }

      sections.push(text.slice(start, end));
      previousEnd = end;

      if (end >= text.length) {
        break;
      }
    }

    return sections;
  }

  private retrieve(topic: string | null | undefined, numSections: number): string | undefined {
    if (!topic || !topic.trim() || !this.index?.isFitted) {
      return undefined;
    }

    const k = Math.min(CHUNKS_PER_SECTION * numSections, this.index.size);
    const content = this.index.retrieveForTopic(topic, k, this.maxCombinedLength);

    return content || undefined;
  }
}
