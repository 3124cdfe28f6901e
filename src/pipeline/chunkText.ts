export type ChunkTextOptions = {
  chunkSize?: number;
  chunkOverlap?: number;
};

const DEFAULT_CHUNK_SIZE = 2000;
const DEFAULT_CHUNK_OVERLAP = 50;

const tokenize = (text: string): string[] =>
  text
    .replace(/\s+/g, ' ')
    .trim()
    .split(' ')
    .filter(Boolean);

const detokenize = (tokens: string[]): string => tokens.join(' ');

/**
 * Word windows of at most `chunkSize` characters. Each window after the first starts
 * with the trailing words of its predecessor that fit in `chunkOverlap` characters.
 * A single word longer than `chunkSize` becomes a chunk of its own.
 */
export const chunkText = (text: string, options: ChunkTextOptions = {}): string[] => {
  const chunkSize = Math.max(1, options.chunkSize ?? DEFAULT_CHUNK_SIZE);
  const chunkOverlap = Math.max(0, Math.min(options.chunkOverlap ?? DEFAULT_CHUNK_OVERLAP, chunkSize - 1));
  const tokens = tokenize(text);

  if (!tokens.length) {
    return [];
  }

  const chunks: string[] = [];
  let start = 0;

  while (start < tokens.length) {
    let end = start;
    let length = 0;

    while (end < tokens.length) {
      const added = tokens[end].length + (end > start ? 1 : 0);
      if (end > start && length + added > chunkSize) {
        break;
      }
      length += added;
      end += 1;
    }

    chunks.push(detokenize(tokens.slice(start, end)));

    if (end >= tokens.length) {
      break;
    }

    let next = end;
    let overlap = 0;
    while (next - 1 > start && overlap + tokens[next - 1].length + 1 <= chunkOverlap) {
      overlap += tokens[next - 1].length + 1;
      next -= 1;
    }

    start = next;
  }

  return chunks;
};
