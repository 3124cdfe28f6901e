import type { CompletionRequest, TextGenerationService } from '../../llm/client';

type Reply = (request: CompletionRequest, call: number) => string | Promise<string>;

/** Generation service double that answers from a script and records every request. */
export class ScriptedGenerationService implements TextGenerationService {
  readonly requests: CompletionRequest[] = [];

  constructor(private readonly reply: Reply) {}

  async complete(request: CompletionRequest): Promise<string> {
    const call = this.requests.length;
    this.requests.push(request);
    return this.reply(request, call);
  }
}

/** Count requested in a user prompt built by `buildUserPrompt`. */
export const requestedCount = (request: CompletionRequest): number => {
  const match = /^Generate (\d+) /.exec(request.userPrompt);
  return match ? Number(match[1]) : 0;
};

/** Formats multiple-choice questions the way the prompts ask the model to. */
export const formatMultipleChoice = (texts: string[], answer = 'B'): string =>
  texts
    .map((text, i) => [
      `Q${i + 1}. ${text}`,
      'A. First option',
      'B. Second option',
      'C. Third option',
      'D. Fourth option',
      `Correct Answer: ${answer}`,
    ].join('\n'))
    .join('\n\n');
