import path from 'node:path';

import { createApp } from './app';
import { config } from './config';
import { OpenAiGenerationService } from './llm/client';
import { resolveDefaultModel } from './llm/models';
import { QuestionGenerator } from './pipeline/generateQuestions';
import { PdfDocumentExtractor } from './pipeline/parsePdf';
import { QuestionMonitor } from './quality/monitor';
import { QuestionVerifier } from './quality/verifier';
import { createFileStore } from './store/files';
import { createJobStore } from './store/jobs';

const main = async (): Promise<void> => {
  const model = await resolveDefaultModel(config.LLM_MODEL, () => new OpenAiGenerationService().listModels());
  const service = new OpenAiGenerationService({ model });
  const verifier = new QuestionVerifier();

  const generator = new QuestionGenerator({
    service,
    extractor: new PdfDocumentExtractor(),
    verifier,
    chunking: { chunkSize: config.CHUNK_SIZE, chunkOverlap: config.CHUNK_OVERLAP },
    maxFeatures: config.MAX_FEATURES,
    planner: { maxSectionLength: config.MAX_SECTION_LENGTH, maxCombinedLength: config.MAX_SECTION_LENGTH },
    synthesizer: { pacingDelayMs: config.BATCH_PACING_MS },
    defaultModel: service.defaultModel,
  });

  const app = createApp({
    generator,
    monitor: new QuestionMonitor({ logDir: config.QUESTION_LOG_DIR, verifier }),
    files: createFileStore(config.DATA_DIR),
    jobs: createJobStore(config.DATA_DIR),
    uploadDir: path.join(config.DATA_DIR, 'files'),
    defaultModel: service.defaultModel,
  });

  app.listen(config.PORT, () => {
    console.log(`Server listening on port ${config.PORT}`);
  });
};

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
