import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const configSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  DATA_DIR: z.string().min(1).default('.data'),
  QUESTION_LOG_DIR: z.string().min(1).default('.data/logs'),
  INDEX_DIR: z.string().min(1).default('.data/index'),
  LLM_BASE_URL: z.string().url().default('http://127.0.0.1:11434/v1'),
  LLM_API_KEY: z.string().min(1).default('ollama'),
  LLM_MODEL: z.string().min(1).optional(),
  LLM_MAX_TOKENS: z.coerce.number().int().positive().default(4096),
  LLM_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  BATCH_PACING_MS: z.coerce.number().int().min(0).default(1000),
  CHUNK_SIZE: z.coerce.number().int().positive().default(2000),
  CHUNK_OVERLAP: z.coerce.number().int().min(0).default(50),
  MAX_FEATURES: z.coerce.number().int().positive().default(5000),
  MAX_SECTION_LENGTH: z.coerce.number().int().positive().default(4000),
});

export type AppConfig = z.infer<typeof configSchema>;

const parseConfig = (env: NodeJS.ProcessEnv): AppConfig => {
  const result = configSchema.safeParse(env);

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }

  return Object.freeze(result.data);
};

export const config: AppConfig = parseConfig(process.env);
