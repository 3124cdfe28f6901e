import { getErrorMessage } from '../errors';

export type ModelSize = 'tiny' | 'small' | 'medium';

export type ModelCapabilities = {
  questionQuality: number;
  reasoning: number;
  knowledge: number;
  speed: number;
  size: ModelSize;
  description: string;
};

export const DEFAULT_MODEL = 'llama3';

// Ratings on a 1-5 scale.
export const MODEL_CAPABILITIES: Record<string, ModelCapabilities> = {
  llama3: { questionQuality: 3, reasoning: 3, knowledge: 3, speed: 4, size: 'medium', description: 'Default model with balanced capabilities' },
  mistral: { questionQuality: 4, reasoning: 4, knowledge: 3, speed: 3, size: 'medium', description: 'Strong reasoning and instruction following' },
  phi3: { questionQuality: 4, reasoning: 4, knowledge: 3, speed: 5, size: 'small', description: 'Lightweight model with good reasoning' },
  gemma: { questionQuality: 3, reasoning: 3, knowledge: 3, speed: 4, size: 'small', description: 'Efficient general-purpose model' },
  'neural-chat': { questionQuality: 4, reasoning: 3, knowledge: 4, speed: 3, size: 'medium', description: 'Tuned for conversational tasks' },
  'llama3:8b': { questionQuality: 3, reasoning: 3, knowledge: 3, speed: 5, size: 'small', description: 'Smaller, faster Llama 3' },
  'mistral:7b': { questionQuality: 3, reasoning: 4, knowledge: 3, speed: 4, size: 'small', description: 'Compact Mistral' },
  'phi3:mini': { questionQuality: 3, reasoning: 3, knowledge: 2, speed: 5, size: 'tiny', description: 'Very small and fast' },
};

export const RECOMMENDED_MODELS = ['phi3', 'mistral', 'neural-chat', 'llama3', 'gemma'] as const;

export type ModelInfo = ModelCapabilities & { name: string };

export const getModelInfo = (name: string): ModelCapabilities =>
  MODEL_CAPABILITIES[name] ?? MODEL_CAPABILITIES[DEFAULT_MODEL];

export const listRecommendedModels = (): ModelInfo[] =>
  RECOMMENDED_MODELS.map((name) => ({ name, ...getModelInfo(name) }));

/**
 * Highest question-quality model among the available ones; unknown models are only
 * chosen when nothing known is available.
 */
export const getBestModelForTask = (available: string[]): string => {
  if (!available.length) {
    return DEFAULT_MODEL;
  }

  const known = available.filter((name) => name in MODEL_CAPABILITIES);
  if (!known.length) {
    return available[0];
  }

  return known.reduce((best, name) =>
    MODEL_CAPABILITIES[name].questionQuality > MODEL_CAPABILITIES[best].questionQuality ? name : best,
  );
};

/**
 * The configured model when there is one, otherwise the best of the models the
 * endpoint reports. An endpoint that cannot be listed leaves `DEFAULT_MODEL`.
 */
export const resolveDefaultModel = async (
  configured: string | undefined,
  listAvailable: () => Promise<string[]>,
): Promise<string> => {
  if (configured) {
    return configured;
  }

  try {
    const available = await listAvailable();
    const model = getBestModelForTask(available);
    console.info(`[LLM] No model configured; picked ${model} from ${available.length} available model(s).`);
    return model;
  } catch (error) {
    console.warn(`[LLM] Could not list available models (${getErrorMessage(error)}). Using ${DEFAULT_MODEL}.`);
    return DEFAULT_MODEL;
  }
};
