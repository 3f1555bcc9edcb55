import { DEFAULT_MAX_TOKENS, SAMPLING_PARAMETERS } from '../llm/generationParameters';

export const DEFAULT_API_URL = 'http://127.0.0.1:5000/v1/completions';

type Env = Record<string, string | undefined>;

export type Config = {
  apiUrl: string;
  apiKey: string;
  maxTokens: number;
  temperature: number;
  responseMaskKeys: string[];
};

const DEFAULT_TEMPERATURE = SAMPLING_PARAMETERS[0].defaultValue;

export function resolveConfig(env: Env = process.env): Config {
  const apiUrl = env.LLM_API_URL?.trim() || DEFAULT_API_URL;
  const apiKey = env.LLM_API_KEY?.trim() ?? '';

  const maxTokens = Math.max(1, Math.floor(numberFromEnv(env, 'LLM_MAX_TOKENS', DEFAULT_MAX_TOKENS)));
  const temperature = Math.max(0, numberFromEnv(env, 'LLM_TEMPERATURE', DEFAULT_TEMPERATURE));

  const responseMaskKeys = (env.LLM_RESPONSE_MASK_KEYS ?? '')
    .split(',')
    .map((key) => key.trim())
    .filter((key) => key.length > 0);

  return {
    apiUrl,
    apiKey,
    maxTokens,
    temperature,
    responseMaskKeys,
  };
}

function numberFromEnv(env: Env, name: string, defaultValue: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return defaultValue;
  }
  const value = Number(raw);
  if (Number.isFinite(value)) {
    return value;
  }
  console.warn(`[TextGeneration] Invalid numeric env ${name}: ${raw}`);
  return defaultValue;
}
