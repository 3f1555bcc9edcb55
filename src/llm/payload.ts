import { SAMPLING_PARAMETERS, type GenerationSettings } from './generationParameters';

export interface CompletionPayload {
  prompt: string;
  max_tokens: number;
  stop?: string[];
  [field: string]: unknown;
}

const MODELED_FIELDS: ReadonlySet<string> = new Set([
  'prompt',
  'max_tokens',
  'stop',
  ...SAMPLING_PARAMETERS.map((parameter) => parameter.field),
]);

export function buildPayload(settings: GenerationSettings): CompletionPayload {
  const payload: CompletionPayload = {
    prompt: settings.prompt,
    max_tokens: settings.maxTokens,
  };

  for (const parameter of SAMPLING_PARAMETERS) {
    payload[parameter.field] = settings[parameter.key];
  }

  // Extras only add fields; the modeled ones above always win.
  for (const [field, value] of Object.entries(settings.extraParameters)) {
    if (value === undefined || MODELED_FIELDS.has(field)) {
      continue;
    }
    payload[field] = value;
  }

  const stop = settings.stop.filter((sequence) => sequence.length > 0);
  if (stop.length > 0) {
    payload.stop = stop;
  }

  return payload;
}
