import { z } from 'zod';

export const DEFAULT_MAX_TOKENS = 250;

export type SamplingParameterKey =
  | 'temperature'
  | 'topP'
  | 'minP'
  | 'topK'
  | 'repetitionPenalty'
  | 'typicalP';

export interface SamplingParameter {
  key: SamplingParameterKey;
  /** Field name in the completion request body. */
  field: string;
  defaultValue: number;
  integer?: boolean;
}

/**
 * Sampler fields sent with every request. The server accepts many more
 * (seed, presence_penalty, mirostat_mode, ...); those go through
 * `extraParameters` until they earn a row here.
 */
export const SAMPLING_PARAMETERS = [
  { key: 'temperature', field: 'temperature', defaultValue: 0.7 },
  { key: 'topP', field: 'top_p', defaultValue: 0.9 },
  { key: 'minP', field: 'min_p', defaultValue: 0.05 },
  { key: 'topK', field: 'top_k', defaultValue: 20, integer: true },
  { key: 'repetitionPenalty', field: 'repetition_penalty', defaultValue: 1.15 },
  { key: 'typicalP', field: 'typical_p', defaultValue: 1 },
] as const satisfies readonly SamplingParameter[];

function samplingNumber(parameter: SamplingParameter) {
  const base = parameter.integer ? z.number().int() : z.number();
  return base.default(parameter.defaultValue);
}

export const generationSettingsSchema = z.object({
  prompt: z.string(),
  maxTokens: z.number().int().positive().default(DEFAULT_MAX_TOKENS),
  temperature: samplingNumber(SAMPLING_PARAMETERS[0]),
  topP: samplingNumber(SAMPLING_PARAMETERS[1]),
  minP: samplingNumber(SAMPLING_PARAMETERS[2]),
  topK: samplingNumber(SAMPLING_PARAMETERS[3]),
  repetitionPenalty: samplingNumber(SAMPLING_PARAMETERS[4]),
  typicalP: samplingNumber(SAMPLING_PARAMETERS[5]),
  stop: z.array(z.string()).default([]),
  extraParameters: z.record(z.unknown()).default({}),
});

export type GenerationSettings = z.infer<typeof generationSettingsSchema>;
export type GenerationSettingsInput = z.input<typeof generationSettingsSchema>;

/** Fills defaults for omitted parameters. Throws a ZodError on wrongly typed values. */
export function resolveGenerationSettings(input: GenerationSettingsInput): GenerationSettings {
  return generationSettingsSchema.parse(input);
}
