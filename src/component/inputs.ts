import { z } from 'zod';

import {
  DEFAULT_MAX_TOKENS,
  SAMPLING_PARAMETERS,
  generationSettingsSchema,
  type SamplingParameterKey,
} from '../llm/generationParameters';
import { DEFAULT_API_URL } from '../utils/config';

export const textGenerationValuesSchema = generationSettingsSchema.extend({
  // A cleared URL field means the default endpoint.
  apiUrl: z
    .union([z.string().url(), z.literal('')])
    .default(DEFAULT_API_URL)
    .transform((url) => url || DEFAULT_API_URL),
  apiKey: z.string().default(''),
});

export type TextGenerationValues = z.infer<typeof textGenerationValuesSchema>;
export type TextGenerationValuesInput = z.input<typeof textGenerationValuesSchema>;

export type InputKind = 'string' | 'multiline' | 'secret' | 'int' | 'float' | 'string-list';

export interface InputDefinition {
  name: keyof TextGenerationValues;
  displayName: string;
  kind: InputKind;
  defaultValue?: string | number | string[];
  required?: boolean;
  advanced?: boolean;
  info?: string;
}

const SAMPLING_LABELS: Record<SamplingParameterKey, string> = {
  temperature: 'Temperature',
  topP: 'Top P',
  minP: 'Min P',
  topK: 'Top K',
  repetitionPenalty: 'Repetition Penalty',
  typicalP: 'Typical P',
};

/** Field declarations, in display order. */
export const TEXT_GENERATION_INPUTS: readonly InputDefinition[] = [
  {
    name: 'apiUrl',
    displayName: 'API URL',
    kind: 'string',
    defaultValue: DEFAULT_API_URL,
    info: 'Completion endpoint of the local inference server.',
  },
  {
    name: 'apiKey',
    displayName: 'API Key',
    kind: 'secret',
    defaultValue: '',
    info: 'Sent as a bearer token when set.',
  },
  {
    name: 'prompt',
    displayName: 'Prompt',
    kind: 'multiline',
    required: true,
  },
  {
    name: 'maxTokens',
    displayName: 'Max Tokens',
    kind: 'int',
    defaultValue: DEFAULT_MAX_TOKENS,
  },
  ...SAMPLING_PARAMETERS.map(
    (parameter): InputDefinition => ({
      name: parameter.key,
      displayName: SAMPLING_LABELS[parameter.key],
      kind: 'integer' in parameter && parameter.integer ? 'int' : 'float',
      defaultValue: parameter.defaultValue,
      advanced: true,
    }),
  ),
  {
    name: 'stop',
    displayName: 'Stop Sequences',
    kind: 'string-list',
    defaultValue: [],
    advanced: true,
    info: 'Generation stops at the first of these strings.',
  },
];

export function createDefaultValues(): TextGenerationValues {
  return textGenerationValuesSchema.parse({ prompt: '' });
}
