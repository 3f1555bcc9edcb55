import type { GenerationSettings } from './generationParameters';

export type CompletionOutcomeKind =
  | 'generated'
  | 'empty'
  | 'request_error'
  | 'data_processing_error';

export interface CompletionOutcome {
  kind: CompletionOutcomeKind;
  text: string;
  raw?: unknown;
}

export interface LlmClient {
  generate(settings: GenerationSettings): Promise<CompletionOutcome>;
}
