export { CompletionClient, EMPTY_RESPONSE_WARNING, REQUEST_TIMEOUT_MS } from './llm/completionClient';
export type { CompletionClientOptions, FetchLike, HttpRequestInit, HttpResponseLike } from './llm/completionClient';
export { buildHeaders } from './llm/headers';
export { buildPayload } from './llm/payload';
export type { CompletionPayload } from './llm/payload';
export {
  DEFAULT_MAX_TOKENS,
  SAMPLING_PARAMETERS,
  generationSettingsSchema,
  resolveGenerationSettings,
} from './llm/generationParameters';
export type { GenerationSettings, GenerationSettingsInput } from './llm/generationParameters';
export type { CompletionOutcome, CompletionOutcomeKind, LlmClient } from './llm/llmClient';
export { DataProcessingError, RequestError } from './llm/errors';
export { TextGenerationComponent } from './component/textGenerationComponent';
export type { ClientFactory, TextGenerationComponentOptions } from './component/textGenerationComponent';
export { TEXT_GENERATION_INPUTS, createDefaultValues, textGenerationValuesSchema } from './component/inputs';
export type { InputDefinition, TextGenerationValues, TextGenerationValuesInput } from './component/inputs';
export { createMessage, isErrorMessage } from './component/message';
export type { Message, MessageStatus } from './component/message';
export { maskResponse, maskSensitive } from './utils/mask';
export { DEFAULT_API_URL, resolveConfig } from './utils/config';
export type { Config } from './utils/config';
