import { CompletionClient } from '../llm/completionClient';
import { formatIssues } from '../llm/errors';
import type { LlmClient } from '../llm/llmClient';
import { createMessage, type Message } from './message';
import {
  TEXT_GENERATION_INPUTS,
  textGenerationValuesSchema,
  type InputDefinition,
  type TextGenerationValuesInput,
} from './inputs';

export interface ClientTarget {
  apiUrl: string;
  apiKey: string;
}

export type ClientFactory = (target: ClientTarget) => LlmClient;

export interface TextGenerationComponentOptions {
  clientFactory?: ClientFactory;
  /** Forwarded to the default client; ignored when `clientFactory` is given. */
  responseMaskKeys?: string[];
}

/**
 * Adapter between a workflow host and the completion client. The host hands
 * over raw field values; the component always answers with a Message.
 */
export class TextGenerationComponent {
  readonly displayName = 'Local LLM Text Generation';
  readonly description = 'Generates text with a locally hosted model through its completion API.';
  readonly inputs: readonly InputDefinition[] = TEXT_GENERATION_INPUTS;

  private readonly clientFactory: ClientFactory;

  constructor(options: TextGenerationComponentOptions = {}) {
    const responseMaskKeys = options.responseMaskKeys ?? [];
    this.clientFactory =
      options.clientFactory ??
      ((target) => new CompletionClient({ ...target, responseMaskKeys }));
  }

  async run(values: TextGenerationValuesInput): Promise<Message> {
    const parsed = textGenerationValuesSchema.safeParse(values);
    if (!parsed.success) {
      const text = `Invalid Input: ${formatIssues(parsed.error)}`;
      console.error('[TextGenerationComponent] Rejected field values', { error: text });
      return createMessage(text, 'invalid_input');
    }

    const { apiUrl, apiKey, ...settings } = parsed.data;
    const client = this.clientFactory({ apiUrl, apiKey });
    const outcome = await client.generate(settings);
    return createMessage(outcome.text, outcome.kind);
  }
}
