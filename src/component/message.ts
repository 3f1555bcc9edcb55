import type { CompletionOutcomeKind } from '../llm/llmClient';

export type MessageStatus = CompletionOutcomeKind | 'invalid_input';

/** Text-bearing result handed back to the workflow host. */
export interface Message {
  text: string;
  status: MessageStatus;
}

export function createMessage(text: string, status: MessageStatus): Message {
  return { text, status };
}

export function isErrorMessage(message: Message): boolean {
  return (
    message.status === 'request_error' ||
    message.status === 'data_processing_error' ||
    message.status === 'invalid_input'
  );
}
