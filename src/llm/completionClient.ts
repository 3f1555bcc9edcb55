import { z } from 'zod';

import type { CompletionOutcome, LlmClient } from './llmClient';
import type { GenerationSettings } from './generationParameters';
import { DataProcessingError, RequestError, describeError, formatIssues } from './errors';
import { buildHeaders } from './headers';
import { buildPayload, type CompletionPayload } from './payload';
import { maskResponse, maskSensitive } from '../utils/mask';
import { executeWithTimeout } from '../utils/timing';
import { DEFAULT_API_URL } from '../utils/config';

export const REQUEST_TIMEOUT_MS = 60_000;

export const EMPTY_RESPONSE_WARNING =
  'Warning: The API returned an empty response. No text was generated.';

const SENSITIVE_HEADERS = ['Authorization'];

export const ERROR_BODY_MAX_CHARS = 200;

export interface HttpRequestInit {
  method: 'POST';
  headers: Record<string, string>;
  body: string;
  signal: AbortSignal;
}

export interface HttpResponseLike {
  ok: boolean;
  status: number;
  statusText: string;
  text(): Promise<string>;
}

export type FetchLike = (url: string, init: HttpRequestInit) => Promise<HttpResponseLike>;

export interface CompletionClientOptions {
  apiUrl?: string;
  apiKey?: string;
  /** Keys hidden when the parsed response is logged. Empty by default. */
  responseMaskKeys?: string[];
  fetch?: FetchLike;
}

const completionResponseSchema = z
  .object({
    choices: z
      .array(z.object({ text: z.string().nullish() }).passthrough())
      .min(1),
  })
  .passthrough();

export class CompletionClient implements LlmClient {
  private readonly apiUrl: string;
  private readonly apiKey: string;
  private readonly responseMaskKeys: string[];
  private readonly fetchImpl: FetchLike;

  constructor(options: CompletionClientOptions = {}) {
    this.apiUrl = options.apiUrl || DEFAULT_API_URL;
    this.apiKey = options.apiKey ?? '';
    this.responseMaskKeys = options.responseMaskKeys ?? [];
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
  }

  async generate(settings: GenerationSettings): Promise<CompletionOutcome> {
    const headers = buildHeaders(this.apiKey);
    const payload = buildPayload(settings);

    console.log('[CompletionClient] Sending completion request', {
      url: this.apiUrl,
      headers: maskSensitive(headers, SENSITIVE_HEADERS),
      payload,
    });

    let bodyText: string;
    try {
      bodyText = await this.post(headers, payload);
    } catch (err) {
      const message = `Request Error: ${describeError(err)}`;
      console.error('[CompletionClient] Completion request failed', { url: this.apiUrl, error: message });
      return { kind: 'request_error', text: message };
    }

    let parsed: z.infer<typeof completionResponseSchema>;
    try {
      parsed = this.parseResponse(bodyText);
    } catch (err) {
      const message = `Data Processing Error: ${describeError(err)}`;
      console.error('[CompletionClient] Could not process completion response', {
        url: this.apiUrl,
        error: message,
      });
      return { kind: 'data_processing_error', text: message };
    }

    const text = parsed.choices[0]?.text ?? '';
    if (!text) {
      console.warn('[CompletionClient] Completion returned no text', { url: this.apiUrl });
      return { kind: 'empty', text: EMPTY_RESPONSE_WARNING, raw: parsed };
    }

    return { kind: 'generated', text, raw: parsed };
  }

  private async post(headers: Record<string, string>, payload: CompletionPayload): Promise<string> {
    try {
      return await executeWithTimeout(async (signal) => {
        const response = await this.fetchImpl(this.apiUrl, {
          method: 'POST',
          headers,
          body: JSON.stringify(payload),
          signal,
        });
        if (!response.ok) {
          const status = `HTTP ${response.status} ${response.statusText}`.trim();
          const detail = truncate((await response.text()).trim(), ERROR_BODY_MAX_CHARS);
          throw new RequestError(`${status} from ${this.apiUrl}${detail ? `: ${detail}` : ''}`);
        }
        return response.text();
      }, REQUEST_TIMEOUT_MS);
    } catch (err) {
      if (err instanceof RequestError) {
        throw err;
      }
      throw new RequestError(describeError(err), { cause: err });
    }
  }

  private parseResponse(bodyText: string): z.infer<typeof completionResponseSchema> {
    let json: unknown;
    try {
      json = JSON.parse(bodyText);
    } catch (err) {
      throw new DataProcessingError(`invalid JSON in response: ${describeError(err)}`, { cause: err });
    }

    console.log('[CompletionClient] Received completion response', {
      response: maskResponse(json, this.responseMaskKeys),
    });

    const result = completionResponseSchema.safeParse(json);
    if (!result.success) {
      throw new DataProcessingError(`unexpected response shape (${formatIssues(result.error)})`, {
        cause: result.error,
      });
    }
    return result.data;
  }
}

function truncate(text: string, maxChars: number): string {
  return text.length > maxChars ? `${text.slice(0, maxChars)}...` : text;
}
