import { TextGenerationComponent, type ClientTarget } from 'src/component/textGenerationComponent';
import {
  CompletionClient,
  type HttpRequestInit,
  type HttpResponseLike,
} from 'src/llm/completionClient';
import type { GenerationSettings } from 'src/llm/generationParameters';
import type { CompletionOutcome, LlmClient } from 'src/llm/llmClient';
import { DEFAULT_API_URL } from 'src/utils/config';

function fakeClient(outcome: CompletionOutcome) {
  const generate = jest.fn<Promise<CompletionOutcome>, [GenerationSettings]>(async () => outcome);
  const client: LlmClient = { generate };
  return { client, generate };
}

describe('TextGenerationComponent', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('builds a client for the target and wraps the generated text', async () => {
    const { client, generate } = fakeClient({ kind: 'generated', text: 'Hi there' });
    const clientFactory = jest.fn<LlmClient, [ClientTarget]>(() => client);
    const component = new TextGenerationComponent({ clientFactory });

    const message = await component.run({ prompt: 'Hi', apiKey: 'test-secret' });

    expect(message).toEqual({ text: 'Hi there', status: 'generated' });
    expect(clientFactory).toHaveBeenCalledWith({ apiUrl: DEFAULT_API_URL, apiKey: 'test-secret' });
    expect(generate).toHaveBeenCalledWith({
      prompt: 'Hi',
      maxTokens: 250,
      temperature: 0.7,
      topP: 0.9,
      minP: 0.05,
      topK: 20,
      repetitionPenalty: 1.15,
      typicalP: 1,
      stop: [],
      extraParameters: {},
    });
  });

  it('passes error outcomes through as message text', async () => {
    const { client } = fakeClient({
      kind: 'request_error',
      text: 'Request Error: HTTP 503 Service Unavailable from http://127.0.0.1:5000/v1/completions',
    });
    const component = new TextGenerationComponent({ clientFactory: () => client });

    const message = await component.run({ prompt: 'Hi' });

    expect(message).toEqual({
      text: 'Request Error: HTTP 503 Service Unavailable from http://127.0.0.1:5000/v1/completions',
      status: 'request_error',
    });
  });

  it('answers invalid field values with a message instead of throwing', async () => {
    const clientFactory = jest.fn<LlmClient, [ClientTarget]>();
    const component = new TextGenerationComponent({ clientFactory });

    const message = await component.run({ prompt: 'Hi', maxTokens: -5 });

    expect(message).toEqual({
      text: 'Invalid Input: maxTokens: Number must be greater than 0',
      status: 'invalid_input',
    });
    expect(clientFactory).not.toHaveBeenCalled();
  });

  it('uses the default endpoint when the URL field is cleared', async () => {
    const { client } = fakeClient({ kind: 'generated', text: 'ok' });
    const clientFactory = jest.fn<LlmClient, [ClientTarget]>(() => client);
    const component = new TextGenerationComponent({ clientFactory });

    const message = await component.run({ prompt: 'Hi', apiUrl: '' });

    expect(message.status).toBe('generated');
    expect(clientFactory).toHaveBeenCalledWith({ apiUrl: DEFAULT_API_URL, apiKey: '' });
  });

  it('rejects an API URL that is not a URL', async () => {
    const component = new TextGenerationComponent({ clientFactory: jest.fn<LlmClient, [ClientTarget]>() });

    const message = await component.run({ prompt: 'Hi', apiUrl: 'localhost without scheme' });

    expect(message.status).toBe('invalid_input');
    expect(message.text.startsWith('Invalid Input: apiUrl:')).toBe(true);
  });

  it('runs end to end through the completion client', async () => {
    const fetchMock = jest.fn<Promise<HttpResponseLike>, [string, HttpRequestInit]>(async () => ({
      ok: true,
      status: 200,
      statusText: 'OK',
      text: async () => JSON.stringify({ choices: [{ text: ' a brave knight.' }] }),
    }));
    const component = new TextGenerationComponent({
      clientFactory: (target) => new CompletionClient({ ...target, fetch: fetchMock }),
    });

    const message = await component.run({
      apiUrl: 'http://localhost:5001/v1/completions',
      prompt: 'Once there was',
      maxTokens: 12,
      stop: ['.'],
    });

    expect(message).toEqual({ text: ' a brave knight.', status: 'generated' });
    expect(fetchMock.mock.calls[0][0]).toBe('http://localhost:5001/v1/completions');
    expect(JSON.parse(fetchMock.mock.calls[0][1].body)).toMatchObject({
      prompt: 'Once there was',
      max_tokens: 12,
      stop: ['.'],
    });
  });

  it('declares its input fields', () => {
    const component = new TextGenerationComponent();
    expect(component.inputs.map((input) => input.name)).toEqual([
      'apiUrl',
      'apiKey',
      'prompt',
      'maxTokens',
      'temperature',
      'topP',
      'minP',
      'topK',
      'repetitionPenalty',
      'typicalP',
      'stop',
    ]);
  });
});
