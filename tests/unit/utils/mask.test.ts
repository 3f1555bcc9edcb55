import { MASK_PLACEHOLDER, maskResponse, maskSensitive } from 'src/utils/mask';

describe('maskSensitive', () => {
  it('never passes the real Authorization value through', () => {
    const headers = {
      'Content-Type': 'application/json',
      Authorization: 'Bearer test-secret',
    };

    const masked = maskSensitive(headers, ['Authorization']);

    expect(masked).toEqual({
      'Content-Type': 'application/json',
      Authorization: MASK_PLACEHOLDER,
    });
    expect(headers.Authorization).toBe('Bearer test-secret');
  });

  it('matches keys without regard to case', () => {
    expect(maskSensitive({ authorization: 'Bearer test-secret' }, ['Authorization'])).toEqual({
      authorization: '***',
    });
  });

  it('leaves empty values and unlisted keys alone', () => {
    expect(maskSensitive({ Authorization: '', Accept: 'text/plain' }, ['Authorization'], '[hidden]')).toEqual({
      Authorization: '',
      Accept: 'text/plain',
    });
  });
});

describe('maskResponse', () => {
  it('returns the same value when no keys are configured', () => {
    const body = { id: 'cmpl-1', choices: [{ text: 'hi' }] };
    expect(maskResponse(body, [])).toBe(body);
  });

  it('masks listed keys at any depth', () => {
    const body = {
      id: 'cmpl-1',
      choices: [{ text: 'hi', logprobs: { tokens: ['h', 'i'] } }],
      usage: { prompt_tokens: 3 },
    };

    expect(maskResponse(body, ['tokens', 'usage'])).toEqual({
      id: 'cmpl-1',
      choices: [{ text: 'hi', logprobs: { tokens: '***' } }],
      usage: '***',
    });
    expect(body.usage).toEqual({ prompt_tokens: 3 });
  });

  it('passes primitives through', () => {
    expect(maskResponse('plain', ['text'])).toBe('plain');
    expect(maskResponse(null, ['text'])).toBeNull();
  });
});
