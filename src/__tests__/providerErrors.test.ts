import { describe, it, expect } from 'vitest';
import { OpenAI } from 'openai';
import { classifyHttpStatus, classifyOpenAIError, classifyUnknownError } from '../providers/providerErrors';
import { AuthError, TransientNetworkError } from '../errors/PipelineError';

describe('classifyHttpStatus', () => {
  it.each([
    [401, undefined, 'AuthError'],
    [403, undefined, 'AuthError'],
    [413, undefined, 'PayloadTooLarge'],
    [429, 'insufficient_quota', 'QuotaExceeded'],
    [429, 'rate_limit_exceeded', 'TransientNetworkError'],
    [408, undefined, 'TransientNetworkError'],
    [500, undefined, 'TransientNetworkError'],
    [503, undefined, 'TransientNetworkError'],
    [400, undefined, 'ProviderError']
  ])('maps %i (%s) to %s', (status, code, kind) => {
    const error = classifyHttpStatus(status, 'failed', 'minutes', undefined, code);
    expect(error.kind).toBe(kind);
    expect(error.stage).toBe('minutes');
  });
});

describe('classifyOpenAIError', () => {
  it('uses the status and error code of API errors', () => {
    const apiError = new OpenAI.APIError(
      429,
      { code: 'insufficient_quota', message: 'You exceeded your current quota' },
      undefined,
      undefined
    );

    const error = classifyOpenAIError(apiError, 'transcription');

    expect(error.kind).toBe('QuotaExceeded');
    expect(error.stage).toBe('transcription');
    expect(error.cause).toBe(apiError);
  });

  it('treats connection failures as transient', () => {
    const error = classifyOpenAIError(new OpenAI.APIConnectionError({ message: 'socket hang up' }), 'minutes');
    expect(error).toBeInstanceOf(TransientNetworkError);
  });

  it('passes pipeline errors through unchanged', () => {
    const original = new AuthError('bad key', 'transcription');
    expect(classifyOpenAIError(original, 'transcription')).toBe(original);
  });
});

describe('classifyUnknownError', () => {
  it('treats aborted and failed fetches as transient', () => {
    const aborted = new Error('This operation was aborted');
    aborted.name = 'AbortError';

    expect(classifyUnknownError(aborted, 'minutes').kind).toBe('TransientNetworkError');
    expect(classifyUnknownError(new TypeError('fetch failed'), 'minutes').kind).toBe('TransientNetworkError');
  });

  it('reports anything else as a provider error', () => {
    const error = classifyUnknownError(new Error('model not found'), 'minutes');
    expect(error.kind).toBe('ProviderError');
    expect(error.message).toBe('model not found');
  });
});
