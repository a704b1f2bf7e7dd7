/**
 * Maps provider failures (OpenAI SDK errors, HTTP statuses, aborted requests)
 * onto the pipeline error taxonomy.
 */

import { OpenAI } from 'openai';
import {
  AuthError,
  PayloadTooLargeError,
  ProviderError,
  QuotaExceededError,
  TransientNetworkError,
  errorMessage,
  isPipelineError,
  type BoundaryStage,
  type PipelineError
} from '../errors/PipelineError';

export function classifyHttpStatus(
  status: number,
  message: string,
  stage: BoundaryStage,
  cause?: unknown,
  code?: string | null
): PipelineError {
  if (status === 401 || status === 403) {
    return new AuthError(message, stage, cause);
  }
  if (status === 413) {
    return new PayloadTooLargeError(message, stage, cause);
  }
  if (status === 429) {
    return code === 'insufficient_quota'
      ? new QuotaExceededError(message, stage, cause)
      : new TransientNetworkError(message, stage, cause);
  }
  if (status === 408 || status === 409 || status >= 500) {
    return new TransientNetworkError(message, stage, cause);
  }
  return new ProviderError(message, stage, cause);
}

export function classifyOpenAIError(error: unknown, stage: BoundaryStage): PipelineError {
  if (isPipelineError(error)) {
    return error;
  }

  // Connection failures and timeouts (APIConnectionTimeoutError extends APIConnectionError)
  if (error instanceof OpenAI.APIConnectionError || error instanceof OpenAI.APIUserAbortError) {
    return new TransientNetworkError(`OpenAI request failed: ${error.message}`, stage, error);
  }

  if (error instanceof OpenAI.APIError && error.status !== undefined) {
    return classifyHttpStatus(error.status, `OpenAI API error: ${error.message}`, stage, error, error.code);
  }

  return classifyUnknownError(error, stage);
}

/**
 * Errors thrown by fetch() itself: aborts and network failures are transient
 */
export function classifyUnknownError(error: unknown, stage: BoundaryStage): PipelineError {
  if (isPipelineError(error)) {
    return error;
  }
  if (error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')) {
    return new TransientNetworkError(`Request aborted: ${error.message}`, stage, error);
  }
  if (error instanceof TypeError && error.message.includes('fetch failed')) {
    return new TransientNetworkError(`Network error: ${error.message}`, stage, error);
  }
  return new ProviderError(errorMessage(error), stage, error);
}
