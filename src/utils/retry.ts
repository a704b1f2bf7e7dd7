import { setTimeout as sleep } from 'timers/promises';
import { TransientNetworkError, type BoundaryStage } from '../errors/PipelineError';
import { createLogger } from './logger';

const logger = createLogger({ service: 'Retry' });

export interface RetryOptions {
  /** Additional attempts after the first one */
  retries: number;
  /** Delay before retry n is backoffMs * 2^(n-1) */
  backoffMs: number;
  shouldRetry: (error: unknown) => boolean;
  label: string;
}

export async function withRetry<T>(operation: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  let attempt = 0;

  for (;;) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (attempt >= options.retries || !options.shouldRetry(error)) {
        throw error;
      }

      attempt++;
      const delayMs = options.backoffMs * 2 ** (attempt - 1);
      logger.warn({ label: options.label, attempt, delayMs, error }, 'Retrying after transient failure');
      if (delayMs > 0) {
        await sleep(delayMs);
      }
    }
  }
}

/**
 * Run an operation with a deadline. The operation receives an AbortSignal that
 * fires on timeout; the returned promise rejects with TransientNetworkError.
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  stage: BoundaryStage
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      // Settle before aborting so the race reports the timeout, not the abort error
      reject(new TransientNetworkError(`${stage} call timed out after ${timeoutMs}ms`, stage));
      controller.abort();
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
