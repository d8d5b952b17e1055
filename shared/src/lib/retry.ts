import axios from 'axios';
import { Logger, consoleLogger } from './logger';

export interface RetryOptions {
  maxRetries?: number;
  baseDelayMs?: number;
  jitterMs?: number;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

const RETRYABLE_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT']);

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export function isRetryableError(error: unknown): boolean {
  if (!axios.isAxiosError(error)) {
    return false;
  }
  const status = error.response?.status;
  if (status !== undefined) {
    return status >= 500 || status === 429;
  }
  return error.code !== undefined && RETRYABLE_CODES.has(error.code);
}

// Retry utility with exponential backoff
export async function retryWithBackoff<T>(operation: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const maxRetries = options.maxRetries ?? 3;
  const baseDelay = options.baseDelayMs ?? 1000;
  const jitter = options.jitterMs ?? 1000;
  const logger = options.logger ?? consoleLogger;
  const sleep = options.sleep ?? defaultSleep;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      if (attempt >= maxRetries || !isRetryableError(error)) {
        throw error;
      }

      const delay = Math.round(baseDelay * Math.pow(2, attempt - 1) + Math.random() * jitter);
      logger.info(`Retry attempt ${attempt}/${maxRetries} after ${delay}ms`);
      await sleep(delay);
    }
  }
}
