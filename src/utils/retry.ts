/**
 * 有界重试
 *
 * 每次尝试都是完整的一轮,失败后按固定间隔再来,
 * 最后一次失败后不再等待。
 */
import { RetryPolicy } from '../types';
import { logger } from './logger';

/**
 * 等待指定毫秒数
 */
export const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: unknown; attempts: number };

export interface RetryHooks {
  onAttemptFailed?: (error: unknown, attempt: number, willRetry: boolean) => void | Promise<void>;
  sleep?: (ms: number) => Promise<void>;
}

export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  hooks: RetryHooks = {}
): Promise<RetryOutcome<T>> {
  const sleep = hooks.sleep ?? delay;
  const maxAttempts = Math.max(1, policy.maxRetries);
  let lastError: unknown = new Error('未执行任何尝试');

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      const value = await operation(attempt);
      return { ok: true, value, attempts: attempt };
    } catch (error) {
      lastError = error;
      const willRetry = attempt < maxAttempts;

      if (hooks.onAttemptFailed) {
        try {
          await hooks.onAttemptFailed(error, attempt, willRetry);
        } catch (hookError) {
          logger.warn('Retry', 'onAttemptFailed 回调出错', hookError);
        }
      }

      if (!willRetry) {
        return { ok: false, error, attempts: attempt };
      }

      const wait = policy.retryInterval;
      logger.info('Retry', `${(wait / 1000).toFixed(0)} 秒后重试 (${attempt + 1}/${maxAttempts})`);
      await sleep(wait);
    }
  }

  return { ok: false, error: lastError, attempts: maxAttempts };
}
