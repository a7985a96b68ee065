/**
 * Retry-until-condition primitive.
 *
 * Cluster state such as leases and node membership is reconciled by
 * controllers running elsewhere, so a single read cannot prove or
 * disprove it. Every convergence check in the suite goes through
 * `eventually` instead of sleeping inline.
 */

import { setTimeout } from 'timers/promises';
import type { Logger } from 'pino';
import { ConvergenceTimeoutError, errorMessage } from '../errors';
import { setupLogger } from './logger';

const defaultLogger = setupLogger('node-lease:eventually');

export interface EventuallyOptions {
  /**
   * Total time budget measured from the first attempt.
   */
  timeoutMs: number;
  intervalMs: number;
  /**
   * Human readable condition, used in logs and in the timeout error.
   */
  description: string;
  logger?: Logger;
}

/**
 * Invoke `check` until it resolves or the timeout elapses.
 *
 * A rejected attempt is logged and retried. When the budget is spent the
 * returned promise rejects with a {@link ConvergenceTimeoutError} holding
 * the last failure message.
 *
 * @example
 * await eventually(async () => {
 *   if (!(await leases.get('node-a'))) throw new Error('lease missing');
 * }, { timeoutMs: 60_000, intervalMs: 5_000, description: 'lease of node-a' });
 */
export async function eventually(
  check: () => Promise<void>,
  options: EventuallyOptions
): Promise<void> {
  const { timeoutMs, intervalMs, description } = options;
  const logger = options.logger ?? defaultLogger;
  const startedAt = Date.now();
  let attempts = 0;

  for (;;) {
    attempts += 1;
    try {
      await check();
      logger.debug({ description, attempts }, 'Condition met');
      return;
    } catch (error) {
      const lastError = errorMessage(error);
      const elapsed = Date.now() - startedAt;

      if (elapsed >= timeoutMs) {
        logger.error({ description, attempts, elapsed, lastError }, 'Condition not met before timeout');
        throw new ConvergenceTimeoutError(description, timeoutMs, attempts, lastError);
      }

      logger.info({ description, attempts, elapsed, error: lastError }, 'Condition not met yet, retrying');
    }

    await setTimeout(intervalMs);
  }
}
