import type { Logger } from 'pino';
import { repeatable, retryOperation } from './retry-policy.js';
import type { RetryOutcome } from './retry-policy.js';

export interface SupervisorOptions {
  delayMs: number;
  maxAttempts: number;
  signal: AbortSignal;
}

/**
 * Keeps a long-lived background task alive.
 *
 * Every attempt calls `task` again, so each restart gets fresh resources;
 * nothing from a failed run is reused. A task that returns after the signal
 * aborted ends supervision cleanly; on cancellation the running task is
 * awaited until it has released its resources. When the attempt budget runs
 * out the last failure is rethrown for the process to exit on.
 */
export async function superviseTask(
  name: string,
  task: (signal: AbortSignal) => Promise<void>,
  log: Logger,
  options: SupervisorOptions,
): Promise<RetryOutcome<void>> {
  const running: { current?: Promise<void> } = {};
  const start = (signal: AbortSignal): Promise<void> => {
    running.current = task(signal);
    return running.current;
  };

  const outcome = await retryOperation(repeatable(start), {
    delayMs: options.delayMs,
    maxAttempts: options.maxAttempts,
    signal: options.signal,
    onRetry: (err, attempt) => {
      running.current = undefined;
      log.error(
        { err, task: name, attempt, maxAttempts: options.maxAttempts, retryInMs: options.delayMs },
        'Supervised task failed, restarting',
      );
    },
  });

  if (outcome.status === 'cancelled') {
    await running.current?.catch((err: unknown) => {
      log.error({ err, task: name }, 'Supervised task failed while stopping');
    });
    log.info({ task: name, attempts: outcome.attempts }, 'Supervised task cancelled');
  } else {
    log.info({ task: name, attempts: outcome.attempts }, 'Supervised task finished');
  }
  return outcome;
}
