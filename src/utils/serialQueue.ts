import logger from '../config/logger';
import { describeError } from './AppError';

/**
 * Runs tasks one at a time in submission order.
 * A failing task is logged and does not stop the ones queued after it.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  get size(): number {
    return this.pending;
  }

  /**
   * Queues a task
   * @returns a promise settled once this task has run, never rejected
   */
  push(task: () => Promise<void>, label = 'task'): Promise<void> {
    this.pending++;

    const run = async (): Promise<void> => {
      try {
        await task();
      } catch (error) {
        logger.error(`Queued ${label} failed`, { error: describeError(error) });
      } finally {
        this.pending--;
      }
    };

    this.tail = this.tail.then(run);
    return this.tail;
  }

  /**
   * Resolves once everything queued so far has run
   */
  drain(): Promise<void> {
    return this.tail;
  }
}
