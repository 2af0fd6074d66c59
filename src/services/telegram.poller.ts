import logger from '../config/logger';
import { describeError } from '../utils/AppError';
import { TgUpdate } from '../types/telegram';

/**
 * Where polled updates come from
 */
export interface UpdateSource {
  getUpdates(offset: number, timeoutSeconds: number): Promise<TgUpdate[]>;
}

export interface PollerOptions {
  timeoutSeconds: number;
  retryDelayMs: number;
}

const DEFAULT_OPTIONS: PollerOptions = {
  timeoutSeconds: 30,
  retryDelayMs: 5000,
};

/**
 * TelegramPoller pulls updates with getUpdates and hands each one over in order.
 * The offset only moves past an update after its handler has returned.
 */
export class TelegramPoller {
  private readonly options: PollerOptions;
  private offset = 0;
  private running = false;
  private loop?: Promise<void>;
  private wakeUp?: () => void;

  constructor(
    private readonly source: UpdateSource,
    private readonly onUpdate: (update: TgUpdate) => Promise<void>,
    options: Partial<PollerOptions> = {}
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  get isRunning(): boolean {
    return this.running;
  }

  get nextOffset(): number {
    return this.offset;
  }

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    logger.info('Telegram polling started', { timeoutSeconds: this.options.timeoutSeconds });
    this.loop = this.run();
  }

  /**
   * Stops polling. Resolves once the current cycle has finished.
   */
  async stop(): Promise<void> {
    this.running = false;
    this.wakeUp?.();
    await this.loop;
    logger.info('Telegram polling stopped');
  }

  /**
   * One getUpdates round trip
   * @returns number of updates handled
   */
  async pollOnce(): Promise<number> {
    const updates = await this.source.getUpdates(this.offset, this.options.timeoutSeconds);

    for (const update of updates) {
      try {
        await this.onUpdate(update);
      } catch (error) {
        logger.error(`Failed to handle update ${update.update_id}`, { error: describeError(error) });
      }
      this.offset = Math.max(this.offset, update.update_id + 1);
    }
    return updates.length;
  }

  private async run(): Promise<void> {
    while (this.running) {
      try {
        await this.pollOnce();
      } catch (error) {
        logger.error('Polling failed, retrying', {
          error: describeError(error),
          retryDelayMs: this.options.retryDelayMs,
        });
        await this.pause(this.options.retryDelayMs);
      }
    }
  }

  private pause(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(resolve, ms);
      this.wakeUp = () => {
        clearTimeout(timer);
        resolve();
      };
    });
  }
}
