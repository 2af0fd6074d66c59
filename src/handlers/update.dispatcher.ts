import logger from '../config/logger';
import conversationHandler from './conversation.handler';
import { InboundEvent } from '../types/conversation';
import { TgUpdate } from '../types/telegram';
import { SerialQueue } from '../utils/serialQueue';
import { mapUpdate } from '../utils/updateMapper';

export interface EventHandler {
  handleEvent(event: InboundEvent): Promise<void>;
}

/**
 * UpdateDispatcher maps raw updates to conversation events and feeds them
 * through a single queue, so each event finishes before the next one starts
 * whichever user it belongs to.
 */
export class UpdateDispatcher {
  constructor(
    private readonly handler: EventHandler,
    private readonly queue: SerialQueue = new SerialQueue()
  ) {}

  get pending(): number {
    return this.queue.size;
  }

  /**
   * Queues an update
   * @returns a promise settled once the update has been handled, never rejected
   */
  dispatch(update: TgUpdate): Promise<void> {
    const event = mapUpdate(update);
    if (!event) {
      logger.debug(`Update ${update.update_id} ignored`);
      return Promise.resolve();
    }
    return this.queue.push(() => this.handler.handleEvent(event), `update ${update.update_id}`);
  }
}

// Export singleton instance
export default new UpdateDispatcher(conversationHandler);
