import { TelegramPoller, UpdateSource } from './telegram.poller';
import { TgUpdate } from '../types/telegram';

class FakeUpdateSource implements UpdateSource {
  readonly offsets: number[] = [];

  constructor(private readonly batches: Array<TgUpdate[] | Error>) {}

  async getUpdates(offset: number): Promise<TgUpdate[]> {
    this.offsets.push(offset);
    const next = this.batches.shift();
    if (next instanceof Error) {
      throw next;
    }
    if (!next) {
      // Idle long poll
      await new Promise((resolve) => setTimeout(resolve, 1));
      return [];
    }
    return next;
  }
}

describe('TelegramPoller', () => {
  it('hands over updates in order and advances the offset', async () => {
    const source = new FakeUpdateSource([[{ update_id: 7 }, { update_id: 8 }], [{ update_id: 9 }]]);
    const handled: number[] = [];
    const poller = new TelegramPoller(source, async (update) => {
      handled.push(update.update_id);
    });

    await poller.pollOnce();
    await poller.pollOnce();

    expect(handled).toEqual([7, 8, 9]);
    expect(source.offsets).toEqual([0, 9]);
    expect(poller.nextOffset).toBe(10);
  });

  it('moves past an update whose handler fails', async () => {
    const source = new FakeUpdateSource([[{ update_id: 1 }, { update_id: 2 }]]);
    const handled: number[] = [];
    const poller = new TelegramPoller(source, async (update) => {
      if (update.update_id === 1) {
        throw new Error('handler failed');
      }
      handled.push(update.update_id);
    });

    await expect(poller.pollOnce()).resolves.toBe(2);
    expect(handled).toEqual([2]);
    expect(poller.nextOffset).toBe(3);
  });

  it('retries after a failed poll and stops on request', async () => {
    const source = new FakeUpdateSource([new Error('network down'), [{ update_id: 4 }]]);
    const handled: number[] = [];
    let markSeen: () => void = () => undefined;
    const seen = new Promise<void>((resolve) => {
      markSeen = resolve;
    });
    const poller = new TelegramPoller(
      source,
      async (update) => {
        handled.push(update.update_id);
        markSeen();
      },
      { retryDelayMs: 1 }
    );

    poller.start();
    await seen;
    await poller.stop();

    expect(handled).toEqual([4]);
    expect(poller.isRunning).toBe(false);
    expect(source.offsets.slice(0, 2)).toEqual([0, 0]);
  });
});
