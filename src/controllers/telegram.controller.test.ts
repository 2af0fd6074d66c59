import {
  SECRET_HEADER,
  TelegramController,
  UpdateSink,
  WebhookRequest,
  WebhookResponse,
  isAuthorizedSecret,
  isTelegramUpdate,
} from './telegram.controller';
import { TgUpdate } from '../types/telegram';

describe('telegram controller guards', () => {
  it('recognizes update payloads', () => {
    expect(isTelegramUpdate({ update_id: 10, message: {} })).toBe(true);
    expect(isTelegramUpdate({ update_id: '10' })).toBe(false);
    expect(isTelegramUpdate(null)).toBe(false);
    expect(isTelegramUpdate('update')).toBe(false);
  });

  it('checks the secret header when a secret is configured', () => {
    expect(isAuthorizedSecret('test-secret', 'test-secret')).toBe(true);
    expect(isAuthorizedSecret('test-secret', 'other')).toBe(false);
    expect(isAuthorizedSecret('test-secret', undefined)).toBe(false);
    expect(isAuthorizedSecret('test-secret', ['test-secret'])).toBe(false);
  });

  it('accepts every request without a configured secret', () => {
    expect(isAuthorizedSecret('', undefined)).toBe(true);
  });
});

describe('TelegramController.receiveWebhook', () => {
  let calls: string[];
  let dispatched: TgUpdate[];
  let sink: UpdateSink;
  let res: WebhookResponse;

  const request = (body: unknown, secret?: string): WebhookRequest => ({
    headers: secret === undefined ? {} : { [SECRET_HEADER]: secret },
    body,
    ip: '127.0.0.1',
  });

  beforeEach(() => {
    calls = [];
    dispatched = [];
    sink = {
      dispatch: async (update) => {
        calls.push(`dispatch ${update.update_id}`);
        dispatched.push(update);
      },
    };
    res = {
      status: (code) => ({
        send: (body) => {
          calls.push(`${code} ${body}`);
          return undefined;
        },
      }),
    };
  });

  it('rejects a mismatched secret with 403 and dispatches nothing', async () => {
    const controller = new TelegramController(sink, 'test-secret');

    await controller.receiveWebhook(request({ update_id: 1 }, 'wrong-secret'), res);

    expect(calls).toEqual(['403 Forbidden']);
    expect(dispatched).toEqual([]);
  });

  it('rejects a missing secret header when a secret is configured', async () => {
    const controller = new TelegramController(sink, 'test-secret');

    await controller.receiveWebhook(request({ update_id: 1 }), res);

    expect(calls).toEqual(['403 Forbidden']);
  });

  it('answers 200 before dispatching the update', async () => {
    const controller = new TelegramController(sink, 'test-secret');
    const update = { update_id: 7 };

    await controller.receiveWebhook(request(update, 'test-secret'), res);

    expect(calls).toEqual(['200 OK', 'dispatch 7']);
    expect(dispatched).toEqual([update]);
  });

  it('acknowledges an invalid body without dispatching it', async () => {
    const controller = new TelegramController(sink, 'test-secret');

    await controller.receiveWebhook(request({ message: 'no id' }, 'test-secret'), res);

    expect(calls).toEqual(['200 OK']);
    expect(dispatched).toEqual([]);
  });

  it('accepts updates without a secret header when none is configured', async () => {
    const controller = new TelegramController(sink, '');

    await controller.receiveWebhook(request({ update_id: 3 }), res);

    expect(calls).toEqual(['200 OK', 'dispatch 3']);
  });
});
