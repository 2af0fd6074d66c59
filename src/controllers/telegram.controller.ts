import { IncomingHttpHeaders } from 'http';
import logger from '../config/logger';
import appConfig from '../config/env';
import updateDispatcher from '../handlers/update.dispatcher';
import { TgUpdate } from '../types/telegram';

export const SECRET_HEADER = 'x-telegram-bot-api-secret-token';

/**
 * Shallow shape check of a webhook body
 */
export function isTelegramUpdate(body: unknown): body is TgUpdate {
  return (
    typeof body === 'object' &&
    body !== null &&
    'update_id' in body &&
    typeof body.update_id === 'number'
  );
}

/**
 * Compares the secret header with the configured secret. No secret configured accepts everything.
 */
export function isAuthorizedSecret(expected: string, received: string | string[] | undefined): boolean {
  if (!expected) {
    return true;
  }
  return received === expected;
}

/**
 * The parts of an express request and response the webhook uses
 */
export interface WebhookRequest {
  headers: IncomingHttpHeaders;
  body: unknown;
  ip?: string;
}

export interface WebhookResponse {
  status(code: number): { send(body: string): unknown };
}

export interface UpdateSink {
  dispatch(update: TgUpdate): Promise<void>;
}

/**
 * TelegramController receives webhook updates
 */
export class TelegramController {
  constructor(
    private readonly dispatcher: UpdateSink,
    private readonly webhookSecret: string
  ) {}

  /**
   * Receives an update from the Bot API
   * POST /webhook
   */
  async receiveWebhook(req: WebhookRequest, res: WebhookResponse): Promise<void> {
    if (!isAuthorizedSecret(this.webhookSecret, req.headers[SECRET_HEADER])) {
      logger.warn('Webhook rejected: secret token mismatch', { ip: req.ip });
      res.status(403).send('Forbidden');
      return;
    }

    // Always return 200 OK immediately, the Bot API retries anything else
    res.status(200).send('OK');

    const { body } = req;
    if (!isTelegramUpdate(body)) {
      logger.warn('Telegram webhook: invalid payload structure');
      return;
    }

    logger.debug(`Telegram update received: ${body.update_id}`);
    await this.dispatcher.dispatch(body);
  }
}

// Export singleton instance
export default new TelegramController(updateDispatcher, appConfig.webhookSecret);
