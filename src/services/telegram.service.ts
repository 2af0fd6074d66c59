import axios, { AxiosInstance } from 'axios';
import logger from '../config/logger';
import appConfig from '../config/env';
import { AppError, describeError } from '../utils/AppError';
import { encodeAction } from '../utils/actionCodec';
import { ChatTransport, Keyboard, OutboundAttachment } from '../types/conversation';
import { TgApiResponse, TgInlineKeyboardMarkup, TgMessage, TgUpdate } from '../types/telegram';

export interface TelegramServiceOptions {
  botToken: string;
  apiUrl: string;
  httpClient?: AxiosInstance;
}

const DEFAULT_REQUEST_TIMEOUT_MS = 15000;

/**
 * Converts rows of action buttons into an inline keyboard
 */
export function toInlineKeyboard(keyboard: Keyboard): TgInlineKeyboardMarkup {
  return {
    inline_keyboard: keyboard.map((row) =>
      row.map((button) => ({ text: button.label, callback_data: encodeAction(button.action) }))
    ),
  };
}

/**
 * TelegramService handles communication with the Telegram Bot API
 */
export class TelegramService implements ChatTransport {
  private readonly axiosInstance: AxiosInstance;
  private readonly botToken: string;
  private readonly apiUrl: string;

  constructor(options: TelegramServiceOptions) {
    this.botToken = options.botToken;
    this.apiUrl = options.apiUrl.replace(/\/+$/, '');

    this.axiosInstance =
      options.httpClient ??
      axios.create({
        timeout: DEFAULT_REQUEST_TIMEOUT_MS,
        headers: {
          'Content-Type': 'application/json',
        },
      });
  }

  /**
   * Validates that the bot credential is present
   * Called before any API operation
   * @throws AppError if configuration is missing
   */
  private validateConfig(): void {
    if (!this.botToken) {
      throw new AppError('Telegram credentials not configured. Set BOT_TOKEN', 500, false);
    }
  }

  /**
   * Private helper to call a Bot API method
   * Handles the response envelope and error extraction
   */
  private async callApi<T>(method: string, payload: object, timeoutMs?: number): Promise<T> {
    this.validateConfig();

    try {
      const response = await this.axiosInstance.post<TgApiResponse<T>>(
        `${this.apiUrl}/bot${this.botToken}/${method}`,
        payload,
        timeoutMs ? { timeout: timeoutMs } : undefined
      );

      const { ok, result, description, error_code: errorCode } = response.data;
      if (!ok || result === undefined) {
        throw new AppError(`Telegram API error (${method}): ${description || 'no result'}`, errorCode || 502);
      }
      return result;
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }

      // Extract the Bot API description from HTTP error responses
      if (axios.isAxiosError<TgApiResponse<unknown>>(error)) {
        const apiError = error.response?.data;
        if (apiError?.description) {
          logger.error('Telegram API error details:', {
            method,
            code: apiError.error_code,
            description: apiError.description,
          });
          throw new AppError(
            `Telegram API error (${method}): ${apiError.description}`,
            apiError.error_code || error.response?.status || 502
          );
        }
      }

      const errorMessage = describeError(error);
      logger.error('Telegram API request failed:', { method, error: errorMessage });
      throw new AppError(`Telegram API request failed (${method}): ${errorMessage}`, 502);
    }
  }

  /**
   * Sends a message, or edits the given message in place.
   * An edit the API refuses (message too old, deleted, unchanged) falls back to a new message.
   */
  async sendOrReplaceMessage(
    chatTarget: number,
    text: string,
    keyboard?: Keyboard,
    replaceMessageId?: number
  ): Promise<void> {
    const payload = {
      chat_id: chatTarget,
      text,
      parse_mode: 'HTML',
      reply_markup: keyboard ? toInlineKeyboard(keyboard) : undefined,
    };

    if (replaceMessageId !== undefined) {
      try {
        await this.callApi<TgMessage | boolean>('editMessageText', { ...payload, message_id: replaceMessageId });
        logger.debug(`Telegram message edited: chat=${chatTarget} message=${replaceMessageId}`);
        return;
      } catch (error) {
        if (error instanceof AppError && !error.isOperational) {
          throw error;
        }
        logger.warn(`Edit refused for message ${replaceMessageId}, sending a new one`, {
          error: describeError(error),
        });
      }
    }

    const message = await this.callApi<TgMessage>('sendMessage', payload);
    logger.debug(`Telegram message sent: chat=${chatTarget} message=${message.message_id}`);
  }

  /**
   * Sends a previously received file by its file id, as a document or a photo
   */
  async sendAttachment(chatTarget: number, attachment: OutboundAttachment): Promise<void> {
    const caption = { caption: attachment.caption, parse_mode: 'HTML' };

    if (attachment.kind === 'image') {
      await this.callApi<TgMessage>('sendPhoto', { chat_id: chatTarget, photo: attachment.fileRef, ...caption });
    } else {
      await this.callApi<TgMessage>('sendDocument', { chat_id: chatTarget, document: attachment.fileRef, ...caption });
    }
    logger.debug(`Telegram ${attachment.kind} forwarded to ${chatTarget}`);
  }

  /**
   * Stops the client-side loading indicator of a button press
   */
  async acknowledge(callbackId: string): Promise<void> {
    try {
      await this.callApi<boolean>('answerCallbackQuery', { callback_query_id: callbackId });
    } catch (error) {
      // Not critical: the press is still processed
      logger.warn(`Failed to answer callback query ${callbackId}`, { error: describeError(error) });
    }
  }

  /**
   * Long-polls for updates after the given offset
   */
  async getUpdates(offset: number, timeoutSeconds: number): Promise<TgUpdate[]> {
    return this.callApi<TgUpdate[]>(
      'getUpdates',
      { offset, timeout: timeoutSeconds, allowed_updates: ['message', 'callback_query'] },
      (timeoutSeconds + 10) * 1000
    );
  }

  async setWebhook(url: string, secretToken?: string): Promise<void> {
    await this.callApi<boolean>('setWebhook', {
      url,
      secret_token: secretToken || undefined,
      allowed_updates: ['message', 'callback_query'],
    });
    logger.info(`Telegram webhook registered at ${url}`);
  }

  async deleteWebhook(): Promise<void> {
    await this.callApi<boolean>('deleteWebhook', { drop_pending_updates: false });
    logger.info('Telegram webhook removed');
  }
}

// Export singleton instance
export default new TelegramService({
  botToken: appConfig.botToken,
  apiUrl: appConfig.telegramApiUrl,
});
