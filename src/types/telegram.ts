/**
 * Telegram Bot API Type Definitions
 * Only the fields this bot reads or sends
 */

/**
 * Incoming update, delivered by webhook or getUpdates
 */
export interface TgUpdate {
  update_id: number;
  message?: TgMessage;
  callback_query?: TgCallbackQuery;
}

export interface TgUser {
  id: number;
  is_bot: boolean;
  first_name: string;
  username?: string;
}

export interface TgChat {
  id: number;
  type: 'private' | 'group' | 'supergroup' | 'channel';
}

export interface TgMessageEntity {
  type: string;
  offset: number;
  length: number;
}

export interface TgFileBase {
  file_id: string;
  file_unique_id: string;
  file_size?: number;
}

export interface TgDocument extends TgFileBase {
  file_name?: string;
  mime_type?: string;
}

export interface TgPhotoSize extends TgFileBase {
  width: number;
  height: number;
}

/**
 * Telegram Message
 */
export interface TgMessage {
  message_id: number;
  from?: TgUser;
  chat: TgChat;
  date: number;
  text?: string;
  entities?: TgMessageEntity[];
  caption?: string;
  document?: TgDocument;
  photo?: TgPhotoSize[];
  video?: TgFileBase;
  video_note?: TgFileBase;
  audio?: TgFileBase;
  voice?: TgFileBase;
  sticker?: TgFileBase;
  animation?: TgFileBase;
}

/**
 * Inline keyboard button press
 */
export interface TgCallbackQuery {
  id: string;
  from: TgUser;
  message?: TgMessage;
  data?: string;
}

export interface TgInlineKeyboardButton {
  text: string;
  callback_data: string;
}

export interface TgInlineKeyboardMarkup {
  inline_keyboard: TgInlineKeyboardButton[][];
}

/**
 * Bot API response envelope
 */
export interface TgApiResponse<T> {
  ok: boolean;
  result?: T;
  description?: string;
  error_code?: number;
}
