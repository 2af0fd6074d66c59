import { ChatUser, InboundEvent, IncomingFileKind } from '../types/conversation';
import { TgFileBase, TgMessage, TgUpdate, TgUser } from '../types/telegram';

const COMMAND_PATTERN = /^\/([A-Za-z0-9_]+)(?:@\w+)?(?:\s+([\s\S]*))?$/;

const UNSUPPORTED_MEDIA: ReadonlyArray<[keyof TgMessage, IncomingFileKind]> = [
  ['video', 'video'],
  ['video_note', 'video'],
  ['animation', 'animation'],
  ['audio', 'audio'],
  ['voice', 'voice'],
  ['sticker', 'sticker'],
];

function toChatUser(user: TgUser): ChatUser {
  return { id: user.id, username: user.username, firstName: user.first_name };
}

function isFile(value: unknown): value is TgFileBase {
  return typeof value === 'object' && value !== null && 'file_id' in value;
}

function mapMessage(message: TgMessage): InboundEvent | undefined {
  if (!message.from) {
    return undefined;
  }
  const base = { user: toChatUser(message.from), chatId: message.chat.id };

  if (message.text !== undefined) {
    const match = COMMAND_PATTERN.exec(message.text.trim());
    if (!match) {
      return { ...base, type: 'text', body: message.text };
    }

    const command = match[1].toLowerCase();
    if (command === 'start') {
      return { ...base, type: 'start' };
    }
    if (command === 'menu') {
      return { ...base, type: 'menu' };
    }
    const args = (match[2] ?? '').split(/\s+/).filter((arg) => arg.length > 0);
    return { ...base, type: 'command', command, args };
  }

  if (message.document) {
    return {
      ...base,
      type: 'file',
      kind: 'document',
      ref: message.document.file_id,
      name: message.document.file_name,
      sizeBytes: message.document.file_size ?? 0,
    };
  }

  if (message.photo && message.photo.length > 0) {
    // Sizes are listed smallest first
    const largest = message.photo[message.photo.length - 1];
    return { ...base, type: 'file', kind: 'image', ref: largest.file_id, sizeBytes: largest.file_size ?? 0 };
  }

  for (const [field, kind] of UNSUPPORTED_MEDIA) {
    const media = message[field];
    if (isFile(media)) {
      return { ...base, type: 'file', kind, ref: media.file_id, sizeBytes: media.file_size ?? 0 };
    }
  }

  return undefined;
}

/**
 * Maps a Bot API update to a conversation event
 * @returns undefined for updates the bot does not react to
 */
export function mapUpdate(update: TgUpdate): InboundEvent | undefined {
  const query = update.callback_query;
  if (query) {
    // A query without data is still answered, so the client stops its spinner
    return {
      type: 'button',
      user: toChatUser(query.from),
      chatId: query.message?.chat.id ?? query.from.id,
      data: query.data ?? '',
      callbackId: query.id,
      messageId: query.message?.message_id,
    };
  }

  return update.message ? mapMessage(update.message) : undefined;
}
