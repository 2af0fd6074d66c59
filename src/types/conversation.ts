import { CryptoCode } from '../config/catalog';
import { AttachmentKind, UserId } from './session';

/**
 * Button actions understood by the conversation handler.
 * Anything the codec cannot place is carried as `unknown`.
 */
export type Action =
  | { kind: 'menu' }
  | { kind: 'back' }
  | { kind: 'new-order' }
  | { kind: 'pricing' }
  | { kind: 'info' }
  | { kind: 'support' }
  | { kind: 'level'; key: string }
  | { kind: 'deadline'; key: string }
  | { kind: 'skip-files' }
  | { kind: 'order-summary' }
  | { kind: 'pay-transfer' }
  | { kind: 'pay-crypto' }
  | { kind: 'crypto'; code: string }
  | { kind: 'payment-done'; orderRef: string }
  | { kind: 'unknown'; raw: string };

export interface KeyboardButton {
  label: string;
  action: Action;
}

/** Rows of buttons */
export type Keyboard = KeyboardButton[][];

export interface RenderedMessage {
  text: string;
  keyboard?: Keyboard;
}

export interface OutboundAttachment {
  fileRef: string;
  kind: AttachmentKind;
  caption?: string;
}

/**
 * The operator-facing rendering of an order: one text plus the files to forward
 */
export interface OperatorNotification {
  text: string;
  attachments: OutboundAttachment[];
}

export interface ChatUser {
  id: UserId;
  username?: string;
  firstName?: string;
}

/**
 * Attachment kinds as received. Only documents and images are accepted into an order.
 */
export type IncomingFileKind = AttachmentKind | 'video' | 'audio' | 'voice' | 'sticker' | 'animation';

interface EventBase {
  user: ChatUser;
  chatId: number;
}

export interface StartEvent extends EventBase {
  type: 'start';
}

export interface MenuEvent extends EventBase {
  type: 'menu';
}

export interface ButtonEvent extends EventBase {
  type: 'button';
  data: string;
  callbackId: string;
  messageId?: number;
}

export interface TextEvent extends EventBase {
  type: 'text';
  body: string;
}

export interface FileEvent extends EventBase {
  type: 'file';
  kind: IncomingFileKind;
  ref: string;
  name?: string;
  sizeBytes: number;
}

export interface CommandEvent extends EventBase {
  type: 'command';
  command: string;
  args: string[];
}

export type InboundEvent =
  | StartEvent
  | MenuEvent
  | ButtonEvent
  | TextEvent
  | FileEvent
  | CommandEvent;

/**
 * Outbound side of the messaging platform, as seen by the conversation handler
 */
export interface ChatTransport {
  sendOrReplaceMessage(
    chatTarget: number,
    text: string,
    keyboard?: Keyboard,
    replaceMessageId?: number
  ): Promise<void>;
  sendAttachment(chatTarget: number, attachment: OutboundAttachment): Promise<void>;
  acknowledge(callbackId: string): Promise<void>;
}

export type PaymentMethod =
  | { kind: 'bank-transfer' }
  | { kind: 'crypto'; code: CryptoCode };
