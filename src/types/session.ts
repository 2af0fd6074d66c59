import { DeadlineKey, LevelKey } from '../config/catalog';

/**
 * OrderStep represents the current position of the user in the conversation
 */
export enum OrderStep {
  MENU = 'menu',
  ORDER_SUBJECT = 'order_subject',
  ORDER_LEVEL = 'order_level',
  ORDER_PAGES = 'order_pages',
  ORDER_DEADLINE = 'order_deadline',
  ORDER_INSTRUCTIONS = 'order_instructions',
  ORDER_FILES = 'order_files',
  PAYMENT_SELECTION = 'payment_selection',
  SUPPORT = 'support',
}

/**
 * Chat participant identifier, stable across messages
 */
export type UserId = number;

/**
 * OrderData stores the order fields collected so far
 */
export interface OrderData {
  subject?: string;
  level?: LevelKey;
  pages?: number;
  deadline?: DeadlineKey;
  instructionsText?: string;
  finalPrice?: number;
}

export type AttachmentKind = 'document' | 'image';

export interface AttachmentDescriptor {
  externalFileRef: string;
  fileName: string;
  sizeBytes: number;
  kind: AttachmentKind;
  uploadedAt: Date;
}

/**
 * Session represents one user's conversation held by the session store
 */
export interface Session {
  userId: UserId;
  step: OrderStep;
  orderData: OrderData;
  files: AttachmentDescriptor[];
  createdAt: Date;
  lastActivityAt: Date;
}
