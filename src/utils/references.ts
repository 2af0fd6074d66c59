import crypto from 'crypto';
import { UserId } from '../types/session';

const ORDER_PREFIX = 'SD';

/**
 * Generates a display-only order reference: SD + 8 uppercase hex characters
 * @returns e.g. SD9F3A01BC
 */
export function generateOrderReference(): string {
  return `${ORDER_PREFIX}${crypto.randomBytes(4).toString('hex').toUpperCase()}`;
}

/**
 * Formats a date as YYYY-MM-DD in local time
 */
export function formatCalendarDate(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${date.getFullYear()}-${month}-${day}`;
}

/**
 * Derives the support thread reference of a user for a given day.
 * Same user, same calendar day, same reference.
 */
export function supportThreadReference(userId: UserId, date: Date = new Date()): string {
  return crypto
    .createHash('md5')
    .update(`${userId}_${formatCalendarDate(date)}`)
    .digest('hex')
    .slice(0, 8);
}

/**
 * Parses a chat participant id typed by the operator
 * @throws Error if the value is not a whole number
 */
export function parseUserId(value: string): UserId {
  const trimmed = value.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    throw new Error(`Invalid user id: ${value}`);
  }
  const userId = Number(trimmed);
  if (!Number.isSafeInteger(userId)) {
    throw new Error(`Invalid user id: ${value}`);
  }
  return userId;
}
