import { Action } from '../types/conversation';

// Button payloads without arguments
const SIMPLE_ACTIONS = {
  menu: 'menu',
  back: 'back',
  'new-order': 'order:new',
  pricing: 'pricing',
  info: 'info',
  support: 'support',
  'skip-files': 'files:skip',
  'order-summary': 'order:summary',
  'pay-transfer': 'pay:transfer',
  'pay-crypto': 'pay:crypto',
} as const;

type SimpleActionKind = keyof typeof SIMPLE_ACTIONS;

// Button payloads carrying one argument, encoded as `<prefix><argument>`
const LEVEL_PREFIX = 'level:';
const DEADLINE_PREFIX = 'deadline:';
const CRYPTO_PREFIX = 'crypto:';
const PAID_PREFIX = 'paid:';

function isSimpleActionKind(kind: string): kind is SimpleActionKind {
  return Object.prototype.hasOwnProperty.call(SIMPLE_ACTIONS, kind);
}

/**
 * Turns an action into the callback payload carried by a button
 */
export function encodeAction(action: Action): string {
  switch (action.kind) {
    case 'level':
      return `${LEVEL_PREFIX}${action.key}`;
    case 'deadline':
      return `${DEADLINE_PREFIX}${action.key}`;
    case 'crypto':
      return `${CRYPTO_PREFIX}${action.code}`;
    case 'payment-done':
      return `${PAID_PREFIX}${action.orderRef}`;
    case 'unknown':
      return action.raw;
    default:
      return SIMPLE_ACTIONS[action.kind];
  }
}

/**
 * Parses a callback payload. Never throws: anything unrecognized becomes
 * an `unknown` action carrying the raw payload.
 */
export function parseAction(data: string): Action {
  for (const kind of Object.keys(SIMPLE_ACTIONS)) {
    if (isSimpleActionKind(kind) && SIMPLE_ACTIONS[kind] === data) {
      return { kind };
    }
  }

  const argument = (prefix: string): string | undefined =>
    data.startsWith(prefix) && data.length > prefix.length ? data.slice(prefix.length) : undefined;

  const levelKey = argument(LEVEL_PREFIX);
  if (levelKey !== undefined) {
    return { kind: 'level', key: levelKey };
  }
  const deadlineKey = argument(DEADLINE_PREFIX);
  if (deadlineKey !== undefined) {
    return { kind: 'deadline', key: deadlineKey };
  }
  const cryptoCode = argument(CRYPTO_PREFIX);
  if (cryptoCode !== undefined) {
    return { kind: 'crypto', code: cryptoCode };
  }
  const orderRef = argument(PAID_PREFIX);
  if (orderRef !== undefined) {
    return { kind: 'payment-done', orderRef };
  }

  return { kind: 'unknown', raw: data };
}
