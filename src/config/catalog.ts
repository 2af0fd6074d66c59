/**
 * Static catalog: academic levels, delivery deadlines and accepted
 * crypto-currencies. Loaded once, never mutated.
 */

export interface AcademicLevel {
  name: string;
  glyph: string;
  basePrice: number;
}

export interface DeadlineOption {
  label: string;
  multiplier: number;
}

export interface CryptoCurrency {
  name: string;
  glyph: string;
}

export const ACADEMIC_LEVELS = {
  high_school: { name: 'High school', glyph: '🎓', basePrice: 18.0 },
  bachelor: { name: 'Bachelor', glyph: '📚', basePrice: 22.0 },
  master: { name: 'Master', glyph: '🎯', basePrice: 26.0 },
  phd: { name: 'PhD', glyph: '🔬', basePrice: 32.0 },
} satisfies Record<string, AcademicLevel>;

// Display order is insertion order
export const DEADLINE_OPTIONS = {
  '6h': { label: 'Express - 6h', multiplier: 1.8 },
  '12h': { label: 'Urgent - 12h', multiplier: 1.7 },
  '24h': { label: 'Fast - 24h', multiplier: 1.5 },
  '48h': { label: 'Standard - 48h', multiplier: 1.3 },
  '3d': { label: 'Normal - 3 days', multiplier: 1.2 },
  '7d': { label: 'Planned - 7 days', multiplier: 1.0 },
  '14d': { label: 'Economy - 14 days', multiplier: 0.9 },
} satisfies Record<string, DeadlineOption>;

export const CRYPTO_CURRENCIES = {
  BTC: { name: 'Bitcoin', glyph: '₿' },
  ETH: { name: 'Ethereum', glyph: 'Ξ' },
  USDT: { name: 'Tether', glyph: '₮' },
} satisfies Record<string, CryptoCurrency>;

export type LevelKey = keyof typeof ACADEMIC_LEVELS;
export type DeadlineKey = keyof typeof DEADLINE_OPTIONS;
export type CryptoCode = keyof typeof CRYPTO_CURRENCIES;

/** Effective per-page price never exceeds this, whatever the multiplier */
export const CEILING_PER_PAGE = 50.0;

export const MIN_PAGES = 1;
export const MAX_PAGES = 50;

export const MAX_FILE_SIZE_BYTES = 20 * 1024 * 1024; // 20 MiB

export const WORDS_PER_PAGE = 350;

export function isLevelKey(key: string): key is LevelKey {
  return Object.prototype.hasOwnProperty.call(ACADEMIC_LEVELS, key);
}

export function isDeadlineKey(key: string): key is DeadlineKey {
  return Object.prototype.hasOwnProperty.call(DEADLINE_OPTIONS, key);
}

export function isCryptoCode(code: string): code is CryptoCode {
  return Object.prototype.hasOwnProperty.call(CRYPTO_CURRENCIES, code);
}

export function levelKeys(): LevelKey[] {
  return Object.keys(ACADEMIC_LEVELS).filter(isLevelKey);
}

export function deadlineKeys(): DeadlineKey[] {
  return Object.keys(DEADLINE_OPTIONS).filter(isDeadlineKey);
}

export function cryptoCodes(): CryptoCode[] {
  return Object.keys(CRYPTO_CURRENCIES).filter(isCryptoCode);
}
