import dotenv from 'dotenv';
import { AppError } from '../utils/AppError';

dotenv.config();

export type UpdateMode = 'webhook' | 'polling';

export interface BankAccount {
  iban: string;
  bic: string;
  holder: string;
  bank: string;
}

export interface AppConfig {
  botToken: string;
  operatorId: number;
  maxSessions: number;
  sessionTimeoutSeconds: number;
  maxFilesPerOrder: number;
  supportDisplayName: string;
  updateMode: UpdateMode;
  publicUrl: string;
  webhookSecret: string;
  telegramApiUrl: string;
  port: number;
  bankAccount: BankAccount;
  cryptoAddresses: Record<string, string>;
}

/**
 * Reads a positive integer from the environment, falling back to the default
 * when the variable is unset or does not parse
 */
function readPositiveInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) {
    return fallback;
  }
  const value = parseInt(raw, 10);
  return isNaN(value) || value <= 0 ? fallback : value;
}

function readUpdateMode(): UpdateMode {
  return process.env.UPDATE_MODE === 'polling' ? 'polling' : 'webhook';
}

/**
 * Builds the process configuration from environment variables.
 * Never throws: missing credentials are reported by validateAppConfig()
 */
export function loadAppConfig(): AppConfig {
  return {
    botToken: process.env.BOT_TOKEN || '',
    operatorId: parseInt(process.env.OPERATOR_ID || '0', 10) || 0,
    maxSessions: readPositiveInt('MAX_SESSIONS', 100),
    sessionTimeoutSeconds: readPositiveInt('SESSION_TIMEOUT', 1800), // 30 minutes
    maxFilesPerOrder: readPositiveInt('MAX_FILES_PER_ORDER', 5),
    supportDisplayName: process.env.SUPPORT_DISPLAY_NAME || 'Academic Support',
    updateMode: readUpdateMode(),
    publicUrl: (process.env.PUBLIC_URL || '').replace(/\/+$/, ''),
    webhookSecret: process.env.WEBHOOK_SECRET || '',
    telegramApiUrl: process.env.TELEGRAM_API_URL || 'https://api.telegram.org',
    port: readPositiveInt('PORT', 3000),
    bankAccount: {
      iban: process.env.BANK_IBAN || 'XX00 0000 0000 0000 0000 0000 000',
      bic: process.env.BANK_BIC || 'XXXXXXXX',
      holder: process.env.BANK_HOLDER || 'ScribeDesk Services',
      bank: process.env.BANK_NAME || 'Example Bank',
    },
    cryptoAddresses: {
      BTC: process.env.CRYPTO_BTC_ADDRESS || 'btc-address-not-configured',
      ETH: process.env.CRYPTO_ETH_ADDRESS || 'eth-address-not-configured',
      USDT: process.env.CRYPTO_USDT_ADDRESS || 'usdt-address-not-configured',
    },
  };
}

/**
 * Checks the settings the bot cannot run without
 * @throws AppError naming the first missing setting
 */
export function validateAppConfig(config: AppConfig): void {
  if (!config.botToken) {
    throw new AppError('BOT_TOKEN is missing. Set it to the bot credential', 500, false);
  }
  if (!config.operatorId) {
    throw new AppError('OPERATOR_ID is missing or not numeric. Set it to the operator chat id', 500, false);
  }
}

const appConfig: AppConfig = loadAppConfig();

export default appConfig;
