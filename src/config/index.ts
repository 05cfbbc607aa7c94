/**
 * Configuration management
 * Built once from the environment and handed to every component
 */
import { LogLevel } from '../utils/logger';

export interface Config {
  // Telegram
  telegram: {
    botToken: string;
    chatId: string;
  };

  // Read but never used by any delivery path
  emailRecipient: string;

  // Portal
  portal: {
    siteOrigin: string;
    baseUrl: string;
    searchUrl: string;
    userAgent: string;
    fetchTimeoutMs: number;
  };

  // Notifications
  notificationTimeoutMs: number;
  maxListingsPerDigest: number;

  // Persistence
  stateFile: string;

  logLevel: LogLevel;
}

export const SITE_ORIGIN = 'https://www.santafe.gob.ar';
export const PORTAL_BASE_URL = `${SITE_ORIGIN}/simtyss/portalempleo/`;
export const PORTAL_SEARCH_URL = `${PORTAL_BASE_URL}ofertas/`;

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36';

function parseString(value: string | undefined, defaultValue: string = ''): string {
  const trimmed = value?.trim();
  return trimmed ? trimmed : defaultValue;
}

function parseNumber(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) || parsed <= 0 ? defaultValue : parsed;
}

function parseLogLevel(value: string | undefined): LogLevel {
  switch (value?.trim().toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'warn':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    default:
      return LogLevel.INFO;
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return {
    telegram: {
      botToken: parseString(env.TELEGRAM_BOT_TOKEN),
      chatId: parseString(env.TELEGRAM_CHAT_ID),
    },
    emailRecipient: parseString(env.EMAIL_RECIPIENT),
    portal: {
      siteOrigin: SITE_ORIGIN,
      baseUrl: PORTAL_BASE_URL,
      searchUrl: PORTAL_SEARCH_URL,
      userAgent: DEFAULT_USER_AGENT,
      fetchTimeoutMs: parseNumber(env.FETCH_TIMEOUT_MS, 30_000),
    },
    notificationTimeoutMs: parseNumber(env.NOTIFICATION_TIMEOUT_MS, 10_000),
    maxListingsPerDigest: 10,
    stateFile: parseString(env.STATE_FILE, 'empleos_anteriores.json'),
    logLevel: parseLogLevel(env.LOG_LEVEL),
  };
}

/**
 * Whether the Telegram notifier has what it needs to deliver
 */
export function isTelegramConfigured(config: Config): boolean {
  return config.telegram.botToken.length > 0 && config.telegram.chatId.length > 0;
}
