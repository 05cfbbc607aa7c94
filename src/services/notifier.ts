import TelegramBot from 'node-telegram-bot-api';
import type { ListingRecord } from '../types/listing';
import { type Config, isTelegramConfigured } from '../config';
import { logger } from '../utils/logger';

export type NotificationResult = 'sent' | 'failed' | 'not-configured';

/**
 * Delivers a digest of new listings
 */
export interface Notifier {
  deliver(listings: readonly ListingRecord[]): Promise<NotificationResult>;
}

export interface DigestOptions {
  maxEntries: number;
}

const TELEGRAM_API_URL = 'https://api.telegram.org';

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#039;');
}

/**
 * Formats new listings as a Telegram HTML message.
 * At most `maxEntries` listings are detailed; the rest are counted.
 */
export function formatDigest(listings: readonly ListingRecord[], options: DigestOptions): string {
  const lines = [
    `🔔 <b>Nuevas Ofertas de Empleo - Santa Fe</b>`,
    `Se detectaron ${listings.length} nueva(s) oferta(s)`,
    '',
  ];

  listings.slice(0, options.maxEntries).forEach((listing, i) => {
    lines.push(
      `${i + 1}. <b>${escapeHtml(listing.title)}</b>`,
      `   📍 ${escapeHtml(listing.location)}`,
      `   🏢 ${escapeHtml(listing.employer)}`,
      `   🔗 <a href="${escapeHtml(listing.link)}">Ver oferta</a>`,
      ''
    );
  });

  const remaining = listings.length - options.maxEntries;
  if (remaining > 0) {
    lines.push(`... y ${remaining} ofertas más.`);
  }

  return lines.join('\n').trimEnd();
}

/**
 * Sends the digest to a single Telegram chat.
 * Never throws: failures are logged and reported as 'failed'.
 */
export class TelegramNotifier implements Notifier {
  private bot: TelegramBot | null = null;

  constructor(private config: Config) {}

  async deliver(listings: readonly ListingRecord[]): Promise<NotificationResult> {
    if (!isTelegramConfigured(this.config)) {
      logger.warn('Telegram not configured, skipping notification');
      return 'not-configured';
    }

    const message = formatDigest(listings, { maxEntries: this.config.maxListingsPerDigest });

    try {
      await this.getBot().sendMessage(this.config.telegram.chatId, message, {
        parse_mode: 'HTML',
        disable_web_page_preview: true,
      });

      logger.info(`Telegram notification sent`, { listings: listings.length });
      return 'sent';
    } catch (error) {
      logger.error(`Error sending Telegram notification`, error, { listings: listings.length });
      return 'failed';
    }
  }

  private getBot(): TelegramBot {
    if (!this.bot) {
      // Request defaults merged into every API call
      const request = { url: TELEGRAM_API_URL, timeout: this.config.notificationTimeoutMs };
      this.bot = new TelegramBot(this.config.telegram.botToken, { polling: false, request });
    }
    return this.bot;
  }
}
