import fetch from 'node-fetch';
import { logger } from '../utils/logger';

export interface FetchPageOptions {
  userAgent: string;
  timeoutMs: number;
}

export interface FetchedPage {
  body: Buffer;
  /** Charset label from the Content-Type header, if it names one */
  charset?: string;
}

const CHARSET_PATTERN = /charset\s*=\s*"?([^";\s]+)"?/i;

export function charsetOf(contentType: string | null): string | undefined {
  return contentType?.match(CHARSET_PATTERN)?.[1];
}

/**
 * Issues a single GET for an HTML page and returns its undecoded body.
 * Non-2xx responses reject like transport errors do.
 */
export async function fetchPortalPage(url: string, options: FetchPageOptions): Promise<FetchedPage> {
  logger.info(`Fetching ${url}`);

  const response = await fetch(url, {
    headers: {
      'User-Agent': options.userAgent,
      Accept: 'text/html,application/xhtml+xml',
    },
    timeout: options.timeoutMs,
  });

  if (!response.ok) {
    throw new Error(`Portal returned HTTP ${response.status}`);
  }

  const body = await response.buffer();
  const charset = charsetOf(response.headers.get('content-type'));
  logger.debug(`Fetched ${body.length} bytes`, { url, status: response.status, charset });
  return { body, charset };
}
