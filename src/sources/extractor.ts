import { load, loadBuffer } from 'cheerio';
import type { Element } from 'domhandler';
import type { ContainerOutcome, ExtractionResult, ListingRecord } from '../types/listing';
import { generateListingFingerprint } from '../utils/hash';
import { logger } from '../utils/logger';
import {
  CONTAINER_SELECTORS,
  EMPLOYER_STRATEGIES,
  LINK_STRATEGIES,
  LOCATION_STRATEGIES,
  TITLE_STRATEGIES,
  resolveField,
} from './selectors';

export const DEFAULT_EMPLOYER = 'Gobierno de Santa Fe';
export const DEFAULT_LOCATION = 'Santa Fe';

export interface LinkOptions {
  /** Scheme and host, e.g. https://www.santafe.gob.ar */
  siteOrigin: string;
  /** Used when a container has no link at all */
  baseUrl: string;
  /** Prefix for hrefs that are neither absolute nor root-relative */
  searchUrl: string;
}

export interface ExtractorOptions extends LinkOptions {
  now?: () => Date;
  /** Transport-layer charset for byte input; a `<meta charset>` is read otherwise */
  charset?: string;
}

const SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:/i;

/**
 * Turns an href found in a container into an absolute link
 */
export function resolveListingLink(href: string | undefined, options: LinkOptions): string {
  if (!href) {
    return options.baseUrl;
  }
  if (SCHEME_PATTERN.test(href)) {
    return href;
  }
  if (href.startsWith('/')) {
    return `${options.siteOrigin}${href}`;
  }
  return `${options.searchUrl}${href}`;
}

/**
 * Parses the portal HTML into listings.
 *
 * Byte input is decoded from `options.charset`, the document's own
 * declaration, or UTF-8, in that order.
 *
 * Containers are located with the first selector in CONTAINER_SELECTORS
 * that matches anything. Containers without a title, and containers that
 * throw while being read, are skipped and reported in `outcomes`.
 */
export function extractListings(html: string | Buffer, options: ExtractorOptions): ExtractionResult {
  const $ = typeof html === 'string'
    ? load(html)
    : loadBuffer(html, {
      encoding: { transportLayerEncodingLabel: options.charset, defaultEncoding: 'utf-8' },
    });
  const detectedAt = (options.now ?? (() => new Date()))().toISOString();

  let selector: string | null = null;
  let containers: Element[] = [];
  for (const candidate of CONTAINER_SELECTORS) {
    const matched = $<Element, string>(candidate);
    if (matched.length > 0) {
      selector = candidate;
      containers = matched.toArray();
      break;
    }
  }

  logger.info(`Containers found: ${containers.length}`, { selector });

  const outcomes: ContainerOutcome[] = [];
  const listings: ListingRecord[] = [];

  containers.forEach((element, index) => {
    try {
      const container = $(element);
      const title = resolveField(container, TITLE_STRATEGIES);

      if (!title) {
        logger.debug(`Container skipped: no title`, { index });
        outcomes.push({ kind: 'skipped', index, reason: 'missing-title' });
        return;
      }

      const employer = resolveField(container, EMPLOYER_STRATEGIES) ?? DEFAULT_EMPLOYER;
      const listing: ListingRecord = {
        title,
        employer,
        location: resolveField(container, LOCATION_STRATEGIES) ?? DEFAULT_LOCATION,
        link: resolveListingLink(resolveField(container, LINK_STRATEGIES), options),
        detectedAt,
        fingerprint: generateListingFingerprint(title, employer),
      };

      listings.push(listing);
      outcomes.push({ kind: 'listing', index, listing });
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      logger.warn(`Failed to read listing container, skipping`, { index, error: detail });
      outcomes.push({ kind: 'skipped', index, reason: 'error', detail });
    }
  });

  logger.info(`Listings extracted: ${listings.length}`, {
    containers: containers.length,
    skipped: outcomes.length - listings.length,
  });

  return { selector, listings, outcomes };
}
