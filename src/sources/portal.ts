import type { ListingSource } from './base';
import type { ListingRecord } from '../types/listing';
import type { Config } from '../config';
import { type FetchedPage, fetchPortalPage } from './fetcher';
import { extractListings } from './extractor';
import { logger } from '../utils/logger';

/**
 * Santa Fe employment portal ("Portal de Empleo") adapter.
 * Scrapes the public offers page with a plain GET; no browser needed.
 */
export class PortalListingSource implements ListingSource {
  readonly name = 'santafe-portal';

  constructor(
    private config: Config,
    private now: () => Date = () => new Date()
  ) {}

  async fetchListings(): Promise<ListingRecord[]> {
    const { portal } = this.config;

    let page: FetchedPage;
    try {
      page = await fetchPortalPage(portal.searchUrl, {
        userAgent: portal.userAgent,
        timeoutMs: portal.fetchTimeoutMs,
      });
    } catch (error) {
      logger.error(`Error fetching listings from ${this.name}`, error, { url: portal.searchUrl });
      return [];
    }

    try {
      const { listings } = extractListings(page.body, {
        siteOrigin: portal.siteOrigin,
        baseUrl: portal.baseUrl,
        searchUrl: portal.searchUrl,
        now: this.now,
        charset: page.charset,
      });
      return listings;
    } catch (error) {
      logger.error(`Error parsing listings from ${this.name}`, error);
      return [];
    }
  }
}
