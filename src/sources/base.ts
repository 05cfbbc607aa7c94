import type { ListingRecord } from '../types/listing';

/**
 * A place listings are read from
 */
export interface ListingSource {
  /**
   * Unique identifier for the source
   */
  readonly name: string;

  /**
   * Fetches and parses the current listings.
   * Resolves to an empty array when the page could not be fetched or
   * parsed; it does not reject for those failures.
   */
  fetchListings(): Promise<ListingRecord[]>;
}
