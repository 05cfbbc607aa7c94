import type { ListingRecord } from '../types/listing';
import { logger } from '../utils/logger';

/**
 * Returns the listings in `current` whose fingerprint is absent from
 * `previous`, keeping their order in `current`.
 *
 * With an empty `previous` every current listing is new; that is how the
 * first run (or a run after a lost state file) behaves.
 */
export function detectNewListings(
  current: readonly ListingRecord[],
  previous: readonly ListingRecord[]
): ListingRecord[] {
  const previousFingerprints = new Set(previous.map(listing => listing.fingerprint));
  const newListings = current.filter(listing => !previousFingerprints.has(listing.fingerprint));

  logger.info(`New listings detected: ${newListings.length}`, {
    current: current.length,
    previous: previous.length,
  });

  return newListings;
}
