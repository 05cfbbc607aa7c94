import { createHash } from 'crypto';

/**
 * Generates the identity of a listing from its title and employer.
 *
 * Both fields are trimmed and lowercased, then concatenated with no
 * separator. Location, link and detection time do not take part, so the
 * same offer re-published with a different link keeps its fingerprint.
 */
export function generateListingFingerprint(title: string, employer: string): string {
  const hashInput = `${title.trim().toLowerCase()}${employer.trim().toLowerCase()}`;
  return createHash('md5').update(hashInput, 'utf8').digest('hex');
}
