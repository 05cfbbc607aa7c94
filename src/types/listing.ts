/**
 * A job offer as scraped from the portal and persisted between runs
 */
export interface ListingRecord {
  title: string;
  employer: string;
  location: string;
  link: string;
  /** ISO-8601 timestamp of the run that scraped it */
  detectedAt: string;
  fingerprint: string;
}

export type SkipReason = 'missing-title' | 'error';

/**
 * Result of processing one matched container
 */
export type ContainerOutcome =
  | { kind: 'listing'; index: number; listing: ListingRecord }
  | { kind: 'skipped'; index: number; reason: SkipReason; detail?: string };

export interface ExtractionResult {
  /** Container selector that matched, or null when none did */
  selector: string | null;
  listings: ListingRecord[];
  outcomes: ContainerOutcome[];
}
