import type { ListingSource } from '../sources/base';
import type { ListingStateStore } from '../store/state-store';
import type { ListingRecord } from '../types/listing';
import type { NotificationResult, Notifier } from './notifier';
import { detectNewListings } from './deduplication';
import { formatRunSummary } from './summary';
import { logger } from '../utils/logger';

export interface RunResult {
  status: 'aborted' | 'completed';
  total: number;
  newListings: ListingRecord[];
  /** null when no notification was attempted */
  notification: NotificationResult | null;
  stateSaved: boolean;
}

export interface ListingMonitorDeps {
  source: ListingSource;
  store: ListingStateStore;
  notifier: Notifier;
  print?: (line: string) => void;
  now?: () => Date;
}

/**
 * Runs one check: fetch, diff, summarize, notify, persist.
 *
 * The snapshot is only replaced after a fetch that produced listings, so
 * an unreachable portal never wipes the previous state.
 */
export class ListingMonitor {
  private print: (line: string) => void;
  private now: () => Date;

  constructor(private deps: ListingMonitorDeps) {
    this.print = deps.print ?? ((line) => console.log(line));
    this.now = deps.now ?? (() => new Date());
  }

  async run(): Promise<RunResult> {
    const startTime = Date.now();
    logger.info('Listing check started', { source: this.deps.source.name });

    const current = await this.deps.source.fetchListings();

    if (current.length === 0) {
      logger.warn('No listings could be fetched. Check connectivity or the portal markup.');
      return { status: 'aborted', total: 0, newListings: [], notification: null, stateSaved: false };
    }

    const previous = this.deps.store.load();
    const newListings = detectNewListings(current, previous);

    for (const line of formatRunSummary({
      at: this.now(),
      total: current.length,
      newListings,
      previousCount: previous.length,
    })) {
      this.print(line);
    }

    let notification: NotificationResult | null = null;
    if (newListings.length > 0) {
      notification = await this.deps.notifier.deliver(newListings);
    }

    const stateSaved = this.deps.store.save(current);

    logger.info('Listing check completed', {
      duration: `${Date.now() - startTime}ms`,
      total: current.length,
      new: newListings.length,
      notification,
      stateSaved,
    });

    return { status: 'completed', total: current.length, newListings, notification, stateSaved };
  }
}
