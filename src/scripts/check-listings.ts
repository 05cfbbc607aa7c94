#!/usr/bin/env node
import { loadConfig } from '../config';
import { PortalListingSource } from '../sources/portal';
import { StateStore } from '../store/state-store';
import { TelegramNotifier } from '../services/notifier';
import { ListingMonitor } from '../services/run-controller';
import { logger, setLogLevel } from '../utils/logger';

/**
 * Single-shot check of the job portal.
 * Meant to be started by an external scheduler (cron, CI workflow).
 */
async function checkListings() {
  try {
    const config = loadConfig();
    setLogLevel(config.logLevel);

    if (config.emailRecipient) {
      logger.debug('EMAIL_RECIPIENT is set but no email delivery exists; ignoring it');
    }

    const monitor = new ListingMonitor({
      source: new PortalListingSource(config),
      store: new StateStore(config.stateFile),
      notifier: new TelegramNotifier(config),
    });

    const result = await monitor.run();
    logger.info(result.status === 'completed' ? 'Check completed' : 'Check aborted');
    process.exit(0);
  } catch (error) {
    logger.error('Listing check failed', error);
    process.exit(1);
  }
}

void checkListings();
