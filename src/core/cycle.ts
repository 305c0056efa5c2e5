/**
 * One monitoring cycle: scrape, track, notify
 */

import { emptyReport, hasChanges, type AvailabilityTracker } from './tracker.js';
import type { AppLogger } from '../utils/logger.js';
import type { ChangeReport, ScrapeResult } from '../types/index.js';

/**
 * Source of snapshots (HTML scraping, login, retries live behind it)
 */
export interface SiteAdapter {
  /**
   * Current view of the schedule grid, or null when none could be obtained
   */
  fetch(): Promise<ScrapeResult | null>;
}

/**
 * Delivery of change reports (formatting and channel live behind it)
 */
export interface ReportNotifier {
  notify(report: ChangeReport): Promise<void>;
}

export interface CycleDeps {
  adapter: SiteAdapter;
  tracker: AvailabilityTracker;
  notifier: ReportNotifier;
  logger: AppLogger;
}

/**
 * Run one cycle. Never throws: a failed scrape counts as "nothing observed"
 * and a failed notification is logged.
 */
export async function runCycle({ adapter, tracker, notifier, logger }: CycleDeps): Promise<ChangeReport> {
  let scrape: ScrapeResult | null;
  try {
    scrape = await adapter.fetch();
  } catch (error) {
    logger.error('Site adapter failed, skipping this cycle', error);
    return emptyReport();
  }

  if (!scrape) {
    logger.warn('No snapshot available this cycle');
    return emptyReport();
  }

  const report = tracker.process(scrape.snapshot, scrape.bookableDates);

  if (!hasChanges(report)) {
    logger.debug('No changes detected');
    return report;
  }

  try {
    await notifier.notify(report);
    logger.info(
      `Notification sent: ${report.freedSlots.length} freed slot(s), ${report.newDates.length} new date(s)`
    );
  } catch (error) {
    logger.error('Failed to send notification', error);
  }

  return report;
}
