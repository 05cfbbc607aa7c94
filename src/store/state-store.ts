import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { z } from 'zod';
import type { ListingRecord } from '../types/listing';
import { logger } from '../utils/logger';

const listingRecordSchema = z.object({
  title: z.string().min(1),
  employer: z.string(),
  location: z.string(),
  link: z.string(),
  detectedAt: z.string(),
  fingerprint: z.string().min(1),
});

const stateSchema = z.array(listingRecordSchema);

/**
 * Snapshot of the listings seen by the previous run
 */
export interface ListingStateStore {
  load(): ListingRecord[];
  save(records: readonly ListingRecord[]): boolean;
}

/**
 * JSON file backed snapshot store.
 * Each save replaces the whole file; nothing is merged.
 */
export class StateStore implements ListingStateStore {
  constructor(private filePath: string) {}

  /**
   * Reads the previous snapshot.
   * A missing, unreadable or malformed file yields an empty snapshot.
   */
  load(): ListingRecord[] {
    if (!existsSync(this.filePath)) {
      logger.info(`No previous state found`, { file: this.filePath });
      return [];
    }

    try {
      const raw: unknown = JSON.parse(readFileSync(this.filePath, 'utf-8'));
      const parsed = stateSchema.safeParse(raw);

      if (!parsed.success) {
        logger.warn(`State file has an unexpected shape, ignoring it`, {
          file: this.filePath,
          issues: parsed.error.issues.slice(0, 3).map(issue => ({
            path: issue.path.join('.'),
            message: issue.message,
          })),
        });
        return [];
      }

      logger.info(`Previous state loaded: ${parsed.data.length} listings`, { file: this.filePath });
      return parsed.data;
    } catch (error) {
      logger.error(`Error loading state`, error, { file: this.filePath });
      return [];
    }
  }

  /**
   * Overwrites the snapshot with `records`.
   * Returns false when the file could not be written.
   */
  save(records: readonly ListingRecord[]): boolean {
    try {
      mkdirSync(dirname(this.filePath), { recursive: true });
      writeFileSync(this.filePath, `${JSON.stringify(records, null, 2)}\n`, 'utf-8');
      logger.info(`State saved: ${records.length} listings`, { file: this.filePath });
      return true;
    } catch (error) {
      logger.error(`Error saving state`, error, { file: this.filePath });
      return false;
    }
  }
}
