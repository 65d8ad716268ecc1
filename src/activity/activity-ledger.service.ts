import { Injectable, Logger } from '@nestjs/common';
import { PersistenceStore, ProfileRef } from '../persistence/persistence-store';

export interface ActivityUpdate {
  updated: boolean;
}

export function isSameUtcDay(a: Date, b: Date): boolean {
  return (
    a.getUTCFullYear() === b.getUTCFullYear() &&
    a.getUTCMonth() === b.getUTCMonth() &&
    a.getUTCDate() === b.getUTCDate()
  );
}

/**
 * Maintains the daily-activity streak: daysActive grows by at most one per
 * UTC calendar day, however many turns or tabs touch the profile that day.
 */
@Injectable()
export class ActivityLedger {
  private readonly logger = new Logger(ActivityLedger.name);

  constructor(private readonly store: PersistenceStore) {}

  async recordActivity(profile: ProfileRef, now: Date = new Date()): Promise<ActivityUpdate> {
    try {
      const updated = await this.store.runActivityTransaction(profile, async (transaction) => {
        const { lastActive } = await transaction.readActivity();

        if (lastActive && isSameUtcDay(lastActive, now)) {
          return false;
        }

        await transaction.markActive(now);
        return true;
      });

      if (updated) {
        this.logger.log(`Daily activity streak updated for ${profile.id}`);
      }
      return { updated };
    } catch (error) {
      // Streak failures never fail the turn
      this.logger.error(`Activity transaction failed for ${profile.id}`, error instanceof Error ? error.stack : String(error));
      return { updated: false };
    }
  }
}
