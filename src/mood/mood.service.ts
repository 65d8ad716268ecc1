import { Injectable } from '@nestjs/common';
import { MoodLogRecord, PersistenceStore, RECENT_MOOD_LOG_LIMIT } from '../persistence/persistence-store';
import { MoodTag } from './mood-tag';

export interface MoodSummary {
  total: number;
  counts: Partial<Record<MoodTag, number>>;
  predominant: MoodTag | null;
  data: MoodLogRecord[];
}

const MAX_HISTORY_LIMIT = 50;

@Injectable()
export class MoodService {
  constructor(private readonly store: PersistenceStore) {}

  async getMoodHistory(sessionId: string, limit: number = RECENT_MOOD_LOG_LIMIT): Promise<MoodLogRecord[]> {
    const profile = await this.store.getOrCreateProfile(sessionId);
    const bounded = Math.min(Math.max(Math.floor(limit), 1), MAX_HISTORY_LIMIT);
    return this.store.getRecentMoodLogs(profile, bounded);
  }

  async getMoodSummary(sessionId: string, limit: number = RECENT_MOOD_LOG_LIMIT): Promise<MoodSummary> {
    const history = await this.getMoodHistory(sessionId, limit);

    const counts: Partial<Record<MoodTag, number>> = {};
    for (const entry of history) {
      counts[entry.mood] = (counts[entry.mood] ?? 0) + 1;
    }

    // Ties go to the mood seen most recently (history is newest-first)
    let predominant: MoodTag | null = null;
    for (const entry of history) {
      if (predominant === null || (counts[entry.mood] ?? 0) > (counts[predominant] ?? 0)) {
        predominant = entry.mood;
      }
    }

    return { total: history.length, counts, predominant, data: history };
  }
}
