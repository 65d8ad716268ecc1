import { ConversationHistory } from '../chat/message.types';
import { MoodTag } from '../mood/mood-tag';

/** Handle to a stored profile, valid for the duration of one request. */
export interface ProfileRef {
  readonly id: string;
}

export interface ProfileSnapshot {
  id: string;
  name: string;
  email: string;
  createdAt: Date;
  lastActive: Date | null;
  daysActive: number;
  sessionsCompleted: number;
  progressScore: number;
}

export interface MoodLogRecord {
  mood: MoodTag;
  recordedAt: Date;
}

export interface ActivitySnapshot {
  lastActive: Date | null;
  daysActive: number;
}

/**
 * Operations available inside an activity transaction. Everything done
 * through it commits or rolls back together, and no other transaction on the
 * same profile can interleave with it.
 */
export interface ActivityTransaction {
  readActivity(): Promise<ActivitySnapshot>;
  /** Increments daysActive by one and sets lastActive to `at`. */
  markActive(at: Date): Promise<void>;
}

export const DEFAULT_PROFILE_NAME = 'Serenity User';
export const RECENT_MOOD_LOG_LIMIT = 10;

export function defaultEmailFor(sessionId: string): string {
  return `user_${sessionId.slice(0, 8)}@serenity.app`;
}

/**
 * Storage contract for session profiles, their conversation history and mood
 * logs. Injected wherever it is needed; there is no process-wide handle.
 */
export abstract class PersistenceStore {
  abstract getOrCreateProfile(sessionId: string): Promise<ProfileRef>;

  abstract getProfile(ref: ProfileRef): Promise<ProfileSnapshot | null>;

  abstract getHistory(ref: ProfileRef): Promise<ConversationHistory>;

  abstract saveHistory(ref: ProfileRef, history: ConversationHistory): Promise<void>;

  /** Returns the stored entry, or null when the mood is neutral and nothing was written. */
  abstract appendMoodLog(ref: ProfileRef, mood: MoodTag): Promise<MoodLogRecord | null>;

  /** Newest first. */
  abstract getRecentMoodLogs(ref: ProfileRef, limit?: number): Promise<MoodLogRecord[]>;

  abstract countMoodLogs(ref: ProfileRef): Promise<number>;

  abstract incrementSessionsCompleted(ref: ProfileRef): Promise<void>;

  abstract runActivityTransaction<T>(
    ref: ProfileRef,
    work: (transaction: ActivityTransaction) => Promise<T>,
  ): Promise<T>;
}
