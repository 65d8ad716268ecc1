import { NotFoundException } from '@nestjs/common';
import { PerKeyLock } from '../common/per-key-lock';
import { ChatMessage, ConversationHistory } from '../chat/message.types';
import { MoodTag } from '../mood/mood-tag';
import {
  ActivitySnapshot,
  DEFAULT_PROFILE_NAME,
  MoodLogRecord,
  PersistenceStore,
  ProfileRef,
  ProfileSnapshot,
  RECENT_MOOD_LOG_LIMIT,
  ActivityTransaction,
  defaultEmailFor,
} from './persistence-store';

interface StoredProfile extends ProfileSnapshot {
  chatHistory: ChatMessage[];
  moodLogs: MoodLogRecord[];
}

/**
 * Process-local store with the same contract as the database-backed one.
 * Activity transactions are serialized per profile and only commit when the
 * work function resolves.
 */
export class InMemoryPersistenceStore extends PersistenceStore {
  private readonly profiles = new Map<string, StoredProfile>();
  private readonly transactionLock = new PerKeyLock<string>();

  constructor(private readonly now: () => Date = () => new Date()) {
    super();
  }

  async getOrCreateProfile(sessionId: string): Promise<ProfileRef> {
    if (!this.profiles.has(sessionId)) {
      this.profiles.set(sessionId, {
        id: sessionId,
        name: DEFAULT_PROFILE_NAME,
        email: defaultEmailFor(sessionId),
        createdAt: this.now(),
        lastActive: null,
        daysActive: 0,
        sessionsCompleted: 0,
        progressScore: 0,
        chatHistory: [],
        moodLogs: [],
      });
    }
    return { id: sessionId };
  }

  async getProfile(ref: ProfileRef): Promise<ProfileSnapshot | null> {
    const profile = this.profiles.get(ref.id);
    if (!profile) {
      return null;
    }
    const { chatHistory, moodLogs, ...snapshot } = profile;
    return { ...snapshot };
  }

  async getHistory(ref: ProfileRef): Promise<ConversationHistory> {
    return [...this.require(ref).chatHistory];
  }

  async saveHistory(ref: ProfileRef, history: ConversationHistory): Promise<void> {
    this.require(ref).chatHistory = history.map((message) => ({ ...message }));
  }

  async appendMoodLog(ref: ProfileRef, mood: MoodTag): Promise<MoodLogRecord | null> {
    if (mood === MoodTag.NEUTRAL) {
      return null;
    }
    const record: MoodLogRecord = { mood, recordedAt: this.now() };
    this.require(ref).moodLogs.push(record);
    return { ...record };
  }

  async getRecentMoodLogs(ref: ProfileRef, limit: number = RECENT_MOOD_LOG_LIMIT): Promise<MoodLogRecord[]> {
    // Reversed first so equal timestamps keep newest-first order under the stable sort
    return [...this.require(ref).moodLogs]
      .reverse()
      .sort((a, b) => b.recordedAt.getTime() - a.recordedAt.getTime())
      .slice(0, limit)
      .map((record) => ({ ...record }));
  }

  async countMoodLogs(ref: ProfileRef): Promise<number> {
    return this.require(ref).moodLogs.length;
  }

  async incrementSessionsCompleted(ref: ProfileRef): Promise<void> {
    this.require(ref).sessionsCompleted += 1;
  }

  async runActivityTransaction<T>(
    ref: ProfileRef,
    work: (transaction: ActivityTransaction) => Promise<T>,
  ): Promise<T> {
    return this.transactionLock.runExclusive(ref.id, async () => {
      const profile = this.require(ref);
      let draft: ActivitySnapshot = { lastActive: profile.lastActive, daysActive: profile.daysActive };

      const result = await work({
        readActivity: async () => ({ ...draft }),
        markActive: async (at: Date) => {
          draft = { lastActive: at, daysActive: draft.daysActive + 1 };
        },
      });

      profile.lastActive = draft.lastActive;
      profile.daysActive = draft.daysActive;
      return result;
    });
  }

  private require(ref: ProfileRef): StoredProfile {
    const profile = this.profiles.get(ref.id);
    if (!profile) {
      throw new NotFoundException(`Profile ${ref.id} not found`);
    }
    return profile;
  }
}
