import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectDataSource, InjectRepository } from '@nestjs/typeorm';
import { DataSource, QueryFailedError, Repository } from 'typeorm';
import { UserProfile } from '../entities/user-profile.entity';
import { MoodLogEntry } from '../entities/mood-log.entity';
import { ConversationHistory, isChatMessage } from '../chat/message.types';
import { MoodTag, isMoodTag } from '../mood/mood-tag';
import {
  ActivitySnapshot,
  ActivityTransaction,
  DEFAULT_PROFILE_NAME,
  MoodLogRecord,
  PersistenceStore,
  ProfileRef,
  ProfileSnapshot,
  RECENT_MOOD_LOG_LIMIT,
  defaultEmailFor,
} from './persistence-store';

const UNIQUE_VIOLATION = '23505';

function isUniqueViolation(error: unknown): boolean {
  return (
    error instanceof QueryFailedError &&
    'code' in error.driverError &&
    error.driverError.code === UNIQUE_VIOLATION
  );
}

@Injectable()
export class TypeOrmPersistenceStore extends PersistenceStore {
  private readonly logger = new Logger(TypeOrmPersistenceStore.name);

  constructor(
    @InjectRepository(UserProfile)
    private profileRepository: Repository<UserProfile>,
    @InjectRepository(MoodLogEntry)
    private moodLogRepository: Repository<MoodLogEntry>,
    @InjectDataSource()
    private dataSource: DataSource,
  ) {
    super();
  }

  async getOrCreateProfile(sessionId: string): Promise<ProfileRef> {
    const existing = await this.profileRepository.findOne({
      where: { id: sessionId },
      select: { id: true },
    });
    if (existing) {
      return { id: existing.id };
    }

    try {
      await this.profileRepository.insert({
        id: sessionId,
        name: DEFAULT_PROFILE_NAME,
        email: defaultEmailFor(sessionId),
        chatHistory: [],
      });
      this.logger.log(`Created profile for session ${sessionId}`);
    } catch (error) {
      // Two first-contact requests for one session: the other insert won
      if (!isUniqueViolation(error)) {
        throw error;
      }
    }

    return { id: sessionId };
  }

  async getProfile(ref: ProfileRef): Promise<ProfileSnapshot | null> {
    const profile = await this.profileRepository.findOne({ where: { id: ref.id } });
    if (!profile) {
      return null;
    }

    return {
      id: profile.id,
      name: profile.name,
      email: profile.email,
      createdAt: profile.createdAt,
      lastActive: profile.lastActive,
      daysActive: profile.daysActive,
      sessionsCompleted: profile.sessionsCompleted,
      progressScore: profile.progressScore,
    };
  }

  async getHistory(ref: ProfileRef): Promise<ConversationHistory> {
    const profile = await this.profileRepository.findOne({
      where: { id: ref.id },
      select: { id: true, chatHistory: true },
    });

    const stored: unknown[] = profile && Array.isArray(profile.chatHistory) ? profile.chatHistory : [];
    const history = stored.filter(isChatMessage);
    if (history.length !== stored.length) {
      this.logger.warn(`Dropped ${stored.length - history.length} malformed history entries for ${ref.id}`);
    }
    return history;
  }

  async saveHistory(ref: ProfileRef, history: ConversationHistory): Promise<void> {
    await this.profileRepository.update(
      { id: ref.id },
      { chatHistory: history.map((message) => ({ role: message.role, content: message.content })) },
    );
  }

  async appendMoodLog(ref: ProfileRef, mood: MoodTag): Promise<MoodLogRecord | null> {
    if (mood === MoodTag.NEUTRAL) {
      return null;
    }

    const recordedAt = new Date();
    const entry = this.moodLogRepository.create({
      profile: { id: ref.id },
      mood,
      recordedAt,
    });
    await this.moodLogRepository.save(entry);

    return { mood, recordedAt };
  }

  async getRecentMoodLogs(ref: ProfileRef, limit: number = RECENT_MOOD_LOG_LIMIT): Promise<MoodLogRecord[]> {
    const entries = await this.moodLogRepository.find({
      where: { profile: { id: ref.id } },
      order: { recordedAt: 'DESC', id: 'DESC' },
      take: limit,
    });

    const records: MoodLogRecord[] = [];
    for (const entry of entries) {
      if (isMoodTag(entry.mood)) {
        records.push({ mood: entry.mood, recordedAt: entry.recordedAt });
      }
    }
    return records;
  }

  async countMoodLogs(ref: ProfileRef): Promise<number> {
    return this.moodLogRepository.count({ where: { profile: { id: ref.id } } });
  }

  async incrementSessionsCompleted(ref: ProfileRef): Promise<void> {
    await this.profileRepository.increment({ id: ref.id }, 'sessionsCompleted', 1);
  }

  /**
   * Runs `work` inside a database transaction holding a row lock on the
   * profile, so concurrent activity updates for one profile are serialized.
   */
  async runActivityTransaction<T>(
    ref: ProfileRef,
    work: (transaction: ActivityTransaction) => Promise<T>,
  ): Promise<T> {
    return this.dataSource.transaction(async (manager) => {
      const profile = await manager.findOne(UserProfile, {
        where: { id: ref.id },
        lock: { mode: 'pessimistic_write' },
      });
      if (!profile) {
        throw new NotFoundException(`Profile ${ref.id} not found`);
      }

      let snapshot: ActivitySnapshot = {
        lastActive: profile.lastActive,
        daysActive: profile.daysActive,
      };

      return work({
        readActivity: async () => ({ ...snapshot }),
        markActive: async (at: Date) => {
          await manager.increment(UserProfile, { id: ref.id }, 'daysActive', 1);
          await manager.update(UserProfile, { id: ref.id }, { lastActive: at });
          snapshot = { lastActive: at, daysActive: snapshot.daysActive + 1 };
        },
      });
    });
  }
}
