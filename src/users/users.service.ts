import { Injectable, NotFoundException } from '@nestjs/common';
import { PersistenceStore } from '../persistence/persistence-store';

export interface ProfileSummary {
  name: string;
  email: string;
  joinDate: string;
  sessionsCompleted: number;
  daysActive: number;
  moodEntries: number;
  progress: number;
}

export function formatJoinDate(createdAt: Date | null | undefined): string {
  if (!createdAt || Number.isNaN(createdAt.getTime())) {
    return 'Unknown';
  }
  return createdAt.toLocaleString('en-US', { month: 'long', year: 'numeric', timeZone: 'UTC' });
}

@Injectable()
export class UsersService {
  constructor(private readonly store: PersistenceStore) {}

  async getProfileSummary(sessionId: string): Promise<ProfileSummary> {
    const ref = await this.store.getOrCreateProfile(sessionId);
    const [profile, moodEntries] = await Promise.all([
      this.store.getProfile(ref),
      this.store.countMoodLogs(ref),
    ]);

    if (!profile) {
      throw new NotFoundException(`Profile ${sessionId} not found`);
    }

    return {
      name: profile.name,
      email: profile.email,
      joinDate: formatJoinDate(profile.createdAt),
      sessionsCompleted: profile.sessionsCompleted,
      daysActive: profile.daysActive,
      moodEntries,
      progress: profile.progressScore,
    };
  }
}
