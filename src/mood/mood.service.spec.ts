import { Test, TestingModule } from '@nestjs/testing';
import { MoodService } from './mood.service';
import { MoodTag } from './mood-tag';
import { PersistenceStore } from '../persistence/persistence-store';
import { InMemoryPersistenceStore } from '../persistence/in-memory-persistence.store';

describe('MoodService', () => {
  let service: MoodService;
  let store: InMemoryPersistenceStore;
  let clock: number;

  const logMoods = async (sessionId: string, moods: MoodTag[]) => {
    const profile = await store.getOrCreateProfile(sessionId);
    for (const mood of moods) {
      clock += 60_000;
      await store.appendMoodLog(profile, mood);
    }
  };

  beforeEach(async () => {
    clock = Date.UTC(2024, 2, 1, 9, 0);
    store = new InMemoryPersistenceStore(() => new Date(clock));

    const module: TestingModule = await Test.createTestingModule({
      providers: [MoodService, { provide: PersistenceStore, useValue: store }],
    }).compile();

    service = module.get<MoodService>(MoodService);
  });

  describe('getMoodHistory', () => {
    it('should return an empty history for a new session', async () => {
      await expect(service.getMoodHistory('session-a')).resolves.toEqual([]);
    });

    it('should return entries newest first', async () => {
      await logMoods('session-a', [MoodTag.SAD, MoodTag.HAPPY]);

      const history = await service.getMoodHistory('session-a');

      expect(history.map((entry) => entry.mood)).toEqual([MoodTag.HAPPY, MoodTag.SAD]);
    });

    it('should clamp the limit', async () => {
      await logMoods('session-a', Array.from({ length: 60 }, () => MoodTag.ANXIOUS));

      await expect(service.getMoodHistory('session-a', 0)).resolves.toHaveLength(1);
      await expect(service.getMoodHistory('session-a', 500)).resolves.toHaveLength(50);
      await expect(service.getMoodHistory('session-a')).resolves.toHaveLength(10);
    });
  });

  describe('getMoodSummary', () => {
    it('should count moods and pick the most frequent', async () => {
      await logMoods('session-a', [MoodTag.SAD, MoodTag.HAPPY, MoodTag.SAD]);

      const summary = await service.getMoodSummary('session-a');

      expect(summary.total).toBe(3);
      expect(summary.counts).toEqual({ [MoodTag.SAD]: 2, [MoodTag.HAPPY]: 1 });
      expect(summary.predominant).toBe(MoodTag.SAD);
    });

    it('should break ties in favour of the most recent mood', async () => {
      await logMoods('session-a', [MoodTag.SAD, MoodTag.ANXIOUS, MoodTag.SAD, MoodTag.ANXIOUS]);

      const summary = await service.getMoodSummary('session-a');

      expect(summary.predominant).toBe(MoodTag.ANXIOUS);
    });

    it('should report no predominant mood without entries', async () => {
      await expect(service.getMoodSummary('session-a')).resolves.toEqual({
        total: 0,
        counts: {},
        predominant: null,
        data: [],
      });
    });
  });
});
