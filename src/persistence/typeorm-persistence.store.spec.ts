import { NotFoundException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { getDataSourceToken, getRepositoryToken } from '@nestjs/typeorm';
import { QueryFailedError } from 'typeorm';
import { TypeOrmPersistenceStore } from './typeorm-persistence.store';
import { UserProfile } from '../entities/user-profile.entity';
import { MoodLogEntry } from '../entities/mood-log.entity';
import { MoodTag } from '../mood/mood-tag';

describe('TypeOrmPersistenceStore', () => {
  let store: TypeOrmPersistenceStore;

  const mockProfileRepository = {
    findOne: jest.fn(),
    insert: jest.fn(),
    update: jest.fn(),
    increment: jest.fn(),
  };

  const mockMoodLogRepository = {
    create: jest.fn(),
    save: jest.fn(),
    find: jest.fn(),
    count: jest.fn(),
  };

  const mockManager = {
    findOne: jest.fn(),
    increment: jest.fn(),
    update: jest.fn(),
  };

  const mockDataSource = {
    transaction: jest.fn(),
  };

  const uniqueViolation = () =>
    new QueryFailedError('INSERT INTO user_profiles', [], Object.assign(new Error('duplicate key'), { code: '23505' }));

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        TypeOrmPersistenceStore,
        {
          provide: getRepositoryToken(UserProfile),
          useValue: mockProfileRepository,
        },
        {
          provide: getRepositoryToken(MoodLogEntry),
          useValue: mockMoodLogRepository,
        },
        {
          provide: getDataSourceToken(),
          useValue: mockDataSource,
        },
      ],
    }).compile();

    store = module.get<TypeOrmPersistenceStore>(TypeOrmPersistenceStore);

    jest.clearAllMocks();
    mockDataSource.transaction.mockImplementation(
      (work: (manager: typeof mockManager) => Promise<unknown>) => work(mockManager),
    );
  });

  describe('getOrCreateProfile', () => {
    it('should return an existing profile without inserting', async () => {
      mockProfileRepository.findOne.mockResolvedValue({ id: 'session-a' });

      await expect(store.getOrCreateProfile('session-a')).resolves.toEqual({ id: 'session-a' });
      expect(mockProfileRepository.insert).not.toHaveBeenCalled();
    });

    it('should insert a profile with defaults on first contact', async () => {
      mockProfileRepository.findOne.mockResolvedValue(null);
      mockProfileRepository.insert.mockResolvedValue({});

      await expect(store.getOrCreateProfile('session-a')).resolves.toEqual({ id: 'session-a' });
      expect(mockProfileRepository.insert).toHaveBeenCalledWith({
        id: 'session-a',
        name: 'Serenity User',
        email: 'user_session-@serenity.app',
        chatHistory: [],
      });
    });

    it('should accept a concurrent insert of the same session', async () => {
      mockProfileRepository.findOne.mockResolvedValue(null);
      mockProfileRepository.insert.mockRejectedValue(uniqueViolation());

      await expect(store.getOrCreateProfile('session-a')).resolves.toEqual({ id: 'session-a' });
    });

    it('should rethrow other insert failures', async () => {
      mockProfileRepository.findOne.mockResolvedValue(null);
      mockProfileRepository.insert.mockRejectedValue(new Error('connection refused'));

      await expect(store.getOrCreateProfile('session-a')).rejects.toThrow('connection refused');
    });
  });

  describe('getHistory', () => {
    it('should return well-formed entries and drop the rest', async () => {
      mockProfileRepository.findOne.mockResolvedValue({
        id: 'session-a',
        chatHistory: [
          { role: 'user', content: 'hello' },
          { role: 'system', content: 'not a chat turn' },
          { role: 'assistant' },
          { role: 'assistant', content: 'hi there' },
        ],
      });

      await expect(store.getHistory({ id: 'session-a' })).resolves.toEqual([
        { role: 'user', content: 'hello' },
        { role: 'assistant', content: 'hi there' },
      ]);
    });

    it('should return an empty history for a missing profile', async () => {
      mockProfileRepository.findOne.mockResolvedValue(null);

      await expect(store.getHistory({ id: 'session-a' })).resolves.toEqual([]);
    });
  });

  it('should overwrite the stored history', async () => {
    mockProfileRepository.update.mockResolvedValue({});

    await store.saveHistory({ id: 'session-a' }, [{ role: 'user', content: 'hello' }]);

    expect(mockProfileRepository.update).toHaveBeenCalledWith(
      { id: 'session-a' },
      { chatHistory: [{ role: 'user', content: 'hello' }] },
    );
  });

  describe('appendMoodLog', () => {
    it('should skip neutral moods', async () => {
      await expect(store.appendMoodLog({ id: 'session-a' }, MoodTag.NEUTRAL)).resolves.toBeNull();
      expect(mockMoodLogRepository.save).not.toHaveBeenCalled();
    });

    it('should save other moods stamped with the current time', async () => {
      const before = Date.now();
      mockMoodLogRepository.create.mockImplementation((entry: object) => entry);
      mockMoodLogRepository.save.mockImplementation(async (entry: object) => entry);

      const record = await store.appendMoodLog({ id: 'session-a' }, MoodTag.SAD);

      expect(record?.mood).toBe(MoodTag.SAD);
      expect(record?.recordedAt.getTime()).toBeGreaterThanOrEqual(before);
      expect(mockMoodLogRepository.create).toHaveBeenCalledWith({
        profile: { id: 'session-a' },
        mood: MoodTag.SAD,
        recordedAt: record?.recordedAt,
      });
    });
  });

  it('should query recent mood logs newest first and skip unknown moods', async () => {
    const recordedAt = new Date('2024-03-01T10:00:00Z');
    mockMoodLogRepository.find.mockResolvedValue([
      { id: 2, mood: 'anxious', recordedAt },
      { id: 1, mood: 'stressed', recordedAt },
    ]);

    const records = await store.getRecentMoodLogs({ id: 'session-a' });

    expect(records).toEqual([{ mood: MoodTag.ANXIOUS, recordedAt }]);
    expect(mockMoodLogRepository.find).toHaveBeenCalledWith({
      where: { profile: { id: 'session-a' } },
      order: { recordedAt: 'DESC', id: 'DESC' },
      take: 10,
    });
  });

  it('should increment completed sessions in place', async () => {
    await store.incrementSessionsCompleted({ id: 'session-a' });

    expect(mockProfileRepository.increment).toHaveBeenCalledWith({ id: 'session-a' }, 'sessionsCompleted', 1);
  });

  describe('runActivityTransaction', () => {
    it('should lock the profile row and write through the transaction manager', async () => {
      const at = new Date('2024-03-02T08:00:00Z');
      mockManager.findOne.mockResolvedValue({
        id: 'session-a',
        lastActive: new Date('2024-03-01T08:00:00Z'),
        daysActive: 4,
      });

      const seen = await store.runActivityTransaction({ id: 'session-a' }, async (transaction) => {
        await transaction.markActive(at);
        return transaction.readActivity();
      });

      expect(seen).toEqual({ lastActive: at, daysActive: 5 });
      expect(mockManager.findOne).toHaveBeenCalledWith(UserProfile, {
        where: { id: 'session-a' },
        lock: { mode: 'pessimistic_write' },
      });
      expect(mockManager.increment).toHaveBeenCalledWith(UserProfile, { id: 'session-a' }, 'daysActive', 1);
      expect(mockManager.update).toHaveBeenCalledWith(UserProfile, { id: 'session-a' }, { lastActive: at });
    });

    it('should fail when the profile does not exist', async () => {
      mockManager.findOne.mockResolvedValue(null);

      await expect(
        store.runActivityTransaction({ id: 'missing' }, (transaction) => transaction.readActivity()),
      ).rejects.toThrow(NotFoundException);
    });
  });
});
