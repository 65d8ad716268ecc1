import { ConflictException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { SchedulerRegistry } from '@nestjs/schedule';
import { CACHE_MANAGER } from '@nestjs/cache-manager';
import { ChatService, sanitizeMessage } from './chat.service';
import { DialogueOrchestrator } from './dialogue-orchestrator.service';
import { CrisisAffordanceService, CrisisLevel } from './crisis-affordance.service';
import { CopingSuggestionService } from './coping-suggestion.service';
import { ChatMessage, ConversationHistory } from './message.types';
import { ActivityLedger } from '../activity/activity-ledger.service';
import { ExerciseService } from '../exercise/exercise.service';
import { ExerciseRejection, describeExercise } from '../exercise/exercise-state-machine';
import { PersistenceStore } from '../persistence/persistence-store';
import { InMemoryPersistenceStore } from '../persistence/in-memory-persistence.store';
import { MoodTag } from '../mood/mood-tag';

describe('ChatService', () => {
  let service: ChatService;
  let store: InMemoryPersistenceStore;
  let exerciseService: ExerciseService;

  const mockDialogueOrchestrator = {
    handleTurn: jest.fn(),
  };

  const mockCacheManager = {
    get: jest.fn(),
    set: jest.fn(),
    del: jest.fn(),
  };

  const deferred = () => {
    let resolve: () => void = () => undefined;
    const promise = new Promise<void>((done) => {
      resolve = done;
    });
    return { promise, resolve };
  };

  const echoTurn = (mood: MoodTag, reply: string) => async (input: string, history: ConversationHistory) => {
    const exchange: ChatMessage[] = [
      { role: 'user', content: input },
      { role: 'assistant', content: reply },
    ];
    return { mood, reply, updatedHistory: [...history, ...exchange] };
  };

  const createService = async (env: Record<string, string> = {}): Promise<ChatService> => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ChatService,
        ActivityLedger,
        CrisisAffordanceService,
        CopingSuggestionService,
        { provide: PersistenceStore, useValue: store },
        { provide: DialogueOrchestrator, useValue: mockDialogueOrchestrator },
        ExerciseService,
        { provide: SchedulerRegistry, useValue: new SchedulerRegistry() },
        {
          provide: ConfigService,
          useValue: {
            get: jest.fn((key: string, defaultValue?: string) => env[key] ?? defaultValue),
          },
        },
        { provide: CACHE_MANAGER, useValue: mockCacheManager },
      ],
    }).compile();

    exerciseService = module.get<ExerciseService>(ExerciseService);
    return module.get<ChatService>(ChatService);
  };

  beforeEach(async () => {
    jest.clearAllMocks();
    store = new InMemoryPersistenceStore();
    mockCacheManager.del.mockResolvedValue(undefined);
    service = await createService();
  });

  afterEach(() => {
    exerciseService.onModuleDestroy();
    jest.restoreAllMocks();
  });

  describe('sanitizeMessage', () => {
    it('should strip control characters and collapse whitespace', () => {
      expect(sanitizeMessage('he\u0000llo \n\n  world\t', 100)).toBe('hello world');
    });

    it('should cap the length', () => {
      expect(sanitizeMessage('abcdefgh', 5)).toBe('abcde');
    });

    it('should return an empty string for whitespace-only input', () => {
      expect(sanitizeMessage(' \n\t ', 100)).toBe('');
    });
  });

  describe('sendMessage', () => {
    it('should run a turn and persist the exchange', async () => {
      jest.spyOn(Math, 'random').mockReturnValue(0);
      mockDialogueOrchestrator.handleTurn.mockImplementation(echoTurn(MoodTag.ANXIOUS, 'Let us breathe together.'));

      const result = await service.sendMessage('session-a', 'My chest feels tight');

      expect(result).toEqual({
        sessionId: 'session-a',
        response: 'Let us breathe together.',
        mood: MoodTag.ANXIOUS,
        suggestion: "Let's try some slow breathing together: in for 4 counts, hold for 4, out for 6.",
        affordance: {
          level: CrisisLevel.MEDIUM,
          mode: 'offer',
          exercise: 'panic',
          emergencyResources: [],
        },
        exercise: null,
      });

      const profile = { id: 'session-a' };
      await expect(store.getHistory(profile)).resolves.toEqual([
        { role: 'user', content: 'My chest feels tight' },
        { role: 'assistant', content: 'Let us breathe together.' },
      ]);
      await expect(store.getRecentMoodLogs(profile)).resolves.toEqual([
        { mood: MoodTag.ANXIOUS, recordedAt: expect.any(Date) },
      ]);
      expect(mockCacheManager.del).toHaveBeenCalledWith('chat_history:session-a');
      expect(exerciseService.getState('session-a').kind).toBe('none');
    });

    it('should record the daily activity of the session', async () => {
      mockDialogueOrchestrator.handleTurn.mockImplementation(echoTurn(MoodTag.HAPPY, 'Lovely!'));

      await service.sendMessage('session-a', 'Good morning');
      await service.sendMessage('session-a', 'Still good');

      expect((await store.getProfile({ id: 'session-a' }))?.daysActive).toBe(1);
    });

    it('should not log neutral moods', async () => {
      mockDialogueOrchestrator.handleTurn.mockImplementation(echoTurn(MoodTag.NEUTRAL, 'Okay.'));

      const result = await service.sendMessage('session-a', 'what time is it');

      expect(result.suggestion).toBe('');
      await expect(store.countMoodLogs({ id: 'session-a' })).resolves.toBe(0);
      await expect(store.getHistory({ id: 'session-a' })).resolves.toHaveLength(2);
    });

    it('should leave history untouched for empty input', async () => {
      mockDialogueOrchestrator.handleTurn.mockImplementation(async (_input: string, history: ConversationHistory) => ({
        mood: MoodTag.NEUTRAL,
        reply: 'Whenever you are ready.',
        updatedHistory: history,
      }));

      const result = await service.sendMessage('session-a', '  \n ');

      expect(result.response).toBe('Whenever you are ready.');
      expect(mockDialogueOrchestrator.handleTurn).toHaveBeenCalledWith('', []);
      await expect(store.getHistory({ id: 'session-a' })).resolves.toEqual([]);
      expect(mockCacheManager.del).not.toHaveBeenCalled();
    });

    it('should start the panic exercise on serious distress', async () => {
      mockDialogueOrchestrator.handleTurn.mockImplementation(
        echoTurn(MoodTag.SERIOUS_DISTRESS, 'I am here with you.'),
      );

      const result = await service.sendMessage('session-a', 'I cannot cope anymore');

      expect(result.exercise).toEqual(describeExercise({ kind: 'panic', stepIndex: 0 }));
      expect(exerciseService.getState('session-a')).toEqual({ kind: 'panic', stepIndex: 0 });
      expect(result.affordance.level).toBe(CrisisLevel.CRITICAL);
      expect(result.affordance.mode).toBe('force');
      expect(result.affordance.emergencyResources.map((resource) => resource.contact)).toEqual([
        'Call or text 988',
        'Text HOME to 741741',
        'Call 911',
      ]);
    });

    it('should refuse to chat while an exercise is running', async () => {
      expect(exerciseService.enter('session-a', 'grounding').ok).toBe(true);

      await expect(service.sendMessage('session-a', 'hello')).rejects.toThrow(ConflictException);
      expect(mockDialogueOrchestrator.handleTurn).not.toHaveBeenCalled();
    });

    it('should refuse exercise entry while a turn is running', async () => {
      const reached = deferred();
      const release = deferred();
      mockDialogueOrchestrator.handleTurn.mockImplementation(async (input: string, history: ConversationHistory) => {
        reached.resolve();
        await release.promise;
        return echoTurn(MoodTag.NEUTRAL, 'Okay.')(input, history);
      });

      const turn = service.sendMessage('session-a', 'hello');
      await reached.promise;

      expect(exerciseService.enter('session-a', 'grounding')).toEqual({
        ok: false,
        state: { kind: 'none', stepIndex: 0 },
        reason: ExerciseRejection.TURN_IN_PROGRESS,
      });

      release.resolve();
      await expect(turn).resolves.toMatchObject({ response: 'Okay.', exercise: null });
      expect(exerciseService.getState('session-a').kind).toBe('none');
      await expect(store.getHistory({ id: 'session-a' })).resolves.toHaveLength(2);
    });

    it('should allow exercise entry once the turn has finished', async () => {
      mockDialogueOrchestrator.handleTurn.mockImplementation(echoTurn(MoodTag.NEUTRAL, 'Okay.'));

      await service.sendMessage('session-a', 'hello');

      expect(exerciseService.enter('session-a', 'grounding')).toEqual({
        ok: true,
        state: { kind: 'grounding', stepIndex: 0 },
      });
    });

    it('should apply the configured message length limit', async () => {
      service = await createService({ MAX_MESSAGE_LENGTH: '5' });
      mockDialogueOrchestrator.handleTurn.mockImplementation(echoTurn(MoodTag.NEUTRAL, 'Okay.'));

      await service.sendMessage('session-a', 'abcdefgh');

      expect(mockDialogueOrchestrator.handleTurn).toHaveBeenCalledWith('abcde', []);
    });

    it('should serialize concurrent turns of one session', async () => {
      mockDialogueOrchestrator.handleTurn.mockImplementation(echoTurn(MoodTag.NEUTRAL, 'Okay.'));

      await Promise.all([service.sendMessage('session-a', 'first'), service.sendMessage('session-a', 'second')]);

      await expect(store.getHistory({ id: 'session-a' })).resolves.toEqual([
        { role: 'user', content: 'first' },
        { role: 'assistant', content: 'Okay.' },
        { role: 'user', content: 'second' },
        { role: 'assistant', content: 'Okay.' },
      ]);
    });

    it('should still answer when the cache cannot be invalidated', async () => {
      mockCacheManager.del.mockRejectedValue(new Error('cache offline'));
      mockDialogueOrchestrator.handleTurn.mockImplementation(echoTurn(MoodTag.HAPPY, 'Great!'));

      await expect(service.sendMessage('session-a', 'hi')).resolves.toMatchObject({ response: 'Great!' });
    });
  });

  describe('getChatHistory', () => {
    it('should return cached history when present', async () => {
      const cached: ChatMessage[] = [{ role: 'user', content: 'cached' }];
      mockCacheManager.get.mockResolvedValue(cached);

      await expect(service.getChatHistory('session-a')).resolves.toBe(cached);
      await expect(store.getProfile({ id: 'session-a' })).resolves.toBeNull();
    });

    it('should load and cache history on a miss', async () => {
      mockCacheManager.get.mockResolvedValue(undefined);
      const profile = await store.getOrCreateProfile('session-a');
      await store.saveHistory(profile, [{ role: 'user', content: 'stored' }]);

      const history = await service.getChatHistory('session-a');

      expect(history).toEqual([{ role: 'user', content: 'stored' }]);
      expect(mockCacheManager.set).toHaveBeenCalledWith('chat_history:session-a', history, 120000);
    });

    it('should not leave stale history cached when a turn lands during a miss', async () => {
      const entries = new Map<string, ConversationHistory>();
      const setReached = deferred();
      const releaseSet = deferred();
      mockCacheManager.get.mockImplementation(async (key: string) => entries.get(key));
      mockCacheManager.set.mockImplementation(async (key: string, value: ConversationHistory) => {
        setReached.resolve();
        await releaseSet.promise;
        entries.set(key, value);
      });
      mockCacheManager.del.mockImplementation(async (key: string) => {
        entries.delete(key);
      });
      mockDialogueOrchestrator.handleTurn.mockImplementation(echoTurn(MoodTag.HAPPY, 'Great!'));

      const read = service.getChatHistory('session-a');
      await setReached.promise;
      const turn = service.sendMessage('session-a', 'hi');
      releaseSet.resolve();

      await expect(read).resolves.toEqual([]);
      await turn;

      expect(entries.has('chat_history:session-a')).toBe(false);
      mockCacheManager.set.mockImplementation(async (key: string, value: ConversationHistory) => {
        entries.set(key, value);
      });
      await expect(service.getChatHistory('session-a')).resolves.toEqual([
        { role: 'user', content: 'hi' },
        { role: 'assistant', content: 'Great!' },
      ]);
    });
  });
});
