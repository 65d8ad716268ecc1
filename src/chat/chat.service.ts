import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CACHE_MANAGER } from '@nestjs/cache-manager';
import type { Cache } from 'cache-manager';
import { PerKeyLock } from '../common/per-key-lock';
import { PersistenceStore } from '../persistence/persistence-store';
import { ActivityLedger } from '../activity/activity-ledger.service';
import { ExerciseService } from '../exercise/exercise.service';
import { ExerciseView } from '../exercise/exercise-state-machine';
import { MoodTag } from '../mood/mood-tag';
import { ConversationHistory } from './message.types';
import { DialogueOrchestrator } from './dialogue-orchestrator.service';
import { CrisisAffordance, CrisisAffordanceService } from './crisis-affordance.service';
import { CopingSuggestionService } from './coping-suggestion.service';

export interface ChatTurnResponse {
  sessionId: string;
  response: string;
  mood: MoodTag;
  suggestion: string;
  affordance: CrisisAffordance;
  /** Present when this turn started an exercise on the user's behalf. */
  exercise: ExerciseView | null;
}

const HISTORY_CACHE_TTL_MS = 120000;
const DEFAULT_MAX_MESSAGE_LENGTH = 5000;

const CONTROL_CHARACTERS = /[\x00-\x08\x0B-\x0C\x0E-\x1F\x7F]/g;

/**
 * Strips control characters, collapses whitespace and caps the length.
 * Whitespace-only input comes back as an empty string.
 */
export function sanitizeMessage(content: string, maxLength: number): string {
  return content
    .replace(CONTROL_CHARACTERS, '')
    .replace(/\s+/g, ' ')
    .trim()
    .substring(0, maxLength);
}

@Injectable()
export class ChatService {
  private readonly logger = new Logger(ChatService.name);
  private readonly sessionLock = new PerKeyLock<string>();
  private readonly maxMessageLength: number;

  constructor(
    private store: PersistenceStore,
    private activityLedger: ActivityLedger,
    private dialogueOrchestrator: DialogueOrchestrator,
    private crisisAffordanceService: CrisisAffordanceService,
    private copingSuggestionService: CopingSuggestionService,
    private exerciseService: ExerciseService,
    private configService: ConfigService,
    @Inject(CACHE_MANAGER) private cacheManager: Cache,
  ) {
    const configured = parseInt(this.configService.get<string>('MAX_MESSAGE_LENGTH', `${DEFAULT_MAX_MESSAGE_LENGTH}`), 10);
    this.maxMessageLength = Number.isFinite(configured) && configured > 0 ? configured : DEFAULT_MAX_MESSAGE_LENGTH;
  }

  async sendMessage(sessionId: string, content: string): Promise<ChatTurnResponse> {
    // Same-session turns run one at a time so history appends never interleave
    return this.sessionLock.runExclusive(sessionId, () =>
      this.exerciseService.duringTurn(sessionId, () => this.runTurn(sessionId, content)),
    );
  }

  private async runTurn(sessionId: string, content: string): Promise<ChatTurnResponse> {
    const message = sanitizeMessage(content, this.maxMessageLength);

    const profile = await this.store.getOrCreateProfile(sessionId);
    const history = await this.store.getHistory(profile);
    await this.activityLedger.recordActivity(profile);

    const turn = await this.dialogueOrchestrator.handleTurn(message, history);

    if (message.length > 0) {
      await this.store.saveHistory(profile, turn.updatedHistory);
      await this.store.appendMoodLog(profile, turn.mood);
      await this.invalidateHistoryCache(sessionId);
    }

    const affordance = this.crisisAffordanceService.evaluate(turn.mood);
    let exercise: ExerciseView | null = null;
    if (affordance.mode === 'force' && affordance.exercise) {
      this.logger.warn(`Starting ${affordance.exercise} exercise for session ${sessionId} (mood: ${turn.mood})`);
      exercise = this.exerciseService.enterFromTurn(sessionId, affordance.exercise);
    }

    return {
      sessionId,
      response: turn.reply,
      mood: turn.mood,
      suggestion: this.copingSuggestionService.suggest(turn.mood),
      affordance,
      exercise,
    };
  }

  async getChatHistory(sessionId: string): Promise<ConversationHistory> {
    const cacheKey = this.historyCacheKey(sessionId);
    const cached = await this.cacheManager.get<ConversationHistory>(cacheKey);
    if (cached) {
      return cached;
    }

    // Filled under the session lock, never between a turn's save and its invalidation
    return this.sessionLock.runExclusive(sessionId, async () => {
      const profile = await this.store.getOrCreateProfile(sessionId);
      const history = await this.store.getHistory(profile);

      await this.cacheManager.set(cacheKey, history, HISTORY_CACHE_TTL_MS);
      return history;
    });
  }

  private async invalidateHistoryCache(sessionId: string): Promise<void> {
    try {
      await this.cacheManager.del(this.historyCacheKey(sessionId));
    } catch (error) {
      this.logger.error(
        `Failed to invalidate history cache for ${sessionId}`,
        error instanceof Error ? error.stack : String(error),
      );
    }
  }

  private historyCacheKey(sessionId: string): string {
    return `chat_history:${sessionId}`;
  }
}
