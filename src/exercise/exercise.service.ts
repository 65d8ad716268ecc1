import { ConflictException, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { SchedulerRegistry } from '@nestjs/schedule';
import { PersistenceStore } from '../persistence/persistence-store';
import { ExerciseKind } from './exercise-steps';
import {
  ExerciseRejection,
  ExerciseState,
  ExerciseView,
  IDLE_EXERCISE,
  TransitionResult,
  abortExercise,
  advanceExercise,
  currentStep,
  describeExercise,
  enterExercise,
  finishExercise,
} from './exercise-state-machine';

export type ExerciseListener = (sessionId: string, view: ExerciseView) => void;

/**
 * Holds the exercise state of every live session and drives the timed panic
 * steps. State lives in process memory only; a restart returns every session
 * to normal chat.
 */
@Injectable()
export class ExerciseService implements OnModuleDestroy {
  private readonly logger = new Logger(ExerciseService.name);
  private readonly sessions = new Map<string, ExerciseState>();
  private readonly listeners = new Set<ExerciseListener>();
  private readonly turnsInFlight = new Set<string>();

  constructor(
    private readonly schedulerRegistry: SchedulerRegistry,
    private readonly store: PersistenceStore,
  ) {}

  getState(sessionId: string): ExerciseState {
    return this.sessions.get(sessionId) ?? IDLE_EXERCISE;
  }

  getView(sessionId: string): ExerciseView {
    return describeExercise(this.getState(sessionId));
  }

  isActive(sessionId: string): boolean {
    return this.getState(sessionId).kind !== 'none';
  }

  /**
   * Runs a chat turn for the session. Chat and exercises never overlap: the
   * turn is refused while an exercise is active, and `enter` is refused while
   * the turn runs.
   */
  async duringTurn<T>(sessionId: string, work: () => Promise<T>): Promise<T> {
    if (this.isActive(sessionId)) {
      throw new ConflictException('An exercise is in progress; finish or abort it before chatting');
    }

    this.turnsInFlight.add(sessionId);
    try {
      return await work();
    } finally {
      this.turnsInFlight.delete(sessionId);
    }
  }

  /** User-initiated entry. Rejected while a chat turn for the session is running. */
  enter(sessionId: string, kind: ExerciseKind): TransitionResult {
    if (this.turnsInFlight.has(sessionId)) {
      return { ok: false, state: this.getState(sessionId), reason: ExerciseRejection.TURN_IN_PROGRESS };
    }
    return { ok: true, state: this.start(sessionId, kind) };
  }

  /** Entry decided by the running turn itself (forced crisis affordance). */
  enterFromTurn(sessionId: string, kind: ExerciseKind): ExerciseView {
    return describeExercise(this.start(sessionId, kind));
  }

  /** User-initiated "next". Timed steps reject it. */
  advance(sessionId: string): TransitionResult {
    const result = advanceExercise(this.getState(sessionId), 'user');
    if (result.ok) {
      this.apply(sessionId, result.state);
    }
    return result;
  }

  async finish(sessionId: string): Promise<TransitionResult> {
    const previous = this.getState(sessionId);
    const result = finishExercise(previous);
    if (!result.ok) {
      return result;
    }

    this.apply(sessionId, result.state);
    this.logger.log(`Session ${sessionId} completed ${previous.kind} exercise`);

    try {
      const profile = await this.store.getOrCreateProfile(sessionId);
      await this.store.incrementSessionsCompleted(profile);
    } catch (error) {
      this.logger.error(
        `Failed to record completed exercise for ${sessionId}`,
        error instanceof Error ? error.stack : String(error),
      );
    }

    return result;
  }

  abort(sessionId: string): ExerciseView {
    const previous = this.getState(sessionId);
    if (previous.kind !== 'none') {
      this.logger.log(`Session ${sessionId} aborted ${previous.kind} at step ${previous.stepIndex}`);
    }
    const state = abortExercise();
    this.apply(sessionId, state);
    return describeExercise(state);
  }

  subscribe(listener: ExerciseListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  onModuleDestroy() {
    for (const sessionId of this.sessions.keys()) {
      this.clearDwell(sessionId);
    }
    this.sessions.clear();
  }

  private start(sessionId: string, kind: ExerciseKind): ExerciseState {
    const previous = this.getState(sessionId);
    if (previous.kind !== 'none') {
      this.logger.log(`Session ${sessionId} abandoned ${previous.kind} at step ${previous.stepIndex}`);
    }

    const state = enterExercise(kind);
    this.apply(sessionId, state);
    this.logger.log(`Session ${sessionId} entered ${kind} exercise`);
    return state;
  }

  private apply(sessionId: string, state: ExerciseState): void {
    this.clearDwell(sessionId);

    if (state.kind === 'none') {
      this.sessions.delete(sessionId);
    } else {
      this.sessions.set(sessionId, state);
      this.scheduleDwell(sessionId, state);
    }

    this.notify(sessionId, describeExercise(state));
  }

  private scheduleDwell(sessionId: string, state: ExerciseState): void {
    const step = currentStep(state);
    if (!step || step.dwellSeconds === null) {
      return;
    }

    const timeout = setTimeout(() => this.onDwellElapsed(sessionId), step.dwellSeconds * 1000);
    this.schedulerRegistry.addTimeout(this.timerName(sessionId), timeout);
  }

  private clearDwell(sessionId: string): void {
    const name = this.timerName(sessionId);
    if (this.schedulerRegistry.doesExist('timeout', name)) {
      this.schedulerRegistry.deleteTimeout(name);
    }
  }

  private onDwellElapsed(sessionId: string): void {
    const result = advanceExercise(this.getState(sessionId), 'timer');
    if (!result.ok) {
      this.clearDwell(sessionId);
      return;
    }
    this.apply(sessionId, result.state);
  }

  private notify(sessionId: string, view: ExerciseView): void {
    for (const listener of this.listeners) {
      try {
        listener(sessionId, view);
      } catch (error) {
        this.logger.error(
          `Exercise listener failed for ${sessionId}`,
          error instanceof Error ? error.stack : String(error),
        );
      }
    }
  }

  private timerName(sessionId: string): string {
    return `exercise:${sessionId}`;
  }
}
