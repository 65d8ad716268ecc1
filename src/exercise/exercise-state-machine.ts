import { ExerciseKind, ExerciseStep, stepsFor } from './exercise-steps';

/**
 * `kind: 'none'` always carries `stepIndex: 0`; otherwise `stepIndex` indexes
 * into the step list of `kind`.
 */
export type ExerciseState =
  | { kind: 'none'; stepIndex: 0 }
  | { kind: ExerciseKind; stepIndex: number };

/** Who asked to advance: the user ("next") or an elapsed dwell timer. */
export type AdvanceTrigger = 'user' | 'timer';

export enum ExerciseRejection {
  NO_ACTIVE_EXERCISE = 'no_active_exercise',
  AT_TERMINAL_STEP = 'at_terminal_step',
  NOT_AT_TERMINAL_STEP = 'not_at_terminal_step',
  WRONG_PACING = 'wrong_pacing',
  TURN_IN_PROGRESS = 'turn_in_progress',
}

export type TransitionResult =
  | { ok: true; state: ExerciseState }
  | { ok: false; state: ExerciseState; reason: ExerciseRejection };

export interface ExerciseView {
  kind: ExerciseState['kind'];
  stepIndex: number;
  totalSteps: number;
  isTerminal: boolean;
  step: ExerciseStep | null;
}

export const IDLE_EXERCISE: ExerciseState = { kind: 'none', stepIndex: 0 };

// grounding waits for the user; panic moves on its own timer
const PACING: Record<ExerciseKind, AdvanceTrigger> = {
  grounding: 'user',
  panic: 'timer',
};

const rejected = (state: ExerciseState, reason: ExerciseRejection): TransitionResult => ({
  ok: false,
  state,
  reason,
});

export function isTerminal(state: ExerciseState): boolean {
  return state.kind !== 'none' && state.stepIndex === stepsFor(state.kind).length - 1;
}

export function currentStep(state: ExerciseState): ExerciseStep | null {
  return state.kind === 'none' ? null : stepsFor(state.kind)[state.stepIndex];
}

/** Starting either exercise discards whatever was in progress. */
export function enterExercise(kind: ExerciseKind): ExerciseState {
  return { kind, stepIndex: 0 };
}

export function advanceExercise(state: ExerciseState, trigger: AdvanceTrigger): TransitionResult {
  if (state.kind === 'none') {
    return rejected(state, ExerciseRejection.NO_ACTIVE_EXERCISE);
  }
  if (isTerminal(state)) {
    return rejected(state, ExerciseRejection.AT_TERMINAL_STEP);
  }
  if (PACING[state.kind] !== trigger) {
    return rejected(state, ExerciseRejection.WRONG_PACING);
  }
  return { ok: true, state: { kind: state.kind, stepIndex: state.stepIndex + 1 } };
}

export function finishExercise(state: ExerciseState): TransitionResult {
  if (state.kind === 'none') {
    return rejected(state, ExerciseRejection.NO_ACTIVE_EXERCISE);
  }
  if (!isTerminal(state)) {
    return rejected(state, ExerciseRejection.NOT_AT_TERMINAL_STEP);
  }
  return { ok: true, state: IDLE_EXERCISE };
}

export function abortExercise(): ExerciseState {
  return IDLE_EXERCISE;
}

export function describeExercise(state: ExerciseState): ExerciseView {
  return {
    kind: state.kind,
    stepIndex: state.stepIndex,
    totalSteps: state.kind === 'none' ? 0 : stepsFor(state.kind).length,
    isTerminal: isTerminal(state),
    step: currentStep(state),
  };
}
