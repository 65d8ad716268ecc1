export type ExerciseKind = 'grounding' | 'panic';

export interface ExerciseStep {
  id: string;
  title: string;
  instruction: string;
  /** Seconds before the machine moves on by itself; null when the user drives it. */
  dwellSeconds: number | null;
}

export const GROUNDING_STEPS: readonly ExerciseStep[] = [
  {
    id: 'intro',
    title: '5-4-3-2-1 Grounding',
    instruction: "Let's bring your attention back to the present. Get comfortable and take one slow breath. Tap next when you're ready.",
    dwellSeconds: null,
  },
  {
    id: 'sight',
    title: '5 things you can see',
    instruction: 'Look around and name five things you can see. Notice their colours and shapes.',
    dwellSeconds: null,
  },
  {
    id: 'touch',
    title: '4 things you can feel',
    instruction: 'Notice four things you can feel: your feet on the floor, the fabric of your clothes, the air on your skin.',
    dwellSeconds: null,
  },
  {
    id: 'hearing',
    title: '3 things you can hear',
    instruction: 'Listen carefully and name three sounds, near or far.',
    dwellSeconds: null,
  },
  {
    id: 'smell',
    title: '2 things you can smell',
    instruction: "Find two things you can smell. If nothing stands out, remember a scent you like.",
    dwellSeconds: null,
  },
  {
    id: 'taste',
    title: '1 thing you can taste',
    instruction: 'Notice one thing you can taste right now, or take a sip of water.',
    dwellSeconds: null,
  },
  {
    id: 'closing',
    title: 'Well done',
    instruction: 'You have walked through all five senses. Take a moment to notice how you feel, then tap finish.',
    dwellSeconds: null,
  },
];

export const PANIC_STEPS: readonly ExerciseStep[] = [
  {
    id: 'prepare',
    title: 'Get ready',
    instruction: 'Sit or stand comfortably and rest a hand on your chest. We will breathe together.',
    dwellSeconds: 5,
  },
  {
    id: 'breathe-in',
    title: 'Breathe in',
    instruction: 'Breathe in slowly through your nose.',
    dwellSeconds: 4,
  },
  {
    id: 'hold',
    title: 'Hold',
    instruction: 'Gently hold your breath.',
    dwellSeconds: 4,
  },
  {
    id: 'breathe-out',
    title: 'Breathe out',
    instruction: 'Let the air out slowly through your mouth.',
    dwellSeconds: 6,
  },
  {
    id: 'hold-empty',
    title: 'Hold',
    instruction: 'Pause before the next breath.',
    dwellSeconds: 4,
  },
  {
    id: 'repeat-cue',
    title: 'Keep going',
    instruction: 'Repeat this rhythm a few more times at your own pace.',
    dwellSeconds: 5,
  },
  {
    id: 'finish',
    title: "You're doing great",
    instruction: 'Notice your breathing settle. Tap finish whenever you are ready to return to the chat.',
    dwellSeconds: null,
  },
];

export function stepsFor(kind: ExerciseKind): readonly ExerciseStep[] {
  return kind === 'grounding' ? GROUNDING_STEPS : PANIC_STEPS;
}

export function isExerciseKind(value: unknown): value is ExerciseKind {
  return value === 'grounding' || value === 'panic';
}
