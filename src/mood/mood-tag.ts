export enum MoodTag {
  HAPPY = 'happy',
  NEUTRAL = 'neutral',
  SAD = 'sad',
  ANXIOUS = 'anxious',
  SEEKING_COMMUNITY = 'seeking_community',
  SERIOUS_DISTRESS = 'serious_distress',
}

const MOOD_TAGS: ReadonlySet<string> = new Set<string>(Object.values(MoodTag));

export function isMoodTag(value: string): value is MoodTag {
  return MOOD_TAGS.has(value);
}
