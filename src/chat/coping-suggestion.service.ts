import { Injectable } from '@nestjs/common';
import { MoodTag } from '../mood/mood-tag';
import copingSuggestions from './coping-suggestions.json';

const SUGGESTIONS: Partial<Record<MoodTag, readonly string[]>> = copingSuggestions;

@Injectable()
export class CopingSuggestionService {
  /** Empty string when there is nothing to suggest (neutral moods). */
  suggest(mood: MoodTag): string {
    const options = SUGGESTIONS[mood];
    if (!options || options.length === 0) {
      return '';
    }
    const index = Math.min(Math.floor(Math.random() * options.length), options.length - 1);
    return options[index];
  }

  suggestionsFor(mood: MoodTag): readonly string[] {
    return SUGGESTIONS[mood] ?? [];
  }
}
