import { Injectable } from '@nestjs/common';
import { PromptsService } from '../prompts/prompts.service';
import { MoodTag } from '../mood/mood-tag';
import { ChatMessage, ConversationHistory } from './message.types';
import { MoodClassifier } from './mood-classifier.service';
import { ResponseGenerator } from './response-generator.service';

export interface TurnResult {
  mood: MoodTag;
  reply: string;
  updatedHistory: ConversationHistory;
}

/**
 * Runs one conversational turn: classify the mood, generate a reply and
 * append the exchange. Nothing is persisted here.
 */
@Injectable()
export class DialogueOrchestrator {
  constructor(
    private readonly moodClassifier: MoodClassifier,
    private readonly responseGenerator: ResponseGenerator,
    private readonly promptsService: PromptsService,
  ) {}

  async handleTurn(userInput: string, history: ConversationHistory): Promise<TurnResult> {
    if (userInput.trim().length === 0) {
      return {
        mood: MoodTag.NEUTRAL,
        reply: this.promptsService.getPrompts().emptyInputReply,
        updatedHistory: history,
      };
    }

    // Neither call depends on the other's output
    const [mood, reply] = await Promise.all([
      this.moodClassifier.classify(userInput, history),
      this.responseGenerator.generate(userInput, history),
    ]);

    const userMessage: ChatMessage = { role: 'user', content: userInput };
    const assistantMessage: ChatMessage = { role: 'assistant', content: reply };

    return {
      mood,
      reply,
      updatedHistory: [...history, userMessage, assistantMessage],
    };
  }
}
