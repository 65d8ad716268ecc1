import { Injectable, Logger } from '@nestjs/common';
import { InferenceGateway } from '../inference/inference-gateway.service';
import { InferenceMessage, SamplingParams } from '../inference/inference.types';
import { PromptsService } from '../prompts/prompts.service';
import { MoodTag, isMoodTag } from '../mood/mood-tag';
import { ConversationHistory } from './message.types';

export const CLASSIFICATION_WINDOW = 4;

// Output is a single bracketed tag, not prose
export const CLASSIFICATION_SAMPLING: SamplingParams = { temperature: 0, maxTokens: 15 };

const TAG_PATTERN = /\[(mood|intent):\s*([^\]]+)\]/;

/**
 * Extracts the tag from raw classifier output such as `[mood: anxious] ...`.
 * Anything unparseable, or a label outside the closed vocabulary, is neutral.
 */
export function parseMoodTag(raw: string): MoodTag {
  const match = TAG_PATTERN.exec(raw);
  if (!match) {
    return MoodTag.NEUTRAL;
  }
  const candidate = match[2].trim();
  return isMoodTag(candidate) ? candidate : MoodTag.NEUTRAL;
}

@Injectable()
export class MoodClassifier {
  private readonly logger = new Logger(MoodClassifier.name);

  constructor(
    private readonly inferenceGateway: InferenceGateway,
    private readonly promptsService: PromptsService,
  ) {}

  buildPrompt(currentInput: string, history: ConversationHistory): InferenceMessage[] {
    const recent = history.slice(-CLASSIFICATION_WINDOW);
    return [
      { role: 'system', content: this.promptsService.getPrompts().classificationInstruction },
      ...recent.map((message) => ({ role: message.role, content: message.content })),
      { role: 'user', content: currentInput },
    ];
  }

  async classify(currentInput: string, history: ConversationHistory): Promise<MoodTag> {
    const result = await this.inferenceGateway.infer(
      this.buildPrompt(currentInput, history),
      CLASSIFICATION_SAMPLING,
    );

    if (!result.ok) {
      this.logger.warn(`Classification unavailable (${result.kind}), defaulting to neutral`);
      return MoodTag.NEUTRAL;
    }

    const mood = parseMoodTag(result.text);
    this.logger.log(`Classified mood: ${mood}`);
    return mood;
  }
}
