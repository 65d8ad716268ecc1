import { Injectable, Logger } from '@nestjs/common';
import { InferenceGateway } from '../inference/inference-gateway.service';
import { InferenceMessage, SamplingParams } from '../inference/inference.types';
import { PromptsService } from '../prompts/prompts.service';
import { ConversationHistory } from './message.types';

export const GENERATION_SAMPLING: SamplingParams = { temperature: 0.7, maxTokens: 128 };

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

/**
 * Removes a leading speaker label ("Serenity:", "Assistant:") that chat
 * models sometimes prepend to their reply.
 */
export function stripSelfIdentification(text: string, personaName: string): string {
  const prefix = new RegExp(`^\\s*(?:${escapeRegExp(personaName)}|assistant)\\s*:\\s*`, 'i');
  return text.replace(prefix, '').trim();
}

@Injectable()
export class ResponseGenerator {
  private readonly logger = new Logger(ResponseGenerator.name);

  constructor(
    private readonly inferenceGateway: InferenceGateway,
    private readonly promptsService: PromptsService,
  ) {}

  buildPrompt(currentInput: string, history: ConversationHistory): InferenceMessage[] {
    return [
      { role: 'system', content: this.promptsService.getPrompts().personaInstruction },
      ...history.map((message) => ({ role: message.role, content: message.content })),
      { role: 'user', content: currentInput },
    ];
  }

  async generate(currentInput: string, history: ConversationHistory): Promise<string> {
    const result = await this.inferenceGateway.infer(
      this.buildPrompt(currentInput, history),
      GENERATION_SAMPLING,
    );

    if (!result.ok) {
      this.logger.warn(`Generation unavailable (${result.kind}), using a fallback reply`);
      return this.fallbackReply();
    }

    const reply = stripSelfIdentification(result.text, this.promptsService.getPrompts().personaName);
    if (!reply) {
      this.logger.warn('Generated reply was empty after cleanup, using a fallback reply');
      return this.fallbackReply();
    }
    return reply;
  }

  fallbackReply(): string {
    const { fallbackReplies } = this.promptsService.getPrompts();
    const index = Math.min(Math.floor(Math.random() * fallbackReplies.length), fallbackReplies.length - 1);
    return fallbackReplies[index];
  }
}
