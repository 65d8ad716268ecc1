import OpenAI from 'openai';
import {
  InferenceFailureKind,
  InferenceMessage,
  InferenceProvider,
  InferenceResult,
  SamplingParams,
  inferenceFailure,
} from '../inference.types';

function toChatCompletionMessage(message: InferenceMessage): OpenAI.Chat.ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
  }
}

/**
 * Chat-completions backend for any OpenAI-compatible endpoint (the Hugging Face
 * router by default). Retries are disabled per request so the configured
 * timeout is the upper bound of a single call.
 */
export class OpenAiCompatibleProvider implements InferenceProvider {
  readonly name = 'openai';

  constructor(
    private readonly client: OpenAI,
    readonly model: string,
    private readonly timeoutMs: number,
  ) {}

  async complete(messages: InferenceMessage[], params: SamplingParams): Promise<InferenceResult> {
    try {
      const completion = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: messages.map(toChatCompletionMessage),
          temperature: params.temperature,
          max_tokens: params.maxTokens,
        },
        { timeout: this.timeoutMs, maxRetries: 0 },
      );

      const content = completion.choices?.[0]?.message?.content;
      if (typeof content !== 'string' || content.trim().length === 0) {
        return inferenceFailure(
          InferenceFailureKind.MALFORMED_RESPONSE,
          'Completion carried no message content',
        );
      }

      return { ok: true, text: content.trim() };
    } catch (error) {
      return this.toFailure(error);
    }
  }

  private toFailure(error: unknown): InferenceResult {
    if (error instanceof OpenAI.APIConnectionTimeoutError) {
      return inferenceFailure(
        InferenceFailureKind.UNAVAILABLE,
        `Request timed out after ${this.timeoutMs}ms`,
      );
    }
    if (error instanceof OpenAI.AuthenticationError || error instanceof OpenAI.PermissionDeniedError) {
      return inferenceFailure(InferenceFailureKind.UNAUTHENTICATED, error.message);
    }
    if (error instanceof OpenAI.APIError) {
      return inferenceFailure(
        InferenceFailureKind.UNAVAILABLE,
        `Upstream error ${error.status ?? 'without status'}: ${error.message}`,
      );
    }
    const message = error instanceof Error ? error.message : String(error);
    return inferenceFailure(InferenceFailureKind.UNAVAILABLE, message);
  }
}
