import {
  Content,
  GoogleGenerativeAI,
  GoogleGenerativeAIFetchError,
} from '@google/generative-ai';
import {
  InferenceFailureKind,
  InferenceMessage,
  InferenceProvider,
  InferenceResult,
  SamplingParams,
  inferenceFailure,
} from '../inference.types';

export class GeminiProvider implements InferenceProvider {
  readonly name = 'gemini';

  constructor(
    private readonly client: GoogleGenerativeAI,
    readonly model: string,
    private readonly timeoutMs: number,
  ) {}

  async complete(messages: InferenceMessage[], params: SamplingParams): Promise<InferenceResult> {
    // Gemini takes system text as a model instruction and calls the assistant "model"
    const systemInstruction = messages
      .filter((message) => message.role === 'system')
      .map((message) => message.content)
      .join('\n\n');
    const contents: Content[] = messages
      .filter((message) => message.role !== 'system')
      .map((message) => ({
        role: message.role === 'assistant' ? 'model' : 'user',
        parts: [{ text: message.content }],
      }));

    try {
      const generativeModel = this.client.getGenerativeModel(
        { model: this.model, systemInstruction },
        { timeout: this.timeoutMs },
      );

      const result = await generativeModel.generateContent({
        contents,
        generationConfig: {
          temperature: params.temperature,
          maxOutputTokens: params.maxTokens,
        },
      });

      const parts = result.response.candidates?.[0]?.content?.parts ?? [];
      const text = parts
        .map((part) => part.text ?? '')
        .join('')
        .trim();

      if (!text) {
        return inferenceFailure(
          InferenceFailureKind.MALFORMED_RESPONSE,
          'Response carried no candidate text',
        );
      }

      return { ok: true, text };
    } catch (error) {
      if (error instanceof GoogleGenerativeAIFetchError && (error.status === 401 || error.status === 403)) {
        return inferenceFailure(InferenceFailureKind.UNAUTHENTICATED, error.message);
      }
      const message = error instanceof Error ? error.message : String(error);
      return inferenceFailure(InferenceFailureKind.UNAVAILABLE, message);
    }
  }
}
