import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  INFERENCE_PROVIDER,
  InferenceFailureKind,
  InferenceMessage,
  InferenceProvider,
  InferenceResult,
  SamplingParams,
  inferenceFailure,
} from './inference.types';

/**
 * Throws when the prompt is not a system instruction followed by at least one
 * conversational turn. Prompt builders in this codebase always satisfy it.
 */
export function assertWellFormedPrompt(messages: InferenceMessage[]): void {
  const lastSystemIndex = messages.map((message) => message.role).lastIndexOf('system');
  if (lastSystemIndex === -1) {
    throw new Error('Inference prompt must contain a system instruction');
  }
  if (lastSystemIndex === messages.length - 1) {
    throw new Error('Inference prompt must contain at least one conversational message after the system instruction');
  }
}

@Injectable()
export class InferenceGateway {
  private readonly logger = new Logger(InferenceGateway.name);

  constructor(
    @Inject(INFERENCE_PROVIDER)
    private readonly provider: InferenceProvider | null,
  ) {
    if (this.provider) {
      this.logger.log(`InferenceGateway initialized with ${this.provider.name} (${this.provider.model})`);
    } else {
      this.logger.warn('InferenceGateway initialized without a credential; every call will fail as unauthenticated');
    }
  }

  async infer(messages: InferenceMessage[], params: SamplingParams): Promise<InferenceResult> {
    assertWellFormedPrompt(messages);

    if (!this.provider) {
      return inferenceFailure(InferenceFailureKind.UNAUTHENTICATED, 'No inference credential configured');
    }

    const startTime = Date.now();
    const result = await this.provider.complete(messages, params);
    const elapsed = Date.now() - startTime;

    if (result.ok) {
      this.logger.log(`${this.provider.name} (${this.provider.model}) call took ${elapsed}ms`);
    } else {
      this.logger.warn(
        `${this.provider.name} (${this.provider.model}) call failed after ${elapsed}ms [${result.kind}]: ${result.detail}`,
      );
    }

    return result;
  }
}
