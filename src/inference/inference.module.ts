import { Logger, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import OpenAI from 'openai';
import { GoogleGenerativeAI } from '@google/generative-ai';
import { getInferenceConfig } from '../config/inference.config';
import { INFERENCE_PROVIDER, InferenceProvider } from './inference.types';
import { InferenceGateway } from './inference-gateway.service';
import { OpenAiCompatibleProvider } from './providers/openai-compatible.provider';
import { GeminiProvider } from './providers/gemini.provider';

export const createInferenceProvider = (configService: ConfigService): InferenceProvider | null => {
  const config = getInferenceConfig(configService);

  if (!config.apiKey) {
    new Logger('InferenceModule').warn(`No API key configured for the ${config.backend} backend`);
    return null;
  }

  if (config.backend === 'gemini') {
    return new GeminiProvider(new GoogleGenerativeAI(config.apiKey), config.model, config.timeoutMs);
  }

  const client = new OpenAI({
    apiKey: config.apiKey,
    baseURL: config.baseURL,
    timeout: config.timeoutMs,
    maxRetries: 0,
  });
  return new OpenAiCompatibleProvider(client, config.model, config.timeoutMs);
};

@Module({
  providers: [
    {
      provide: INFERENCE_PROVIDER,
      useFactory: createInferenceProvider,
      inject: [ConfigService],
    },
    InferenceGateway,
  ],
  exports: [InferenceGateway],
})
export class InferenceModule {}
