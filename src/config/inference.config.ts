import { ConfigService } from '@nestjs/config';

export type InferenceBackend = 'openai' | 'gemini';

export interface InferenceConfig {
  backend: InferenceBackend;
  apiKey: string;
  baseURL: string;
  model: string;
  timeoutMs: number;
}

const DEFAULT_TIMEOUT_MS = 30000;

export const getInferenceConfig = (configService: ConfigService): InferenceConfig => {
  const backend: InferenceBackend =
    configService.get<string>('AI_PROVIDER', 'openai') === 'gemini' ? 'gemini' : 'openai';

  // Always finite; invalid values fall back to the default
  const parsedTimeout = parseInt(configService.get<string>('INFERENCE_TIMEOUT_MS', `${DEFAULT_TIMEOUT_MS}`), 10);
  const timeoutMs = Number.isFinite(parsedTimeout) && parsedTimeout > 0 ? parsedTimeout : DEFAULT_TIMEOUT_MS;

  if (backend === 'gemini') {
    return {
      backend,
      apiKey: configService.get<string>('GEMINI_API_KEY', ''),
      baseURL: '',
      model: configService.get<string>('GEMINI_MODEL', 'gemini-1.5-flash'),
      timeoutMs,
    };
  }

  return {
    backend,
    apiKey:
      configService.get<string>('INFERENCE_API_KEY') ||
      configService.get<string>('HUGGINGFACE_API_KEY') ||
      configService.get<string>('OPENAI_API_KEY') ||
      '',
    baseURL: configService.get<string>('INFERENCE_BASE_URL', 'https://router.huggingface.co/v1'),
    model: configService.get<string>('INFERENCE_MODEL', 'mistralai/Mistral-7B-Instruct-v0.2'),
    timeoutMs,
  };
};
