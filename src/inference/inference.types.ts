import { ChatRole } from '../chat/message.types';

export type InferenceRole = 'system' | ChatRole;

export interface InferenceMessage {
  role: InferenceRole;
  content: string;
}

export interface SamplingParams {
  maxTokens: number;
  /** 0 asks the backend for deterministic output. */
  temperature: number;
}

export enum InferenceFailureKind {
  UNAVAILABLE = 'unavailable',
  MALFORMED_RESPONSE = 'malformed_response',
  UNAUTHENTICATED = 'unauthenticated',
}

export type InferenceResult =
  | { ok: true; text: string }
  | { ok: false; kind: InferenceFailureKind; detail: string };

/**
 * A concrete text-generation backend. Implementations make exactly one
 * outbound call per `complete` and report every upstream problem as a
 * failure result instead of throwing.
 */
export interface InferenceProvider {
  readonly name: string;
  readonly model: string;
  complete(messages: InferenceMessage[], params: SamplingParams): Promise<InferenceResult>;
}

export const INFERENCE_PROVIDER = Symbol('INFERENCE_PROVIDER');

export function inferenceFailure(kind: InferenceFailureKind, detail: string): InferenceResult {
  return { ok: false, kind, detail };
}
