import type { Result } from '../../domain/result.js';
import type { AppError } from '../../domain/errors.js';

export interface LLMResponse {
  content: string;
  model: string;
  usage: {
    promptTokens: number;
    completionTokens: number;
  };
  latencyMs: number;
}

export interface VisionModel {
  describeImage(
    prompt: string,
    image: Uint8Array,
    options?: LLMRequestOptions,
  ): Promise<Result<LLMResponse, AppError>>;
  unload(): Promise<Result<void, AppError>>;
}

export interface LLMRequestOptions {
  temperature?: number;
}

export interface LLMProviderConfig {
  provider: 'ollama';
  host: string;
  model: string;
  timeoutMs: number;
}
