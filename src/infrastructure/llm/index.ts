export type { VisionModel, LLMResponse, LLMRequestOptions, LLMProviderConfig } from './types.js';
export { OllamaProvider, createOllamaClient } from './ollama.js';
export type { OllamaClient } from './ollama.js';

import { OllamaProvider, createOllamaClient } from './ollama.js';
import type { VisionModel, LLMProviderConfig } from './types.js';

export function createVisionModel(config: LLMProviderConfig): VisionModel {
  switch (config.provider) {
    case 'ollama':
      return new OllamaProvider(createOllamaClient(config.host, config.timeoutMs), config.model);
    default:
      throw new Error(`Unsupported LLM provider: ${String(config.provider)}`);
  }
}
