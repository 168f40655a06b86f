import { Ollama } from 'ollama';
import { ok, err } from '../../domain/result.js';
import { createAppError, describeCause, ErrorCode } from '../../domain/errors.js';
import { logger } from '../logger.js';
import type { Result } from '../../domain/result.js';
import type { AppError } from '../../domain/errors.js';
import type { VisionModel, LLMResponse, LLMRequestOptions } from './types.js';

const log = logger.child({ module: 'llm-ollama' });

export interface OllamaClient {
  chat(request: {
    model: string;
    messages: Array<{ role: 'user'; content: string; images?: Uint8Array[] }>;
    stream?: false;
    options?: { temperature?: number };
  }): Promise<{
    model: string;
    message: { content: string };
    prompt_eval_count?: number;
    eval_count?: number;
  }>;
  generate(request: {
    model: string;
    prompt: string;
    stream?: false;
    keep_alive?: number | string;
  }): Promise<unknown>;
}

export class OllamaProvider implements VisionModel {
  private readonly client: OllamaClient;
  private readonly model: string;

  constructor(client: OllamaClient, model: string) {
    this.client = client;
    this.model = model;
  }

  async describeImage(
    prompt: string,
    image: Uint8Array,
    options?: LLMRequestOptions,
  ): Promise<Result<LLMResponse, AppError>> {
    const startTime = Date.now();
    const ctx = { model: this.model, imageBytes: image.byteLength };

    log.debug(ctx, 'Calling Ollama chat');

    try {
      const response = await this.client.chat({
        model: this.model,
        messages: [{ role: 'user', content: prompt, images: [image] }],
        stream: false,
        options: { temperature: options?.temperature ?? 0 },
      });

      const latencyMs = Date.now() - startTime;
      const result: LLMResponse = {
        content: response.message.content.trim(),
        model: response.model,
        usage: {
          promptTokens: response.prompt_eval_count ?? 0,
          completionTokens: response.eval_count ?? 0,
        },
        latencyMs,
      };

      log.info(
        {
          ...ctx,
          latencyMs,
          promptTokens: result.usage.promptTokens,
          completionTokens: result.usage.completionTokens,
        },
        'Ollama chat succeeded',
      );

      return ok(result);
    } catch (cause) {
      return this.mapError(cause, Date.now() - startTime);
    }
  }

  async unload(): Promise<Result<void, AppError>> {
    try {
      await this.client.generate({ model: this.model, prompt: '', stream: false, keep_alive: 0 });
      log.info({ model: this.model }, 'Model unloaded');
      return ok(undefined);
    } catch (cause) {
      const details = describeCause(cause);
      log.warn({ model: this.model, errorCode: ErrorCode.MODEL_UNLOAD_FAILED, details }, 'Model unload failed');
      return err(createAppError(ErrorCode.MODEL_UNLOAD_FAILED, 'Could not unload model', true, details));
    }
  }

  private mapError(cause: unknown, latencyMs: number): Result<never, AppError> {
    const details = describeCause(cause);
    const ctx = { model: this.model, latencyMs, details };

    if (cause instanceof Error && (cause.name === 'TimeoutError' || cause.name === 'AbortError')) {
      log.error({ ...ctx, errorCode: ErrorCode.LLM_TIMEOUT, retryable: true }, 'Ollama request timed out');
      return err(createAppError(ErrorCode.LLM_TIMEOUT, 'Ollama request timed out', true, details));
    }

    log.error({ ...ctx, errorCode: ErrorCode.LLM_API_ERROR, retryable: true }, 'Ollama call failed');
    return err(createAppError(ErrorCode.LLM_API_ERROR, 'Ollama call failed', true, details));
  }
}

/** Every request made through the returned client is aborted after `timeoutMs`. */
export function createOllamaClient(host: string, timeoutMs: number): OllamaClient {
  const timedFetch: typeof fetch = (input, init) =>
    fetch(input, { ...init, signal: AbortSignal.timeout(timeoutMs) });
  return new Ollama({ host, fetch: timedFetch });
}
