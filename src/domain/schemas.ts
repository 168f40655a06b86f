import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('true')
  .transform((value) => value === 'true' || value === '1');

export const envSchema = z.object({
  WATCH_DIR: z.string().min(1, 'WATCH_DIR is required'),
  OLLAMA_MODEL: z.string().min(1).default('qwen3-vl:32b'),
  OLLAMA_HOST: z.string().url().default('http://127.0.0.1:11434'),
  STABILITY_TIMEOUT_SECONDS: z.coerce.number().int().positive().default(30),
  MODEL_TIMEOUT_SECONDS: z.coerce.number().int().positive().default(300),
  PDF_RENDER_SCALE: z.coerce.number().positive().max(8).default(2),
  SWEEP_ON_START: booleanFlag,
});

export type EnvInput = z.input<typeof envSchema>;
export type ParsedEnv = z.infer<typeof envSchema>;
