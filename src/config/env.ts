/**
 * Runtime configuration from environment variables (.env is loaded by the
 * entry points through dotenv before this runs)
 */

import { resolve } from 'path';
import { z } from 'zod';
import { API_DEFAULTS, KNOWLEDGE_BASE_DEFAULTS } from './defaults.js';

const EnvSchema = z.object({
  KB_PATH: z.string().min(1).default(KNOWLEDGE_BASE_DEFAULTS.KB_PATH),
  SYNONYMS_PATH: z.string().min(1).default(KNOWLEDGE_BASE_DEFAULTS.SYNONYMS_PATH),
  ENABLE_SYNONYMS: z
    .enum(['true', 'false'])
    .default(KNOWLEDGE_BASE_DEFAULTS.ENABLE_SYNONYMS ? 'true' : 'false')
    .transform((v) => v === 'true'),
  PORT: z.coerce.number().int().min(0).max(65535).default(API_DEFAULTS.PORT),
});

export interface RuntimeConfig {
  kb_path: string;
  synonyms_path: string | null;
  port: number;
}

export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  return {
    kb_path: resolve(process.cwd(), parsed.data.KB_PATH),
    synonyms_path: parsed.data.ENABLE_SYNONYMS
      ? resolve(process.cwd(), parsed.data.SYNONYMS_PATH)
      : null,
    port: parsed.data.PORT,
  };
}
