import dotenv from 'dotenv';
import { z } from 'zod';

const emptyToUndefined = (value: unknown) => (value === '' ? undefined : value);

const optionalString = z.preprocess(emptyToUndefined, z.string().optional());

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(5000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  TELEGRAM_BOT_TOKEN: optionalString,
  TELEGRAM_MODE: z.enum(['polling', 'webhook']).default('polling'),
  TELEGRAM_WEBHOOK_SECRET: optionalString,
  TELEGRAM_BOT_USERNAME: optionalString,
  NUMBER_API_BASE_URL: z.string().url(),
  NUMBER_API_KEY: z.string().min(1),
  CALLBACK_SECRET: optionalString,
  ADMIN_CHAT_ID: z.preprocess(emptyToUndefined, z.coerce.number().int().optional()),
  MAPPINGS_FILE: z.string().min(1).default('mappings.json'),
  LOCK_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(20000)
});

export type Env = z.infer<typeof envSchema>;

export function loadEnv(source?: NodeJS.ProcessEnv): Env {
  if (!source) {
    dotenv.config();
  }
  return envSchema.parse(source ?? process.env);
}
