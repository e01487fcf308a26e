import dotenv from 'dotenv';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

dotenv.config();

const dataFile = (name: string) => fileURLToPath(new URL(`../../data/${name}`, import.meta.url));

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('warn'),
    SITES_FILE: z.string().min(1).default(dataFile('sites.yml')),
    HEADERS_FILE: z.string().min(1).default(dataFile('headers.yml')),
    LINKS_OUT: z.string().min(1).default('hits.txt'),
    THREADS: z.coerce.number().int().default(32),
    TIMEOUT_SECONDS: z.coerce.number().positive().default(10),
    DOMAIN_LIMIT: z.coerce.number().int().min(1).default(3),
    JITTER_MIN_MS: z.coerce.number().int().min(0).default(80),
    JITTER_MAX_MS: z.coerce.number().int().min(0).default(250),
    HTTP_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(3),
    HTTP_BACKOFF_MS: z.coerce.number().int().min(0).default(500),
  })
  .refine((env) => env.JITTER_MAX_MS >= env.JITTER_MIN_MS, {
    message: 'JITTER_MAX_MS must be >= JITTER_MIN_MS',
    path: ['JITTER_MAX_MS'],
  });

export type AppConfig = z.infer<typeof envSchema>;

export function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
  return envSchema.parse(env);
}

export const config: AppConfig = loadConfig(process.env);
