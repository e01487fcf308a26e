import { readFile } from 'node:fs/promises';
import { parse } from 'yaml';
import { z } from 'zod';
import { ConfigurationError, getErrorMessage } from '../utils/errors.js';

const headerValue = z.union([z.string(), z.number(), z.boolean()]).transform(String);

const headerConfigSchema = z.object({
  Base: z.record(headerValue).optional(),
  'User-Agents': z.array(z.string().min(1)).optional(),
  'Accept-Languages': z.array(z.string().min(1)).optional(),
});

export type HeaderConfig = z.infer<typeof headerConfigSchema>;

export function parseHeaderConfig(raw: unknown, file = 'headers'): HeaderConfig {
  // An empty document means no headers at all
  if (raw === null || raw === undefined) return {};

  const parsed = headerConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new ConfigurationError(`Invalid header config ${file}${where}: ${issue?.message ?? 'unknown issue'}`, { file });
  }
  return parsed.data;
}

export async function loadHeaderConfig(file: string): Promise<HeaderConfig> {
  let raw: unknown;
  try {
    raw = parse(await readFile(file, 'utf8'));
  } catch (error) {
    throw new ConfigurationError(`Could not read header config ${file}: ${getErrorMessage(error)}`, { file, cause: error });
  }
  return parseHeaderConfig(raw, file);
}

function pick<T>(pool: readonly T[] | undefined, random: () => number): T | undefined {
  if (!pool || pool.length === 0) return undefined;
  return pool[Math.floor(random() * pool.length)];
}

/**
 * Headers for one session: the base set plus one User-Agent and one
 * Accept-Language drawn from their pools.
 */
export function buildSessionHeaders(cfg: HeaderConfig, random: () => number = Math.random): Record<string, string> {
  const headers: Record<string, string> = { ...cfg.Base };

  const userAgent = pick(cfg['User-Agents'], random);
  if (userAgent) headers['User-Agent'] = userAgent;

  const language = pick(cfg['Accept-Languages'], random);
  if (language) headers['Accept-Language'] = language;

  return headers;
}
