import { createLogger } from '../logger/logger.js';
import { getErrorMessage } from '../../utils/errors.js';

const log = createLogger('evidence');

/** `{user}` is current; `{!!}` comes from older site lists. */
const PLACEHOLDERS = ['{user}', '{!!}'] as const;

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Replace every username placeholder in `template`. */
export function fillPlaceholders(template: string, value: string): string {
  let out = template;
  for (const placeholder of PLACEHOLDERS) {
    out = out.split(placeholder).join(value);
  }
  return out;
}

/**
 * Decide whether a 200 body is evidence that `username` exists.
 *
 * No patterns means the status alone is enough. Otherwise any pattern that
 * matches (case-insensitive, multiline) is enough; patterns that fail to
 * compile are skipped and never count as a match.
 */
export function matchesEvidence(body: string, patterns: readonly string[] | undefined, username: string): boolean {
  if (!patterns || patterns.length === 0) return true;

  const escaped = escapeRegExp(username);
  for (const pattern of patterns) {
    let regex: RegExp;
    try {
      regex = new RegExp(fillPlaceholders(pattern, escaped), 'im');
    } catch (error) {
      log.debug({ pattern, err: getErrorMessage(error) }, 'Skipping malformed evidence pattern');
      continue;
    }
    if (regex.test(body)) return true;
  }
  return false;
}
