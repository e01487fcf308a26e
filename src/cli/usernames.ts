import { readFile } from 'node:fs/promises';
import { createInterface } from 'node:readline/promises';
import { AppError, getErrorMessage } from '../utils/errors.js';

/** Split "alice, bob carol" style input into names. */
export function splitUsernames(raw: string): string[] {
  return raw
    .split(/[,\s]+/)
    .map((name) => name.trim())
    .filter((name) => name !== '');
}

export async function readUserList(path: string): Promise<string[]> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw new AppError(`Could not read user list ${path}: ${getErrorMessage(error)}`, {
      code: 'USERLIST_ERROR',
      context: { path },
      cause: error,
    });
  }
  return text
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line !== '');
}

/**
 * Ask on the terminal. Resolves null when the prompt is closed (Ctrl-C / Ctrl-D)
 * before an answer arrives.
 */
export async function promptUsernames(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): Promise<string[] | null> {
  const rl = createInterface({ input, output });
  const closed = new AbortController();
  rl.once('close', () => closed.abort());
  rl.once('SIGINT', () => rl.close());

  try {
    const answer = await rl.question('Enter username(s) (comma or space separated): ', { signal: closed.signal });
    return splitUsernames(answer);
  } catch (error) {
    if (closed.signal.aborted) return null;
    throw error;
  } finally {
    rl.close();
  }
}
