import Bottleneck from 'bottleneck';
import { mkdir, open, readFile } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { createLogger } from '../logger/logger.js';
import { AppError } from '../../utils/errors.js';

const log = createLogger('dedup-sink');

interface ExistingContent {
  lines: Set<string>;
  /** Non-empty and missing its final newline, e.g. after a crash mid-write. */
  unterminated: boolean;
}

async function readExisting(path: string): Promise<ExistingContent> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return { lines: new Set(), unterminated: false };
    }
    throw error;
  }
  const lines = text
    .split('\n')
    .map((line) => line.replace(/\r$/, ''))
    .filter((line) => line.trim() !== '');
  return { lines: new Set(lines), unterminated: text.length > 0 && !text.endsWith('\n') };
}

/**
 * Append-only, de-duplicating line writer. Lines already in the file when it
 * is opened count as seen, so re-running against the same file adds nothing
 * twice. Each accepted line is synced to disk before `offer` resolves.
 */
export class DedupSink {
  // Single-slot limiter: the check-write-sync-mark sequence runs one caller at a time
  private readonly lock = new Bottleneck({ maxConcurrent: 1 });
  private closing: Promise<void> | null = null;

  private constructor(
    readonly path: string,
    private readonly handle: FileHandle,
    private readonly seen: Set<string>,
  ) {}

  static async open(path: string): Promise<DedupSink> {
    const absolute = resolve(path);
    await mkdir(dirname(absolute), { recursive: true });
    const existing = await readExisting(absolute);
    const handle = await open(absolute, 'a');
    if (existing.unterminated) {
      // the next append must start on its own line
      try {
        await handle.write('\n');
        await handle.datasync();
      } catch (error) {
        await handle.close();
        throw error;
      }
      log.warn({ path: absolute }, 'Links file did not end with a newline; terminated its last line');
    }
    log.info({ path: absolute, existing: existing.lines.size }, 'Opened links file');
    return new DedupSink(absolute, handle, existing.lines);
  }

  get size(): number {
    return this.seen.size;
  }

  has(line: string): boolean {
    return this.seen.has(line);
  }

  /** Resolves true when the line was newly written, false when it was already there. */
  async offer(line: string): Promise<boolean> {
    if (this.closing) {
      throw new AppError(`Links file ${this.path} is closed`, { code: 'SINK_CLOSED' });
    }
    if (/[\r\n]/.test(line)) {
      throw new AppError('Links file entries must be single lines', { code: 'INVALID_LINE', context: { line } });
    }
    if (line.trim() === '' || this.seen.has(line)) return false;

    return this.lock.schedule(async () => {
      if (this.seen.has(line)) return false;
      await this.handle.write(`${line}\n`);
      await this.handle.datasync();
      this.seen.add(line);
      return true;
    });
  }

  /** Waits for pending writes, then closes the file. Safe to call more than once. */
  close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.lock.schedule(() => this.handle.close());
    }
    return this.closing;
  }
}
