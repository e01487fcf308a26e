import Bottleneck from 'bottleneck';
import { availableParallelism } from 'node:os';
import { createLogger } from '../logger/logger.js';
import { getErrorMessage } from '../../utils/errors.js';
import { errorLabel, resolveUrl } from '../probe/prober.js';
import { Reassembler } from './reassembler.js';
import type { SiteDescriptor, ProbeResult, ProbeTask } from '../probe/types.js';

const log = createLogger('scheduler');

/** Workers per available CPU. */
const WORKERS_PER_CPU = 5;

/**
 * Clamp a requested worker count to [1, max(1, cpus * 5)].
 */
export function resolvePoolSize(requested: number, parallelism: number = availableParallelism()): number {
  let size = Math.floor(requested);
  if (!Number.isFinite(size) || size < 1) {
    log.warn({ requested }, 'Worker count below 1, using 1');
    size = 1;
  }
  const ceiling = Math.max(1, parallelism * WORKERS_PER_CPU);
  return Math.min(size, ceiling);
}

/**
 * Cross product of usernames and sites, usernames outermost. Ordinals start at 1.
 */
export function enumerateTasks(usernames: readonly string[], sites: readonly SiteDescriptor[]): ProbeTask[] {
  const tasks: ProbeTask[] = [];
  for (const username of usernames) {
    for (const site of sites) {
      tasks.push(Object.freeze({ username, site, ordinal: tasks.length + 1 }));
    }
  }
  return tasks;
}

export interface RunProbesOptions {
  tasks: readonly ProbeTask[];
  worker: (task: ProbeTask) => Promise<ProbeResult>;
  poolSize: number;
  /** Called once per result, in ascending ordinal order, never concurrently. */
  onRelease: (result: ProbeResult) => void | Promise<void>;
  /** Aborting stops new dispatches; in-flight tasks still finish. */
  signal?: AbortSignal;
}

export interface RunSummary {
  total: number;
  released: number;
  /** Tasks never dispatched because the run was aborted. */
  cancelled: number;
  durationMs: number;
}

function workerErrorResult(task: ProbeTask): ProbeResult {
  const result: ProbeResult = {
    ordinal: task.ordinal,
    siteName: task.site.name,
    username: task.username,
    url: resolveUrl(task.site.urlTemplate, task.username),
    statusLabel: errorLabel('WorkerError'),
    elapsedMs: 0,
    isHttpOk: false,
    isVerifiedHit: false,
    shouldPersist: false,
    tone: 'warn',
  };
  return Object.freeze(result);
}

/**
 * Fan tasks out across a bounded pool and release results in submission order.
 *
 * A worker that throws still fills its ordinal slot with an error result, so
 * one bad task never stalls the ordering. An `onRelease` failure stops further
 * dispatch and rejects the run once in-flight work has settled.
 */
export async function runProbes(options: RunProbesOptions): Promise<RunSummary> {
  const { tasks, worker, onRelease } = options;
  const total = tasks.length;
  const startedAt = Date.now();

  const pool = new Bottleneck({ maxConcurrent: Math.max(1, options.poolSize) });
  const reassembler = new Reassembler<ProbeResult>(total);

  let released = 0;
  let cancelled = 0;
  const releaseFailures: unknown[] = [];
  let releaseChain: Promise<void> = Promise.resolve();

  const stopped = () => options.signal?.aborted === true || releaseFailures.length > 0;

  const deliver = (ready: ProbeResult[]) => {
    if (ready.length === 0) return;
    releaseChain = releaseChain.then(async () => {
      for (const result of ready) {
        if (releaseFailures.length > 0) return;
        try {
          await onRelease(result);
          released++;
        } catch (error) {
          log.error({ ordinal: result.ordinal, err: getErrorMessage(error) }, 'Result observer failed, stopping dispatch');
          releaseFailures.push(error);
        }
      }
    });
  };

  const runOne = async (task: ProbeTask): Promise<void> => {
    if (stopped()) {
      cancelled++;
      return;
    }

    let result: ProbeResult;
    try {
      result = await worker(task);
    } catch (error) {
      log.error({ ordinal: task.ordinal, site: task.site.name, err: getErrorMessage(error) }, 'Worker threw');
      result = workerErrorResult(task);
    }
    deliver(reassembler.accept(task.ordinal, result));
  };

  await Promise.all(tasks.map((task) => pool.schedule(() => runOne(task))));
  await releaseChain;

  if (cancelled > 0) {
    log.warn({ cancelled, stuckBehind: reassembler.nextOrdinal, buffered: reassembler.buffered }, 'Run aborted before all tasks were dispatched');
  }

  if (releaseFailures.length > 0) throw releaseFailures[0];

  return { total, released, cancelled, durationMs: Date.now() - startedAt };
}
