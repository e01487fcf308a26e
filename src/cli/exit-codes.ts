import type { RunSummary } from '../services/scheduler/scheduler.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;
export const EXIT_INTERRUPTED = 130;

/**
 * A run counts as interrupted once Ctrl-C aborted it, even when every task
 * had already been dispatched and nothing was cancelled.
 */
export function runExitCode(summary: RunSummary, signal: AbortSignal): number {
  return signal.aborted || summary.cancelled > 0 ? EXIT_INTERRUPTED : EXIT_OK;
}
