import { randomUUID } from 'crypto';

/**
 * Generate a short run ID for tying together the log lines of one scout run.
 * Uses first 8 chars of a UUID for brevity in logs.
 */
export function generateRunId(): string {
  return randomUUID().slice(0, 8);
}

/**
 * Context bound onto the run's child logger.
 */
export interface RunContext {
  runId: string;
  usernames: number;
  sites: number;
  service: string;
}

export function createRunContext(usernames: number, sites: number): RunContext {
  return {
    runId: generateRunId(),
    usernames,
    sites,
    service: 'scout',
  };
}
