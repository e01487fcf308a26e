import { createLogger } from '../logger/logger.js';
import { err, getErrorMessage } from '../../utils/errors.js';
import { hostOf } from '../../utils/url.js';
import { fillPlaceholders, matchesEvidence } from './evidence.js';
import type { DomainGate } from './rate-gate.js';
import type { HttpTransport, ProbeOutcome } from '../http/client.js';
import type { ProbeMode, ProbeResult, ProbeTask, ProbeTone, TransportErrorKind } from './types.js';

const log = createLogger('prober');

export interface JitterRange {
  minMs: number;
  maxMs: number;
}

export const DEFAULT_JITTER: JitterRange = { minMs: 80, maxMs: 250 };

export interface ProberOptions {
  transport: HttpTransport;
  gate: DomainGate;
  mode: ProbeMode;
  jitter?: JitterRange;
  random?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export function resolveUrl(template: string, username: string): string {
  return fillPlaceholders(template, username);
}

export function errorLabel(kind: TransportErrorKind | 'WorkerError'): string {
  return `ERR: ${kind}`;
}

interface Classification {
  statusLabel: string;
  isHttpOk: boolean;
  isVerifiedHit: boolean;
  tone: ProbeTone;
}

function classify(outcome: ProbeOutcome, task: ProbeTask): Classification {
  if (!outcome.success) {
    return { statusLabel: errorLabel(outcome.error.kind), isHttpOk: false, isVerifiedHit: false, tone: 'warn' };
  }

  const { status, body } = outcome.data;
  if (status === 200) {
    const isVerifiedHit = matchesEvidence(body, task.site.evidencePatterns, task.username);
    return { statusLabel: '200', isHttpOk: true, isVerifiedHit, tone: isVerifiedHit ? 'hit' : 'warn' };
  }
  if (status === 404) {
    return { statusLabel: '404', isHttpOk: false, isVerifiedHit: false, tone: 'miss' };
  }
  return { statusLabel: String(status), isHttpOk: false, isVerifiedHit: false, tone: 'warn' };
}

export function shouldPersist(mode: ProbeMode, isHttpOk: boolean, isVerifiedHit: boolean): boolean {
  return mode === 'evidence' ? isVerifiedHit : isHttpOk;
}

/**
 * Runs single username/site probes. `probe` always resolves; every failure
 * ends up in the result's status label.
 */
export class Prober {
  private readonly jitter: JitterRange;
  private readonly random: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly options: ProberOptions) {
    this.jitter = options.jitter ?? DEFAULT_JITTER;
    this.random = options.random ?? Math.random;
    this.sleep = options.sleep ?? defaultSleep;
  }

  get mode(): ProbeMode {
    return this.options.mode;
  }

  private jitterMs(): number {
    const { minMs, maxMs } = this.jitter;
    return Math.round(minMs + this.random() * (maxMs - minMs));
  }

  private async fetch(url: string): Promise<ProbeOutcome> {
    const domain = hostOf(url);
    if (!domain) {
      return err({ kind: 'InvalidUrl', message: `Cannot parse URL: ${url}` });
    }
    try {
      return await this.options.gate.run(domain, () => this.options.transport.get(url));
    } catch (error) {
      // Transports resolve their failures; reaching here means a broken transport
      log.error({ url, err: getErrorMessage(error) }, 'Transport threw instead of resolving');
      return err({ kind: 'RequestError', message: getErrorMessage(error) });
    }
  }

  async probe(task: ProbeTask): Promise<ProbeResult> {
    const url = resolveUrl(task.site.urlTemplate, task.username);

    const delay = this.jitterMs();
    if (delay > 0) await this.sleep(delay);

    // Timed from after the jitter, so gate waits count toward elapsed
    const start = performance.now();
    const outcome = await this.fetch(url);
    const elapsedMs = Math.floor(performance.now() - start);

    const { statusLabel, isHttpOk, isVerifiedHit, tone } = classify(outcome, task);

    log.debug({ ordinal: task.ordinal, site: task.site.name, url, status: statusLabel, elapsedMs }, 'Probe finished');

    return Object.freeze({
      ordinal: task.ordinal,
      siteName: task.site.name,
      username: task.username,
      url,
      statusLabel,
      elapsedMs,
      isHttpOk,
      isVerifiedHit,
      shouldPersist: shouldPersist(this.options.mode, isHttpOk, isVerifiedHit),
      tone,
    });
  }
}
