import Bottleneck from 'bottleneck';

/** Requests allowed in flight per domain at once. */
export const DEFAULT_DOMAIN_LIMIT = 3;

export interface GateToken {
  readonly domain: string;
  /** Frees the slot. Calling it again is a no-op. */
  release(): void;
}

/**
 * Per-domain admission control. Each domain gets its own limiter whose
 * maxConcurrent is the slot count, so waiters suspend instead of polling and
 * the limit holds exactly.
 *
 * One gate belongs to one run; nothing here is module-level state.
 */
export class DomainGate {
  private readonly limiters = new Map<string, Bottleneck>();
  private readonly holders = new Map<string, number>();

  constructor(readonly limit: number = DEFAULT_DOMAIN_LIMIT) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`Domain limit must be a positive integer, got ${limit}`);
    }
  }

  private limiterFor(domain: string): Bottleneck {
    let limiter = this.limiters.get(domain);
    if (!limiter) {
      limiter = new Bottleneck({ maxConcurrent: this.limit });
      this.limiters.set(domain, limiter);
    }
    return limiter;
  }

  private adjust(domain: string, delta: number): void {
    const next = Math.max(0, (this.holders.get(domain) ?? 0) + delta);
    if (next === 0) this.holders.delete(domain);
    else this.holders.set(domain, next);
  }

  /**
   * Resolves once the domain has a free slot. The slot stays taken until the
   * token is released.
   */
  acquire(domain: string): Promise<GateToken> {
    return new Promise<GateToken>((resolve, reject) => {
      this.limiterFor(domain)
        .schedule(
          () =>
            new Promise<void>((freeSlot) => {
              this.adjust(domain, 1);
              let released = false;
              resolve({
                domain,
                release: () => {
                  if (released) return;
                  released = true;
                  this.adjust(domain, -1);
                  freeSlot();
                },
              });
            }),
        )
        .catch(reject);
    });
  }

  /** Runs `fn` holding a slot for `domain`; the slot is freed on every exit path. */
  async run<T>(domain: string, fn: () => Promise<T>): Promise<T> {
    const token = await this.acquire(domain);
    try {
      return await fn();
    } finally {
      token.release();
    }
  }

  inFlight(domain: string): number {
    return this.holders.get(domain) ?? 0;
  }

  /** Domains seen so far. */
  domains(): string[] {
    return [...this.limiters.keys()];
  }
}
