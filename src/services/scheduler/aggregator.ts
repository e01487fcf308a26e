import type { ProbeResult } from '../probe/types.js';

/** One saved hit as written to the JSONL and CSV exports. */
export interface ExportRow {
  site: string;
  username: string;
  url: string;
  status: string;
  ms: number;
  hit200: boolean;
  hit: boolean;
}

export const EXPORT_FIELDS = ['site', 'username', 'url', 'status', 'ms', 'hit200', 'hit'] as const satisfies readonly (keyof ExportRow)[];

/**
 * Collects released results that qualify for saving, in release order.
 */
export class HitAggregator {
  private readonly saved: ProbeResult[] = [];

  add(result: ProbeResult): boolean {
    if (!result.shouldPersist) return false;
    this.saved.push(result);
    return true;
  }

  get count(): number {
    return this.saved.length;
  }

  hits(): readonly ProbeResult[] {
    return [...this.saved];
  }

  toExportRows(): ExportRow[] {
    return this.saved.map((r) => ({
      site: r.siteName,
      username: r.username,
      url: r.url,
      status: r.statusLabel,
      ms: r.elapsedMs,
      hit200: r.isHttpOk,
      hit: r.isVerifiedHit,
    }));
  }
}
