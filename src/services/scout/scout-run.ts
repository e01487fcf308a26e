import { stringify } from 'yaml';
import type { Writable } from 'node:stream';
import { buildSessionHeaders } from '../../config/headers.js';
import type { HeaderConfig } from '../../config/headers.js';
import { HttpClient } from '../http/client.js';
import type { HttpTransport } from '../http/client.js';
import { createLogger } from '../logger/logger.js';
import { createRunContext } from '../logger/correlation.js';
import { BANNER, ConsolePrinter, RULE } from '../output/console.js';
import { DedupSink } from '../output/dedup-sink.js';
import { exportCsv, exportJsonl } from '../output/exporters.js';
import { DomainGate, DEFAULT_DOMAIN_LIMIT } from '../probe/rate-gate.js';
import { DEFAULT_JITTER, Prober } from '../probe/prober.js';
import type { JitterRange } from '../probe/prober.js';
import type { ProbeMode, ProbeResult, SiteDescriptor } from '../probe/types.js';
import { HitAggregator } from '../scheduler/aggregator.js';
import { enumerateTasks, resolvePoolSize, runProbes } from '../scheduler/scheduler.js';
import type { RunSummary } from '../scheduler/scheduler.js';

const log = createLogger('scout');

export interface ScoutOptions {
  usernames: readonly string[];
  sites: readonly SiteDescriptor[];
  headerConfig: HeaderConfig;
  mode: ProbeMode;
  threads: number;
  timeoutSeconds: number;
  proxy?: string;
  /** Site names to keep, case-insensitive. */
  only?: readonly string[];
  /** Streaming de-duplicated URL file; null disables it. */
  linksOut: string | null;
  hitsJsonl?: string;
  csvOut?: string;
  color: boolean;
  banner?: boolean;
  domainLimit?: number;
  jitter?: JitterRange;
  maxRetries?: number;
  backoffMs?: number;
  signal?: AbortSignal;
  out?: Writable;
  /** Replaces the axios session, e.g. with an in-process stand-in. */
  transport?: HttpTransport;
  parallelism?: number;
}

export interface ScoutReport {
  summary: RunSummary;
  hits: readonly ProbeResult[];
  /** URLs newly appended to the links file during this run. */
  linksWritten: number;
}

export interface SiteSelection {
  sites: readonly SiteDescriptor[];
  /** False when a filter was given but matched nothing, so every site is used. */
  matched: boolean;
}

export function selectSites(sites: readonly SiteDescriptor[], only?: readonly string[]): SiteSelection {
  if (!only || only.length === 0) return { sites, matched: true };

  const wanted = new Set(only.map((name) => name.trim().toLowerCase()).filter((name) => name !== ''));
  const selected = sites.filter((site) => wanted.has(site.name.toLowerCase()));
  return selected.length > 0 ? { sites: selected, matched: true } : { sites, matched: false };
}

/**
 * One complete run: probe every username on every selected site, print
 * results in order, stream hits to the links file, then write the exports.
 */
export async function scout(options: ScoutOptions): Promise<ScoutReport> {
  const printer = new ConsolePrinter(options.out, options.color);

  const selection = selectSites(options.sites, options.only);
  if (!selection.matched) {
    printer.line('Warning: --only matched no sites. Using all sites.');
  }
  const sites = selection.sites;

  const runLog = log.child(createRunContext(options.usernames.length, sites.length));
  const poolSize = resolvePoolSize(options.threads, options.parallelism);
  const headers = buildSessionHeaders(options.headerConfig);

  const transport =
    options.transport ??
    new HttpClient({
      headers,
      timeoutMs: Math.round(options.timeoutSeconds * 1000),
      proxy: options.proxy,
      maxRetries: options.maxRetries ?? 3,
      backoffMs: options.backoffMs ?? 500,
    });
  const gate = new DomainGate(options.domainLimit ?? DEFAULT_DOMAIN_LIMIT);
  const prober = new Prober({ transport, gate, mode: options.mode, jitter: options.jitter ?? DEFAULT_JITTER });

  if (options.banner !== false) printer.line(BANNER);
  printer.line(`Scouting user(s): ${options.usernames.join(', ')}`);
  printer.line(`Page count: ${sites.length}`);
  printer.line(`Maximum threads: ${poolSize}`);
  printer.line('Headers:');
  printer.line(RULE);
  printer.line(Object.keys(headers).length > 0 ? stringify(headers, { indent: 2 }).trim() : '{}');
  printer.line(RULE);

  const tasks = enumerateTasks(options.usernames, sites);
  const total = tasks.length;
  const aggregator = new HitAggregator();
  const sink = options.linksOut ? await DedupSink.open(options.linksOut) : null;
  let linksWritten = 0;

  runLog.info({ total, poolSize, mode: options.mode }, 'Starting run');

  try {
    const summary = await runProbes({
      tasks,
      poolSize,
      signal: options.signal,
      worker: (task) => prober.probe(task),
      onRelease: async (result) => {
        printer.result(result, total);
        if (aggregator.add(result) && sink && (await sink.offer(result.url))) {
          linksWritten++;
        }
      },
    });

    const seconds = (summary.durationMs / 1000).toFixed(2);
    printer.line(RULE);
    if (summary.cancelled > 0) {
      printer.line(`Interrupted: ${summary.released} of ${total} requests reported, ${summary.cancelled} not started`);
    } else {
      printer.line(`Completed ${total} requests in ${seconds}s`);
    }
    printer.line(`Saved positives: ${aggregator.count} (mode: ${options.mode === 'evidence' ? 'evidence-only' : 'any-200'})`);

    const rows = aggregator.toExportRows();
    if (options.hitsJsonl) {
      await exportJsonl(options.hitsJsonl, rows);
      printer.toned('info', `Saved JSONL -> ${options.hitsJsonl}`);
    }
    if (options.csvOut) {
      await exportCsv(options.csvOut, rows);
      printer.toned('info', `Saved CSV   -> ${options.csvOut}`);
    }
    if (sink) {
      printer.toned('info', `Saved links -> ${options.linksOut}`);
    }

    runLog.info({ ...summary, saved: aggregator.count, linksWritten }, 'Run complete');
    return { summary, hits: aggregator.hits(), linksWritten };
  } finally {
    await sink?.close();
  }
}
