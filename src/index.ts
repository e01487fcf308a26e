// Library entry point: the probing core without the CLI wrapper.
export { DomainGate, DEFAULT_DOMAIN_LIMIT } from './services/probe/rate-gate.js';
export type { GateToken } from './services/probe/rate-gate.js';
export { Prober, resolveUrl, shouldPersist, DEFAULT_JITTER } from './services/probe/prober.js';
export type { ProberOptions, JitterRange } from './services/probe/prober.js';
export { matchesEvidence, escapeRegExp, fillPlaceholders } from './services/probe/evidence.js';
export { HttpClient, RETRY_STATUSES } from './services/http/client.js';
export type { HttpTransport, HttpClientOptions, ProbeOutcome } from './services/http/client.js';
export { DedupSink } from './services/output/dedup-sink.js';
export { exportCsv, exportJsonl, toCsv, toJsonl } from './services/output/exporters.js';
export { Reassembler } from './services/scheduler/reassembler.js';
export { runProbes, enumerateTasks, resolvePoolSize } from './services/scheduler/scheduler.js';
export type { RunProbesOptions, RunSummary } from './services/scheduler/scheduler.js';
export { HitAggregator } from './services/scheduler/aggregator.js';
export type { ExportRow } from './services/scheduler/aggregator.js';
export { scout, selectSites } from './services/scout/scout-run.js';
export type { ScoutOptions, ScoutReport } from './services/scout/scout-run.js';
export { loadSites, normalizeSites } from './config/sites.js';
export { loadHeaderConfig, parseHeaderConfig, buildSessionHeaders } from './config/headers.js';
export type { HeaderConfig } from './config/headers.js';
export type {
  SiteDescriptor,
  ProbeTask,
  ProbeResult,
  ProbeMode,
  ProbeTone,
  TransportError,
  TransportErrorKind,
  TransportResponse,
} from './services/probe/types.js';
