/**
 * One target website, normalised from the site list. Read-only for the run.
 */
export interface SiteDescriptor {
  readonly name: string;
  /** URL with `{user}` (or legacy `{!!}`) placeholders. */
  readonly urlTemplate: string;
  /** Regexes that must match a 200 body for a verified hit. Empty means any 200 counts. */
  readonly evidencePatterns: readonly string[];
}

export interface ProbeTask {
  readonly username: string;
  readonly site: SiteDescriptor;
  /** 1-based position in enumeration order; the only ordering key. */
  readonly ordinal: number;
}

/** `evidence` persists verified hits only, `any-200` persists every HTTP 200. */
export type ProbeMode = 'evidence' | 'any-200';

/** Console colour class of a result line. */
export type ProbeTone = 'hit' | 'miss' | 'warn';

export interface ProbeResult {
  readonly ordinal: number;
  readonly siteName: string;
  readonly username: string;
  readonly url: string;
  readonly statusLabel: string;
  readonly elapsedMs: number;
  readonly isHttpOk: boolean;
  readonly isVerifiedHit: boolean;
  readonly shouldPersist: boolean;
  readonly tone: ProbeTone;
}

export type TransportErrorKind =
  | 'Timeout'
  | 'DnsFailure'
  | 'ConnectionRefused'
  | 'ConnectionReset'
  | 'TlsError'
  | 'TooManyRedirects'
  | 'InvalidUrl'
  | 'RequestError';

export interface TransportError {
  kind: TransportErrorKind;
  message: string;
}

export interface TransportResponse {
  status: number;
  body: string;
}
