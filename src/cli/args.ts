import { parseArgs } from 'node:util';
import { z } from 'zod';
import { ValidationError, getErrorMessage } from '../utils/errors.js';
import type { AppConfig } from '../config/index.js';
import type { ProbeMode } from '../services/probe/types.js';

export interface CliOptions {
  usernames: string[];
  userlist?: string;
  threads: number;
  timeoutSeconds: number;
  proxy?: string;
  only?: string[];
  hitsOut?: string;
  csvOut?: string;
  linksOut: string | null;
  mode: ProbeMode;
  color: boolean;
  count: boolean;
  howto: boolean;
  help: boolean;
  sitesFile: string;
  headersFile: string;
}

export const USAGE = `Usage: handle-scout [usernames...] [options]

Scout users on popular websites.

Options:
  --userlist <file>      File with one username per line
  --threads <n>          Max concurrent workers (default: 32)
  --timeout <seconds>    Per-request timeout (default: 10)
  --proxy <url>          HTTP(S) or SOCKS4/5 proxy (e.g. socks5h://127.0.0.1:9050)
  --only <names>         Comma-separated site names to include
  --hits-out <file>      Write positives to a JSONL file (end of run)
  --csv-out <file>       Write positives to a CSV file (end of run)
  --links-out <file>     Append each positive URL immediately (default: hits.txt)
  --no-links             Do not write the links file
  --evidence-only        Only save when evidence_regex matches (default)
  --any-200              Count any HTTP 200 as a hit (ignore evidence_regex)
  --sites-file <file>    Site list YAML
  --headers-file <file>  Header config YAML
  --no-color             Disable ANSI colors
  --count                Print site count and exit
  --no-howto             Do not print the how-to guide at start
  -h, --help             Show this help`;

const numericFlags = z.object({
  threads: z.coerce.number({ invalid_type_error: '--threads must be a number' }).int('--threads must be an integer'),
  timeout: z.coerce.number({ invalid_type_error: '--timeout must be a number' }).positive('--timeout must be positive'),
});

function parseFlags(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      allowPositionals: true,
      strict: true,
      options: {
        userlist: { type: 'string' },
        threads: { type: 'string' },
        timeout: { type: 'string' },
        proxy: { type: 'string' },
        only: { type: 'string' },
        'hits-out': { type: 'string' },
        'csv-out': { type: 'string' },
        'links-out': { type: 'string' },
        'no-links': { type: 'boolean', default: false },
        'evidence-only': { type: 'boolean', default: false },
        'any-200': { type: 'boolean', default: false },
        'sites-file': { type: 'string' },
        'headers-file': { type: 'string' },
        'no-color': { type: 'boolean', default: false },
        count: { type: 'boolean', default: false },
        'no-howto': { type: 'boolean', default: false },
        help: { type: 'boolean', short: 'h', default: false },
      },
    });
  } catch (error) {
    throw new ValidationError(getErrorMessage(error));
  }
}

/**
 * Parse argv (without the node and script entries). Environment-derived
 * defaults come from `defaults`; flags win over them.
 */
export function parseCliArgs(argv: readonly string[], defaults: AppConfig): CliOptions {
  const { values, positionals } = parseFlags(argv);

  if (values['evidence-only'] === true && values['any-200'] === true) {
    throw new ValidationError('--evidence-only and --any-200 cannot be used together');
  }

  const numbers = numericFlags.safeParse({
    threads: values.threads ?? defaults.THREADS,
    timeout: values.timeout ?? defaults.TIMEOUT_SECONDS,
  });
  if (!numbers.success) {
    throw new ValidationError(numbers.error.issues[0]?.message ?? 'Invalid numeric option');
  }

  const only = values.only
    ?.split(',')
    .map((name) => name.trim())
    .filter((name) => name !== '');

  return {
    usernames: positionals.map((name) => name.trim()).filter((name) => name !== ''),
    userlist: values.userlist,
    threads: numbers.data.threads,
    timeoutSeconds: numbers.data.timeout,
    proxy: values.proxy,
    only: only && only.length > 0 ? only : undefined,
    hitsOut: values['hits-out'],
    csvOut: values['csv-out'],
    linksOut: values['no-links'] === true ? null : values['links-out'] ?? defaults.LINKS_OUT,
    mode: values['any-200'] === true ? 'any-200' : 'evidence',
    color: values['no-color'] !== true,
    count: values.count === true,
    howto: values['no-howto'] !== true,
    help: values.help === true,
    sitesFile: values['sites-file'] ?? defaults.SITES_FILE,
    headersFile: values['headers-file'] ?? defaults.HEADERS_FILE,
  };
}
