import type { Writable } from 'node:stream';
import type { ProbeResult, ProbeTone } from '../probe/types.js';

type Rgb = readonly [number, number, number];

export const PALETTE = {
  hit: [38, 182, 82],
  miss: [250, 41, 41],
  warn: [255, 211, 0],
  info: [110, 200, 255],
} as const satisfies Record<ProbeTone | 'info', Rgb>;

export type Tone = keyof typeof PALETTE;

export function colorize(tone: Tone, text: string): string {
  const [r, g, b] = PALETTE[tone];
  return `\x1b[38;2;${r};${g};${b}m${text}\x1b[0m`;
}

/** `[i/N] [ STATUS ] (MSms) Site: URL` */
export function formatResultLine(result: ProbeResult, total: number): string {
  return `[${result.ordinal}/${total}] [ ${result.statusLabel} ] (${result.elapsedMs}ms) ${result.siteName}: ${result.url}`;
}

/**
 * Line printer for the user-facing stream. Colour is optional so output can
 * be piped or diffed.
 */
export class ConsolePrinter {
  constructor(
    private readonly out: Writable = process.stdout,
    private readonly color = true,
  ) {}

  line(text = ''): void {
    this.out.write(`${text}\n`);
  }

  toned(tone: Tone, text: string): void {
    this.line(this.color ? colorize(tone, text) : text);
  }

  result(result: ProbeResult, total: number): void {
    this.toned(result.tone, formatResultLine(result, total));
  }
}

export const RULE = '========================================';

export const BANNER = String.raw`
 _                     _ _                                 _
| |__   __ _ _ __   __| | | ___        ___  ___ ___  _   _| |_
| '_ \ / _' | '_ \ / _' | |/ _ \_____ / __|/ __/ _ \| | | | __|
| | | | (_| | | | | (_| | |  __/_____|\__ \ (_| (_) | |_| | |_
|_| |_|\__,_|_| |_|\__,_|_|\___|     |___/\___\___/ \__,_|\__|
`;

export const HOWTO = [
  'How to use:',
  '  • Single user:        handle-scout USERNAME',
  '  • Limit sites:        handle-scout USERNAME --only "GitHub,Twitter,Reddit"',
  '  • Use a proxy:        handle-scout USERNAME --proxy http://127.0.0.1:8080',
  '  • Through Tor:        handle-scout USERNAME --proxy socks5h://127.0.0.1:9050',
  '  • Bulk from file:     handle-scout --userlist users.txt',
  '  • Outputs (default):  --links-out hits.txt (stream URLs) + --evidence-only',
  '  • Looser matching:    add --any-200 to save any HTTP 200',
  '',
  "Tip: without CLI usernames, you'll be prompted to enter them interactively.",
  '==========================================================================',
  '',
].join('\n');
