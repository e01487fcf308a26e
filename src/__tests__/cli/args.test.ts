import { describe, expect, it } from 'vitest';
import { USAGE, parseCliArgs } from '../../cli/args.js';
import { loadConfig } from '../../config/index.js';
import { ValidationError } from '../../utils/errors.js';

const defaults = loadConfig({ SITES_FILE: 'sites.yml', HEADERS_FILE: 'headers.yml' });

describe('parseCliArgs', () => {
  it('applies defaults when only usernames are given', () => {
    expect(parseCliArgs(['alice', 'bob'], defaults)).toEqual({
      usernames: ['alice', 'bob'],
      userlist: undefined,
      threads: 32,
      timeoutSeconds: 10,
      proxy: undefined,
      only: undefined,
      hitsOut: undefined,
      csvOut: undefined,
      linksOut: 'hits.txt',
      mode: 'evidence',
      color: true,
      count: false,
      howto: true,
      help: false,
      sitesFile: 'sites.yml',
      headersFile: 'headers.yml',
    });
  });

  it('reads every option', () => {
    const args = parseCliArgs(
      [
        'alice',
        '--userlist', 'users.txt',
        '--threads', '8',
        '--timeout', '2.5',
        '--proxy', 'http://127.0.0.1:8080',
        '--only', 'GitHub, Reddit,,',
        '--hits-out', 'hits.jsonl',
        '--csv-out', 'hits.csv',
        '--links-out', 'links.txt',
        '--any-200',
        '--no-color',
        '--no-howto',
        '--sites-file', 'custom-sites.yml',
        '--headers-file', 'custom-headers.yml',
      ],
      defaults,
    );

    expect(args).toMatchObject({
      usernames: ['alice'],
      userlist: 'users.txt',
      threads: 8,
      timeoutSeconds: 2.5,
      proxy: 'http://127.0.0.1:8080',
      only: ['GitHub', 'Reddit'],
      hitsOut: 'hits.jsonl',
      csvOut: 'hits.csv',
      linksOut: 'links.txt',
      mode: 'any-200',
      color: false,
      howto: false,
      sitesFile: 'custom-sites.yml',
      headersFile: 'custom-headers.yml',
    });
  });

  it('disables the links file with --no-links', () => {
    expect(parseCliArgs(['alice', '--no-links', '--links-out', 'x.txt'], defaults).linksOut).toBeNull();
  });

  it('takes numeric defaults from the environment config', () => {
    const args = parseCliArgs(['alice'], loadConfig({ THREADS: '4', TIMEOUT_SECONDS: '3', LINKS_OUT: 'out/links.txt' }));

    expect(args.threads).toBe(4);
    expect(args.timeoutSeconds).toBe(3);
    expect(args.linksOut).toBe('out/links.txt');
  });

  it('accepts -h and --count without usernames', () => {
    expect(parseCliArgs(['-h'], defaults).help).toBe(true);
    expect(parseCliArgs(['--count'], defaults)).toMatchObject({ count: true, usernames: [] });
  });

  it('keeps --evidence-only as the default mode', () => {
    expect(parseCliArgs(['alice', '--evidence-only'], defaults).mode).toBe('evidence');
  });

  it('rejects both matching modes together', () => {
    expect(() => parseCliArgs(['alice', '--evidence-only', '--any-200'], defaults)).toThrow(
      '--evidence-only and --any-200 cannot be used together',
    );
  });

  it('rejects non-numeric and non-positive values', () => {
    expect(() => parseCliArgs(['--threads', 'many'], defaults)).toThrow('--threads must be a number');
    expect(() => parseCliArgs(['--threads', '2.5'], defaults)).toThrow('--threads must be an integer');
    expect(() => parseCliArgs(['--timeout', '0'], defaults)).toThrow('--timeout must be positive');
  });

  it('turns unknown flags into validation errors', () => {
    expect(() => parseCliArgs(['--frobnicate'], defaults)).toThrow(ValidationError);
  });

  it('documents every flag in the usage text', () => {
    for (const flag of ['--userlist', '--threads', '--only', '--links-out', '--no-links', '--any-200', '--count']) {
      expect(USAGE).toContain(flag);
    }
  });
});
