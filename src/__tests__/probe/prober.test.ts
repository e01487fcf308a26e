import { describe, expect, it, vi } from 'vitest';
import { Prober, resolveUrl, shouldPersist } from '../../services/probe/prober.js';
import { DomainGate } from '../../services/probe/rate-gate.js';
import type { HttpTransport } from '../../services/http/client.js';
import type { ProbeMode, ProbeTask } from '../../services/probe/types.js';
import { FakeTransport, fail, noSleep, respond, site } from '../helpers/fakes.js';

const NO_JITTER = { minMs: 0, maxMs: 0 };

function makeProber(transport: HttpTransport, mode: ProbeMode = 'evidence', gate = new DomainGate()) {
  return new Prober({ transport, gate, mode, jitter: NO_JITTER, sleep: noSleep });
}

function task(urlTemplate: string, evidence: string[] = [], username = 'alice'): ProbeTask {
  return { username, ordinal: 1, site: site('Example', urlTemplate, evidence) };
}

describe('Prober', () => {
  it('reports a verified hit when the evidence matches', async () => {
    const transport = new FakeTransport({ 'https://ex.test/alice': respond(200, '<h1>alice</h1>') });
    const result = await makeProber(transport).probe(task('https://ex.test/{user}', ['<h1>{user}</h1>']));

    expect(result).toMatchObject({
      ordinal: 1,
      siteName: 'Example',
      username: 'alice',
      url: 'https://ex.test/alice',
      statusLabel: '200',
      isHttpOk: true,
      isVerifiedHit: true,
      shouldPersist: true,
      tone: 'hit',
    });
    expect(transport.calls).toEqual(['https://ex.test/alice']);
  });

  it('does not persist an unverified 200 in evidence mode', async () => {
    const transport = new FakeTransport({ 'https://ex.test/alice': respond(200, 'nothing here') });
    const result = await makeProber(transport).probe(task('https://ex.test/{user}', ['{user}']));

    expect(result.isHttpOk).toBe(true);
    expect(result.isVerifiedHit).toBe(false);
    expect(result.shouldPersist).toBe(false);
    expect(result.tone).toBe('warn');
  });

  it('persists any 200 in any-200 mode', async () => {
    const transport = new FakeTransport({ 'https://ex.test/alice': respond(200, 'nothing here') });
    const result = await makeProber(transport, 'any-200').probe(task('https://ex.test/{user}', ['{user}']));

    expect(result.shouldPersist).toBe(true);
    expect(result.isVerifiedHit).toBe(false);
  });

  it('marks 404 as a plain miss', async () => {
    const transport = new FakeTransport({ 'https://ex.test/alice': respond(404) });
    const result = await makeProber(transport, 'any-200').probe(task('https://ex.test/{user}'));

    expect(result.statusLabel).toBe('404');
    expect(result.isHttpOk).toBe(false);
    expect(result.shouldPersist).toBe(false);
    expect(result.tone).toBe('miss');
  });

  it('records other statuses verbatim', async () => {
    const transport = new FakeTransport({ 'https://ex.test/alice': respond(503) });
    const result = await makeProber(transport).probe(task('https://ex.test/{user}'));

    expect(result.statusLabel).toBe('503');
    expect(result.tone).toBe('warn');
    expect(result.shouldPersist).toBe(false);
  });

  it('encodes transport failures in the status label', async () => {
    const transport = new FakeTransport({ 'https://ex.test/alice': fail('Timeout') });
    const result = await makeProber(transport).probe(task('https://ex.test/{user}'));

    expect(result.statusLabel).toBe('ERR: Timeout');
    expect(result.isHttpOk).toBe(false);
  });

  it('reports an unparseable URL without calling the transport', async () => {
    const transport = new FakeTransport({});
    const result = await makeProber(transport).probe(task('not a url/{user}'));

    expect(result.statusLabel).toBe('ERR: InvalidUrl');
    expect(result.url).toBe('not a url/alice');
    expect(transport.calls).toEqual([]);
  });

  it('resolves instead of rejecting when the transport throws', async () => {
    const transport: HttpTransport = {
      get: async () => {
        throw new Error('socket exploded');
      },
    };
    const result = await makeProber(transport).probe(task('https://ex.test/{user}'));

    expect(result.statusLabel).toBe('ERR: RequestError');
  });

  it('releases the domain slot after every probe', async () => {
    const gate = new DomainGate(1);
    const transport = new FakeTransport({ 'https://ex.test/alice': fail('ConnectionReset') });
    const prober = makeProber(transport, 'evidence', gate);

    await prober.probe(task('https://ex.test/{user}'));
    await prober.probe(task('https://ex.test/{user}'));

    expect(gate.inFlight('ex.test')).toBe(0);
    expect(transport.calls).toHaveLength(2);
  });

  it('waits a jittered delay before each request', async () => {
    const sleep = vi.fn(noSleep);
    const transport = new FakeTransport({ 'https://ex.test/alice': respond(404) });
    const prober = new Prober({
      transport,
      gate: new DomainGate(),
      mode: 'evidence',
      jitter: { minMs: 80, maxMs: 250 },
      random: () => 0.5,
      sleep,
    });

    await prober.probe(task('https://ex.test/{user}'));

    expect(sleep).toHaveBeenCalledWith(165);
  });

  it('returns frozen results', async () => {
    const transport = new FakeTransport({ 'https://ex.test/alice': respond(404) });
    const result = await makeProber(transport).probe(task('https://ex.test/{user}'));

    expect(Object.isFrozen(result)).toBe(true);
  });
});

describe('resolveUrl', () => {
  it('substitutes every placeholder', () => {
    expect(resolveUrl('https://{user}.blog.test/@{!!}', 'alice')).toBe('https://alice.blog.test/@alice');
  });
});

describe('shouldPersist', () => {
  it('requires a verified hit in evidence mode and only a 200 otherwise', () => {
    expect(shouldPersist('evidence', true, false)).toBe(false);
    expect(shouldPersist('evidence', true, true)).toBe(true);
    expect(shouldPersist('any-200', true, false)).toBe(true);
    expect(shouldPersist('any-200', false, false)).toBe(false);
  });
});
