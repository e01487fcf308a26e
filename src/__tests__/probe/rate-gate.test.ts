import { describe, expect, it } from 'vitest';
import { DomainGate, DEFAULT_DOMAIN_LIMIT } from '../../services/probe/rate-gate.js';

const wait = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe('DomainGate', () => {
  it('defaults to three slots per domain', () => {
    expect(DEFAULT_DOMAIN_LIMIT).toBe(3);
    expect(new DomainGate().limit).toBe(3);
  });

  it('never admits more than the limit at once', async () => {
    const gate = new DomainGate(3);
    let active = 0;
    let peak = 0;
    const observed: number[] = [];

    await Promise.all(
      Array.from({ length: 12 }, () =>
        gate.run('a.test', async () => {
          active++;
          peak = Math.max(peak, active);
          observed.push(gate.inFlight('a.test'));
          await wait(10);
          active--;
        }),
      ),
    );

    expect(peak).toBe(3);
    expect(Math.max(...observed)).toBeLessThanOrEqual(3);
    expect(gate.inFlight('a.test')).toBe(0);
  });

  it('holds a waiter until a slot is released', async () => {
    const gate = new DomainGate(3);
    const tokens = await Promise.all([gate.acquire('a.test'), gate.acquire('a.test'), gate.acquire('a.test')]);
    expect(gate.inFlight('a.test')).toBe(3);

    let admitted = false;
    const fourth = gate.acquire('a.test').then((token) => {
      admitted = true;
      return token;
    });

    await wait(30);
    expect(admitted).toBe(false);

    tokens[0].release();
    const token = await fourth;
    expect(admitted).toBe(true);
    expect(gate.inFlight('a.test')).toBe(3);

    token.release();
    tokens[1].release();
    tokens[2].release();
    expect(gate.inFlight('a.test')).toBe(0);
  });

  it('keeps domains independent', async () => {
    const gate = new DomainGate(1);
    const held = await gate.acquire('a.test');
    const other = await gate.acquire('b.test');

    expect(gate.inFlight('a.test')).toBe(1);
    expect(gate.inFlight('b.test')).toBe(1);
    expect(gate.domains().sort()).toEqual(['a.test', 'b.test']);

    held.release();
    other.release();
  });

  it('ignores a second release of the same token', async () => {
    const gate = new DomainGate(2);
    const token = await gate.acquire('a.test');
    token.release();
    token.release();
    expect(gate.inFlight('a.test')).toBe(0);

    const again = await Promise.all([gate.acquire('a.test'), gate.acquire('a.test')]);
    expect(gate.inFlight('a.test')).toBe(2);
    again.forEach((t) => t.release());
  });

  it('releases the slot when the guarded work throws', async () => {
    const gate = new DomainGate(1);
    await expect(
      gate.run('a.test', async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');
    expect(gate.inFlight('a.test')).toBe(0);

    await expect(gate.run('a.test', async () => 'next')).resolves.toBe('next');
  });

  it('does not share state between instances', async () => {
    const first = new DomainGate(1);
    const second = new DomainGate(1);
    const token = await first.acquire('a.test');

    await expect(second.run('a.test', async () => 'free')).resolves.toBe('free');
    token.release();
  });

  it('rejects a limit below one', () => {
    expect(() => new DomainGate(0)).toThrow(RangeError);
  });
});
