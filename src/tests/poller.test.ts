import { describe, it } from 'node:test';
import assert from 'node:assert';
import { poll, untilReady, systemClock } from '../core/polling/index.js';
import { complete, failed, pending, describeOutcome } from '../core/results/index.js';
import { FatalActionError, TransientActionError } from '../utils/errors.js';
import { FakeClock } from './fakes.js';

describe('Readiness Poller', () => {
  it('returns a terminal outcome as soon as the probe reports one', async () => {
    const clock = new FakeClock();
    let probes = 0;

    const outcome = await poll(
      async () => {
        probes++;
        return probes === 3 ? complete('Synced') : pending('Progressing');
      },
      { intervalMs: 10_000, timeoutMs: 600_000, clock }
    );

    assert.deepStrictEqual(outcome, { kind: 'complete', detail: 'Synced' });
    assert.strictEqual(probes, 3);
    assert.strictEqual(clock.now(), 20_000);
  });

  it('returns failed without waiting further', async () => {
    const clock = new FakeClock();
    const outcome = await poll(async () => failed('BackoffLimitExceeded'), {
      intervalMs: 10_000,
      timeoutMs: 600_000,
      clock,
    });

    assert.deepStrictEqual(outcome, { kind: 'failed', reason: 'BackoffLimitExceeded' });
    assert.deepStrictEqual(clock.sleeps, []);
  });

  it('times out after exactly timeout when the interval divides it', async () => {
    const clock = new FakeClock();
    let probes = 0;

    const outcome = await poll(
      async () => {
        probes++;
        return pending(`active=1 (${probes})`);
      },
      { intervalMs: 10_000, timeoutMs: 600_000, clock }
    );

    assert.deepStrictEqual(outcome, {
      kind: 'timed_out',
      elapsedMs: 600_000,
      cancelled: false,
      lastDetail: 'active=1 (61)',
    });
    assert.strictEqual(probes, 61);
  });

  it('shortens the last sleep so the deadline is not overshot', async () => {
    const clock = new FakeClock();
    let probes = 0;

    const outcome = await poll(
      async () => {
        probes++;
        return pending();
      },
      { intervalMs: 10_000, timeoutMs: 25_000, clock }
    );

    assert.strictEqual(outcome.kind, 'timed_out');
    assert.strictEqual(probes, 4);
    assert.deepStrictEqual(clock.sleeps, [10_000, 10_000, 5_000]);
    if (outcome.kind === 'timed_out') {
      assert.strictEqual(outcome.elapsedMs, 25_000);
      assert.strictEqual(outcome.lastDetail, undefined);
    }
  });

  it('treats retryable probe errors as pending and keeps their message', async () => {
    const clock = new FakeClock();
    const seen: Array<string | undefined> = [];
    let probes = 0;

    const outcome = await poll(
      async () => {
        probes++;
        if (probes === 1) throw new TransientActionError('connection refused');
        if (probes === 2) throw new TransientActionError('Unable to connect to the server: EOF');
        return complete();
      },
      { intervalMs: 1_000, timeoutMs: 60_000, clock, onPending: ({ detail }) => seen.push(detail) }
    );

    assert.deepStrictEqual(outcome, { kind: 'complete', detail: undefined });
    assert.strictEqual(probes, 3);
    assert.deepStrictEqual(seen, ['connection refused', 'Unable to connect to the server: EOF']);
  });

  it('propagates errors that are not orchestrator errors', async () => {
    let probes = 0;
    await assert.rejects(
      poll(
        async () => {
          probes++;
          throw new TypeError("Cannot read properties of undefined (reading 'status')");
        },
        { intervalMs: 1_000, timeoutMs: 60_000, clock: new FakeClock() }
      ),
      TypeError
    );
    assert.strictEqual(probes, 1);
  });

  it('propagates fatal orchestrator errors', async () => {
    await assert.rejects(
      poll(
        async () => {
          throw new FatalActionError('credentials rejected');
        },
        { intervalMs: 1_000, timeoutMs: 60_000, clock: new FakeClock() }
      ),
      { message: 'credentials rejected' }
    );
  });

  it('reports each pending probe before sleeping', async () => {
    const clock = new FakeClock();
    const seen: Array<{ attempt: number; elapsedMs: number; detail?: string }> = [];
    let probes = 0;

    await poll(
      async () => {
        probes++;
        return probes < 3 ? pending(`CREATING ${probes}`) : complete();
      },
      { intervalMs: 5_000, timeoutMs: 60_000, clock, onPending: (info) => seen.push(info) }
    );

    assert.deepStrictEqual(seen, [
      { attempt: 1, elapsedMs: 0, detail: 'CREATING 1' },
      { attempt: 2, elapsedMs: 5_000, detail: 'CREATING 2' },
    ]);
  });

  it('returns cancelled immediately when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    let probes = 0;

    const outcome = await poll(
      async () => {
        probes++;
        return pending();
      },
      { intervalMs: 10_000, timeoutMs: 600_000, signal: controller.signal, clock: new FakeClock() }
    );

    assert.deepStrictEqual(outcome, { kind: 'timed_out', elapsedMs: 0, cancelled: true, lastDetail: undefined });
    assert.strictEqual(probes, 0);
  });

  it('returns within one interval when cancelled mid-poll', async () => {
    const controller = new AbortController();
    const startedAt = Date.now();
    setTimeout(() => controller.abort(), 50);

    const outcome = await poll(async () => pending('Progressing'), {
      intervalMs: 2_000,
      timeoutMs: 600_000,
      signal: controller.signal,
      clock: systemClock,
    });

    const elapsed = Date.now() - startedAt;
    assert.strictEqual(outcome.kind, 'timed_out');
    if (outcome.kind === 'timed_out') {
      assert.strictEqual(outcome.cancelled, true);
      assert.strictEqual(outcome.lastDetail, 'Progressing');
    }
    assert.ok(elapsed < 2_000, `poll took ${elapsed}ms`);
  });

  describe('untilReady', () => {
    it('adapts boolean checks', async () => {
      assert.deepStrictEqual(await untilReady(async () => true)({ attempt: 1 }), { kind: 'complete' });
      assert.deepStrictEqual(await untilReady(async () => false)({ attempt: 1 }), { kind: 'pending' });
    });

    it('adapts check results', async () => {
      assert.deepStrictEqual(
        await untilReady(async () => ({ ok: false, reason: '1/3 ready' }))({ attempt: 1 }),
        { kind: 'pending', detail: '1/3 ready' }
      );
      assert.deepStrictEqual(
        await untilReady(async () => ({ ok: true, detail: 'ready' }))({ attempt: 1 }),
        { kind: 'complete', detail: 'ready' }
      );
    });
  });

  describe('describeOutcome', () => {
    it('describes each outcome kind', () => {
      assert.strictEqual(describeOutcome(pending('active=1')), 'pending (active=1)');
      assert.strictEqual(describeOutcome(complete()), 'complete');
      assert.strictEqual(describeOutcome(failed('OOMKilled')), 'failed: OOMKilled');
      assert.strictEqual(
        describeOutcome({ kind: 'timed_out', elapsedMs: 1, cancelled: true }),
        'cancelled'
      );
      assert.strictEqual(
        describeOutcome({ kind: 'timed_out', elapsedMs: 1, cancelled: false }),
        'timed out'
      );
    });
  });
});
