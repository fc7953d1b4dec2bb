import { describe, it, before, after } from 'node:test';
import assert from 'node:assert';
import {
  DeploymentPipeline,
  DecliningConfirmationProvider,
  PresetConfirmationProvider,
} from '../core/pipeline/index.js';
import type { PipelineState, PipelineStep, StepContext } from '../core/pipeline/index.js';
import { notMet, passed } from '../core/results/index.js';
import type { CheckResult } from '../core/results/index.js';
import { buildEnvironment } from '../lib/environments.js';
import {
  FatalActionError,
  LockError,
  PollTimeoutError,
  PostconditionError,
  PreconditionError,
  TransientActionError,
} from '../utils/errors.js';
import { setSilentMode } from '../utils/logger.js';
import { FakeClock, MemoryStateStore, RecordingConfirmationProvider } from './fakes.js';

const env = buildEnvironment('dev');

interface StepSpy {
  step: PipelineStep;
  actions: number;
  preconditions: number;
}

function spyStep(
  id: string,
  options: {
    mutating?: boolean;
    maxAttempts?: number;
    precondition?: (context: StepContext) => CheckResult;
    action?: (attempt: number, context: StepContext) => Record<string, string> | void;
    postcondition?: (attempt: number) => CheckResult;
    confirmation?: PipelineStep['confirmation'];
  } = {}
): StepSpy {
  const spy: StepSpy = {
    actions: 0,
    preconditions: 0,
    step: {
      id,
      name: `Step ${id}`,
      mutating: options.mutating ?? true,
      maxAttempts: options.maxAttempts ?? 1,
      retryDelayMs: 1_000,
      precondition: async (context) => {
        spy.preconditions++;
        return options.precondition ? options.precondition(context) : passed();
      },
      action: async (context) => {
        spy.actions++;
        return options.action?.(context.attempt, context);
      },
      postcondition: async (context) =>
        options.postcondition ? options.postcondition(context.attempt) : passed(),
      confirmation: options.confirmation,
    },
  };
  return spy;
}

function pipelineOf(spies: StepSpy[], store = new MemoryStateStore(), clock = new FakeClock()) {
  return new DeploymentPipeline(
    spies.map((spy) => spy.step),
    { store, confirmations: new DecliningConfirmationProvider(), clock }
  );
}

describe('Deployment Step Pipeline', () => {
  before(() => setSilentMode(true));
  after(() => setSilentMode(false));

  it('retries an unmet postcondition within the bound and records the last step', async () => {
    const store = new MemoryStateStore();
    const clock = new FakeClock();
    const spies = [
      spyStep('s0'),
      spyStep('s1'),
      spyStep('s2', {
        maxAttempts: 3,
        postcondition: (attempt) => (attempt < 3 ? notMet(`not yet (${attempt})`) : passed()),
      }),
      spyStep('s3'),
      spyStep('s4'),
    ];
    const retries: string[] = [];
    const pipeline = new DeploymentPipeline(
      spies.map((spy) => spy.step),
      {
        store,
        clock,
        confirmations: new DecliningConfirmationProvider(),
        callbacks: {
          onAttemptFailed: (step, attempt, reason, delayMs) =>
            retries.push(`${step.id}#${attempt}: ${reason} (${delayMs}ms)`),
        },
      }
    );

    const result = await pipeline.run(env);

    assert.strictEqual(result.status, 'succeeded');
    assert.strictEqual(result.exitCode, 0);
    assert.strictEqual(result.lastCompletedStep, 4);
    assert.strictEqual(result.steps[2].attempts, 3);
    assert.strictEqual(spies[2].actions, 3);
    assert.deepStrictEqual(retries, ['s2#1: not yet (1) (1000ms)', 's2#2: not yet (2) (1000ms)']);
    assert.deepStrictEqual(clock.sleeps, [1_000, 1_000]);

    const state = await store.load('dev');
    assert.strictEqual(state?.lastCompletedStep, 4);
    assert.strictEqual(state?.status, 'succeeded');
    assert.strictEqual(state?.steps['s2']?.attempts, 3);
    assert.deepStrictEqual(pipeline.getState(), { status: 'succeeded' });
    assert.strictEqual(store.locks.size, 0);
  });

  it('halts on a failed precondition without running the action or later steps', async () => {
    const store = new MemoryStateStore();
    const spies = [
      spyStep('s0'),
      spyStep('s1', { precondition: () => notMet('cluster not reachable') }),
      spyStep('s2'),
    ];

    const result = await pipelineOf(spies, store).run(env);

    assert.strictEqual(result.status, 'failed');
    assert.strictEqual(result.exitCode, 1);
    assert.strictEqual(result.failedStep, 's1');
    assert.ok(result.error instanceof PreconditionError);
    assert.strictEqual(result.error.message, "Precondition for 's1' not met: cluster not reachable");
    assert.strictEqual(result.lastCompletedStep, 0);
    assert.strictEqual(spies[1].actions, 0);
    assert.strictEqual(spies[2].preconditions, 0);
    assert.deepStrictEqual(
      result.steps.map((step) => [step.id, step.status, step.actionRan, step.attempts]),
      [
        ['s0', 'succeeded', true, 1],
        ['s1', 'failed', false, 0],
      ]
    );

    const state = await store.load('dev');
    assert.strictEqual(state?.status, 'failed');
    assert.deepStrictEqual(state?.lastFailure, {
      step: 's1',
      index: 1,
      message: "Precondition for 's1' not met: cluster not reachable",
      code: 'PRECONDITION_FAILED',
      at: state?.lastFailure?.at,
    });
  });

  it('does not retry fatal action errors', async () => {
    const spies = [
      spyStep('s0', {
        maxAttempts: 3,
        action: () => {
          throw new FatalActionError('terraform apply failed (exit 1): Error: Invalid reference');
        },
      }),
    ];

    const result = await pipelineOf(spies).run(env);

    assert.strictEqual(result.exitCode, 2);
    assert.strictEqual(spies[0].actions, 1);
    assert.strictEqual(result.steps[0].attempts, 1);
    assert.strictEqual(result.steps[0].actionRan, true);
  });

  it('retries transient action errors up to maxAttempts', async () => {
    const spies = [
      spyStep('s0', {
        maxAttempts: 3,
        action: (attempt) => {
          throw new TransientActionError(`i/o timeout ${attempt}`);
        },
      }),
    ];

    const result = await pipelineOf(spies).run(env);

    assert.strictEqual(result.status, 'failed');
    assert.strictEqual(spies[0].actions, 3);
    assert.strictEqual(result.error?.message, 'i/o timeout 3');
  });

  it('fails with the last reason when the postcondition never holds', async () => {
    const spies = [spyStep('s0', { maxAttempts: 2, postcondition: () => notMet('0/1 ready') })];

    const result = await pipelineOf(spies).run(env);

    assert.ok(result.error instanceof PostconditionError);
    assert.strictEqual(
      result.error.message,
      "Postcondition for 's0' still not met after 2 attempt(s): 0/1 ready"
    );
    assert.strictEqual(result.exitCode, 2);
  });

  it('skips recorded mutating steps whose postcondition still holds', async () => {
    const store = new MemoryStateStore();
    let drifted = false;
    const spies = [
      spyStep('s0', { mutating: false }),
      spyStep('s1'),
      spyStep('s2', { postcondition: () => (drifted ? notMet('drifted') : passed()) }),
    ];
    const pipeline = pipelineOf(spies, store);

    await pipeline.run(env);
    drifted = true;
    let second = await pipeline.run(env);

    assert.deepStrictEqual(
      second.steps.map((step) => [step.id, step.status]),
      [
        ['s0', 'succeeded'],
        ['s1', 'skipped'],
        ['s2', 'failed'],
      ]
    );
    assert.strictEqual(spies[0].actions, 2);
    assert.strictEqual(spies[1].actions, 1);
    assert.strictEqual(spies[2].actions, 2);

    drifted = false;
    second = await pipeline.run(env);
    assert.deepStrictEqual(
      second.steps.map((step) => step.status),
      ['succeeded', 'skipped', 'skipped']
    );
    assert.strictEqual(spies[1].actions + spies[2].actions, 3);
  });

  it('passes outputs to later steps and records them', async () => {
    const store = new MemoryStateStore();
    const seen: Array<string | undefined> = [];
    const spies = [
      spyStep('s0', { action: () => ({ clusterName: 'dev-eks' }) }),
      spyStep('s1', { action: (_attempt, context) => void seen.push(context.outputs['clusterName']) }),
    ];

    const result = await pipelineOf(spies, store).run(env);

    assert.deepStrictEqual(seen, ['dev-eks']);
    assert.deepStrictEqual(result.steps[0].outputs, { clusterName: 'dev-eks' });
    assert.deepStrictEqual((await store.load('dev'))?.outputs, { clusterName: 'dev-eks' });
  });

  it('runs only the selected steps, using outputs recorded earlier', async () => {
    const store = new MemoryStateStore();
    const seen: Array<string | undefined> = [];
    const spies = [
      spyStep('s0', { action: () => ({ clusterName: 'dev-eks' }) }),
      spyStep('s1', {
        precondition: (context) =>
          context.outputs['clusterName'] ? passed() : notMet('no cluster recorded'),
        action: (_attempt, context) => void seen.push(context.outputs['clusterName']),
      }),
    ];
    const pipeline = pipelineOf(spies, store);

    const early = await pipeline.run(env, { only: ['s1'] });
    assert.strictEqual(early.exitCode, 1);

    await pipeline.run(env, { only: ['s0'] });
    const result = await pipeline.run(env, { only: ['s1'] });

    assert.strictEqual(result.status, 'succeeded');
    assert.deepStrictEqual(result.steps.map((step) => step.id), ['s1']);
    assert.deepStrictEqual(seen, ['dev-eks']);
    assert.strictEqual((await store.load('dev'))?.status, 'succeeded');
  });

  it('refuses to run while another run holds the lock', async () => {
    const store = new MemoryStateStore();
    await store.acquireLock('dev', 'alice', 'other-run');
    const spies = [spyStep('s0')];

    const result = await pipelineOf(spies, store).run(env, { owner: 'bob' });

    assert.strictEqual(result.status, 'failed');
    assert.ok(result.error instanceof LockError);
    assert.strictEqual(result.exitCode, 1);
    assert.strictEqual(result.failedStep, undefined);
    assert.strictEqual(result.lastCompletedStep, -1);
    assert.strictEqual(spies[0].preconditions, 0);
    assert.strictEqual(store.locks.get('dev')?.owner, 'alice');
  });

  it('asks for confirmation once per request and declines with exit code 3', async () => {
    const confirmation = () => ({
      id: 'deploy-dev',
      title: 'Deploy to dev',
      message: 'protected',
      expectedPhrase: 'DEPLOY_DEV',
    });
    const spies = [spyStep('s0', { confirmation }), spyStep('s1', { confirmation })];

    const accepting = new RecordingConfirmationProvider('DEPLOY_DEV');
    const accepted = await new DeploymentPipeline(spies.map((spy) => spy.step), {
      store: new MemoryStateStore(),
      confirmations: accepting,
      clock: new FakeClock(),
    }).run(env);
    assert.strictEqual(accepted.status, 'succeeded');
    assert.strictEqual(accepting.requests.length, 1);

    const declining = new RecordingConfirmationProvider('deploy_dev');
    const declined = await new DeploymentPipeline(spies.map((spy) => spy.step), {
      store: new MemoryStateStore(),
      confirmations: declining,
      clock: new FakeClock(),
    }).run(env);
    assert.strictEqual(declined.exitCode, 3);
    assert.strictEqual(declined.error?.message, 'Confirmation declined: Deploy to dev');
    assert.strictEqual(declined.steps[0].actionRan, false);
    assert.strictEqual(spies[0].actions, 1);
  });

  it('fails the first step when the run is already cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    const spies = [spyStep('s0')];

    const result = await pipelineOf(spies).run(env, { signal: controller.signal });

    assert.strictEqual(result.error?.message, "Run cancelled before 's0'");
    assert.strictEqual(result.exitCode, 2);
    assert.strictEqual(spies[0].preconditions, 0);
  });

  it('reports every state transition', async () => {
    const states: PipelineState[] = [];
    const spies = [spyStep('s0'), spyStep('s1', { precondition: () => notMet('nope') })];
    const pipeline = new DeploymentPipeline(spies.map((spy) => spy.step), {
      store: new MemoryStateStore(),
      confirmations: new PresetConfirmationProvider(),
      clock: new FakeClock(),
      callbacks: { onStateChange: (state) => states.push(state) },
    });

    await pipeline.run(env);

    assert.deepStrictEqual(
      states.map((state) => (state.status === 'running' || state.status === 'failed' ? `${state.status}:${state.stepId}` : state.status)),
      ['running:s0', 'running:s1', 'failed:s1']
    );
  });

  describe('configuration', () => {
    it('rejects duplicate ids and impossible retry bounds', () => {
      assert.throws(() => pipelineOf([spyStep('a'), spyStep('a')]), {
        message: "Duplicate pipeline step id 'a'",
      });
      assert.throws(() => pipelineOf([spyStep('a', { maxAttempts: 0 })]), {
        message: "Step 'a' needs maxAttempts >= 1",
      });
    });

    it('resolves steps by position or id', () => {
      const pipeline = pipelineOf([spyStep('validate'), spyStep('provision')]);
      assert.strictEqual(pipeline.resolveStep('2').id, 'provision');
      assert.strictEqual(pipeline.resolveStep('validate').id, 'validate');
      assert.throws(() => pipeline.resolveStep('3'), {
        message: "Unknown step '3' (1=validate, 2=provision)",
      });
      assert.throws(() => pipeline.resolveStep('deploy'), {
        message: "Unknown step 'deploy' (1=validate, 2=provision)",
      });
    });
  });

  it('fails a step that outlives its timeout', async () => {
    const hanging: PipelineStep = {
      id: 'hang',
      name: 'Hanging step',
      mutating: true,
      maxAttempts: 1,
      timeoutMs: 20,
      precondition: async () => passed(),
      action: async ({ signal }) => {
        await new Promise((resolve) => signal.addEventListener('abort', resolve, { once: true }));
        throw new FatalActionError('terraform apply was interrupted');
      },
      postcondition: async () => passed(),
    };
    const store = new MemoryStateStore();
    // The step timer is unref'd; hold the event loop open until it fires
    const keepAlive = setTimeout(() => undefined, 5_000);

    const result = await new DeploymentPipeline([hanging], {
      store,
      confirmations: new DecliningConfirmationProvider(),
      clock: new FakeClock(),
    })
      .run(env)
      .finally(() => clearTimeout(keepAlive));

    assert.strictEqual(result.status, 'failed');
    assert.strictEqual(result.failedStep, 'hang');
    assert.ok(result.error instanceof PollTimeoutError);
    assert.strictEqual(
      result.error.message,
      'Waiting for step hang timed out after 0s (last status: terraform apply was interrupted)'
    );
    assert.strictEqual(store.locks.size, 0);
  });
});
