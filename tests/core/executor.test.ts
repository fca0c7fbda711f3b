/**
 * Tests for executing actions: idempotence, postconditions and failure policy
 */

import { BaseAction } from '../../src/core/base-action.js';
import { execute, executeAll } from '../../src/core/executor.js';
import type { ActionOutcome, ActionStatus, RunContext } from '../../src/core/types.js';
import { CommandError } from '../../src/lib/exec.js';
import { createContext } from '../mocks/index.js';

interface StubOptions {
  satisfied?: boolean;
  /** Whether apply actually reaches the desired state. */
  effective?: boolean;
  applyError?: () => never;
  checkError?: Error;
  outcome?: ActionOutcome;
}

class StubAction extends BaseAction {
  satisfied: boolean;
  checkCount = 0;
  applyCount = 0;
  private readonly options: StubOptions;

  constructor(key: string, options: StubOptions = {}) {
    super({ kind: 'copy-file', key, description: `Stub ${key}`, target: key });
    this.satisfied = options.satisfied ?? false;
    this.options = options;
  }

  async check(_ctx: RunContext): Promise<boolean> {
    this.checkCount++;
    if (this.options.checkError) throw this.options.checkError;
    return this.satisfied;
  }

  async apply(_ctx: RunContext): Promise<ActionOutcome | void> {
    this.applyCount++;
    if (this.options.applyError) this.options.applyError();
    if (this.options.effective ?? true) this.satisfied = true;
    return this.options.outcome;
  }

  failFatally(): never {
    return this.fail('no write permission in home directory: EACCES', { fatal: true });
  }
}

describe('Executor', () => {
  let ctx: RunContext;

  beforeEach(() => {
    ctx = createContext();
  });

  describe('execute', () => {
    it('should skip an action whose precondition already holds', async () => {
      const action = new StubAction('a', { satisfied: true });

      const result = await execute(action, ctx);

      expect(result.status).toBe('skipped');
      expect(action.applyCount).toBe(0);
    });

    it('should apply and verify an unsatisfied action', async () => {
      const action = new StubAction('a', { outcome: { message: 'wrote 12 bytes' } });

      const result = await execute(action, ctx);

      expect(result).toMatchObject({ status: 'applied', message: 'wrote 12 bytes' });
      expect(action.applyCount).toBe(1);
      expect(action.checkCount).toBe(2);
    });

    it('should be idempotent across runs', async () => {
      const action = new StubAction('a');

      await execute(action, ctx);
      const second = await execute(action, ctx);

      expect(second.status).toBe('skipped');
      expect(action.applyCount).toBe(1);
    });

    it('should fail when the postcondition does not hold after apply', async () => {
      const action = new StubAction('a', { effective: false });

      const result = await execute(action, ctx);

      expect(result).toEqual({
        status: 'failed',
        action: action.summary(),
        reason: 'postcondition not satisfied after apply',
        fatal: false,
        durationMs: expect.any(Number),
      });
    });

    it('should surface the tool error verbatim', async () => {
      const action = new StubAction('a', {
        applyError: () => {
          throw new CommandError('sudo yum install -y vim', 1, '', 'No package vim available.');
        },
      });

      const result = await execute(action, ctx);

      expect(result).toMatchObject({ status: 'failed', reason: 'No package vim available.', fatal: false });
    });

    it('should keep the fatal flag of an action failure', async () => {
      const action: StubAction = new StubAction('a', { applyError: () => action.failFatally() });

      const result = await execute(action, ctx);

      expect(result).toMatchObject({
        status: 'failed',
        reason: 'no write permission in home directory: EACCES',
        fatal: true,
      });
    });

    it('should turn a throwing check into a failure', async () => {
      const action = new StubAction('a', { checkError: new Error('boom') });

      await expect(execute(action, ctx)).resolves.toMatchObject({ status: 'failed', reason: 'boom' });
    });

    it('should pass credentials through', async () => {
      const credential = { label: 'SSH public key /home/dev/.ssh/id_ed25519.pub', text: 'ssh-ed25519 AAAAtest' };
      const action = new StubAction('a', { outcome: { credential } });

      const result = await execute(action, ctx);

      expect(result).toMatchObject({ status: 'applied', credential });
    });
  });

  describe('executeAll', () => {
    it('should continue after a non-fatal failure', async () => {
      const failing = new StubAction('a', { effective: false });
      const next = new StubAction('b');

      const run = await executeAll([failing, next], ctx);

      expect(run.results.map((r) => r.status)).toEqual(['failed', 'applied']);
      expect(run.aborted).toBe(false);
      expect(run.notRun).toEqual([]);
    });

    it('should stop at a fatal failure and report what did not run', async () => {
      const first = new StubAction('a');
      const fatal: StubAction = new StubAction('b', { applyError: () => fatal.failFatally() });
      const third = new StubAction('c');
      const fourth = new StubAction('d');

      const run = await executeAll([first, fatal, third, fourth], ctx);

      expect(run.results.map((r) => r.status)).toEqual(['applied', 'failed']);
      expect(run.aborted).toBe(true);
      expect(run.notRun.map((a) => a.id)).toEqual(['copy-file:c', 'copy-file:d']);
      expect(third.checkCount).toBe(0);
    });

    it('should report every status change in order', async () => {
      const events: Array<[string, ActionStatus]> = [];
      const hooks = {
        onActionStatusChange: ({ action, status }: { action: { id: string }; status: ActionStatus }) => {
          events.push([action.id, status]);
        },
      };

      await executeAll([new StubAction('a', { satisfied: true }), new StubAction('b')], ctx, hooks);

      expect(events).toEqual([
        ['copy-file:a', 'pending'],
        ['copy-file:b', 'pending'],
        ['copy-file:a', 'running'],
        ['copy-file:a', 'skipped'],
        ['copy-file:b', 'running'],
        ['copy-file:b', 'applied'],
      ]);
    });
  });
});
