import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { createAgent } from '../../src/agent/agent.js';
import type { ExecutionContextState } from '../../src/engine/context-store.js';
import { DisabledTransactionRecorder } from '../../src/engine/shim.js';
import { TransactionRecorder } from '../../src/engine/transactions.js';
import type { StatsHash } from '../../src/stats/stats-hash.js';
import { DEFAULT_CONFIG } from '../../src/shared/types.js';
import { fakeSampler, sequenceClock } from '../helpers/recorder.js';

let tmpDir: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'stackmeter-agent-'));
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe('createAgent', () => {
  it('builds a live recorder from an enabled config', () => {
    const agent = createAgent({ config: structuredClone(DEFAULT_CONFIG), logDir: tmpDir });
    expect(agent.transactions).toBeInstanceOf(TransactionRecorder);

    const log = fs.readFileSync(path.join(tmpDir, 'agent.log'), 'utf-8');
    expect(log).toMatch(/\[INFO\] Stackmeter agent enabled\n$/);
  });

  it('selects the disabled surface when agent_enabled is false in the config file', async () => {
    const configPath = path.join(tmpDir, 'stackmeter.yml');
    fs.writeFileSync(configPath, 'agent_enabled: false\n', 'utf-8');

    const agent = createAgent({ configPath, logDir: tmpDir });
    expect(agent.transactions).toBeInstanceOf(DisabledTransactionRecorder);

    const result = await agent.inTransaction('Home#index', () => agent.trace('View/render', () => 'html'));
    expect(result).toBe('html');
    expect(agent.engine.harvest().isEmpty()).toBe(true);
  });
});

describe('Agent.inTransaction', () => {
  it('resolves traced metrics to the transaction name', async () => {
    const sampler = fakeSampler();
    const agent = createAgent({ config: structuredClone(DEFAULT_CONFIG), logDir: tmpDir, sampler });
    const finished: Array<[string, StatsHash | undefined]> = [];
    agent.events.subscribe('transaction_finished', (name, stats) => {
      finished.push([name, stats]);
    });

    await agent.inTransaction('OrderController#create', async () => {
      await agent.traceAsync('Controller/orders/create', async () => {
        agent.trace('Database/insert', () => undefined);
      });
    });

    expect(agent.engine.getStats('Controller/orders/create', 'OrderController#create')?.callCount).toBe(1);
    expect(agent.engine.getStats('Database/insert', 'OrderController#create')?.callCount).toBe(1);
    expect(agent.engine.getStats('Database/insert')?.callCount).toBe(1);
    expect(sampler.noticePopScope).toHaveBeenCalledTimes(2);
    expect(finished).toHaveLength(1);
    expect(finished[0]![0]).toBe('OrderController#create');
  });

  it('merges stats even when the transaction body throws', async () => {
    const agent = createAgent({ config: structuredClone(DEFAULT_CONFIG), logDir: tmpDir });

    await expect(agent.inTransaction('Checkout#pay', () => {
      agent.trace('External/gateway', () => undefined);
      throw new Error('declined');
    })).rejects.toThrow('declined');

    expect(agent.engine.getStats('External/gateway', 'Checkout#pay')?.callCount).toBe(1);
  });

  it('keeps concurrent transactions apart', async () => {
    const agent = createAgent({ config: structuredClone(DEFAULT_CONFIG), logDir: tmpDir });

    await Promise.all([
      agent.inTransaction('A#run', () => agent.traceAsync('Custom/a', async () => undefined)),
      agent.inTransaction('B#run', () => agent.traceAsync('Custom/b', async () => undefined)),
    ]);

    expect(agent.engine.getStats('Custom/a', 'A#run')?.callCount).toBe(1);
    expect(agent.engine.getStats('Custom/b', 'B#run')?.callCount).toBe(1);
    expect(agent.engine.getStats('Custom/a', 'B#run')).toBeUndefined();
  });

  it('nests an inner transaction inside the enclosing one', async () => {
    const agent = createAgent({ config: structuredClone(DEFAULT_CONFIG), logDir: tmpDir });
    const tx = agent.transactions;
    let innerDepth: number | undefined;
    let innerName: string | undefined;
    let nameAfterInner: string | undefined;

    await agent.inTransaction('Outer#run', () =>
      agent.traceAsync('Outer/op', async () => {
        await agent.inTransaction('Inner#run', () => {
          innerDepth = tx.currentStatsStack()?.length;
          innerName = tx.currentTransactionName();
          agent.trace('Inner/op', () => undefined, { clock: sequenceClock(2, 5) });
        });
        nameAfterInner = tx.currentTransactionName();
      }, { clock: sequenceClock(0, 10) }));

    expect(innerDepth).toBe(2);
    expect(innerName).toBe('Inner#run');
    expect(nameAfterInner).toBe('Outer#run');

    const outer = agent.engine.getStats('Outer/op', 'Outer#run');
    expect(outer?.totalCallTime).toBe(10);
    expect(outer?.totalExclusiveTime).toBe(7);
    expect(agent.engine.getStats('Inner/op', 'Inner#run')?.totalCallTime).toBe(3);
    expect(agent.engine.getStats('Inner/op', 'Outer#run')).toBeUndefined();
  });

  it('releases the context state once a top-level transaction ends', async () => {
    const agent = createAgent({ config: structuredClone(DEFAULT_CONFIG), logDir: tmpDir });
    let state: ExecutionContextState | undefined;

    await agent.inTransaction('Job#perform', () => {
      state = agent.contexts.current();
      agent.trace('Custom/step', () => undefined);
    });

    expect(state?.scopeStack).toBeUndefined();
    expect(state?.transactionName).toBeUndefined();
    expect(state?.statsStack).toEqual([]);
  });

  it('notifies start_transaction listeners', async () => {
    const agent = createAgent({ config: structuredClone(DEFAULT_CONFIG), logDir: tmpDir });
    let starts = 0;
    agent.events.subscribe('start_transaction', () => { starts += 1; });

    await agent.inTransaction('Job#perform', () => undefined);
    expect(starts).toBe(1);
  });
});
