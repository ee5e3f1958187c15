import { describe, expect, it } from 'vitest';
import { ActionChainStep } from '../src/models/ActionChain';
import { Account } from '../src/models/Account';
import { AutomationRunConfig } from '../src/models/Worker';
import { SessionGate } from '../src/services/SessionGate';
import { AutomationAlreadyRunningError } from '../src/utils/errors';
import { WorkerPoolCoordinator, partitionAccounts } from '../src/workers/WorkerPoolCoordinator';
import { FakeSessionProvider, StubAdapter, createAccount, recordingSleeper, testConfig } from './helpers/fakes';

const chain: ActionChainStep[] = [{ type: 'follow', name: 'follow', enabled: true }];

function runConfig(accounts: Account[], workersCount: number): AutomationRunConfig {
  return {
    accounts,
    targets: ['target_one'],
    actionChain: chain,
    texts: { storyReplies: [], directMessages: [] },
    workersCount,
  };
}

function createCoordinator(options: { onAdapter?: (adapter: StubAdapter) => void } = {}) {
  const gate = new SessionGate();
  const reported: Array<[string, number, number]> = [];
  const coordinator = new WorkerPoolCoordinator({
    config: testConfig,
    sessionProvider: new FakeSessionProvider(),
    sessionGate: gate,
    accountStore: {
      updateAccountStats: async (username, actions, rate) => {
        reported.push([username, actions, rate]);
      },
    },
    controlOptions: { sleeper: recordingSleeper(), random: () => 0.5, pausePollMs: 1 },
    adapterFactory: () => {
      const adapter = new StubAdapter();
      options.onAdapter?.(adapter);
      return adapter;
    },
  });
  return { coordinator, gate, reported };
}

describe('partitionAccounts', () => {
  it('splits into contiguous chunks, larger ones first', () => {
    expect(partitionAccounts([1, 2, 3, 4, 5], 2)).toEqual([
      [1, 2, 3],
      [4, 5],
    ]);
  });

  it('leaves trailing chunks empty when workers outnumber accounts', () => {
    expect(partitionAccounts([1, 2], 3)).toEqual([[1], [2], []]);
  });

  it('uses at least one worker', () => {
    expect(partitionAccounts([1, 2], 0)).toEqual([[1, 2]]);
  });

  it('keeps every account exactly once', () => {
    const accounts = Array.from({ length: 11 }, (_, i) => i);
    expect(partitionAccounts(accounts, 4).flat()).toEqual(accounts);
  });
});

describe('WorkerPoolCoordinator', () => {
  it('runs every active account once and reports its totals', async () => {
    const { coordinator, gate, reported } = createCoordinator();
    const accounts = [createAccount('a'), createAccount('b'), createAccount('c', { status: 'disabled' })];

    const summary = await coordinator.start(runConfig(accounts, 2));

    expect(summary.stopped).toBe(false);
    expect(summary.accounts.map((result) => [result.account, result.status])).toEqual([
      ['a', 'completed'],
      ['b', 'completed'],
    ]);
    expect(summary.statistics.accountsProcessed).toBe(2);
    expect(summary.statistics.successfulActions).toBe(2);
    expect([...reported].sort()).toEqual([
      ['a', 1, 100],
      ['b', 1, 100],
    ]);
    expect(gate.listActive().size).toBe(0);
    expect(coordinator.isRunning()).toBe(false);
    expect(coordinator.getWorkerStatuses().map((worker) => [worker.workerId, worker.status, worker.label])).toEqual([
      [1, 'idle', 'Done'],
      [2, 'idle', 'Done'],
    ]);
  });

  it('never runs the same account in two workers at once', async () => {
    const { coordinator, reported } = createCoordinator();

    const summary = await coordinator.start(runConfig([createAccount('dup'), createAccount('dup')], 2));

    expect(summary.accounts.map((result) => result.status).sort()).toEqual(['completed', 'skipped_busy']);
    expect(summary.statistics.accountsProcessed).toBe(1);
    expect(summary.statistics.errors.map((error) => error.kind)).toEqual(['contention']);
    expect(reported).toHaveLength(1);
  });

  it('refuses a second start while running', async () => {
    const { coordinator } = createCoordinator();
    const first = coordinator.start(runConfig([createAccount('a')], 1));

    await expect(coordinator.start(runConfig([createAccount('a')], 1))).rejects.toBeInstanceOf(
      AutomationAlreadyRunningError
    );
    await first;
  });

  it('stops every worker', async () => {
    let coordinatorRef: WorkerPoolCoordinator | null = null;
    const { coordinator } = createCoordinator({
      onAdapter: (adapter) => {
        adapter.hooks.follow = () => coordinatorRef?.stop();
      },
    });
    coordinatorRef = coordinator;

    const summary = await coordinator.start(runConfig([createAccount('a'), createAccount('b')], 1));

    expect(summary.stopped).toBe(true);
    expect(summary.accounts.map((result) => [result.account, result.status])).toEqual([['a', 'stopped']]);
    expect(coordinator.getWorkerStatuses()[0].label).toBe('Stopped');
  });

  it('holds workers while paused', async () => {
    const adapters: StubAdapter[] = [];
    const { coordinator } = createCoordinator({ onAdapter: (adapter) => adapters.push(adapter) });

    const running = coordinator.start(runConfig([createAccount('a')], 1));
    coordinator.pause();

    expect(coordinator.isPaused()).toBe(true);
    expect(coordinator.getWorkerStatuses().map((worker) => worker.status)).toEqual(['paused']);
    await new Promise<void>((resolve) => setTimeout(resolve, 20));
    expect(adapters.flatMap((adapter) => adapter.calls)).toEqual([]);

    coordinator.resume();
    const summary = await running;

    expect(adapters[0].calls).toEqual(['openProfile:target_one', 'follow:target_one']);
    expect(summary.statistics.accountsProcessed).toBe(1);
  });

  it('passes every status change to the callback', async () => {
    const { coordinator } = createCoordinator();
    const labels: string[] = [];

    await coordinator.start(runConfig([createAccount('a')], 1), (_id, _status, label) => {
      if (label) labels.push(label);
    });

    expect(labels).toEqual(['1 account(s)', 'Starting a', 'a → target_one (1/1)', 'Finished a', 'Done']);
  });
});
