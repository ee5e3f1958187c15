import { ISessionProvider } from '../browser/types';
import { Account } from '../models/Account';
import { EngineConfig } from '../models/EngineConfig';
import { RunStatistics } from '../models/Statistics';
import {
  AccountRunResult,
  AutomationRunConfig,
  AutomationRunSummary,
  StatusCallback,
  WorkerState,
  WorkerStatus,
} from '../models/Worker';
import { SessionGate, getSessionGate } from '../services/SessionGate';
import { AutomationAlreadyRunningError, describeError } from '../utils/errors';
import { createScopedLogger, logger } from '../utils/logger';
import { AccountOrchestrator, AdapterFactory } from './AccountOrchestrator';
import { RunControl, RunControlOptions } from './RunControl';
import { StatisticsTracker, successRate } from './StatisticsTracker';

/**
 * Receives per-account totals after each account run
 */
export interface AccountStatsSink {
  updateAccountStats(username: string, actions: number, successRate: number): Promise<void>;
}

export interface WorkerPoolCoordinatorOptions {
  config: EngineConfig;
  sessionProvider: ISessionProvider;
  sessionGate?: SessionGate;
  accountStore?: AccountStatsSink;
  /** Sleeper / random source for every run this coordinator starts */
  controlOptions?: RunControlOptions;
  adapterFactory?: AdapterFactory;
}

/**
 * Splits accounts into `workers` contiguous chunks. Chunk sizes differ by at
 * most one, the larger chunks first; chunks may be empty when there are more
 * workers than accounts.
 */
export function partitionAccounts<T>(accounts: readonly T[], workers: number): T[][] {
  const count = Math.max(1, Math.floor(workers));
  const chunkSize = Math.floor(accounts.length / count);
  const remainder = accounts.length % count;
  const chunks: T[][] = [];

  let start = 0;
  for (let i = 0; i < count; i++) {
    const end = start + chunkSize + (i < remainder ? 1 : 0);
    chunks.push(accounts.slice(start, end));
    start = end;
  }
  return chunks;
}

export function activeAccounts(accounts: readonly Account[]): Account[] {
  return accounts.filter((account) => account.status === 'active');
}

/**
 * Runs the whole account pool across N concurrent workers.
 *
 * Each worker is a task over its own chunk of accounts; all tasks share one
 * RunControl, so stop() cancels every pending delay in every worker at once,
 * and start() resolves only after every worker has finished.
 */
export class WorkerPoolCoordinator {
  private readonly statistics = new StatisticsTracker();
  private readonly sessionGate: SessionGate;
  private readonly workerStates = new Map<number, WorkerState>();
  private control: RunControl | null = null;
  private callback: StatusCallback | undefined;

  constructor(private readonly options: WorkerPoolCoordinatorOptions) {
    this.sessionGate = options.sessionGate ?? getSessionGate();
  }

  isRunning(): boolean {
    return this.control !== null;
  }

  isPaused(): boolean {
    return this.control?.isPaused ?? false;
  }

  getStatistics(): RunStatistics {
    return this.statistics.snapshot();
  }

  getWorkerStatuses(): WorkerState[] {
    return [...this.workerStates.values()].map((state) => ({ ...state }));
  }

  async start(runConfig: AutomationRunConfig, callback?: StatusCallback): Promise<AutomationRunSummary> {
    if (this.control) {
      throw new AutomationAlreadyRunningError();
    }

    const control = new RunControl(this.options.controlOptions);
    this.control = control;
    this.callback = callback;
    this.workerStates.clear();
    this.statistics.reset();

    const startedAt = new Date().toISOString();
    const accounts = activeAccounts(runConfig.accounts);
    const chunks = partitionAccounts(accounts, runConfig.workersCount).filter((chunk) => chunk.length > 0);

    logger.info(
      `Starting automation: ${accounts.length} active account(s), ${runConfig.targets.length} target(s), ${chunks.length} worker(s)`
    );

    try {
      const settled = await Promise.allSettled(
        chunks.map((chunk, index) => this.runWorker(index + 1, chunk, runConfig, control))
      );

      const results: AccountRunResult[] = [];
      settled.forEach((outcome, index) => {
        if (outcome.status === 'fulfilled') {
          results.push(...outcome.value);
        } else {
          logger.error(`Worker ${index + 1} crashed: ${describeError(outcome.reason)}`);
          this.updateWorker(index + 1, 'error', describeError(outcome.reason));
        }
      });

      const summary: AutomationRunSummary = {
        startedAt,
        finishedAt: new Date().toISOString(),
        stopped: control.isStopped,
        accounts: results,
        statistics: this.statistics.snapshot(),
      };
      logger.info(
        `Automation finished: ${summary.statistics.accountsProcessed} account(s), ${summary.statistics.successfulActions}/${summary.statistics.totalActions} successful action(s)`
      );
      return summary;
    } finally {
      this.statistics.setCurrent(null);
      this.control = null;
    }
  }

  stop(): void {
    if (!this.control) {
      return;
    }
    logger.info('Stopping automation');
    this.control.stop();
    for (const workerId of this.workerStates.keys()) {
      this.updateWorker(workerId, 'idle', 'Stopping');
    }
  }

  pause(): void {
    if (!this.control || this.control.isPaused) {
      return;
    }
    logger.info('Pausing automation');
    this.control.pause();
    for (const workerId of this.workerStates.keys()) {
      this.updateWorker(workerId, 'paused', 'Paused');
    }
  }

  resume(): void {
    if (!this.control || !this.control.isPaused) {
      return;
    }
    logger.info('Resuming automation');
    this.control.resume();
    for (const workerId of this.workerStates.keys()) {
      this.updateWorker(workerId, 'working', 'Resumed');
    }
  }

  private async runWorker(
    workerId: number,
    accounts: Account[],
    runConfig: AutomationRunConfig,
    control: RunControl
  ): Promise<AccountRunResult[]> {
    const log = createScopedLogger({ workerId });
    const results: AccountRunResult[] = [];
    const orchestrator = new AccountOrchestrator({
      config: this.options.config,
      control,
      sessionGate: this.sessionGate,
      sessionProvider: this.options.sessionProvider,
      statistics: this.statistics,
      workerId,
      adapterFactory: this.options.adapterFactory,
      onStatus: (id, status, label) => this.updateWorker(id, status, label),
    });

    log.info(`Worker ${workerId} started with ${accounts.length} account(s)`);
    this.updateWorker(workerId, 'working', `${accounts.length} account(s)`);

    for (let i = 0; i < accounts.length; i++) {
      if (!(await control.checkpoint())) {
        break;
      }

      const result = await orchestrator.run({
        account: accounts[i],
        targets: runConfig.targets,
        chain: runConfig.actionChain,
        texts: runConfig.texts,
      });
      results.push(result);
      await this.reportAccountStats(result);

      if (i < accounts.length - 1 && !control.isStopped) {
        log.info('Cooling down before next account');
        await control.pauseBetween(this.options.config.actionDelays.betweenAccounts);
      }
    }

    this.updateWorker(workerId, 'idle', control.isStopped ? 'Stopped' : 'Done');
    log.info(`Worker ${workerId} finished`);
    return results;
  }

  private async reportAccountStats(result: AccountRunResult): Promise<void> {
    const { accountStore } = this.options;
    if (!accountStore || result.status === 'skipped_busy') {
      return;
    }
    const { totalActions, successfulActions } = result.statistics;
    try {
      await accountStore.updateAccountStats(
        result.account,
        totalActions,
        successRate(successfulActions, totalActions)
      );
    } catch (error) {
      logger.warn(`Could not update stats for ${result.account}: ${describeError(error)}`);
    }
  }

  private updateWorker(workerId: number, status: WorkerStatus, label?: string): void {
    this.workerStates.set(workerId, { workerId, status, label, updatedAt: new Date().toISOString() });
    try {
      this.callback?.(workerId, status, label, this.statistics.snapshot());
    } catch (error) {
      logger.warn(`Status callback failed: ${describeError(error)}`);
    }
  }
}
