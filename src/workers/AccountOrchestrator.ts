import { IPageDriver } from '../adapters/interfaces/IPageDriver';
import { IPlatformAdapter } from '../adapters/interfaces/IPlatformAdapter';
import { PlatformAdapterFactory } from '../adapters/PlatformAdapterFactory';
import { AccountSession, ISessionProvider } from '../browser/types';
import { Account } from '../models/Account';
import { ActionChainStep } from '../models/ActionChain';
import { EngineConfig } from '../models/EngineConfig';
import { TextPool } from '../models/TextPool';
import { AccountRunResult, AccountRunStatus, StatusCallback, WorkerStatus } from '../models/Worker';
import { SessionGate } from '../services/SessionGate';
import { describeError } from '../utils/errors';
import { Logger, createScopedLogger } from '../utils/logger';
import { shuffle } from '../utils/random';
import { ActionChainRunner, ChainStateChange } from './ActionChainRunner';
import { RunControl } from './RunControl';
import { StatisticsTracker } from './StatisticsTracker';

export type AdapterFactory = (page: IPageDriver, control: RunControl, log: Logger) => IPlatformAdapter;

export interface AccountOrchestratorOptions {
  config: EngineConfig;
  control: RunControl;
  sessionGate: SessionGate;
  sessionProvider: ISessionProvider;
  /** Pool-wide tracker; each account run gets a child of it */
  statistics: StatisticsTracker;
  workerId?: number;
  onStatus?: StatusCallback;
  adapterFactory?: AdapterFactory;
  onChainStateChange?: (change: ChainStateChange) => void;
}

export interface AccountRunRequest {
  account: Account;
  targets: readonly string[];
  chain: readonly ActionChainStep[];
  texts: TextPool;
}

/**
 * Runs one account end to end: lease → browser session → login → every
 * target in shuffled order → release. The lease and the session are always
 * released, whatever happens in between.
 */
export class AccountOrchestrator {
  private readonly workerId: number;
  private readonly adapterFactory: AdapterFactory;

  constructor(private readonly options: AccountOrchestratorOptions) {
    this.workerId = options.workerId ?? 0;
    this.adapterFactory =
      options.adapterFactory ??
      ((page, control, log) =>
        PlatformAdapterFactory.create('instagram', { page, config: options.config, control, logger: log }));
  }

  async run(request: AccountRunRequest): Promise<AccountRunResult> {
    const { account, chain, texts } = request;
    const { config, control, sessionGate, sessionProvider } = this.options;
    const username = account.username;
    const log = createScopedLogger({ workerId: this.workerId, account: username });
    const statistics = new StatisticsTracker(this.options.statistics);
    statistics.reset();

    if (!sessionGate.acquire(username)) {
      const message = `Session for ${username} is already active; skipping`;
      log.warn(message);
      statistics.recordError('contention', username, message);
      return { account: username, status: 'skipped_busy', statistics: statistics.snapshot() };
    }

    let session: AccountSession | null = null;
    let adapter: IPlatformAdapter | null = null;
    let status: AccountRunStatus = 'completed';
    let failure: string | undefined;

    try {
      this.emit('working', `Starting ${username}`);
      statistics.setCurrent(username);

      session = await sessionProvider.createSession(username, account.proxy);
      const page = await sessionProvider.createPage(session);
      adapter = this.adapterFactory(page, control, log);

      if (!(await adapter.isLoggedIn())) {
        await adapter.login(account);
      }

      const runner = new ActionChainRunner({
        config,
        control,
        statistics,
        onStateChange: this.options.onChainStateChange,
      });
      const targets = shuffle(request.targets, control.random);

      for (let i = 0; i < targets.length; i++) {
        if (!(await control.checkpoint())) {
          break;
        }

        const target = targets[i];
        statistics.setCurrent(username, target);
        this.emit('working', `${username} → ${target} (${i + 1}/${targets.length})`);

        try {
          await runner.run({ adapter, account: username, target, chain, texts, workerId: this.workerId });
        } catch (error) {
          const message = `Unexpected error on ${target}: ${describeError(error)}`;
          log.error(message);
          statistics.recordError('fault', username, message, target);
        }

        if (i < targets.length - 1) {
          await control.pauseBetween(config.actionDelays.betweenTargets);
        }
      }

      if (control.isStopped) {
        status = 'stopped';
        this.emit('idle', `Stopped ${username}`);
      } else {
        this.emit('idle', `Finished ${username}`);
      }
      statistics.recordAccountProcessed();
    } catch (error) {
      status = 'failed';
      failure = describeError(error);
      log.error(`Account run failed: ${failure}`);
      statistics.recordError('session', username, failure);
      this.emit('error', `${username}: ${failure}`);
    } finally {
      await this.cleanup(username, adapter, session !== null, log);
      sessionGate.release(username);
    }

    const result: AccountRunResult = { account: username, status, statistics: statistics.snapshot() };
    if (failure !== undefined) {
      result.error = failure;
    }
    return result;
  }

  private async cleanup(
    username: string,
    adapter: IPlatformAdapter | null,
    hasSession: boolean,
    log: Logger
  ): Promise<void> {
    if (adapter) {
      await adapter.close();
    }
    if (hasSession) {
      try {
        await this.options.sessionProvider.closeSession(username);
      } catch (error) {
        log.warn(`Failed to close session for ${username}: ${describeError(error)}`);
      }
    }
  }

  private emit(status: WorkerStatus, label: string): void {
    this.options.onStatus?.(this.workerId, status, label, this.options.statistics.snapshot());
  }
}
