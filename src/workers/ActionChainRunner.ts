import { IPlatformAdapter } from '../adapters/interfaces/IPlatformAdapter';
import { ActionChainStep, enabledSteps, stepLabel } from '../models/ActionChain';
import { ActionResult } from '../models/ActionResult';
import { EngineConfig } from '../models/EngineConfig';
import { ProfileInfo, ProfileStatus, emptyProfileInfo } from '../models/Profile';
import { ChainAbortReason, TargetStatistics } from '../models/Statistics';
import { TextPool } from '../models/TextPool';
import { findBlockIndicator } from '../services/BlockDetector';
import {
  classifyProfileStatus,
  unreachableProfileStatus,
} from '../services/ProfileStatusClassifier';
import { computeAdaptiveDelay } from '../utils/delay';
import { describeError } from '../utils/errors';
import { Logger, createScopedLogger } from '../utils/logger';
import { ActionExecutor, StoryViewState } from './ActionExecutor';
import { ErrorRecovery } from './ErrorRecovery';
import { RunControl } from './RunControl';
import { StatisticsTracker, successRate } from './StatisticsTracker';
import { navigateToProfile } from './profileNavigation';

export type ChainRunState =
  | 'idle'
  | 'navigating_to_profile'
  | 'checking_status'
  | 'gathering_info'
  | 'executing_step'
  | 'completed'
  | 'aborted';

export interface ChainStateChange {
  state: ChainRunState;
  target: string;
  stepIndex?: number;
  stepLabel?: string;
}

export interface ChainRunnerOptions {
  config: EngineConfig;
  control: RunControl;
  statistics: StatisticsTracker;
  executor?: ActionExecutor;
  recovery?: ErrorRecovery;
  onStateChange?: (change: ChainStateChange) => void;
}

export interface ChainRunRequest {
  adapter: IPlatformAdapter;
  account: string;
  target: string;
  chain: readonly ActionChainStep[];
  texts: TextPool;
  workerId?: number;
}

export interface ChainRunResult extends TargetStatistics {
  /** Enabled steps that were dispatched before the run ended */
  stepsAttempted: number;
  profileInfo?: ProfileInfo;
}

interface ChainProgress {
  successful: number;
  failed: number;
  performed: string[];
  profileStatus?: ProfileStatus;
  profileInfo?: ProfileInfo;
}

/**
 * Runs one action chain against one target on an authenticated page.
 *
 * idle → navigating_to_profile → checking_status → gathering_info →
 * executing_step(i)… → completed | aborted
 *
 * Never throws for anything that happens on the page: navigation failures,
 * unavailable profiles, blocks and unrecoverable faults all end as an
 * `aborted` result, and a TargetStatistics entry is recorded either way.
 */
export class ActionChainRunner {
  private readonly config: EngineConfig;
  private readonly control: RunControl;
  private readonly statistics: StatisticsTracker;
  private readonly executor: ActionExecutor;
  private readonly recovery: ErrorRecovery;
  private readonly onStateChange?: (change: ChainStateChange) => void;

  constructor(options: ChainRunnerOptions) {
    this.config = options.config;
    this.control = options.control;
    this.statistics = options.statistics;
    this.executor = options.executor ?? new ActionExecutor();
    this.recovery = options.recovery ?? new ErrorRecovery(options.config, options.control);
    this.onStateChange = options.onStateChange;
  }

  async run(request: ChainRunRequest): Promise<ChainRunResult> {
    const { adapter, account, target, chain, texts } = request;
    const log = createScopedLogger({ workerId: request.workerId, account, target });
    const progress: ChainProgress = { successful: 0, failed: 0, performed: [] };
    const transition = (state: ChainRunState, stepIndex?: number, label?: string): void => {
      this.onStateChange?.({ state, target, stepIndex, stepLabel: label });
    };
    const abort = (reason: ChainAbortReason): ChainRunResult => {
      transition('aborted');
      return this.finish(account, target, 'aborted', progress, reason);
    };

    transition('idle');

    const steps = enabledSteps(chain);
    if (steps.length === 0) {
      log.warn(chain.length === 0 ? 'Empty action chain' : 'Action chain has no enabled steps');
      return abort('empty_chain');
    }

    if (!(await this.control.checkpoint())) {
      return abort('stopped');
    }

    log.info(`Executing ${steps.length} step(s) on ${target}`);

    transition('navigating_to_profile');
    const navigation = await navigateToProfile(adapter, target, this.control, this.config, log);
    if (!navigation.loaded) {
      if (this.control.isStopped) {
        return abort('stopped');
      }
      const message = `Profile ${target} failed to load after ${navigation.attempts} attempt(s): ${navigation.lastError ?? 'unknown error'}`;
      log.error(message);
      this.statistics.recordError('navigation', account, message, target);
      return abort('navigation_failed');
    }

    transition('checking_status');
    progress.profileStatus = await this.checkProfileStatus(adapter, log);
    if (progress.profileStatus.blocked) {
      log.warn(`Skipping ${target}: ${progress.profileStatus.reason ?? progress.profileStatus.kind}`);
      return abort('profile_unavailable');
    }

    transition('gathering_info');
    let profile = await this.readProfileInfo(adapter, target, log);
    progress.profileInfo = profile;
    log.info(`Profile ${target}: ${profile.postsCount} posts, ${profile.followersCount} followers`);

    const storyState: StoryViewState = {};

    for (let i = 0; i < steps.length; i++) {
      if (!(await this.control.checkpoint())) {
        log.info('Stop requested; ending chain');
        return abort('stopped');
      }

      const step = steps[i];
      const label = stepLabel(step);
      transition('executing_step', i, label);
      log.info(`Step ${i + 1}/${steps.length}: ${label}`);
      progress.performed.push(label);

      let result: ActionResult;
      let faulted = false;
      try {
        result = await this.executor.execute(step, {
          adapter,
          target,
          profile,
          texts,
          control: this.control,
          storyState,
          logger: log,
        });
      } catch (error) {
        faulted = true;
        result = { success: false, error: describeError(error), details: {} };
      }

      this.statistics.recordAction(result.success);
      if (result.success) {
        progress.successful++;
        log.info(`${label} succeeded`);
        if (step.type === 'follow' || step.type === 'like_posts') {
          profile = await this.refreshStories(adapter, profile, log);
          progress.profileInfo = profile;
        }
      } else {
        progress.failed++;
        if (!faulted) {
          log.warn(`${label} failed: ${result.error ?? 'unknown reason'}`);
          this.statistics.recordError('business', account, `${label}: ${result.error ?? 'failed'}`, target);
        }
      }

      if (faulted) {
        log.error(`${label} threw: ${result.error ?? 'unknown error'}`);
        this.statistics.recordError('fault', account, `${label}: ${result.error ?? 'fault'}`, target);
        const outcome = await this.recovery.recover(adapter, target, log);
        if (!outcome.recovered) {
          this.statistics.recordError(
            'fault',
            account,
            `Recovery failed after ${label}: ${outcome.error ?? 'profile did not load'}`,
            target
          );
          return abort(this.control.isStopped ? 'stopped' : 'recovery_failed');
        }
      }

      if (i < steps.length - 1) {
        const delay = computeAdaptiveDelay(
          step.type,
          result.success,
          this.config.actionDelays.betweenActions,
          this.control.random
        );
        log.debug(`Waiting ${delay.toFixed(1)}s before next step`);
        await this.control.sleepSeconds(delay);
      }

      if (this.control.isStopped) {
        continue;
      }

      const indicator = await this.scanForBlock(adapter, log);
      if (indicator) {
        const message = `Platform block detected after ${label}: "${indicator}"`;
        log.error(message);
        this.statistics.recordError('block', account, message, target);
        return abort('blocked');
      }
    }

    transition('completed');
    const result = this.finish(account, target, 'completed', progress);
    log.info(
      `Finished ${target}: ${progress.successful} succeeded, ${progress.failed} failed (${result.successRate.toFixed(1)}%)`
    );
    return result;
  }

  private async checkProfileStatus(adapter: IPlatformAdapter, log: Logger): Promise<ProfileStatus> {
    try {
      return classifyProfileStatus(await adapter.readPageText());
    } catch (error) {
      log.error(`Could not read profile page: ${describeError(error)}`);
      return unreachableProfileStatus(describeError(error));
    }
  }

  private async readProfileInfo(adapter: IPlatformAdapter, target: string, log: Logger): Promise<ProfileInfo> {
    try {
      return await adapter.gatherProfileInfo(target);
    } catch (error) {
      log.warn(`Could not gather profile info of ${target}: ${describeError(error)}`);
      return emptyProfileInfo(target);
    }
  }

  private async refreshStories(
    adapter: IPlatformAdapter,
    profile: ProfileInfo,
    log: Logger
  ): Promise<ProfileInfo> {
    try {
      return { ...profile, hasStories: await adapter.hasActiveStories() };
    } catch (error) {
      log.debug(`Could not refresh story state: ${describeError(error)}`);
      return profile;
    }
  }

  private async scanForBlock(adapter: IPlatformAdapter, log: Logger): Promise<string | null> {
    try {
      const [pageText, dialogText] = await Promise.all([adapter.readPageText(), adapter.readDialogText()]);
      return findBlockIndicator(pageText, dialogText);
    } catch (error) {
      log.warn(`Block check failed: ${describeError(error)}`);
      return null;
    }
  }

  private finish(
    account: string,
    target: string,
    state: TargetStatistics['state'],
    progress: ChainProgress,
    abortReason?: ChainAbortReason
  ): ChainRunResult {
    const entry: TargetStatistics = {
      account,
      target,
      state,
      successfulActions: progress.successful,
      failedActions: progress.failed,
      successRate: successRate(progress.successful, progress.successful + progress.failed),
      actionsPerformed: [...progress.performed],
      processedAt: new Date().toISOString(),
    };
    if (abortReason) {
      entry.abortReason = abortReason;
    }
    if (progress.profileStatus) {
      entry.profileStatus = progress.profileStatus;
    }
    this.statistics.recordTarget(entry);

    return {
      ...entry,
      stepsAttempted: progress.successful + progress.failed,
      profileInfo: progress.profileInfo,
    };
  }
}
