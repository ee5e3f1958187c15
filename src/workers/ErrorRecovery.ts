import { IPlatformAdapter } from '../adapters/interfaces/IPlatformAdapter';
import { EngineConfig } from '../models/EngineConfig';
import { Logger } from '../utils/logger';
import { describeError } from '../utils/errors';
import { RunControl } from './RunControl';
import { navigateToProfile } from './profileNavigation';

export interface RecoveryOutcome {
  recovered: boolean;
  reloaded: boolean;
  dialogsClosed: number;
  error?: string;
}

/**
 * Brings the page back to the target's profile after a step threw.
 *
 * 1. wait for the DOM to settle; reload when it does not
 * 2. close any open dialog
 * 3. re-open the profile
 *
 * Recovered only when step 3 loads the profile. Never throws.
 */
export class ErrorRecovery {
  constructor(
    private readonly config: EngineConfig,
    private readonly control: RunControl
  ) {}

  async recover(adapter: IPlatformAdapter, target: string, log: Logger): Promise<RecoveryOutcome> {
    const { timeouts } = this.config;
    let reloaded = false;
    let dialogsClosed = 0;

    try {
      await adapter.page.waitForLoadState('domcontentloaded', timeouts.recoveryCheck);
    } catch (waitError) {
      log.info(`Page did not settle (${describeError(waitError)}); reloading`);
      try {
        await adapter.page.reload({ waitUntil: 'networkidle', timeout: timeouts.reload });
        reloaded = true;
        await this.control.pauseBetween([3, 6]);
      } catch (reloadError) {
        log.warn(`Reload failed during recovery on ${target}: ${describeError(reloadError)}`);
      }
    }

    try {
      dialogsClosed = await adapter.dismissDialogs();
    } catch (error) {
      log.debug(`Could not close dialogs during recovery: ${describeError(error)}`);
    }

    const navigation = await navigateToProfile(
      adapter,
      target,
      this.control,
      this.config,
      log,
      this.config.recoveryNavigationAttempts
    );

    if (!navigation.loaded) {
      log.error(`Recovery failed for ${target}: ${navigation.lastError ?? 'profile did not load'}`);
      return { recovered: false, reloaded, dialogsClosed, error: navigation.lastError };
    }

    log.info(`Recovered page state for ${target}`);
    return { recovered: true, reloaded, dialogsClosed };
  }
}
