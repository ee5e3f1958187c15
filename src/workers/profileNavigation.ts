import { IPlatformAdapter } from '../adapters/interfaces/IPlatformAdapter';
import { EngineConfig } from '../models/EngineConfig';
import { Logger } from '../utils/logger';
import { describeError } from '../utils/errors';
import { navigationBackoff } from '../utils/delay';
import { RunControl } from './RunControl';

export interface NavigationResult {
  loaded: boolean;
  attempts: number;
  lastError?: string;
}

/**
 * Opens the target's profile page, retrying with a growing randomized backoff.
 * Never throws; `loaded: false` means every attempt failed.
 */
export async function navigateToProfile(
  adapter: IPlatformAdapter,
  target: string,
  control: RunControl,
  config: EngineConfig,
  log: Logger,
  maxAttempts: number = config.navigationAttempts
): Promise<NavigationResult> {
  let lastError: string | undefined;

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    if (control.isStopped) {
      return { loaded: false, attempts: attempt, lastError: 'Stopped' };
    }

    try {
      log.debug(`Loading profile ${target}, attempt ${attempt + 1}/${maxAttempts}`);
      const outcome = await adapter.openProfile(target);
      if (outcome.loaded) {
        await control.pauseBetween(config.actionDelays.pageLoad);
        return { loaded: true, attempts: attempt + 1 };
      }
      lastError = `Unexpected page title "${outcome.title}"`;
    } catch (error) {
      lastError = describeError(error);
    }

    log.warn(`Attempt ${attempt + 1} to load ${target} failed: ${lastError}`);
    if (attempt < maxAttempts - 1) {
      await control.sleepSeconds(navigationBackoff(attempt, control.random));
    }
  }

  return { loaded: false, attempts: maxAttempts, lastError };
}
