import { ActionType } from '../models/ActionChain';
import { DelayRange } from '../models/EngineConfig';
import { RandomSource, defaultRandom, uniform } from './random';

/** Actions the platform watches most closely; they get a longer cool-down. */
export const SENSITIVE_ACTIONS: ReadonlySet<ActionType> = new Set<ActionType>([
  'follow',
  'send_dm',
  'reply_stories',
]);

export const MIN_ACTION_DELAY_SECONDS = 1;

/**
 * Random delay (seconds) drawn uniformly from a [min, max] range
 */
export function randomDelaySeconds(range: DelayRange, random: RandomSource = defaultRandom): number {
  const [min, max] = range;
  return uniform(Math.min(min, max), Math.max(min, max), random);
}

/**
 * Delay (seconds) applied after a chain step before the next one starts.
 * Sensitive actions are stretched by 1.5, failures by 2, then a -2..+3 s
 * jitter is added. Never below one second.
 */
export function computeAdaptiveDelay(
  actionType: ActionType,
  wasSuccessful: boolean,
  betweenActions: DelayRange,
  random: RandomSource = defaultRandom
): number {
  let delay = randomDelaySeconds(betweenActions, random);

  if (SENSITIVE_ACTIONS.has(actionType)) {
    delay *= 1.5;
  }

  if (!wasSuccessful) {
    delay *= 2;
  }

  delay += uniform(-2, 3, random);

  return Math.max(delay, MIN_ACTION_DELAY_SECONDS);
}

/**
 * Backoff (seconds) before navigation attempt `attempt + 1`; grows with each
 * failed attempt.
 */
export function navigationBackoff(attempt: number, random: RandomSource = defaultRandom): number {
  return uniform(3, 6, random) * (1 + attempt * 0.5);
}
