import { z } from 'zod';
import { parseProxy } from '../browser/proxy';
import { BrowserType } from '../browser/types';
import { Account, CreateAccountParams } from '../models/Account';
import { ACTION_TYPES, ActionChainStep, ActionType } from '../models/ActionChain';
import { TextPool } from '../models/TextPool';

/**
 * Chain step as stored on disk or sent by a client, before type checking
 */
export const RawChainStepSchema = z.object({
  type: z.string(),
  name: z.string().optional(),
  enabled: z.boolean().optional(),
  settings: z.record(z.unknown()).optional(),
});

export const RawChainSchema = z.array(RawChainStepSchema);

export type RawChainStep = z.infer<typeof RawChainStepSchema>;

export interface ValidationReport {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

export interface ReadinessReport {
  ready: boolean;
  issues: string[];
}

const USERNAME_PATTERN = /^[a-zA-Z0-9._]{1,30}$/;
const MAX_SUGGESTED_COUNT = 10;

const DEFAULT_COUNTS: Partial<Record<ActionType, number>> = {
  like_posts: 2,
  view_stories: 3,
  like_stories: 1,
};
const DEFAULT_DELAY_SECONDS = 30;

export function isKnownActionType(type: string): type is ActionType {
  return ACTION_TYPES.some((known) => known === type);
}

function isEnabled(step: RawChainStep): boolean {
  return step.enabled ?? true;
}

function settingValue(step: RawChainStep, key: string, fallback: number): unknown {
  return step.settings?.[key] ?? fallback;
}

function isCountInRange(count: unknown): boolean {
  return typeof count === 'number' && Number.isInteger(count) && count >= 1 && count <= MAX_SUGGESTED_COUNT;
}

/**
 * Authoring-time check of an action chain.
 *
 * Errors make the chain unusable: empty chain, unknown step type, nothing
 * enabled, a like_stories step with no enabled view_stories before it or
 * asking for more likes than that step views. Warnings flag counts outside
 * 1-10 and delays under a second.
 */
export function validateActionChain(chain: readonly RawChainStep[]): ValidationReport {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (chain.length === 0) {
    return { valid: false, errors: ['Action chain is empty'], warnings };
  }

  let lastViewCount: number | null = null;

  chain.forEach((step, index) => {
    const position = index + 1;

    if (!isKnownActionType(step.type)) {
      errors.push(`Unknown action type at step ${position}: ${step.type}`);
      return;
    }

    switch (step.type) {
      case 'like_posts':
      case 'view_stories':
      case 'like_stories': {
        const count = settingValue(step, 'count', DEFAULT_COUNTS[step.type] ?? 1);
        if (!isCountInRange(count)) {
          warnings.push(`Unusual count at step ${position}: ${String(count)}`);
        }
        if (step.type === 'view_stories' && isEnabled(step) && typeof count === 'number') {
          lastViewCount = count;
        }
        if (step.type === 'like_stories' && isEnabled(step)) {
          if (lastViewCount === null) {
            errors.push(`Step ${position}: like_stories needs an enabled view_stories step before it`);
          } else if (typeof count === 'number' && count > lastViewCount) {
            errors.push(
              `Step ${position}: like_stories count (${count}) exceeds the preceding view_stories count (${lastViewCount})`
            );
          }
        }
        break;
      }
      case 'delay': {
        const delay = settingValue(step, 'delay', DEFAULT_DELAY_SECONDS);
        if (typeof delay !== 'number' || delay < 1) {
          warnings.push(`Unusual delay at step ${position}: ${String(delay)}`);
        }
        break;
      }
      default:
        break;
    }
  });

  if (!chain.some(isEnabled)) {
    errors.push('Action chain has no enabled steps');
  }

  return { valid: errors.length === 0, errors, warnings };
}

function numericSetting(step: RawChainStep, key: string, fallback: number): number {
  const value = settingValue(step, key, fallback);
  return typeof value === 'number' ? value : Number(value);
}

/**
 * Converts raw steps into typed chain steps. Steps of unknown type are dropped.
 */
export function toActionChain(chain: readonly RawChainStep[]): ActionChainStep[] {
  const steps: ActionChainStep[] = [];
  for (const raw of chain) {
    const base = { name: raw.name ?? raw.type, enabled: isEnabled(raw) };
    switch (raw.type) {
      case 'follow':
      case 'reply_stories':
      case 'send_dm':
        steps.push({ ...base, type: raw.type });
        break;
      case 'like_posts':
      case 'view_stories':
      case 'like_stories':
        steps.push({
          ...base,
          type: raw.type,
          settings: { count: numericSetting(raw, 'count', DEFAULT_COUNTS[raw.type] ?? 1) },
        });
        break;
      case 'delay':
        steps.push({ ...base, type: 'delay', settings: { delay: numericSetting(raw, 'delay', DEFAULT_DELAY_SECONDS) } });
        break;
      default:
        break;
    }
  }
  return steps;
}

export function validateUsername(username: string): boolean {
  return USERNAME_PATTERN.test(username);
}

export function validateTarget(target: string): boolean {
  return validateUsername(normalizeTarget(target));
}

/** Trims and removes every `@` */
export function normalizeTarget(target: string): string {
  return target.trim().replace(/@/g, '');
}

export function validateProxy(proxy: string): boolean {
  return parseProxy(proxy) !== null;
}

export function validateAccount(account: CreateAccountParams): ValidationReport {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!account.username) {
    errors.push('Username is missing');
  } else if (!validateUsername(account.username)) {
    errors.push('Username has an invalid format');
  }

  if (!account.password) {
    errors.push('Password is missing');
  } else if (account.password.length < 6) {
    warnings.push('Password is shorter than 6 characters');
  }

  if (account.proxy && !validateProxy(account.proxy)) {
    warnings.push('Proxy has an invalid format');
  }

  return { valid: errors.length === 0, errors, warnings };
}

export interface ReadinessInput {
  accounts: readonly Account[];
  targets: readonly string[];
  chain: readonly ActionChainStep[];
  texts: TextPool;
  browserType: BrowserType;
  dolphinApiUrl?: string;
  dolphinToken?: string;
}

/**
 * Whether there is enough data to start a run; `issues` lists what is missing
 */
export function checkReadiness(input: ReadinessInput): ReadinessReport {
  const issues: string[] = [];

  if (input.accounts.length === 0) {
    issues.push('No accounts added');
  } else if (!input.accounts.some((account) => account.status === 'active')) {
    issues.push('No active accounts');
  }

  if (input.targets.length === 0) {
    issues.push('No targets added');
  }

  const enabled = input.chain.filter((step) => step.enabled);
  if (input.chain.length === 0) {
    issues.push('No action chain configured');
  } else if (enabled.length === 0) {
    issues.push('Action chain has no enabled steps');
  }

  if (enabled.some((step) => step.type === 'reply_stories') && input.texts.storyReplies.length === 0) {
    issues.push('Story replies need at least one reply text');
  }
  if (enabled.some((step) => step.type === 'send_dm') && input.texts.directMessages.length === 0) {
    issues.push('Direct messages need at least one message text');
  }

  if (input.browserType === 'dolphin') {
    if (!input.dolphinApiUrl) {
      issues.push('Dolphin API URL is not configured');
    }
    if (!input.dolphinToken) {
      issues.push('Dolphin API token is not configured');
    }
  }

  return { ready: issues.length === 0, issues };
}
