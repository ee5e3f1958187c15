import { IPlatformAdapter } from '../adapters/interfaces/IPlatformAdapter';
import { ActionChainStep } from '../models/ActionChain';
import { ActionResult, actionFailed, actionSucceeded } from '../models/ActionResult';
import { ProfileInfo } from '../models/Profile';
import { TextPool } from '../models/TextPool';
import { Logger, logger as rootLogger } from '../utils/logger';
import { pickRandom } from '../utils/random';
import { RunControl } from './RunControl';

/**
 * Story viewing done so far in one chain run; like_stories is bounded by it
 */
export interface StoryViewState {
  lastViewStories?: { count: number; viewed: number };
}

export interface ExecutionContext {
  adapter: IPlatformAdapter;
  target: string;
  profile: ProfileInfo;
  texts: TextPool;
  control: RunControl;
  storyState: StoryViewState;
  logger?: Logger;
}

function isValidCount(count: unknown): count is number {
  return typeof count === 'number' && Number.isInteger(count) && count >= 1;
}

function readNumber(details: ActionResult['details'], key: string): number {
  const value = details[key];
  return typeof value === 'number' ? value : 0;
}

/**
 * Executes one chain step against the current profile page.
 *
 * Business outcomes (no stories, empty text pool, control missing) come back
 * as `success: false`. Exceptions thrown by the adapter are not caught here:
 * the chain runner treats them as faults and runs recovery.
 */
export class ActionExecutor {
  async execute(step: ActionChainStep, context: ExecutionContext): Promise<ActionResult> {
    const log = context.logger ?? rootLogger;
    const { adapter, target, profile, texts, control, storyState } = context;

    switch (step.type) {
      case 'follow':
        return adapter.follow(target);

      case 'like_posts': {
        const { count } = step.settings;
        if (!isValidCount(count)) {
          return actionFailed(`Invalid like_posts count: ${String(count)}`);
        }
        return adapter.likePosts(target, count);
      }

      case 'view_stories': {
        const { count } = step.settings;
        if (!isValidCount(count)) {
          return actionFailed(`Invalid view_stories count: ${String(count)}`);
        }
        const viewing = { count, viewed: 0 };
        storyState.lastViewStories = viewing;
        if (!profile.hasStories) {
          return actionFailed('No active stories', { viewed: 0 });
        }
        const result = await adapter.viewStories(target, count);
        viewing.viewed = readNumber(result.details, 'viewed');
        return result;
      }

      case 'like_stories': {
        const { count } = step.settings;
        if (!isValidCount(count)) {
          return actionFailed(`Invalid like_stories count: ${String(count)}`);
        }
        const viewing = storyState.lastViewStories;
        if (!viewing) {
          return actionFailed('like_stories requires a preceding enabled view_stories step');
        }
        if (count > viewing.count) {
          return actionFailed(
            `like_stories count (${count}) exceeds the preceding view_stories count (${viewing.count})`
          );
        }
        if (!profile.hasStories) {
          return actionFailed('No active stories');
        }
        if (viewing.viewed === 0) {
          return actionFailed('No story frames were viewed before like_stories');
        }
        const frames = Math.min(count, viewing.viewed);
        if (frames < count) {
          log.info(`Capping story likes for ${target} at ${frames} viewed frame(s)`);
        }
        return adapter.likeStories(target, frames);
      }

      case 'reply_stories': {
        if (!profile.hasStories) {
          return actionFailed('No active stories');
        }
        const text = pickRandom(texts.storyReplies, control.random);
        if (text === undefined) {
          return actionFailed('Story reply text pool is empty');
        }
        return adapter.replyToStory(target, text);
      }

      case 'send_dm': {
        const text = pickRandom(texts.directMessages, control.random);
        if (text === undefined) {
          return actionFailed('Direct message text pool is empty');
        }
        return adapter.sendDirectMessage(target, text);
      }

      case 'delay': {
        const seconds = step.settings.delay;
        if (typeof seconds !== 'number' || !Number.isFinite(seconds) || seconds < 0) {
          return actionFailed(`Invalid delay: ${String(seconds)}`);
        }
        log.debug(`Explicit delay of ${seconds}s before next step on ${target}`);
        await control.sleepSeconds(seconds);
        return actionSucceeded({ seconds });
      }

      default:
        return unknownStep(step);
    }
  }
}

/**
 * Chains loaded from disk may carry types this build does not know
 */
function unknownStep(step: never): ActionResult {
  const type: unknown = Reflect.get(Object(step), 'type');
  return actionFailed(`Unknown action type: ${String(type)}`);
}
