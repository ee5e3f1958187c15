export type ActionType =
  | 'follow'
  | 'like_posts'
  | 'view_stories'
  | 'like_stories'
  | 'reply_stories'
  | 'send_dm'
  | 'delay';

export const ACTION_TYPES: readonly ActionType[] = [
  'follow',
  'like_posts',
  'view_stories',
  'like_stories',
  'reply_stories',
  'send_dm',
  'delay',
];

interface ChainStepBase {
  name: string;
  enabled: boolean;
}

export interface FollowStep extends ChainStepBase {
  type: 'follow';
}

export interface LikePostsStep extends ChainStepBase {
  type: 'like_posts';
  settings: { count: number };
}

export interface ViewStoriesStep extends ChainStepBase {
  type: 'view_stories';
  settings: { count: number };
}

/** count must not exceed the count of the closest preceding enabled view_stories step */
export interface LikeStoriesStep extends ChainStepBase {
  type: 'like_stories';
  settings: { count: number };
}

export interface ReplyStoriesStep extends ChainStepBase {
  type: 'reply_stories';
}

export interface SendDirectMessageStep extends ChainStepBase {
  type: 'send_dm';
}

export interface DelayStep extends ChainStepBase {
  type: 'delay';
  settings: { delay: number };
}

export type ActionChainStep =
  | FollowStep
  | LikePostsStep
  | ViewStoriesStep
  | LikeStoriesStep
  | ReplyStoriesStep
  | SendDirectMessageStep
  | DelayStep;

export type ActionChain = ActionChainStep[];

export function stepLabel(step: ActionChainStep): string {
  return step.name || step.type;
}

export function enabledSteps(chain: readonly ActionChainStep[]): ActionChainStep[] {
  return chain.filter((step) => step.enabled);
}
