export type TextPoolType = 'storyReplies' | 'directMessages';

export interface TextPool {
  storyReplies: string[];
  directMessages: string[];
}

export function emptyTextPool(): TextPool {
  return { storyReplies: [], directMessages: [] };
}
