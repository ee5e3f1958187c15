/** [min, max] in seconds */
export type DelayRange = [number, number];

export interface ActionDelays {
  likePost: DelayRange;
  viewStory: DelayRange;
  likeStory: DelayRange;
  replyStory: DelayRange;
  sendDm: DelayRange;
  follow: DelayRange;
  betweenActions: DelayRange;
  betweenTargets: DelayRange;
  betweenAccounts: DelayRange;
  pageLoad: DelayRange;
}

/** Milliseconds */
export interface EngineTimeouts {
  navigation: number;
  domContentLoaded: number;
  recoveryCheck: number;
  reload: number;
  element: number;
}

export interface SafetyLimits {
  /** Largest worker count a run may be started with */
  maxParallelWorkers: number;
}

export interface EngineConfig {
  actionDelays: ActionDelays;
  timeouts: EngineTimeouts;
  safetyLimits: SafetyLimits;
  navigationAttempts: number;
  recoveryNavigationAttempts: number;
  userAgents: string[];
  screenResolutions: Array<[number, number]>;
}
