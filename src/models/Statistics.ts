import { ProfileStatus } from './Profile';

export type ErrorKind =
  | 'business'
  | 'fault'
  | 'block'
  | 'navigation'
  | 'contention'
  | 'session'
  | 'account';

export interface ErrorRecord {
  kind: ErrorKind;
  account: string;
  target?: string;
  message: string;
  timestamp: string;
}

export type ChainTerminalState = 'completed' | 'aborted';

export type ChainAbortReason =
  | 'empty_chain'
  | 'navigation_failed'
  | 'profile_unavailable'
  | 'blocked'
  | 'stopped'
  | 'recovery_failed';

export interface TargetStatistics {
  account: string;
  target: string;
  state: ChainTerminalState;
  abortReason?: ChainAbortReason;
  profileStatus?: ProfileStatus;
  successfulActions: number;
  failedActions: number;
  /** Percentage, 0 when nothing ran */
  successRate: number;
  actionsPerformed: string[];
  processedAt: string;
}

export interface RunStatistics {
  totalActions: number;
  successfulActions: number;
  failedActions: number;
  accountsProcessed: number;
  currentAccount: string | null;
  currentTarget: string | null;
  startTime: string | null;
  errors: ErrorRecord[];
  targets: TargetStatistics[];
}
