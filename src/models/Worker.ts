import { Account } from './Account';
import { ActionChainStep } from './ActionChain';
import { RunStatistics } from './Statistics';
import { TextPool } from './TextPool';

export type WorkerStatus = 'idle' | 'working' | 'error' | 'paused';

export type StatusCallback = (
  workerId: number,
  status: WorkerStatus,
  label?: string,
  statistics?: RunStatistics
) => void;

export interface WorkerState {
  workerId: number;
  status: WorkerStatus;
  label?: string;
  updatedAt: string;
}

export type AccountRunStatus = 'completed' | 'skipped_busy' | 'failed' | 'stopped';

export interface AccountRunResult {
  account: string;
  status: AccountRunStatus;
  error?: string;
  statistics: RunStatistics;
}

export interface AutomationRunConfig {
  accounts: Account[];
  targets: string[];
  actionChain: ActionChainStep[];
  texts: TextPool;
  workersCount: number;
}

export interface AutomationRunSummary {
  startedAt: string;
  finishedAt: string;
  stopped: boolean;
  accounts: AccountRunResult[];
  statistics: RunStatistics;
}
