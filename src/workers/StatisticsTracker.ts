import { ErrorKind, ErrorRecord, RunStatistics, TargetStatistics } from '../models/Statistics';

export function emptyRunStatistics(): RunStatistics {
  return {
    totalActions: 0,
    successfulActions: 0,
    failedActions: 0,
    accountsProcessed: 0,
    currentAccount: null,
    currentTarget: null,
    startTime: null,
    errors: [],
    targets: [],
  };
}

/**
 * Run counters. Every mutation is synchronous; callers only ever see
 * deep-copied snapshots. A tracker created with a parent forwards each
 * mutation to it, so an account-level view and the pool-wide view stay
 * consistent without a second bookkeeping pass.
 */
export class StatisticsTracker {
  private stats: RunStatistics = emptyRunStatistics();

  constructor(private readonly parent?: StatisticsTracker) {}

  reset(startTime: Date = new Date()): void {
    this.stats = emptyRunStatistics();
    this.stats.startTime = startTime.toISOString();
  }

  recordAction(success: boolean): void {
    this.stats.totalActions++;
    if (success) {
      this.stats.successfulActions++;
    } else {
      this.stats.failedActions++;
    }
    this.parent?.recordAction(success);
  }

  recordError(kind: ErrorKind, account: string, message: string, target?: string): ErrorRecord {
    const record: ErrorRecord = {
      kind,
      account,
      message,
      timestamp: new Date().toISOString(),
    };
    if (target !== undefined) {
      record.target = target;
    }
    this.stats.errors.push(record);
    this.parent?.recordError(kind, account, message, target);
    return { ...record };
  }

  recordTarget(entry: TargetStatistics): void {
    this.stats.targets.push(cloneTarget(entry));
    this.parent?.recordTarget(entry);
  }

  recordAccountProcessed(): void {
    this.stats.accountsProcessed++;
    this.parent?.recordAccountProcessed();
  }

  setCurrent(account: string | null, target: string | null = null): void {
    this.stats.currentAccount = account;
    this.stats.currentTarget = target;
    this.parent?.setCurrent(account, target);
  }

  snapshot(): RunStatistics {
    return {
      ...this.stats,
      errors: this.stats.errors.map((error) => ({ ...error })),
      targets: this.stats.targets.map(cloneTarget),
    };
  }
}

function cloneTarget(entry: TargetStatistics): TargetStatistics {
  return {
    ...entry,
    actionsPerformed: [...entry.actionsPerformed],
    profileStatus: entry.profileStatus ? { ...entry.profileStatus } : undefined,
  };
}

/** Percentage of successful actions, 0 when nothing ran */
export function successRate(successful: number, total: number): number {
  return total > 0 ? (successful / total) * 100 : 0;
}
