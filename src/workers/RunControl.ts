import { DelayRange } from '../models/EngineConfig';
import { randomDelaySeconds } from '../utils/delay';
import { RandomSource, defaultRandom } from '../utils/random';

/**
 * Waits `ms` milliseconds, resolving early once `signal` aborts. Never rejects.
 */
export type Sleeper = (ms: number, signal: AbortSignal) => Promise<void>;

export const timerSleeper: Sleeper = (ms, signal) =>
  new Promise<void>((resolve) => {
    if (signal.aborted || ms <= 0) {
      resolve();
      return;
    }
    const done = (): void => {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener('abort', done, { once: true });
  });

export interface RunControlOptions {
  sleeper?: Sleeper;
  random?: RandomSource;
  pausePollMs?: number;
}

/**
 * Stop / pause token handed down from the coordinator to every orchestrator,
 * chain runner and action. Stop aborts every pending sleep at once; pause is
 * cooperative and only holds the loops at their next checkpoint.
 */
export class RunControl {
  private readonly abortController = new AbortController();
  private paused = false;
  private readonly sleeper: Sleeper;
  private readonly pausePollMs: number;
  readonly random: RandomSource;

  constructor(options: RunControlOptions = {}) {
    this.sleeper = options.sleeper ?? timerSleeper;
    this.random = options.random ?? defaultRandom;
    this.pausePollMs = options.pausePollMs ?? 250;
  }

  get signal(): AbortSignal {
    return this.abortController.signal;
  }

  get isStopped(): boolean {
    return this.abortController.signal.aborted;
  }

  get isPaused(): boolean {
    return this.paused;
  }

  stop(): void {
    this.paused = false;
    this.abortController.abort();
  }

  pause(): void {
    if (!this.isStopped) {
      this.paused = true;
    }
  }

  resume(): void {
    this.paused = false;
  }

  /**
   * Blocks while paused. Returns false when the run was stopped.
   */
  async checkpoint(): Promise<boolean> {
    while (this.paused && !this.isStopped) {
      await this.sleeper(this.pausePollMs, this.signal);
    }
    return !this.isStopped;
  }

  async sleep(ms: number): Promise<void> {
    if (this.isStopped) {
      return;
    }
    await this.sleeper(Math.max(0, Math.round(ms)), this.signal);
    await this.checkpoint();
  }

  async sleepSeconds(seconds: number): Promise<void> {
    await this.sleep(seconds * 1000);
  }

  /**
   * Random human-like pause drawn from a [min, max] seconds range
   */
  async pauseBetween(range: DelayRange): Promise<void> {
    await this.sleepSeconds(randomDelaySeconds(range, this.random));
  }
}
