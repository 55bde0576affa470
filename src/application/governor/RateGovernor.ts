import { GovernorConfig } from './GovernorConfig';
import { Clock, systemClock } from '../../shared/utils/clock';
import { ILogger, SilentLogger } from '../../shared/logging/Logger';

/**
 * Adaptive parameters shared by every dispatch of one downloader
 */
export interface GovernorState {
  currentWorkers: number;
  /** seconds */
  adaptiveDelay: number;
  consecutiveSuccesses: number;
  /** epoch milliseconds, null until the first throttle */
  lastThrottleTimestamp: number | null;
}

export type GovernorBounds = Pick<
  GovernorConfig,
  'maxWorkers' | 'initialWorkers' | 'minDelay' | 'maxDelay' | 'initialDelay'
>;

export interface RateGovernorOptions {
  clock?: Clock;
  random?: () => number;
  logger?: ILogger;
}

/**
 * Multiplicative backoff on throttle, slow relaxation on a stable success
 * streak.
 *
 * The adjustment rules are not reentrant-safe by themselves; the scheduler
 * calls them from its completion step only.
 */
export class RateGovernor {
  static readonly STABILITY_WINDOW_MS = 120_000;
  static readonly RELAX_AFTER_SUCCESSES = 15;
  static readonly SCALE_UP_EVERY = 20;
  static readonly RELAX_FACTOR = 0.95;
  static readonly JITTER_MIN = 0.8;
  static readonly JITTER_MAX = 1.2;

  private readonly state: GovernorState;
  private readonly clock: Clock;
  private readonly random: () => number;
  private readonly logger: ILogger;

  constructor(private readonly bounds: GovernorBounds, options: RateGovernorOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.random = options.random ?? Math.random;
    this.logger = options.logger ?? new SilentLogger();
    this.state = {
      currentWorkers: bounds.initialWorkers,
      adaptiveDelay: bounds.initialDelay,
      consecutiveSuccesses: 0,
      lastThrottleTimestamp: null
    };
  }

  /**
   * Severity-scaled multiplier for a remote-imposed wait
   */
  static throttleMultiplier(waitSeconds: number): number {
    if (waitSeconds > 10) {
      return 2.0;
    }
    if (waitSeconds > 5) {
      return 1.8;
    }
    return 1.5;
  }

  onThrottle(waitSeconds: number): void {
    const multiplier = RateGovernor.throttleMultiplier(waitSeconds);
    const previousDelay = this.state.adaptiveDelay;
    const previousWorkers = this.state.currentWorkers;

    this.state.adaptiveDelay = Math.min(this.bounds.maxDelay, previousDelay * multiplier);
    this.state.currentWorkers = Math.max(1, previousWorkers - 1);
    this.state.consecutiveSuccesses = 0;
    this.state.lastThrottleTimestamp = this.clock();

    this.logger.warn(`Throttled for ${waitSeconds}s, backing off`, {
      multiplier,
      delay: `${previousDelay.toFixed(3)}s -> ${this.state.adaptiveDelay.toFixed(3)}s`,
      workers: `${previousWorkers} -> ${this.state.currentWorkers}`
    });
  }

  onSuccess(): void {
    this.state.consecutiveSuccesses += 1;

    if (!this.isStable() || this.state.consecutiveSuccesses < RateGovernor.RELAX_AFTER_SUCCESSES) {
      return;
    }

    this.state.adaptiveDelay = Math.max(
      this.bounds.minDelay,
      this.state.adaptiveDelay * RateGovernor.RELAX_FACTOR
    );

    if (this.state.consecutiveSuccesses % RateGovernor.SCALE_UP_EVERY === 0) {
      const previousWorkers = this.state.currentWorkers;
      this.state.currentWorkers = Math.min(this.bounds.maxWorkers, previousWorkers + 1);
      if (this.state.currentWorkers !== previousWorkers) {
        this.logger.debug(`Scaling up to ${this.state.currentWorkers} workers`, {
          consecutiveSuccesses: this.state.consecutiveSuccesses,
          delay: this.state.adaptiveDelay
        });
      }
    }
  }

  /**
   * Non-throttle failure: the success streak is broken, nothing else moves
   */
  onFailure(): void {
    this.state.consecutiveSuccesses = 0;
  }

  /**
   * Jittered pre-dispatch delay in seconds
   */
  nextDelay(): number {
    const jitter =
      RateGovernor.JITTER_MIN + (RateGovernor.JITTER_MAX - RateGovernor.JITTER_MIN) * this.random();
    return this.state.adaptiveDelay * jitter;
  }

  get currentWorkers(): number {
    return this.state.currentWorkers;
  }

  get adaptiveDelay(): number {
    return this.state.adaptiveDelay;
  }

  getState(): Readonly<GovernorState> {
    return { ...this.state };
  }

  private isStable(): boolean {
    const last = this.state.lastThrottleTimestamp;
    return last === null || this.clock() - last > RateGovernor.STABILITY_WINDOW_MS;
  }
}
