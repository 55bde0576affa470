import { GovernorState } from './RateGovernor';
import { Clock, systemClock } from '../../shared/utils/clock';

export interface StatsCounters {
  totalAttempts: number;
  successfulDownloads: number;
  floodWaits: number;
  failedAttempts: number;
  bytesDownloaded: number;
}

/**
 * Read-only view handed to status displays and logs
 */
export interface StatsSnapshot extends StatsCounters {
  successRate: number;
  floodWaitRate: number;
  downloadsPerMinute: number;
  /** successful files per second */
  averageSpeed: number;
  elapsedSeconds: number;
  currentWorkers: number;
  adaptiveDelay: number;
  consecutiveSuccesses: number;
}

function emptyCounters(): StatsCounters {
  return {
    totalAttempts: 0,
    successfulDownloads: 0,
    floodWaits: 0,
    failedAttempts: 0,
    bytesDownloaded: 0
  };
}

/**
 * Counters owned by one submit() call. Folded into the collector's lifetime
 * totals once, when that call finishes.
 */
export class DownloadSession {
  readonly counters: StatsCounters = emptyCounters();
  private committed = false;

  constructor(public readonly startedAt: number) {}

  recordAttempt(): void {
    this.counters.totalAttempts += 1;
  }

  recordSuccess(bytes: number): void {
    this.counters.successfulDownloads += 1;
    this.counters.bytesDownloaded += bytes;
  }

  recordFailure(): void {
    this.counters.failedAttempts += 1;
  }

  recordFloodWait(): void {
    this.counters.floodWaits += 1;
    this.counters.failedAttempts += 1;
  }

  get isCommitted(): boolean {
    return this.committed;
  }

  /** @internal used by StatsCollector.commit */
  markCommitted(): void {
    this.committed = true;
  }
}

export class StatsCollector {
  private readonly lifetime: StatsCounters = emptyCounters();
  private readonly openSessions = new Set<DownloadSession>();
  private readonly startedAt: number;

  constructor(private readonly clock: Clock = systemClock) {
    this.startedAt = clock();
  }

  openSession(): DownloadSession {
    const session = new DownloadSession(this.clock());
    this.openSessions.add(session);
    return session;
  }

  /**
   * Merge a finished session into the lifetime totals. Returns false when
   * the session was already merged.
   */
  commit(session: DownloadSession): boolean {
    if (session.isCommitted) {
      return false;
    }
    addInto(this.lifetime, session.counters);
    session.markCommitted();
    this.openSessions.delete(session);
    return true;
  }

  /**
   * Lifetime totals plus whatever open sessions have accumulated so far
   */
  totals(): StatsCounters {
    const totals = { ...this.lifetime };
    this.openSessions.forEach(session => addInto(totals, session.counters));
    return totals;
  }

  snapshot(governor: Readonly<GovernorState>): StatsSnapshot {
    const totals = this.totals();
    const elapsedSeconds = Math.max(0, (this.clock() - this.startedAt) / 1000);
    const minutesElapsed = elapsedSeconds / 60;

    return {
      ...totals,
      successRate: percentage(totals.successfulDownloads, totals.totalAttempts),
      floodWaitRate: percentage(totals.floodWaits, totals.totalAttempts),
      downloadsPerMinute: minutesElapsed > 0 ? totals.successfulDownloads / minutesElapsed : 0,
      averageSpeed: elapsedSeconds > 0 ? totals.successfulDownloads / elapsedSeconds : 0,
      elapsedSeconds,
      currentWorkers: governor.currentWorkers,
      adaptiveDelay: governor.adaptiveDelay,
      consecutiveSuccesses: governor.consecutiveSuccesses
    };
  }
}

function percentage(part: number, total: number): number {
  return total === 0 ? 0 : (part / total) * 100;
}

function addInto(target: StatsCounters, source: StatsCounters): void {
  target.totalAttempts += source.totalAttempts;
  target.successfulDownloads += source.successfulDownloads;
  target.floodWaits += source.floodWaits;
  target.failedAttempts += source.failedAttempts;
  target.bytesDownloaded += source.bytesDownloaded;
}
