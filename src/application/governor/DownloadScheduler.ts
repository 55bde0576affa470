import pLimit from 'p-limit';
import {
  ClassifiedError,
  DownloadTask,
  ErrorKind,
  TaskOutcome,
  TaskState
} from '../../domain/entities/DownloadTask';
import { IMediaFetcher } from '../../domain/interfaces/IMediaFetcher';
import { CancelledError } from '../../shared/errors/AppError';
import { ILogger, SilentLogger } from '../../shared/logging/Logger';
import { Clock, systemClock } from '../../shared/utils/clock';
import { Sleeper, sleep as defaultSleep, uniform } from '../../shared/utils/sleep';
import { classifyError } from './ErrorClassifier';
import { Batcher, PendingQueue, TaskSource } from './Batcher';
import { GovernorConfig, resolveGovernorConfig } from './GovernorConfig';
import { RateGovernor } from './RateGovernor';
import { DownloadSession, StatsCollector, StatsSnapshot } from './StatsCollector';

export interface DownloadSchedulerOptions<TRef> {
  fetcher: IMediaFetcher<TRef>;
  config?: Partial<GovernorConfig>;
  logger?: ILogger;
  clock?: Clock;
  random?: () => number;
  sleep?: Sleeper;
}

export interface SubmitOptions {
  signal?: AbortSignal;
  onProgress?: (progress: DownloadProgress) => void;
}

/**
 * Reported after every batch barrier
 */
export interface DownloadProgress {
  completed: number;
  failed: number;
  /** tasks buffered for the next batch, retries included */
  remaining: number;
  filesPerSecond: number;
  megabytesPerSecond: number;
}

export interface BatchReport<TRef> {
  /** every outcome of this batch, retryable ones included */
  outcomes: TaskOutcome[];
  retry: DownloadTask<TRef>[];
  /** dispatched tasks interrupted mid-fetch or during their backoff */
  cancelled: DownloadTask<TRef>[];
  /** tasks the stop signal reached before they were dispatched */
  skipped: DownloadTask<TRef>[];
}

type AttemptResult =
  | { ok: true; bytes: number; elapsed: number }
  | { ok: false; error: unknown; elapsed: number };

/**
 * Runs download tasks batch by batch under the rate governor.
 *
 * Within a batch at most `currentWorkers` fetches are in flight; the next
 * batch is formed only after every task of the current one has settled, so
 * its parameters reflect the full feedback of the previous batch. Governor
 * and stats are mutated only from the completion step, never by the fetch
 * itself.
 */
export class DownloadScheduler<TRef = unknown> {
  static readonly MAX_FLOOD_WAIT_SECONDS = 300;
  static readonly NETWORK_BACKOFF_SECONDS = { min: 3, max: 8 } as const;

  readonly config: GovernorConfig;
  readonly governor: RateGovernor;
  readonly stats: StatsCollector;

  private readonly fetcher: IMediaFetcher<TRef>;
  private readonly batcher = new Batcher();
  private readonly logger: ILogger;
  private readonly clock: Clock;
  private readonly random: () => number;
  private readonly sleep: Sleeper;

  constructor(options: DownloadSchedulerOptions<TRef>) {
    this.config = resolveGovernorConfig(options.config);
    this.fetcher = options.fetcher;
    this.logger = options.logger ?? new SilentLogger();
    this.clock = options.clock ?? systemClock;
    this.random = options.random ?? Math.random;
    this.sleep = options.sleep ?? defaultSleep;

    this.governor = new RateGovernor(this.config, {
      clock: this.clock,
      random: this.random,
      logger: this.logger
    });
    this.stats = new StatsCollector(this.clock);
  }

  /**
   * Download every task of `tasks`, yielding one terminal outcome per task
   * (SUCCEEDED, PERMANENT or EXHAUSTED) as each batch settles.
   *
   * Throws CancelledError once `signal` aborts; its details list only the
   * dispatched tasks that were interrupted, whose destination files must not
   * be trusted. Tasks never dispatched in this run are left out so that
   * files from earlier runs stay untouched.
   */
  async *submit(
    tasks: TaskSource<DownloadTask<TRef>>,
    options: SubmitOptions = {}
  ): AsyncGenerator<TaskOutcome, void, undefined> {
    const { signal, onProgress } = options;
    const queue = new PendingQueue(tasks);
    const session = this.stats.openSession();
    let completed = 0;
    let failed = 0;
    let batchNumber = 0;

    try {
      while (!signal?.aborted) {
        const batch = await this.batcher.nextBatch(queue, this.governor.currentWorkers);
        if (batch.length === 0) {
          break;
        }

        batchNumber += 1;
        const report = await this.runBatch(batch, session, signal);
        report.retry.forEach(task => queue.requeue(task));

        const terminal = report.outcomes.filter(outcome => outcome.status !== TaskState.RETRYABLE);
        for (const outcome of terminal) {
          if (outcome.status === TaskState.SUCCEEDED) {
            completed += 1;
          } else {
            failed += 1;
          }
        }

        this.logger.info(`Batch ${batchNumber} settled`, {
          size: batch.length,
          succeeded: terminal.filter(outcome => outcome.status === TaskState.SUCCEEDED).length,
          retrying: report.retry.length,
          workers: this.governor.currentWorkers,
          delay: Number(this.governor.adaptiveDelay.toFixed(3))
        });

        onProgress?.(this.progress(session, completed, failed, queue.buffered));

        for (const outcome of terminal) {
          yield outcome;
        }

        if (report.cancelled.length > 0 || report.skipped.length > 0 || signal?.aborted) {
          throw this.cancellation(report.cancelled);
        }
      }

      if (signal?.aborted) {
        throw this.cancellation([]);
      }
    } finally {
      await queue.close();
      this.stats.commit(session);
    }
  }

  /**
   * Drive one batch to its barrier
   */
  async runBatch(
    batch: DownloadTask<TRef>[],
    session: DownloadSession,
    signal?: AbortSignal
  ): Promise<BatchReport<TRef>> {
    const report: BatchReport<TRef> = { outcomes: [], retry: [], cancelled: [], skipped: [] };
    const limit = pLimit(this.governor.currentWorkers);
    const launched: Promise<void>[] = [];

    for (const task of batch) {
      try {
        await this.sleep(this.governor.nextDelay() * 1000, signal);
      } catch (error) {
        if (!(error instanceof CancelledError)) {
          throw error;
        }
        task.transition(TaskState.CANCELLED);
        report.skipped.push(task);
        continue;
      }

      launched.push(
        limit(async () => {
          const result = await this.attempt(task, session, signal);
          await this.complete(task, result, session, report, signal);
        })
      );
    }

    const settled = await Promise.allSettled(launched);
    settled.forEach(result => {
      if (result.status === 'rejected') {
        this.logger.error('Download worker failed unexpectedly', result.reason);
      }
    });

    return report;
  }

  getStats(): StatsSnapshot {
    return this.stats.snapshot(this.governor.getState());
  }

  /**
   * Fetch stage: touches nothing shared but the session's attempt counter
   */
  private async attempt(
    task: DownloadTask<TRef>,
    session: DownloadSession,
    signal?: AbortSignal
  ): Promise<AttemptResult> {
    task.begin();
    session.recordAttempt();
    const startedAt = this.clock();

    try {
      const bytes = await this.fetcher.fetch(task.mediaRef, task.destinationPath, signal);
      return { ok: true, bytes, elapsed: this.clock() - startedAt };
    } catch (error) {
      return { ok: false, error, elapsed: this.clock() - startedAt };
    }
  }

  /**
   * Completion step: the only place governor state changes
   */
  private async complete(
    task: DownloadTask<TRef>,
    result: AttemptResult,
    session: DownloadSession,
    report: BatchReport<TRef>,
    signal?: AbortSignal
  ): Promise<void> {
    if (signal?.aborted) {
      task.transition(TaskState.CANCELLED);
      report.cancelled.push(task);
      return;
    }

    if (result.ok && result.bytes > 0) {
      task.transition(TaskState.SUCCEEDED);
      this.governor.onSuccess();
      session.recordSuccess(result.bytes);
      report.outcomes.push(this.outcome(task, TaskState.SUCCEEDED, result.bytes, result.elapsed));
      return;
    }

    const verdict: ClassifiedError = result.ok
      ? { kind: ErrorKind.UNKNOWN, message: `Fetch wrote no bytes to ${task.destinationPath}` }
      : classifyError(result.error);

    let backoffSeconds = 0;
    switch (verdict.kind) {
      case ErrorKind.FLOOD_WAIT:
        session.recordFloodWait();
        this.governor.onThrottle(verdict.waitSeconds);
        backoffSeconds = Math.min(verdict.waitSeconds, DownloadScheduler.MAX_FLOOD_WAIT_SECONDS);
        break;
      case ErrorKind.NETWORK:
        session.recordFailure();
        this.governor.onFailure();
        backoffSeconds = uniform(
          DownloadScheduler.NETWORK_BACKOFF_SECONDS.min,
          DownloadScheduler.NETWORK_BACKOFF_SECONDS.max,
          this.random
        );
        break;
      case ErrorKind.PERMISSION:
        session.recordFailure();
        this.governor.onFailure();
        task.transition(TaskState.PERMANENT);
        this.logger.warn(`Task ${task.taskId} denied, not retrying`, { reason: verdict.message });
        report.outcomes.push(this.outcome(task, TaskState.PERMANENT, 0, result.elapsed, verdict));
        return;
      case ErrorKind.UNKNOWN:
        session.recordFailure();
        this.governor.onFailure();
        break;
    }

    if (backoffSeconds > 0) {
      try {
        await this.sleep(backoffSeconds * 1000, signal);
      } catch (error) {
        if (!(error instanceof CancelledError)) {
          throw error;
        }
        task.transition(TaskState.CANCELLED);
        report.cancelled.push(task);
        return;
      }
    }

    if (task.attempts >= this.config.maxRetries) {
      task.transition(TaskState.EXHAUSTED);
      this.logger.warn(`Task ${task.taskId} exhausted after ${task.attempts} attempts`, {
        kind: verdict.kind,
        reason: verdict.message
      });
      report.outcomes.push(this.outcome(task, TaskState.EXHAUSTED, 0, result.elapsed, verdict));
      return;
    }

    task.transition(TaskState.RETRYABLE);
    this.logger.debug(`Task ${task.taskId} will be retried`, {
      attempt: task.attempts,
      kind: verdict.kind
    });
    report.outcomes.push(this.outcome(task, TaskState.RETRYABLE, 0, result.elapsed, verdict));
    report.retry.push(task);
  }

  private outcome(
    task: DownloadTask<TRef>,
    status: TaskOutcome['status'],
    bytesWritten: number,
    elapsed: number,
    classifiedError?: ClassifiedError
  ): TaskOutcome {
    return {
      taskId: task.taskId,
      status,
      attempts: task.attempts,
      destinationPath: task.destinationPath,
      bytesWritten,
      elapsed,
      ...(classifiedError && { classifiedError })
    };
  }

  private progress(
    session: DownloadSession,
    completed: number,
    failed: number,
    remaining: number
  ): DownloadProgress {
    const seconds = (this.clock() - session.startedAt) / 1000;
    const megabytes = session.counters.bytesDownloaded / (1024 * 1024);
    return {
      completed,
      failed,
      remaining,
      filesPerSecond: seconds > 0 ? completed / seconds : 0,
      megabytesPerSecond: seconds > 0 ? megabytes / seconds : 0
    };
  }

  private cancellation(tasks: DownloadTask<TRef>[]): CancelledError {
    return new CancelledError(
      'Download run was cancelled',
      tasks.map(task => task.taskId),
      tasks.map(task => task.destinationPath)
    );
  }
}
