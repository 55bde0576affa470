/**
 * Lifecycle of a single download task.
 *
 * PENDING -> IN_FLIGHT -> SUCCEEDED | RETRYABLE | PERMANENT
 * RETRYABLE goes back to PENDING until the attempt cap, then EXHAUSTED.
 */
export enum TaskState {
  PENDING = 'PENDING',
  IN_FLIGHT = 'IN_FLIGHT',
  SUCCEEDED = 'SUCCEEDED',
  RETRYABLE = 'RETRYABLE',
  PERMANENT = 'PERMANENT',
  EXHAUSTED = 'EXHAUSTED',
  CANCELLED = 'CANCELLED'
}

/**
 * Status carried by a task outcome
 */
export type OutcomeStatus =
  | TaskState.SUCCEEDED
  | TaskState.RETRYABLE
  | TaskState.PERMANENT
  | TaskState.EXHAUSTED;

export enum ErrorKind {
  FLOOD_WAIT = 'FLOOD_WAIT',
  NETWORK = 'NETWORK',
  PERMISSION = 'PERMISSION',
  UNKNOWN = 'UNKNOWN'
}

/**
 * Verdict of the error classifier
 */
export type ClassifiedError =
  | { kind: ErrorKind.FLOOD_WAIT; waitSeconds: number; message: string }
  | { kind: ErrorKind.NETWORK; message: string }
  | { kind: ErrorKind.PERMISSION; message: string }
  | { kind: ErrorKind.UNKNOWN; message: string };

/**
 * Descriptor of one attachment fetch. Everything but the attempt counter
 * and the state is fixed at creation.
 */
export class DownloadTask<TRef = unknown> {
  private attemptCount = 0;
  private currentState: TaskState = TaskState.PENDING;

  constructor(
    public readonly taskId: string,
    public readonly mediaRef: TRef,
    public readonly destinationPath: string
  ) {}

  get attempts(): number {
    return this.attemptCount;
  }

  get state(): TaskState {
    return this.currentState;
  }

  /**
   * Moves the task in flight and counts the attempt
   */
  begin(): number {
    this.currentState = TaskState.IN_FLIGHT;
    this.attemptCount += 1;
    return this.attemptCount;
  }

  transition(state: TaskState): void {
    this.currentState = state;
  }
}

/**
 * Result of one attempt at a task, reported after its batch settles
 */
export interface TaskOutcome {
  taskId: string;
  status: OutcomeStatus;
  attempts: number;
  destinationPath: string;
  bytesWritten: number;
  /** milliseconds spent in the fetch primitive */
  elapsed: number;
  classifiedError?: ClassifiedError;
}
