import { ErrorKind, TaskOutcome, TaskState } from './DownloadTask';

/**
 * Outcome of a whole download run over one channel's attachments
 */
export class DownloadResult {
  private constructor(
    public readonly success: boolean,
    public readonly files: DownloadedFile[],
    public readonly errors: DownloadError[],
    public readonly metadata: DownloadMetadata
  ) {}

  /**
   * Fold terminal task outcomes into a result. A run with no tasks counts
   * as a success.
   */
  static fromOutcomes(
    outcomes: TaskOutcome[],
    metadata: Partial<DownloadMetadata> = {}
  ): DownloadResult {
    const files: DownloadedFile[] = [];
    const errors: DownloadError[] = [];

    for (const outcome of outcomes) {
      if (outcome.status === TaskState.SUCCEEDED) {
        files.push({
          taskId: outcome.taskId,
          localPath: outcome.destinationPath,
          size: outcome.bytesWritten,
          attempts: outcome.attempts
        });
      } else {
        errors.push({
          taskId: outcome.taskId,
          status: outcome.status,
          kind: outcome.classifiedError?.kind ?? ErrorKind.UNKNOWN,
          message: outcome.classifiedError?.message ?? 'Download failed',
          attempts: outcome.attempts
        });
      }
    }

    return new DownloadResult(errors.length === 0, files, errors, {
      totalFiles: files.length,
      totalSize: files.reduce((sum, file) => sum + file.size, 0),
      duration: 0,
      ...metadata
    });
  }

  isPartialSuccess(): boolean {
    return this.files.length > 0 && this.errors.length > 0;
  }

  /**
   * Success rate as a percentage of tasks that reached a terminal status
   */
  getSuccessRate(): number {
    const total = this.files.length + this.errors.length;
    return total > 0 ? (this.files.length / total) * 100 : 0;
  }
}

export interface DownloadedFile {
  taskId: string;
  localPath: string;
  size: number; // in bytes
  attempts: number;
}

export interface DownloadError {
  taskId: string;
  status: TaskState;
  kind: ErrorKind;
  message: string;
  attempts: number;
}

export interface DownloadMetadata {
  totalFiles: number;
  totalSize: number; // in bytes
  duration: number; // in milliseconds
  channel?: string;
}
