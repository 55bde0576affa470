import * as path from 'path';
import {
  Attachment,
  DownloadResult,
  DownloadTask,
  Filename,
  IFileStorage,
  TaskOutcome,
  TaskState
} from '../../domain';
import { DownloadProgress, DownloadScheduler, StatsSnapshot, TaskSource } from '../governor';
import { CancelledError, ILogger, ValidationError } from '../../shared';

/**
 * Download media use case request
 */
export interface DownloadMediaRequest {
  channel: string;
  attachments: TaskSource<Attachment>;
  signal?: AbortSignal;
  /**
   * Delete destination files of tasks interrupted by cancellation.
   * Defaults to true; pass false to keep them for a later resumable check.
   */
  removePartialFiles?: boolean;
  onProgress?: (progress: DownloadProgress) => void;
}

/**
 * Download media use case response
 */
export interface DownloadMediaResponse {
  success: boolean;
  result: DownloadResult;
  /** messageId -> path relative to the channel directory, verified on disk */
  downloaded: Map<number, string>;
  stats: StatsSnapshot;
}

/**
 * Use case for downloading every attachment of a channel
 */
export class DownloadMediaUseCase {
  constructor(
    private readonly scheduler: DownloadScheduler<Attachment>,
    private readonly storage: IFileStorage,
    private readonly logger: ILogger
  ) {}

  async execute(request: DownloadMediaRequest): Promise<DownloadMediaResponse> {
    this.validateRequest(request);

    const startedAt = Date.now();
    const channelDir = Filename.forDirectory(request.channel).toString();
    await this.storage.createDirectory(path.posix.join(channelDir, Attachment.MEDIA_DIR));

    this.logger.info('Starting media download', { channel: request.channel });

    const messageIds = new Map<string, number>();
    const outcomes: TaskOutcome[] = [];
    const downloaded = new Map<number, string>();

    const tasks = this.toTasks(request.attachments, channelDir, messageIds);

    try {
      for await (const outcome of this.scheduler.submit(tasks, {
        signal: request.signal,
        onProgress: request.onProgress
      })) {
        outcomes.push(outcome);

        const messageId = messageIds.get(outcome.taskId);
        if (outcome.status === TaskState.SUCCEEDED && messageId !== undefined) {
          downloaded.set(messageId, path.posix.relative(channelDir, outcome.destinationPath));
        }
      }
    } catch (error) {
      if (error instanceof CancelledError && request.removePartialFiles !== false) {
        await this.removePartialFiles(error);
      }
      throw error;
    }

    const result = DownloadResult.fromOutcomes(outcomes, {
      duration: Date.now() - startedAt,
      channel: request.channel
    });
    const stats = this.scheduler.getStats();

    if (result.success) {
      this.logger.info('Download completed successfully', {
        files: result.files.length,
        totalSize: result.metadata.totalSize,
        duration: result.metadata.duration
      });
    } else {
      this.logger.warn('Download finished with failures', {
        files: result.files.length,
        failed: result.errors.length,
        successRate: Number(stats.successRate.toFixed(1)),
        floodWaits: stats.floodWaits
      });
    }

    return { success: result.success, result, downloaded, stats };
  }

  /**
   * Lazily turn attachments into tasks so the source is never buffered
   */
  private async *toTasks(
    attachments: TaskSource<Attachment>,
    channelDir: string,
    messageIds: Map<string, number>
  ): AsyncGenerator<DownloadTask<Attachment>> {
    for await (const attachment of attachments) {
      const taskId = `${channelDir}:${attachment.messageId}`;
      messageIds.set(taskId, attachment.messageId);
      yield new DownloadTask(
        taskId,
        attachment,
        path.posix.join(channelDir, attachment.getMediaPath())
      );
    }
  }

  private async removePartialFiles(error: CancelledError): Promise<void> {
    for (const filePath of error.destinationPaths) {
      await this.storage.delete(filePath);
      this.logger.debug(`Removed partial file ${filePath}`);
    }
  }

  private validateRequest(request: DownloadMediaRequest): void {
    if (!request.channel || request.channel.trim().length === 0) {
      throw new ValidationError('Channel name is required');
    }
  }
}
