import { IFileStorage, IMediaFetcher } from '../../domain';
import { ILogger, IncompleteDownloadError } from '../../shared';

/**
 * Wraps a fetch primitive so that a fetch only succeeds once a non-empty
 * file is on disk. A missing or empty file is raised as
 * IncompleteDownloadError, which the scheduler retries like any other
 * unknown failure; an empty leftover is removed first.
 */
export class VerifyingMediaFetcher<TRef = unknown> implements IMediaFetcher<TRef> {
  constructor(
    private readonly inner: IMediaFetcher<TRef>,
    private readonly storage: IFileStorage,
    private readonly logger: ILogger
  ) {}

  async fetch(mediaRef: TRef, destinationPath: string, signal?: AbortSignal): Promise<number> {
    const reported = await this.inner.fetch(mediaRef, destinationPath, signal);

    const size = (await this.storage.exists(destinationPath))
      ? (await this.storage.getMetadata(destinationPath)).size
      : 0;

    if (size > 0) {
      return size;
    }

    this.logger.warn(`Downloaded file is missing or empty: ${destinationPath}`, { reported });
    await this.storage.delete(destinationPath);
    throw new IncompleteDownloadError(destinationPath);
  }
}
