import { Attachment } from '../../domain';
import { DownloadMediaResponse, DownloadMediaUseCase } from '../use-cases/DownloadMediaUseCase';
import { DownloadProgress } from '../governor';

export interface DrainOptions {
  signal?: AbortSignal;
  onProgress?: (progress: DownloadProgress) => void;
}

/**
 * Collects a channel's attachments while messages are being exported and
 * downloads them together on `drain()`.
 *
 * `add` hands back the relative media path right away so the caller can
 * reference it before the file exists; `getDownloadedFile` only answers for
 * files that were verified on disk.
 */
export class MediaDownloadQueue {
  private readonly pending = new Map<number, Attachment>();
  private readonly downloaded = new Map<number, string>();

  constructor(
    private readonly useCase: DownloadMediaUseCase,
    readonly channel: string
  ) {}

  add(attachment: Attachment): string {
    if (!this.pending.has(attachment.messageId) && !this.downloaded.has(attachment.messageId)) {
      this.pending.set(attachment.messageId, attachment);
    }
    return attachment.getMediaPath();
  }

  get size(): number {
    return this.pending.size;
  }

  /**
   * Download everything queued so far. Attachments that fail stay out of
   * the downloaded set; the queue is emptied either way.
   */
  async drain(options: DrainOptions = {}): Promise<DownloadMediaResponse> {
    const attachments = Array.from(this.pending.values());
    this.pending.clear();

    const response = await this.useCase.execute({
      channel: this.channel,
      attachments,
      signal: options.signal,
      onProgress: options.onProgress
    });

    response.downloaded.forEach((mediaPath, messageId) => {
      this.downloaded.set(messageId, mediaPath);
    });

    return response;
  }

  getDownloadedFile(messageId: number): string | undefined {
    return this.downloaded.get(messageId);
  }
}
