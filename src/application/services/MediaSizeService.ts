import { ISizeLookup } from '../../domain';
import { ILogger, SilentLogger } from '../../shared';
import { SizeCache } from '../governor';

const BYTES_PER_MEGABYTE = 1024 * 1024;

/**
 * Size queries answered through the shared SizeCache
 */
export class MediaSizeService {
  constructor(
    private readonly cache: SizeCache<number>,
    private readonly channelLookup: ISizeLookup,
    private readonly logger: ILogger = new SilentLogger()
  ) {}

  static channelKey(channel: string): string {
    return `media_size_${channel}`;
  }

  /**
   * Total size in MB of the non-empty files in a channel's media directory
   */
  async getChannelMediaSize(channel: string, signal?: AbortSignal): Promise<number> {
    return this.cache.getOrLoad(MediaSizeService.channelKey(channel), async () => {
      const bytes = await this.channelLookup.lookup(channel, signal);
      const megabytes = bytes / BYTES_PER_MEGABYTE;
      this.logger.debug(`Channel ${channel}: ${megabytes.toFixed(2)} MB of media`);
      return megabytes;
    });
  }

  /**
   * Size in bytes of any remote object, cached under its own key
   */
  async getSize(key: string, lookup: ISizeLookup, signal?: AbortSignal): Promise<number> {
    return this.cache.getOrLoad(key, () => lookup.lookup(key, signal));
  }

  invalidate(channel: string): void {
    this.cache.delete(MediaSizeService.channelKey(channel));
  }
}
