import * as path from 'path';
import { Attachment } from '../../domain/entities/Attachment';
import { IFileStorage } from '../../domain/interfaces/IFileStorage';
import { ISizeLookup } from '../../domain/interfaces/IMediaFetcher';
import { Filename } from '../../domain/value-objects/Filename';
import { Logger } from '../../shared/logging/Logger';

/**
 * Bytes held by the non-empty files directly under `<channel>/media`
 */
export class ChannelMediaSizeLookup implements ISizeLookup {
    constructor(
        private storage: IFileStorage,
        private logger: Logger
    ) {}

    async lookup(channel: string): Promise<number> {
        const mediaDir = path.posix.join(Filename.forDirectory(channel).toString(), Attachment.MEDIA_DIR);

        if (!await this.storage.exists(mediaDir)) {
            return 0;
        }

        const files = (await this.storage.list(mediaDir)).filter(file => file.size > 0);
        const total = files.reduce((sum, file) => sum + file.size, 0);

        this.logger.debug(`Channel ${channel}: ${files.length} media files, ${total} bytes`);
        return total;
    }
}
