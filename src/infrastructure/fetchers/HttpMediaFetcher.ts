import { Attachment } from '../../domain/entities/Attachment';
import { IMediaFetcher } from '../../domain/interfaces/IMediaFetcher';
import { IFileStorage } from '../../domain/interfaces/IFileStorage';
import { Logger } from '../../shared/logging/Logger';
import { HttpClient } from '../http/HttpClient';

/**
 * Streams an attachment's URL into storage. Resolves only after the file
 * is flushed, with the byte count found on disk.
 */
export class HttpMediaFetcher implements IMediaFetcher<Attachment> {
    constructor(
        private http: HttpClient,
        private storage: IFileStorage,
        private logger: Logger
    ) {}

    async fetch(attachment: Attachment, destinationPath: string, signal?: AbortSignal): Promise<number> {
        const response = await this.http.getStream(attachment.url, { signal });

        try {
            const bytes = await this.storage.save(destinationPath, response.data, {
                overwrite: true,
                createDirectories: true,
                signal
            });
            this.logger.debug(`Fetched message ${attachment.messageId} into ${destinationPath}`, { bytes });
            return bytes;
        } catch (error) {
            throw HttpClient.normalizeTransportError(error, attachment.url, signal);
        }
    }
}
