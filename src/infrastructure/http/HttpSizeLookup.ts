import { ISizeLookup } from '../../domain/interfaces/IMediaFetcher';
import { AppError } from '../../shared/errors/AppError';
import { HttpClient } from './HttpClient';

/**
 * Remote object size from the content-length of a HEAD request
 */
export class HttpSizeLookup implements ISizeLookup {
    constructor(private http: HttpClient) {}

    async lookup(url: string, signal?: AbortSignal): Promise<number> {
        const response = await this.http.head(url, { signal });
        const header = response.headers['content-length'];
        const size = header === undefined ? NaN : Number(header);

        if (!Number.isInteger(size) || size < 0) {
            throw new AppError(`No usable content-length for ${url}`, 'SIZE_UNKNOWN', 502, true, {
                url,
                contentLength: header
            });
        }

        return size;
    }
}
