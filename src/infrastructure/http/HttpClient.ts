import nodeFetch, { FetchError, Response } from 'node-fetch';
import { pipeline, Transform } from 'stream';
import { Logger } from '../../shared/logging/Logger';
import {
    AppError,
    CancelledError,
    FloodWaitError,
    NetworkError,
    PermissionError,
    TimeoutError
} from '../../shared/errors/AppError';

export interface HttpClientConfig {
    baseUrl?: string;
    /**
     * milliseconds until response headers must have arrived, and the longest
     * a streamed body may go without delivering data
     */
    timeout?: number;
    headers?: Record<string, string>;
    /** wait used for a 429 that carries no usable Retry-After */
    defaultRetryAfter?: number;
}

export interface RequestOptions {
    params?: Record<string, string>;
    headers?: Record<string, string>;
    timeout?: number;
    signal?: AbortSignal;
}

export interface HttpResponse<T> {
    data: T;
    status: number;
    statusText: string;
    headers: Record<string, string>;
}

/**
 * Thin node-fetch wrapper that turns HTTP and socket failures into the
 * application's error types. It never retries; callers own that policy.
 */
export class HttpClient {
    private config: Required<HttpClientConfig>;

    constructor(
        private logger: Logger,
        config: HttpClientConfig = {}
    ) {
        this.config = {
            baseUrl: '',
            timeout: 30000,
            headers: {},
            defaultRetryAfter: 5,
            ...config
        };
    }

    /**
     * GET whose body is handed over unread. The caller's signal keeps
     * governing the body until it ends; a body that delivers nothing for
     * `timeout` milliseconds fails with TimeoutError.
     */
    async getStream(url: string, options: RequestOptions = {}): Promise<HttpResponse<NodeJS.ReadableStream>> {
        const { response, release } = await this.request('GET', url, options);
        const idleTimeout = options.timeout ?? this.config.timeout;
        const fullUrl = this.buildUrl(url, options.params);

        let idleTimer: NodeJS.Timeout | undefined;
        const watched = new Transform({
            transform(chunk, _encoding, callback) {
                arm();
                callback(null, chunk);
            }
        });
        const arm = () => {
            clearTimeout(idleTimer);
            idleTimer = setTimeout(() => {
                watched.destroy(new TimeoutError(`GET ${fullUrl} body`, idleTimeout));
            }, idleTimeout);
            idleTimer.unref();
        };

        arm();
        pipeline(response.body, watched, error => {
            clearTimeout(idleTimer);
            release();
            if (error) {
                this.logger.debug(`Body of ${fullUrl} ended early`, { reason: error.message });
            }
        });

        return this.toHttpResponse(response, watched);
    }

    async head(url: string, options: RequestOptions = {}): Promise<HttpResponse<void>> {
        const { response, release } = await this.request('HEAD', url, options);
        release();
        return this.toHttpResponse(response, undefined);
    }

    /**
     * Map a failure raised while talking to `url` onto the error taxonomy
     */
    static normalizeTransportError(error: unknown, url: string, signal?: AbortSignal): unknown {
        if (error instanceof AppError) {
            return error;
        }
        if (signal?.aborted) {
            return new CancelledError(`Request to ${url} was cancelled`);
        }
        if (error instanceof FetchError && error.type === 'system') {
            return new NetworkError(`Network error while fetching ${url}: ${error.message}`, {
                code: error.code
            });
        }
        return error;
    }

    /**
     * Seconds to wait according to a Retry-After header, which holds either
     * a delay in seconds or an HTTP date
     */
    static parseRetryAfter(value: string | null, now: number = Date.now()): number | undefined {
        if (value === null || value.trim() === '') {
            return undefined;
        }
        const trimmed = value.trim();
        if (/^\d+$/.test(trimmed)) {
            return Number(trimmed);
        }
        const date = Date.parse(trimmed);
        if (Number.isNaN(date)) {
            return undefined;
        }
        return Math.max(0, Math.ceil((date - now) / 1000));
    }

    private async request(
        method: 'GET' | 'HEAD',
        url: string,
        options: RequestOptions
    ): Promise<{ response: Response; release: () => void }> {
        const fullUrl = this.buildUrl(url, options.params);
        const timeout = options.timeout ?? this.config.timeout;
        const callerSignal = options.signal;

        if (callerSignal?.aborted) {
            throw new CancelledError(`Request to ${fullUrl} was cancelled`);
        }

        const controller = new AbortController();
        const onAbort = () => controller.abort();
        callerSignal?.addEventListener('abort', onAbort, { once: true });
        const release = () => callerSignal?.removeEventListener('abort', onAbort);

        let timedOut = false;
        const timeoutId = setTimeout(() => {
            timedOut = true;
            controller.abort();
        }, timeout);

        let response: Response;
        try {
            this.logger.debug(`HTTP ${method} ${fullUrl}`);
            response = await nodeFetch(fullUrl, {
                method,
                headers: {
                    ...this.config.headers,
                    ...options.headers
                },
                signal: controller.signal
            });
        } catch (error) {
            release();
            if (timedOut) {
                throw new TimeoutError(`${method} ${fullUrl}`, timeout);
            }
            throw HttpClient.normalizeTransportError(error, fullUrl, callerSignal);
        } finally {
            clearTimeout(timeoutId);
        }

        if (!response.ok) {
            release();
            throw this.statusError(response, fullUrl);
        }

        return { response, release };
    }

    private statusError(response: Response, url: string): AppError {
        const { status, statusText } = response;

        if (status === 429) {
            const seconds =
                HttpClient.parseRetryAfter(response.headers.get('retry-after')) ??
                this.config.defaultRetryAfter;
            this.logger.warn(`Rate limited by ${url}`, { seconds });
            return new FloodWaitError(seconds, `Rate limited by ${url}, retry after ${seconds}s`);
        }

        if (status === 401 || status === 403) {
            return new PermissionError(`Access denied to ${url}: HTTP ${status} ${statusText}`, { status });
        }

        if (status >= 500) {
            return new NetworkError(`Server error from ${url}: HTTP ${status} ${statusText}`, { status });
        }

        return new AppError(`HTTP ${status} ${statusText} for ${url}`, 'HTTP_ERROR', status, true, { url });
    }

    private toHttpResponse<T>(response: Response, data: T): HttpResponse<T> {
        const headers: Record<string, string> = {};
        response.headers.forEach((value, key) => {
            headers[key] = value;
        });

        return {
            data,
            status: response.status,
            statusText: response.statusText,
            headers
        };
    }

    private buildUrl(url: string, params?: Record<string, string>): string {
        const fullUrl = /^https?:\/\//.test(url)
            ? url
            : `${this.config.baseUrl}${url}`;

        if (!params || Object.keys(params).length === 0) {
            return fullUrl;
        }

        const urlObj = new URL(fullUrl);
        Object.entries(params).forEach(([key, value]) => {
            urlObj.searchParams.append(key, value);
        });

        return urlObj.toString();
    }
}
