/**
 * Fetch primitive supplied by the protocol client.
 *
 * Writes the attachment behind `mediaRef` to `destinationPath` and resolves
 * with the number of bytes on disk once they are flushed. Failures are
 * raised as-is; the scheduler classifies them.
 */
export interface IMediaFetcher<TRef = unknown> {
  fetch(mediaRef: TRef, destinationPath: string, signal?: AbortSignal): Promise<number>;
}

/**
 * Remote size lookup, keyed by an opaque channel or attachment identifier
 */
export interface ISizeLookup {
  lookup(key: string, signal?: AbortSignal): Promise<number>;
}
