export * from './governor';
export * from './use-cases/DownloadMediaUseCase';
export * from './services/MediaDownloadQueue';
export * from './services/MediaSizeService';
export * from './services/VerifyingMediaFetcher';
