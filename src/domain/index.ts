// Entities
export * from './entities/Attachment';
export * from './entities/DownloadTask';
export * from './entities/DownloadResult';

// Interfaces
export * from './interfaces/IMediaFetcher';
export * from './interfaces/IFileStorage';

// Value Objects
export * from './value-objects/Filename';
