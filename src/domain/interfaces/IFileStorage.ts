/**
 * File storage operations used around downloads
 */
export interface IFileStorage {
  /**
   * Stream data to a file and resolve with the bytes written after flush
   */
  save(path: string, data: NodeJS.ReadableStream, options?: SaveOptions): Promise<number>;

  exists(path: string): Promise<boolean>;

  delete(path: string): Promise<void>;

  getMetadata(path: string): Promise<FileMetadata>;

  createDirectory(path: string): Promise<void>;

  list(directory: string, options?: ListOptions): Promise<FileInfo[]>;

  /**
   * Absolute location of a storage-relative path
   */
  resolve(path: string): string;
}

export interface SaveOptions {
  overwrite?: boolean;
  createDirectories?: boolean;
  signal?: AbortSignal;
}

export interface FileMetadata {
  size: number; // in bytes
  createdAt: Date;
  modifiedAt: Date;
  mimeType?: string;
}

export interface ListOptions {
  recursive?: boolean;
  pattern?: string; // glob pattern
  includeDirectories?: boolean;
  sortBy?: 'name' | 'size' | 'date';
  sortOrder?: 'asc' | 'desc';
  limit?: number;
}

export interface FileInfo {
  name: string;
  path: string;
  size: number;
  isDirectory: boolean;
  createdAt: Date;
  modifiedAt: Date;
}
