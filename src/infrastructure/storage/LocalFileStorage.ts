import * as fs from 'fs';
import * as path from 'path';
import { pipeline } from 'stream/promises';
import { glob } from 'glob';
import {
    IFileStorage,
    SaveOptions,
    FileMetadata,
    ListOptions,
    FileInfo
} from '../../domain/interfaces/IFileStorage';
import { AppError, CancelledError } from '../../shared/errors/AppError';
import { Logger } from '../../shared/logging/Logger';

const fsPromises = fs.promises;

const MIME_TYPES: Record<string, string> = {
    '.jpg': 'image/jpeg',
    '.jpeg': 'image/jpeg',
    '.png': 'image/png',
    '.gif': 'image/gif',
    '.webp': 'image/webp',
    '.mp4': 'video/mp4',
    '.mp3': 'audio/mpeg',
    '.ogg': 'audio/ogg',
    '.pdf': 'application/pdf',
    '.zip': 'application/zip',
    '.json': 'application/json',
    '.txt': 'text/plain'
};

function errorCode(error: unknown): string | undefined {
    if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Storage rooted at the export directory. Every path is relative to it and
 * may not escape it.
 */
export class LocalFileStorage implements IFileStorage {
    private baseDir: string;

    constructor(
        private logger: Logger,
        baseDir: string = 'exports'
    ) {
        this.baseDir = path.resolve(baseDir);
        this.ensureBaseDirectory();
    }

    async save(
        filePath: string,
        data: NodeJS.ReadableStream,
        options: SaveOptions = {}
    ): Promise<number> {
        const fullPath = this.resolve(filePath);
        const {
            overwrite = false,
            createDirectories = true,
            signal
        } = options;

        if (!overwrite && await this.exists(filePath)) {
            throw new AppError(`File already exists: ${filePath}`, 'FILE_EXISTS', 409);
        }

        if (createDirectories) {
            await this.createDirectory(path.dirname(filePath));
        }

        if (signal?.aborted) {
            throw new CancelledError(`Save of ${filePath} was cancelled`);
        }

        try {
            await pipeline(data, fs.createWriteStream(fullPath), { signal });
        } catch (error) {
            await fsPromises.rm(fullPath, { force: true });
            this.logger.debug(`Discarded partial file ${filePath}: ${errorMessage(error)}`);
            throw error;
        }

        const stats = await fsPromises.stat(fullPath);
        this.logger.debug(`File saved: ${filePath} (${stats.size} bytes)`);
        return stats.size;
    }

    async exists(filePath: string): Promise<boolean> {
        const fullPath = this.resolve(filePath);

        try {
            await fsPromises.access(fullPath, fs.constants.F_OK);
            return true;
        } catch {
            return false;
        }
    }

    async delete(filePath: string): Promise<void> {
        const fullPath = this.resolve(filePath);

        try {
            await fsPromises.unlink(fullPath);
            this.logger.debug(`File deleted: ${filePath}`);
        } catch (error) {
            if (errorCode(error) === 'ENOENT') {
                return;
            }
            throw new AppError(
                `Failed to delete file: ${errorMessage(error)}`,
                'DELETE_FAILED'
            );
        }
    }

    async getMetadata(filePath: string): Promise<FileMetadata> {
        const fullPath = this.resolve(filePath);

        try {
            const stats = await fsPromises.stat(fullPath);

            return {
                size: stats.size,
                createdAt: stats.birthtime,
                modifiedAt: stats.mtime,
                mimeType: this.getMimeType(filePath)
            };
        } catch (error) {
            if (errorCode(error) === 'ENOENT') {
                throw new AppError(`File not found: ${filePath}`, 'FILE_NOT_FOUND', 404);
            }
            throw new AppError(
                `Failed to get metadata: ${errorMessage(error)}`,
                'METADATA_FAILED'
            );
        }
    }

    async createDirectory(dirPath: string): Promise<void> {
        const fullPath = this.resolve(dirPath);

        try {
            await fsPromises.mkdir(fullPath, { recursive: true });
        } catch (error) {
            throw new AppError(
                `Failed to create directory: ${errorMessage(error)}`,
                'CREATE_DIR_FAILED'
            );
        }
    }

    async list(directory: string, options: ListOptions = {}): Promise<FileInfo[]> {
        const fullPath = this.resolve(directory);
        const {
            recursive = false,
            pattern = '*',
            includeDirectories = false,
            sortBy = 'name',
            sortOrder = 'asc',
            limit
        } = options;

        try {
            const files = await glob(recursive ? `**/${pattern}` : pattern, {
                cwd: fullPath,
                dot: true,
                absolute: true
            });

            const fileInfos = await Promise.all(
                files.map(async (file): Promise<FileInfo[]> => {
                    const stats = await fsPromises.stat(file);

                    if (!includeDirectories && stats.isDirectory()) {
                        return [];
                    }

                    return [{
                        name: path.basename(file),
                        path: path.relative(this.baseDir, file),
                        size: stats.size,
                        isDirectory: stats.isDirectory(),
                        createdAt: stats.birthtime,
                        modifiedAt: stats.mtime
                    }];
                })
            );

            const results = this.sortFiles(fileInfos.flat(), sortBy, sortOrder);

            return limit && limit > 0 ? results.slice(0, limit) : results;

        } catch (error) {
            throw new AppError(
                `Failed to list directory: ${errorMessage(error)}`,
                'LIST_FAILED'
            );
        }
    }

    resolve(filePath: string): string {
        const resolved = path.resolve(this.baseDir, filePath);

        if (resolved !== this.baseDir && !resolved.startsWith(this.baseDir + path.sep)) {
            throw new AppError(
                `Path escapes the storage directory: ${filePath}`,
                'INVALID_PATH',
                400
            );
        }

        return resolved;
    }

    private ensureBaseDirectory(): void {
        if (!fs.existsSync(this.baseDir)) {
            fs.mkdirSync(this.baseDir, { recursive: true });
            this.logger.info(`Created base directory: ${this.baseDir}`);
        }
    }

    private getMimeType(filePath: string): string {
        return MIME_TYPES[path.extname(filePath).toLowerCase()] ?? 'application/octet-stream';
    }

    private sortFiles(
        files: FileInfo[],
        sortBy: 'name' | 'size' | 'date',
        sortOrder: 'asc' | 'desc'
    ): FileInfo[] {
        const multiplier = sortOrder === 'asc' ? 1 : -1;

        return files.sort((a, b) => {
            switch (sortBy) {
                case 'name':
                    return a.name.localeCompare(b.name) * multiplier;
                case 'size':
                    return (a.size - b.size) * multiplier;
                case 'date':
                    return (a.modifiedAt.getTime() - b.modifiedAt.getTime()) * multiplier;
            }
        });
    }
}
