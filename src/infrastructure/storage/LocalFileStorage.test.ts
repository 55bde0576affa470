import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Readable } from 'stream';
import { LocalFileStorage } from './LocalFileStorage';
import { AppError, CancelledError } from '../../shared/errors/AppError';
import { SilentLogger } from '../../shared/logging/Logger';

function streamOf(content: string): Readable {
    return Readable.from([Buffer.from(content)]);
}

async function codeOf(promise: Promise<unknown>): Promise<string | undefined> {
    try {
        await promise;
        return undefined;
    } catch (error) {
        return error instanceof AppError ? error.code : 'not an AppError';
    }
}

describe('LocalFileStorage', () => {
    let baseDir: string;
    let storage: LocalFileStorage;

    beforeEach(() => {
        baseDir = fs.mkdtempSync(path.join(os.tmpdir(), 'chmedia-storage-'));
        storage = new LocalFileStorage(new SilentLogger(), baseDir);
    });

    afterEach(() => {
        fs.rmSync(baseDir, { recursive: true, force: true });
    });

    it('should create a missing base directory', () => {
        const nested = path.join(baseDir, 'exports', 'nested');

        new LocalFileStorage(new SilentLogger(), nested);

        expect(fs.existsSync(nested)).toBe(true);
    });

    it('should save a stream and report the bytes on disk', async () => {
        const bytes = await storage.save('news/media/a.jpg', streamOf('hello'));

        expect(bytes).toBe(5);
        expect(fs.readFileSync(path.join(baseDir, 'news', 'media', 'a.jpg'), 'utf-8')).toBe('hello');
    });

    it('should refuse to overwrite unless asked', async () => {
        await storage.save('a.txt', streamOf('first'));

        expect(await codeOf(storage.save('a.txt', streamOf('second')))).toBe('FILE_EXISTS');

        await storage.save('a.txt', streamOf('second!'), { overwrite: true });
        expect(fs.readFileSync(path.join(baseDir, 'a.txt'), 'utf-8')).toBe('second!');
    });

    it('should leave no file behind when a save is aborted', async () => {
        const controller = new AbortController();
        controller.abort();

        await expect(
            storage.save('a.jpg', streamOf('hello'), { signal: controller.signal })
        ).rejects.toBeInstanceOf(CancelledError);

        expect(fs.existsSync(path.join(baseDir, 'a.jpg'))).toBe(false);
    });

    it('should describe a stored file', async () => {
        await storage.save('doc.pdf', streamOf('%PDF'));

        const metadata = await storage.getMetadata('doc.pdf');

        expect(metadata.size).toBe(4);
        expect(metadata.mimeType).toBe('application/pdf');
        expect(await codeOf(storage.getMetadata('missing.pdf'))).toBe('FILE_NOT_FOUND');
    });

    it('should ignore deleting a file that does not exist', async () => {
        await expect(storage.delete('missing.jpg')).resolves.toBeUndefined();

        await storage.save('a.jpg', streamOf('x'));
        await storage.delete('a.jpg');
        expect(await storage.exists('a.jpg')).toBe(false);
    });

    it('should not let paths escape the base directory', () => {
        expect(storage.resolve('news/a.jpg')).toBe(path.join(baseDir, 'news', 'a.jpg'));
        expect(() => storage.resolve('../outside.jpg')).toThrow(AppError);
    });

    it('should list files sorted and limited', async () => {
        await storage.save('media/b.jpg', streamOf('bb'));
        await storage.save('media/a.jpg', streamOf('a'));
        await storage.save('media/c.jpg', streamOf('ccc'));
        await storage.createDirectory('media/sub');

        const byName = await storage.list('media');
        expect(byName.map(file => file.name)).toEqual(['a.jpg', 'b.jpg', 'c.jpg']);
        expect(byName[0].path).toBe(path.join('media', 'a.jpg'));

        const largest = await storage.list('media', { sortBy: 'size', sortOrder: 'desc', limit: 1 });
        expect(largest.map(file => file.name)).toEqual(['c.jpg']);
    });
});
