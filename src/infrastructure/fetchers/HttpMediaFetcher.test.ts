import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Readable } from 'stream';
import nodeFetch, { Response } from 'node-fetch';
import { HttpMediaFetcher } from './HttpMediaFetcher';
import { HttpClient } from '../http/HttpClient';
import { LocalFileStorage } from '../storage/LocalFileStorage';
import { Attachment, AttachmentKind } from '../../domain/entities/Attachment';
import { CancelledError, PermissionError } from '../../shared/errors/AppError';
import { SilentLogger } from '../../shared/logging/Logger';

jest.mock('node-fetch', () => {
    const actual = jest.requireActual<object>('node-fetch');
    return { ...actual, __esModule: true, default: jest.fn() };
});

const fetchMock = jest.mocked(nodeFetch);

describe('HttpMediaFetcher', () => {
    let baseDir: string;
    let fetcher: HttpMediaFetcher;
    const attachment = new Attachment(1, AttachmentKind.PHOTO, 'https://media.example.test/1');

    beforeEach(() => {
        fetchMock.mockReset();
        baseDir = fs.mkdtempSync(path.join(os.tmpdir(), 'chmedia-fetcher-'));
        const logger = new SilentLogger();
        fetcher = new HttpMediaFetcher(new HttpClient(logger), new LocalFileStorage(logger, baseDir), logger);
    });

    afterEach(() => {
        fs.rmSync(baseDir, { recursive: true, force: true });
    });

    it('should stream the attachment to its destination', async () => {
        fetchMock.mockResolvedValue(new Response(Readable.from([Buffer.from('hello')]), { status: 200 }));

        const bytes = await fetcher.fetch(attachment, 'news/media/msg_1_photo.jpg');

        expect(bytes).toBe(5);
        expect(fs.readFileSync(path.join(baseDir, 'news', 'media', 'msg_1_photo.jpg'), 'utf-8')).toBe('hello');
        expect(fetchMock.mock.calls[0][0]).toBe('https://media.example.test/1');
    });

    it('should overwrite what an earlier attempt left behind', async () => {
        fs.mkdirSync(path.join(baseDir, 'news', 'media'), { recursive: true });
        fs.writeFileSync(path.join(baseDir, 'news', 'media', 'msg_1_photo.jpg'), 'partial-data');
        fetchMock.mockResolvedValue(new Response(Readable.from([Buffer.from('ok')]), { status: 200 }));

        await expect(fetcher.fetch(attachment, 'news/media/msg_1_photo.jpg')).resolves.toBe(2);
    });

    it('should raise HTTP failures for the scheduler to classify', async () => {
        fetchMock.mockResolvedValue(new Response('', { status: 403, statusText: 'Forbidden' }));

        await expect(fetcher.fetch(attachment, 'news/media/msg_1_photo.jpg')).rejects.toBeInstanceOf(PermissionError);
        expect(fs.existsSync(path.join(baseDir, 'news', 'media', 'msg_1_photo.jpg'))).toBe(false);
    });

    it('should report a cancelled signal as a cancellation', async () => {
        const controller = new AbortController();
        controller.abort();

        await expect(
            fetcher.fetch(attachment, 'news/media/msg_1_photo.jpg', controller.signal)
        ).rejects.toBeInstanceOf(CancelledError);
        expect(fetchMock).not.toHaveBeenCalled();
    });
});
