import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Readable } from 'stream';
import { DownloadCommand } from './DownloadCommand';
import { Runtime } from './RuntimeCommand';
import { AppConfig, ConfigLoader } from '../../config/ConfigLoader';
import { DownloadScheduler } from '../../../application/governor/DownloadScheduler';
import { SizeCache } from '../../../application/governor/SizeCache';
import { MediaSizeService } from '../../../application/services/MediaSizeService';
import { DownloadMediaUseCase } from '../../../application/use-cases/DownloadMediaUseCase';
import { Attachment } from '../../../domain/entities/Attachment';
import { IMediaFetcher } from '../../../domain/interfaces/IMediaFetcher';
import { ManifestReader } from '../../../infrastructure/manifest/ManifestReader';
import { LocalFileStorage } from '../../../infrastructure/storage/LocalFileStorage';
import { PermissionError, ValidationError } from '../../../shared/errors/AppError';
import { SilentLogger } from '../../../shared/logging/Logger';

type FetchFn = IMediaFetcher<Attachment>['fetch'];

describe('DownloadCommand', () => {
    let dir: string;
    let manifest: string;
    let fetch: jest.Mock<FetchFn>;
    let denied: boolean;
    let command: DownloadCommand;
    let logSpy: jest.SpiedFunction<typeof console.log>;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'chmedia-download-'));
        manifest = path.join(dir, 'news.jsonl');
        fs.writeFileSync(manifest, [
            '{"messageId": 1, "kind": "photo", "url": "https://media.example.test/1"}',
            '{"messageId": 2, "kind": "document", "url": "https://media.example.test/2", "fileName": "a.pdf"}'
        ].join('\n'));

        const logger = new SilentLogger();
        fetch = jest.fn<FetchFn>();
        denied = false;

        const runtimeFactory = (config: AppConfig): Runtime => {
            const storage = new LocalFileStorage(logger, config.outputDir);
            fetch.mockImplementation(async (_attachment, destinationPath) => {
                if (denied) {
                    throw new PermissionError('Access denied to media');
                }
                return storage.save(destinationPath, Readable.from([Buffer.from('data')]), { overwrite: true });
            });
            const scheduler = new DownloadScheduler<Attachment>({
                fetcher: { fetch },
                sleep: async () => undefined
            });
            return {
                config,
                downloadUseCase: new DownloadMediaUseCase(scheduler, storage, logger),
                sizeService: new MediaSizeService(new SizeCache<number>(), { lookup: async () => 0 }),
                manifestReader: new ManifestReader(logger),
                remoteSizeLookup: { lookup: async () => 0 }
            };
        };

        const configLoader = new ConfigLoader(logger, {
            explorer: { search: () => null },
            env: {},
            cwd: dir,
            homeDir: dir
        });
        command = new DownloadCommand(logger, configLoader, runtimeFactory);
        logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    });

    afterEach(() => {
        logSpy.mockRestore();
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('should download a manifest into a directory named after it', async () => {
        const output = path.join(dir, 'exports');

        const exitCode = await command.execute({ _: ['download'], manifest, output });

        expect(exitCode).toBe(0);
        expect(fs.existsSync(path.join(output, 'news', 'media', 'msg_1_photo.jpg'))).toBe(true);
        expect(fs.existsSync(path.join(output, 'news', 'media', 'msg_2_document.pdf'))).toBe(true);
        expect(logSpy).toHaveBeenCalledWith(`\n📥 Downloading media of news into ${output}`);
        expect(logSpy).toHaveBeenCalledWith('✅ Successful: 2 (8 B)');
    });

    it('should use the channel option for the export directory', async () => {
        const output = path.join(dir, 'exports');

        await command.execute({ _: ['download'], manifest, output, channel: 'Daily News' });

        expect(fs.existsSync(path.join(output, 'Daily News', 'media', 'msg_1_photo.jpg'))).toBe(true);
    });

    it('should exit with 1 and list failed downloads', async () => {
        denied = true;

        const exitCode = await command.execute({ _: ['download'], manifest, output: path.join(dir, 'exports') });

        expect(exitCode).toBe(1);
        expect(logSpy).toHaveBeenCalledWith('❌ Failed: 2');
        expect(logSpy).toHaveBeenCalledWith(
            '   news:1: PERMANENT after 1 attempts (PERMISSION) Access denied to media'
        );
    });

    it('should reject a manifest that does not exist', async () => {
        await expect(command.execute({
            _: ['download'],
            manifest: path.join(dir, 'missing.jsonl'),
            output: path.join(dir, 'exports')
        })).rejects.toBeInstanceOf(ValidationError);
        expect(fetch).not.toHaveBeenCalled();
    });

    it('should require a manifest', async () => {
        await expect(command.execute({ _: ['download'] })).rejects.toBeInstanceOf(ValidationError);
    });
});
