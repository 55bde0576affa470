import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ChannelMediaSizeLookup } from './ChannelMediaSizeLookup';
import { LocalFileStorage } from './LocalFileStorage';
import { SilentLogger } from '../../shared/logging/Logger';

describe('ChannelMediaSizeLookup', () => {
    let baseDir: string;
    let lookup: ChannelMediaSizeLookup;

    beforeEach(() => {
        baseDir = fs.mkdtempSync(path.join(os.tmpdir(), 'chmedia-size-'));
        const logger = new SilentLogger();
        lookup = new ChannelMediaSizeLookup(new LocalFileStorage(logger, baseDir), logger);
    });

    afterEach(() => {
        fs.rmSync(baseDir, { recursive: true, force: true });
    });

    it('should sum the non-empty media files of a channel', async () => {
        const mediaDir = path.join(baseDir, 'Test Channel', 'media');
        fs.mkdirSync(path.join(mediaDir, 'nested'), { recursive: true });
        fs.writeFileSync(path.join(mediaDir, 'msg_1_photo.jpg'), 'hello');
        fs.writeFileSync(path.join(mediaDir, 'msg_2_photo.jpg'), '');
        fs.writeFileSync(path.join(mediaDir, 'msg_3_document.pdf'), 'abc');
        fs.writeFileSync(path.join(mediaDir, 'nested', 'ignored.bin'), 'not counted');

        await expect(lookup.lookup('Test   Channel')).resolves.toBe(8);
    });

    it('should report zero for a channel without media', async () => {
        await expect(lookup.lookup('unknown')).resolves.toBe(0);
    });
});
