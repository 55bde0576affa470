import * as path from 'path';
import { CommandArgs, CommandOption, CommandPositional, CONFIG_OPTIONS } from './ICommand';
import { RuntimeCommand } from './RuntimeCommand';
import { DownloadMediaResponse } from '../../../application/use-cases/DownloadMediaUseCase';
import { DownloadProgress } from '../../../application/governor/DownloadScheduler';
import { CancelledError, ValidationError } from '../../../shared/errors/AppError';
import { formatSize } from '../../../shared/utils/format';

/** Exit code of a run stopped by SIGINT */
export const EXIT_INTERRUPTED = 130;

export class DownloadCommand extends RuntimeCommand {
    name = 'download';
    description = 'Download the attachments listed in a JSON-lines manifest';
    aliases = ['dl'];
    positionals: CommandPositional[] = [
        {
            name: 'manifest',
            description: 'File with one {"messageId", "kind", "url", "fileName"} object per line'
        }
    ];

    async execute(args: CommandArgs): Promise<number> {
        this.validateArgs(args);

        const manifest = this.getString(args, 'manifest');
        if (manifest === undefined) {
            throw new ValidationError('No manifest provided. Usage: chmedia download <manifest>');
        }
        const channel = this.getString(args, 'channel') ?? path.basename(manifest, path.extname(manifest));

        const runtime = this.prepareRuntime(args);
        const controller = new AbortController();
        const onInterrupt = () => {
            this.logger.warn('Interrupt received, stopping after the current batch');
            controller.abort();
        };
        process.once('SIGINT', onInterrupt);

        console.log(`\n📥 Downloading media of ${channel} into ${runtime.config.outputDir}`);

        try {
            const response = await runtime.downloadUseCase.execute({
                channel,
                attachments: runtime.manifestReader.read(manifest),
                signal: controller.signal,
                onProgress: progress => this.reportProgress(progress)
            });

            this.printSummary(response);
            return response.success ? 0 : 1;

        } catch (error) {
            if (error instanceof CancelledError) {
                console.log(`\n⏹️  Cancelled, ${error.taskIds.length} unfinished downloads discarded`);
                return EXIT_INTERRUPTED;
            }
            throw error;
        } finally {
            process.removeListener('SIGINT', onInterrupt);
        }
    }

    getOptions(): CommandOption[] {
        return [
            {
                name: 'channel',
                alias: 'c',
                description: 'Channel name used for the export directory (defaults to the manifest name)',
                type: 'string'
            },
            ...CONFIG_OPTIONS
        ];
    }

    private reportProgress(progress: DownloadProgress): void {
        this.logger.info(
            `Progress: ${progress.completed} done, ${progress.failed} failed, ${progress.remaining} queued ` +
            `(${progress.filesPerSecond.toFixed(2)} files/s, ${progress.megabytesPerSecond.toFixed(2)} MB/s)`
        );
    }

    private printSummary(response: DownloadMediaResponse): void {
        const { result, stats } = response;

        console.log('\n📊 Download Summary:');
        console.log(`✅ Successful: ${result.files.length} (${formatSize(result.metadata.totalSize)})`);
        if (result.errors.length > 0) {
            console.log(`❌ Failed: ${result.errors.length}`);
            result.errors.forEach(error => {
                console.log(`   ${error.taskId}: ${error.status} after ${error.attempts} attempts (${error.kind}) ${error.message}`);
            });
        }
        console.log(
            `📈 Attempts: ${stats.totalAttempts}, flood waits: ${stats.floodWaits}, ` +
            `success rate: ${stats.successRate.toFixed(1)}%, ` +
            `workers: ${stats.currentWorkers}, delay: ${stats.adaptiveDelay.toFixed(2)}s`
        );
    }
}
