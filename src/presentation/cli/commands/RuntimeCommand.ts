import { BaseCommand, CommandArgs } from './ICommand';
import { AppConfig, ConfigLoader } from '../../config/ConfigLoader';
import { DownloadMediaUseCase } from '../../../application/use-cases/DownloadMediaUseCase';
import { MediaSizeService } from '../../../application/services/MediaSizeService';
import { ISizeLookup } from '../../../domain/interfaces/IMediaFetcher';
import { ManifestReader } from '../../../infrastructure/manifest/ManifestReader';
import { Logger, LoggerFactory, LogLevel } from '../../../shared/logging/Logger';

/**
 * Everything a command needs once the final configuration is known
 */
export interface Runtime {
    config: AppConfig;
    downloadUseCase: DownloadMediaUseCase;
    sizeService: MediaSizeService;
    manifestReader: ManifestReader;
    remoteSizeLookup: ISizeLookup;
}

export type RuntimeFactory = (config: AppConfig) => Runtime;

/**
 * Command that runs against the configured download stack
 */
export abstract class RuntimeCommand extends BaseCommand {
    constructor(
        logger: Logger,
        private configLoader: ConfigLoader,
        private runtimeFactory: RuntimeFactory
    ) {
        super(logger);
    }

    /**
     * Apply the command-line flags on top of the loaded configuration and
     * build the runtime for the result
     */
    protected prepareRuntime(args: CommandArgs): Runtime {
        const config = this.configLoader.applyCliOverrides(this.configOverrides(args));

        if (config.verbose) {
            LoggerFactory.setDefaultConfig({ level: LogLevel.DEBUG });
            this.logger.setLevel?.(LogLevel.DEBUG);
        }

        return this.runtimeFactory(config);
    }
}
