import { ICommand } from './commands/ICommand';
import { Runtime, RuntimeFactory } from './commands/RuntimeCommand';
import { DownloadCommand } from './commands/DownloadCommand';
import { SizeCommand } from './commands/SizeCommand';
import { DownloadMediaUseCase } from '../../application/use-cases/DownloadMediaUseCase';
import { MediaSizeService } from '../../application/services/MediaSizeService';
import { VerifyingMediaFetcher } from '../../application/services/VerifyingMediaFetcher';
import { DownloadScheduler } from '../../application/governor/DownloadScheduler';
import { SizeCache } from '../../application/governor/SizeCache';
import { Attachment } from '../../domain/entities/Attachment';
import { HttpMediaFetcher } from '../../infrastructure/fetchers/HttpMediaFetcher';
import { HttpClient } from '../../infrastructure/http/HttpClient';
import { HttpSizeLookup } from '../../infrastructure/http/HttpSizeLookup';
import { ManifestReader } from '../../infrastructure/manifest/ManifestReader';
import { ChannelMediaSizeLookup } from '../../infrastructure/storage/ChannelMediaSizeLookup';
import { LocalFileStorage } from '../../infrastructure/storage/LocalFileStorage';
import { Logger, LoggerFactory } from '../../shared/logging/Logger';
import { AppConfig, ConfigLoader, toGovernorConfig } from '../config/ConfigLoader';

export interface Dependencies {
    commands: ICommand[];
    createRuntime: RuntimeFactory;
}

/**
 * Wire the object graph for one configuration using manual dependency
 * injection
 */
export function createRuntime(config: AppConfig, logger: Logger): Runtime {
    const httpClient = new HttpClient(LoggerFactory.getLogger('Http'), {
        timeout: config.timeout * 1000
    });

    const storage = new LocalFileStorage(logger, config.outputDir);
    const fetcher = new VerifyingMediaFetcher<Attachment>(
        new HttpMediaFetcher(httpClient, storage, logger),
        storage,
        logger
    );

    const scheduler = new DownloadScheduler<Attachment>({
        fetcher,
        config: toGovernorConfig(config),
        logger: LoggerFactory.getLogger('Scheduler')
    });

    const cache = new SizeCache<number>({
        ttlSeconds: scheduler.config.cacheTTLSeconds,
        capacity: scheduler.config.cacheCapacity
    });

    return {
        config,
        downloadUseCase: new DownloadMediaUseCase(scheduler, storage, logger),
        sizeService: new MediaSizeService(cache, new ChannelMediaSizeLookup(storage, logger), logger),
        manifestReader: new ManifestReader(logger),
        remoteSizeLookup: new HttpSizeLookup(httpClient)
    };
}

/**
 * Set up the commands. Commands build their runtime only after command-line
 * overrides have been applied to the loaded configuration.
 */
export function setupDependencies(
    configLoader: ConfigLoader,
    logger: Logger,
    runtimeFactory: RuntimeFactory = config => createRuntime(config, logger)
): Dependencies {
    const commands: ICommand[] = [
        new DownloadCommand(logger, configLoader, runtimeFactory),
        new SizeCommand(logger, configLoader, runtimeFactory)
    ];

    return {
        commands,
        createRuntime: runtimeFactory
    };
}
