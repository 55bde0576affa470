#!/usr/bin/env node

import * as dotenv from 'dotenv';
import { CliApplication } from './CliApplication';
import { ConfigLoader } from '../config/ConfigLoader';
import { LoggerFactory, LogLevel } from '../../shared/logging/Logger';
import { ErrorHandler } from '../../shared/errors/ErrorHandler';
import { setupDependencies } from './setup';

async function main(argv: string[] = process.argv): Promise<number> {
    const logger = LoggerFactory.getLogger('CLI');

    try {
        // CHMEDIA_* settings may also come from a .env file in the working directory
        dotenv.config();

        const configLoader = new ConfigLoader(logger);
        const config = configLoader.load();

        if (config.verbose) {
            LoggerFactory.setDefaultConfig({ level: LogLevel.DEBUG });
        }

        const { commands } = setupDependencies(configLoader, logger);

        const app = new CliApplication(
            logger,
            'chmedia',
            process.env.npm_package_version || '1.0.0'
        );

        commands.forEach(command => app.registerCommand(command));

        return await app.run(argv);

    } catch (error) {
        const response = ErrorHandler.getInstance().handle(error);
        console.error('Fatal error:', response.message);
        return 1;
    }
}

// Run if this is the main module
if (require.main === module) {
    main().then(
        exitCode => {
            process.exitCode = exitCode;
        },
        (error: unknown) => {
            console.error('Fatal error:', error);
            process.exitCode = 1;
        }
    );
}

export { main };
