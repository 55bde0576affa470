import { describe, it, expect } from '@jest/globals';
import {
    ConfigExplorer,
    ConfigLoader,
    ConfigSearchResult,
    getDefaults,
    parseConfigObject,
    toGovernorConfig
} from './ConfigLoader';
import { ConfigurationError } from '../../shared/errors/AppError';
import { SilentLogger } from '../../shared/logging/Logger';

const HOME = '/home/tester';
const CWD = '/work/export';

function explorerOf(files: Record<string, ConfigSearchResult>): ConfigExplorer {
    const byDirectory = new Map(Object.entries(files));
    return {
        search: (searchFrom?: string) => (searchFrom === undefined ? null : byDirectory.get(searchFrom) ?? null)
    };
}

function loaderWith(files: Record<string, ConfigSearchResult> = {}, env: NodeJS.ProcessEnv = {}): ConfigLoader {
    return new ConfigLoader(new SilentLogger(), {
        explorer: explorerOf(files),
        env,
        cwd: CWD,
        homeDir: HOME
    });
}

function fieldOf(action: () => unknown): string | undefined {
    try {
        action();
    } catch (error) {
        if (error instanceof ConfigurationError) {
            return error.field;
        }
        throw error;
    }
    return undefined;
}

describe('ConfigLoader', () => {
    it('should fall back to defaults without any configuration', () => {
        const loader = loaderWith();

        expect(loader.load()).toEqual(getDefaults());
        expect(loader.getSources()).toEqual([]);
    });

    it('should let the working directory override the home directory', () => {
        const loader = loaderWith({
            [HOME]: {
                filepath: `${HOME}/.chmediarc`,
                config: { outputDir: 'home-exports', governor: { maxWorkers: 4, minDelay: 0.5 } }
            },
            [CWD]: {
                filepath: `${CWD}/chmedia.config.json`,
                config: { governor: { minDelay: 0.2 }, cache: { ttl: 60 } }
            }
        });

        const config = loader.load();

        expect(config.outputDir).toBe('home-exports');
        expect(config.governor.maxWorkers).toBe(4);
        expect(config.governor.minDelay).toBe(0.2);
        expect(config.cache).toEqual({ ttl: 60, capacity: 100 });
        expect(loader.getSources()).toEqual([`${HOME}/.chmediarc`, `${CWD}/chmedia.config.json`]);
    });

    it('should apply a file found from both directories once', () => {
        const shared = { filepath: `${HOME}/.chmediarc`, config: { verbose: true } };
        const loader = loaderWith({ [HOME]: shared, [CWD]: shared });

        expect(loader.load().verbose).toBe(true);
        expect(loader.getSources()).toEqual([`${HOME}/.chmediarc`]);
    });

    it('should let the environment override configuration files', () => {
        const loader = loaderWith(
            { [CWD]: { filepath: `${CWD}/.chmediarc`, config: { outputDir: 'file-exports' } } },
            {
                CHMEDIA_OUTPUT_DIR: 'env-exports',
                CHMEDIA_VERBOSE: '1',
                CHMEDIA_MAX_WORKERS: '6',
                CHMEDIA_MAX_DELAY: '2.5'
            }
        );

        const config = loader.load();

        expect(config.outputDir).toBe('env-exports');
        expect(config.verbose).toBe(true);
        expect(config.governor.maxWorkers).toBe(6);
        expect(config.governor.maxDelay).toBe(2.5);
        expect(loader.getSources()).toEqual([`${CWD}/.chmediarc`, 'environment']);
    });

    it('should ignore empty environment variables', () => {
        const loader = loaderWith({}, { CHMEDIA_MAX_WORKERS: '  ' });

        expect(loader.load().governor.maxWorkers).toBe(8);
        expect(loader.getSources()).toEqual([]);
    });

    it('should reject a non-numeric environment variable', () => {
        const loader = loaderWith({}, { CHMEDIA_MIN_DELAY: 'fast' });

        expect(fieldOf(() => loader.load())).toBe('CHMEDIA_MIN_DELAY');
    });

    it('should reject out-of-range governor settings', () => {
        const loader = loaderWith({
            [CWD]: { filepath: `${CWD}/.chmediarc`, config: { governor: { maxWorkers: 64 } } }
        });

        expect(fieldOf(() => loader.load())).toBe('maxWorkers');
    });

    it('should reject a non-positive timeout', () => {
        const loader = loaderWith({
            [CWD]: { filepath: `${CWD}/.chmediarc`, config: { timeout: 0 } }
        });

        expect(fieldOf(() => loader.load())).toBe('timeout');
    });

    it('should apply command-line overrides last', () => {
        const loader = loaderWith({}, { CHMEDIA_MAX_WORKERS: '6' });
        loader.load();

        const config = loader.applyCliOverrides({ outputDir: 'cli-exports', governor: { maxWorkers: 2 } });

        expect(config.outputDir).toBe('cli-exports');
        expect(config.governor.maxWorkers).toBe(2);
        expect(loader.getConfig()).toBe(config);
    });

    it('should keep the previous configuration when overrides are invalid', () => {
        const loader = loaderWith();
        const loaded = loader.load();

        expect(fieldOf(() => loader.applyCliOverrides({ governor: { minDelay: 5 } }))).toBe('maxDelay');
        expect(loader.getConfig()).toBe(loaded);
    });
});

describe('parseConfigObject', () => {
    it('should read every known setting', () => {
        expect(parseConfigObject({
            outputDir: 'out',
            timeout: 10,
            verbose: false,
            governor: { maxWorkers: 12, initialWorkers: 2, initialDelay: 1, maxRetries: 5 },
            cache: { capacity: 20 }
        }, 'test')).toEqual({
            outputDir: 'out',
            timeout: 10,
            verbose: false,
            governor: { maxWorkers: 12, initialWorkers: 2, initialDelay: 1, maxRetries: 5 },
            cache: { capacity: 20 }
        });
    });

    it('should treat an empty file as no settings', () => {
        expect(parseConfigObject(null, 'test')).toEqual({});
    });

    it('should name the offending field', () => {
        expect(fieldOf(() => parseConfigObject({ governor: { maxWorkers: 'many' } }, 'test')))
            .toBe('governor.maxWorkers');
        expect(fieldOf(() => parseConfigObject({ cache: [] }, 'test'))).toBe('cache');
        expect(fieldOf(() => parseConfigObject({ verbose: 'yes' }, 'test'))).toBe('verbose');
        expect(fieldOf(() => parseConfigObject('outputDir=out', 'test'))).toBe('root');
    });
});

describe('toGovernorConfig', () => {
    it('should hand governor and cache settings to the scheduler', () => {
        expect(toGovernorConfig(getDefaults())).toEqual({
            maxWorkers: 8,
            minDelay: 0.1,
            maxDelay: 3.0,
            maxRetries: 3,
            cacheTTLSeconds: 300,
            cacheCapacity: 100
        });
    });
});
