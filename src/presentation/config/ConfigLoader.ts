import * as os from 'os';
import { cosmiconfigSync } from 'cosmiconfig';
import { Logger } from '../../shared/logging/Logger';
import { ConfigurationError } from '../../shared/errors/AppError';
import { GovernorConfig, resolveGovernorConfig } from '../../application/governor/GovernorConfig';

export interface GovernorSettings {
    maxWorkers: number;
    /** derived from maxWorkers when unset */
    initialWorkers?: number;
    minDelay: number;
    maxDelay: number;
    /** derived from the delay bounds when unset */
    initialDelay?: number;
    maxRetries: number;
}

export interface CacheSettings {
    ttl: number; // seconds
    capacity: number;
}

export interface AppConfig {
    outputDir: string;
    timeout: number; // seconds
    verbose: boolean;
    governor: GovernorSettings;
    cache: CacheSettings;
}

export interface ConfigOverrides {
    outputDir?: string;
    timeout?: number;
    verbose?: boolean;
    governor?: Partial<GovernorSettings>;
    cache?: Partial<CacheSettings>;
}

export interface ConfigSearchResult {
    config: unknown;
    filepath: string;
}

/**
 * The part of a cosmiconfig explorer the loader relies on
 */
export interface ConfigExplorer {
    search(searchFrom?: string): ConfigSearchResult | null;
}

export interface ConfigLoaderOptions {
    explorer?: ConfigExplorer;
    env?: NodeJS.ProcessEnv;
    cwd?: string;
    homeDir?: string;
}

export const MODULE_NAME = 'chmedia';

export function createConfigExplorer(): ConfigExplorer {
    return cosmiconfigSync(MODULE_NAME, {
        searchPlaces: [
            'package.json',
            `${MODULE_NAME}.config.json`,
            `.${MODULE_NAME}rc.json`,
            `.${MODULE_NAME}rc`
        ],
        packageProp: MODULE_NAME
    });
}

export function getDefaults(): AppConfig {
    return {
        outputDir: 'exports',
        timeout: 30,
        verbose: false,
        governor: {
            maxWorkers: 8,
            minDelay: 0.1,
            maxDelay: 3.0,
            maxRetries: 3
        },
        cache: {
            ttl: 300,
            capacity: 100
        }
    };
}

/**
 * Governor settings as the scheduler takes them
 */
export function toGovernorConfig(config: AppConfig): Partial<GovernorConfig> {
    return {
        ...config.governor,
        cacheTTLSeconds: config.cache.ttl,
        cacheCapacity: config.cache.capacity
    };
}

export function mergeConfig(base: AppConfig, override: ConfigOverrides): AppConfig {
    const merged: AppConfig = {
        ...base,
        governor: { ...base.governor },
        cache: { ...base.cache }
    };

    if (override.outputDir !== undefined) merged.outputDir = override.outputDir;
    if (override.timeout !== undefined) merged.timeout = override.timeout;
    if (override.verbose !== undefined) merged.verbose = override.verbose;

    if (override.governor) {
        const governor = override.governor;
        if (governor.maxWorkers !== undefined) merged.governor.maxWorkers = governor.maxWorkers;
        if (governor.initialWorkers !== undefined) merged.governor.initialWorkers = governor.initialWorkers;
        if (governor.minDelay !== undefined) merged.governor.minDelay = governor.minDelay;
        if (governor.maxDelay !== undefined) merged.governor.maxDelay = governor.maxDelay;
        if (governor.initialDelay !== undefined) merged.governor.initialDelay = governor.initialDelay;
        if (governor.maxRetries !== undefined) merged.governor.maxRetries = governor.maxRetries;
    }

    if (override.cache) {
        if (override.cache.ttl !== undefined) merged.cache.ttl = override.cache.ttl;
        if (override.cache.capacity !== undefined) merged.cache.capacity = override.cache.capacity;
    }

    return merged;
}

/**
 * Loads configuration: defaults < home directory < working directory <
 * environment < command line
 */
export class ConfigLoader {
    private config: AppConfig = getDefaults();
    private sources: string[] = [];
    private readonly explorer: ConfigExplorer;
    private readonly env: NodeJS.ProcessEnv;
    private readonly cwd: string;
    private readonly homeDir: string;

    constructor(private logger: Logger, options: ConfigLoaderOptions = {}) {
        this.explorer = options.explorer ?? createConfigExplorer();
        this.env = options.env ?? process.env;
        this.cwd = options.cwd ?? process.cwd();
        this.homeDir = options.homeDir ?? os.homedir();
    }

    load(): AppConfig {
        let config = getDefaults();
        this.sources = [];

        const homeResult = this.explorer.search(this.homeDir);
        if (homeResult) {
            config = mergeConfig(config, parseConfigObject(homeResult.config, homeResult.filepath));
            this.sources.push(homeResult.filepath);
        }

        const localResult = this.explorer.search(this.cwd);
        if (localResult && localResult.filepath !== homeResult?.filepath) {
            config = mergeConfig(config, parseConfigObject(localResult.config, localResult.filepath));
            this.sources.push(localResult.filepath);
        }

        const envOverrides = this.loadFromEnvironment();
        if (Object.keys(envOverrides).length > 0) {
            config = mergeConfig(config, envOverrides);
            this.sources.push('environment');
        }

        this.validateConfig(config);
        this.config = config;

        this.logger.debug('Configuration loaded', { sources: this.sources });

        return this.config;
    }

    getConfig(): Readonly<AppConfig> {
        return this.config;
    }

    getSources(): string[] {
        return [...this.sources];
    }

    /**
     * Override configuration with command-line arguments
     */
    applyCliOverrides(overrides: ConfigOverrides): AppConfig {
        const config = mergeConfig(this.config, overrides);
        this.validateConfig(config);
        this.config = config;
        return config;
    }

    private loadFromEnvironment(): ConfigOverrides {
        const overrides: ConfigOverrides = {};
        const governor: Partial<GovernorSettings> = {};

        const outputDir = this.env.CHMEDIA_OUTPUT_DIR;
        if (outputDir) {
            overrides.outputDir = outputDir;
        }
        const verbose = this.env.CHMEDIA_VERBOSE;
        if (verbose) {
            overrides.verbose = verbose === 'true' || verbose === '1';
        }

        const maxWorkers = this.readNumber('CHMEDIA_MAX_WORKERS');
        if (maxWorkers !== undefined) governor.maxWorkers = maxWorkers;
        const initialWorkers = this.readNumber('CHMEDIA_INITIAL_WORKERS');
        if (initialWorkers !== undefined) governor.initialWorkers = initialWorkers;
        const minDelay = this.readNumber('CHMEDIA_MIN_DELAY');
        if (minDelay !== undefined) governor.minDelay = minDelay;
        const maxDelay = this.readNumber('CHMEDIA_MAX_DELAY');
        if (maxDelay !== undefined) governor.maxDelay = maxDelay;

        if (Object.keys(governor).length > 0) {
            overrides.governor = governor;
        }

        return overrides;
    }

    private readNumber(name: string): number | undefined {
        const raw = this.env[name];
        if (raw === undefined || raw.trim() === '') {
            return undefined;
        }
        const value = Number(raw);
        if (Number.isNaN(value)) {
            throw new ConfigurationError(`${name} must be a number, got: ${raw}`, name);
        }
        return value;
    }

    private validateConfig(config: AppConfig): void {
        if (config.outputDir.trim() === '') {
            throw new ConfigurationError('outputDir must not be empty', 'outputDir');
        }

        if (!Number.isFinite(config.timeout) || config.timeout <= 0) {
            throw new ConfigurationError('Timeout must be a positive number', 'timeout');
        }

        resolveGovernorConfig(toGovernorConfig(config));
    }
}

/**
 * Check the shape of a configuration file's contents
 */
export function parseConfigObject(raw: unknown, source: string): ConfigOverrides {
    const root = asEntries(raw, source, 'root');
    const overrides: ConfigOverrides = {};

    const outputDir = root.get('outputDir');
    if (outputDir !== undefined) overrides.outputDir = expectString(outputDir, source, 'outputDir');
    const timeout = root.get('timeout');
    if (timeout !== undefined) overrides.timeout = expectNumber(timeout, source, 'timeout');
    const verbose = root.get('verbose');
    if (verbose !== undefined) overrides.verbose = expectBoolean(verbose, source, 'verbose');

    const governorRaw = root.get('governor');
    if (governorRaw !== undefined) {
        const governor = asEntries(governorRaw, source, 'governor');
        const settings: Partial<GovernorSettings> = {};
        const fields = ['maxWorkers', 'initialWorkers', 'minDelay', 'maxDelay', 'initialDelay', 'maxRetries'] as const;
        for (const field of fields) {
            const value = governor.get(field);
            if (value !== undefined) {
                settings[field] = expectNumber(value, source, `governor.${field}`);
            }
        }
        overrides.governor = settings;
    }

    const cacheRaw = root.get('cache');
    if (cacheRaw !== undefined) {
        const cache = asEntries(cacheRaw, source, 'cache');
        const settings: Partial<CacheSettings> = {};
        const ttl = cache.get('ttl');
        if (ttl !== undefined) settings.ttl = expectNumber(ttl, source, 'cache.ttl');
        const capacity = cache.get('capacity');
        if (capacity !== undefined) settings.capacity = expectNumber(capacity, source, 'cache.capacity');
        overrides.cache = settings;
    }

    return overrides;
}

function asEntries(value: unknown, source: string, field: string): Map<string, unknown> {
    if (value === null || value === undefined) {
        return new Map();
    }
    if (typeof value !== 'object' || Array.isArray(value)) {
        throw new ConfigurationError(`${field} in ${source} must be an object`, field);
    }
    return new Map<string, unknown>(Object.entries(value));
}

function expectString(value: unknown, source: string, field: string): string {
    if (typeof value !== 'string') {
        throw new ConfigurationError(`${field} in ${source} must be a string`, field);
    }
    return value;
}

function expectNumber(value: unknown, source: string, field: string): number {
    if (typeof value !== 'number') {
        throw new ConfigurationError(`${field} in ${source} must be a number`, field);
    }
    return value;
}

function expectBoolean(value: unknown, source: string, field: string): boolean {
    if (typeof value !== 'boolean') {
        throw new ConfigurationError(`${field} in ${source} must be a boolean`, field);
    }
    return value;
}
