import { Logger } from '../../../shared/logging/Logger';
import { ValidationError } from '../../../shared/errors/AppError';
import { ConfigOverrides, GovernorSettings } from '../../config/ConfigLoader';

/**
 * Base interface for CLI commands
 */
export interface ICommand {
    /**
     * Command name (e.g., 'download', 'size')
     */
    name: string;

    description: string;

    aliases?: string[];

    /**
     * Positional arguments, in order
     */
    positionals?: CommandPositional[];

    /**
     * Execute the command and resolve with the process exit code
     */
    execute(args: CommandArgs): Promise<number>;

    getOptions(): CommandOption[];
}

/**
 * Command arguments passed from CLI
 */
export interface CommandArgs {
    _: string[];
    [key: string]: unknown;
}

export interface CommandPositional {
    name: string;
    description: string;
}

export interface CommandOption {
    name: string;
    alias?: string;
    description: string;
    type: 'string' | 'number' | 'boolean';
    default?: string | number | boolean;
    required?: boolean;
    choices?: string[];
}

/**
 * Flags every command understands; they override the loaded configuration
 */
export const CONFIG_OPTIONS: CommandOption[] = [
    {
        name: 'output',
        alias: 'o',
        description: 'Export directory',
        type: 'string'
    },
    {
        name: 'max-workers',
        description: 'Upper bound on parallel downloads (1-32)',
        type: 'number'
    },
    {
        name: 'initial-workers',
        description: 'Parallel downloads to start with (1-16)',
        type: 'number'
    },
    {
        name: 'min-delay',
        description: 'Lower bound of the delay between dispatches, in seconds',
        type: 'number'
    },
    {
        name: 'max-delay',
        description: 'Upper bound of the delay between dispatches, in seconds',
        type: 'number'
    },
    {
        name: 'verbose',
        description: 'Enable debug logging',
        type: 'boolean'
    }
];

/**
 * Base command class with common functionality
 */
export abstract class BaseCommand implements ICommand {
    abstract name: string;
    abstract description: string;
    aliases?: string[];
    positionals?: CommandPositional[];

    constructor(protected logger: Logger) {}

    abstract execute(args: CommandArgs): Promise<number>;

    abstract getOptions(): CommandOption[];

    /**
     * Validate command arguments
     */
    protected validateArgs(args: CommandArgs): void {
        for (const positional of this.positionals ?? []) {
            if (this.getString(args, positional.name) === undefined) {
                throw new ValidationError(`Missing required argument: <${positional.name}>`);
            }
        }

        for (const option of this.getOptions()) {
            const value = args[option.name];

            if (option.required && value === undefined) {
                throw new ValidationError(`Missing required option: --${option.name}`);
            }

            if (option.choices && typeof value === 'string' && !option.choices.includes(value)) {
                throw new ValidationError(
                    `Invalid value for --${option.name}: ${value}. ` +
                    `Valid choices are: ${option.choices.join(', ')}`
                );
            }
        }
    }

    protected getString(args: CommandArgs, name: string): string | undefined {
        const value = args[name];
        if (typeof value === 'string') {
            return value;
        }
        if (typeof value === 'number') {
            return String(value);
        }
        return undefined;
    }

    protected getNumber(args: CommandArgs, name: string): number | undefined {
        const value = args[name];
        if (value === undefined) {
            return undefined;
        }
        if (typeof value !== 'number' || Number.isNaN(value)) {
            throw new ValidationError(`--${name} must be a number`);
        }
        return value;
    }

    protected getBoolean(args: CommandArgs, name: string): boolean {
        return args[name] === true;
    }

    /**
     * Configuration overrides given on the command line
     */
    protected configOverrides(args: CommandArgs): ConfigOverrides {
        const overrides: ConfigOverrides = {};

        const output = this.getString(args, 'output');
        if (output !== undefined) overrides.outputDir = output;
        if (this.getBoolean(args, 'verbose')) overrides.verbose = true;

        const governor: Partial<GovernorSettings> = {};
        const maxWorkers = this.getNumber(args, 'max-workers');
        if (maxWorkers !== undefined) governor.maxWorkers = maxWorkers;
        const initialWorkers = this.getNumber(args, 'initial-workers');
        if (initialWorkers !== undefined) governor.initialWorkers = initialWorkers;
        const minDelay = this.getNumber(args, 'min-delay');
        if (minDelay !== undefined) governor.minDelay = minDelay;
        const maxDelay = this.getNumber(args, 'max-delay');
        if (maxDelay !== undefined) governor.maxDelay = maxDelay;

        if (Object.keys(governor).length > 0) {
            overrides.governor = governor;
        }

        return overrides;
    }
}
