import yargs, { Argv, Options } from 'yargs';
import { hideBin } from 'yargs/helpers';
import { ICommand, CommandArgs } from './commands/ICommand';
import { Logger } from '../../shared/logging/Logger';
import { ValidationError } from '../../shared/errors/AppError';
import { ErrorHandler } from '../../shared/errors/ErrorHandler';

export class CliApplication {
    private commands: Map<string, ICommand> = new Map();

    constructor(
        private logger: Logger,
        private appName: string = 'chmedia',
        private version: string = '1.0.0',
        private errorHandler: ErrorHandler = ErrorHandler.getInstance()
    ) {}

    /**
     * Register a command
     */
    registerCommand(command: ICommand): void {
        this.commands.set(command.name, command);
        this.logger.debug(`Registered command: ${command.name}`);
    }

    /**
     * Run the CLI application and resolve with the exit code
     */
    async run(argv: string[] = process.argv): Promise<number> {
        let exitCode = 0;

        try {
            const yargsInstance = yargs(hideBin(argv))
                .scriptName(this.appName)
                .version(this.version)
                .help()
                .alias('h', 'help')
                .strict()
                .demandCommand(1, 'Specify a command')
                .fail((message, error) => {
                    throw error ?? new ValidationError(message);
                })
                .wrap(100);

            this.commands.forEach(command => {
                const usage = [command.name, ...(command.positionals ?? []).map(p => `<${p.name}>`)].join(' ');
                yargsInstance.command(
                    [usage, ...(command.aliases ?? [])],
                    command.description,
                    builder => this.configureCommand(builder, command),
                    async parsed => {
                        exitCode = await this.executeCommand(command, {
                            ...parsed,
                            _: parsed._.map(String)
                        });
                    }
                );
            });

            await yargsInstance.parseAsync();
            return exitCode;

        } catch (error) {
            const response = this.errorHandler.handle(error);
            console.error(`\n❌ ${response.message}`);
            return 1;
        }
    }

    private configureCommand(builder: Argv, command: ICommand): Argv {
        (command.positionals ?? []).forEach(positional => {
            builder.positional(positional.name, {
                describe: positional.description,
                type: 'string'
            });
        });

        command.getOptions().forEach(option => {
            const config: Options = {
                describe: option.description,
                type: option.type,
                demandOption: option.required
            };

            if (option.default !== undefined) {
                config.default = option.default;
            }

            if (option.choices) {
                config.choices = option.choices;
            }

            if (option.alias) {
                config.alias = option.alias;
            }

            builder.option(option.name, config);
        });

        return builder;
    }

    private async executeCommand(command: ICommand, args: CommandArgs): Promise<number> {
        this.logger.debug(`Running command '${command.name}'`);
        return command.execute(args);
    }

    /**
     * Get registered commands
     */
    getCommands(): ICommand[] {
        return Array.from(this.commands.values());
    }
}
