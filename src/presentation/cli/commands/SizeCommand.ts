import { CommandArgs, CommandOption, CommandPositional, CONFIG_OPTIONS } from './ICommand';
import { RuntimeCommand } from './RuntimeCommand';
import { ValidationError } from '../../../shared/errors/AppError';
import { formatSize } from '../../../shared/utils/format';

export class SizeCommand extends RuntimeCommand {
    name = 'size';
    description = 'Show the size of a channel\'s downloaded media, or of a remote file';
    positionals: CommandPositional[] = [
        {
            name: 'target',
            description: 'Channel name, or a URL together with --remote'
        }
    ];

    async execute(args: CommandArgs): Promise<number> {
        this.validateArgs(args);

        const target = this.getString(args, 'target');
        if (target === undefined) {
            throw new ValidationError('Nothing to measure. Usage: chmedia size <target>');
        }

        const runtime = this.prepareRuntime(args);

        if (this.getBoolean(args, 'remote')) {
            const bytes = await runtime.sizeService.getSize(target, runtime.remoteSizeLookup);
            console.log(`${target}: ${formatSize(bytes)}`);
            return 0;
        }

        const megabytes = await runtime.sizeService.getChannelMediaSize(target);
        console.log(`${target}: ${megabytes.toFixed(2)} MB of media`);
        return 0;
    }

    getOptions(): CommandOption[] {
        return [
            {
                name: 'remote',
                alias: 'r',
                description: 'Treat the target as a URL and ask the server for its size',
                type: 'boolean',
                default: false
            },
            ...CONFIG_OPTIONS
        ];
    }
}
