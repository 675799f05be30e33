import { Command } from 'commander';
import { createHooksCommand } from './commands/hooks.js';
import { createPluginsCommand } from './commands/plugins.js';
import { CliSession } from './session.js';

export const VERSION = '0.1.0';

export function createCLI(session: CliSession = new CliSession()): Command {
    const program = new Command('hookline')
        .description('Run commands through user hooks and installed plugins')
        .version(VERSION);

    program.addCommand(createPluginsCommand(session));
    program.addCommand(createHooksCommand(session));

    return program;
}
