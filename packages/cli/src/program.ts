import chalk from 'chalk';
import { configureLogging } from '@hwseal/sealer';
import { Command } from 'commander';
import { enrollCommand } from './commands/enroll.command.js';
import { listCommand } from './commands/list.command.js';
import { removeCommand } from './commands/remove.command.js';
import { showCommand } from './commands/show.command.js';
import { unlockCommand } from './commands/unlock.command.js';
import type { GlobalOptions, VaultContext } from './context.js';

export function createProgram(ctx: VaultContext): Command {
	const program = new Command();

	program
		.name('hwseal-vault')
		.description('Keep a password-manager master password sealed to a YubiKey')
		.version('0.1.0')
		.option('--store <path>', 'Envelope store file (default: ~/.hwseal/vault.json)')
		.option('--slot <n>', 'Challenge-response slot, 1 or 2 (default: 2)')
		.option('--timeout <ms>', 'How long to wait for a touch (default: 15000)')
		.option('-v, --verbose', 'Log workflow and store events')
		.hook('preAction', (thisCommand) => {
			configureLogging(thisCommand.opts<GlobalOptions>().verbose === true);
		})
		.addHelpText(
			'after',
			`
${chalk.dim('Getting started:')}
  $ hwseal-vault enroll    Seal your master password to the plugged-in token
  $ hwseal-vault unlock    Unlock bw and open a shell with BW_SESSION set
`,
		);

	program.addCommand(enrollCommand(ctx));
	program.addCommand(showCommand(ctx));
	program.addCommand(unlockCommand(ctx));
	program.addCommand(removeCommand(ctx));
	program.addCommand(listCommand(ctx));

	return program;
}
