import { configureLogging } from '@hwseal/sealer';
import { Command } from 'commander';
import { enrollCommand } from './commands/enroll.command.js';
import { listCommand } from './commands/list.command.js';
import { removeCommand } from './commands/remove.command.js';
import { showCommand } from './commands/show.command.js';
import { statusCommand } from './commands/status.command.js';
import { type GlobalOptions, type SecretsContext, createContext } from './context.js';
import { BRAND_BANNER, dim } from './theme.js';

export function createCli(ctx: SecretsContext): Command {
	const program = new Command();

	program
		.name('hwseal')
		.description(BRAND_BANNER)
		.version('0.1.0')
		.option('--store <path>', 'Envelope store file (default: ~/.hwseal/secrets.json)')
		.option('--slot <n>', 'Challenge-response slot, 1 or 2 (default: 2)')
		.option('--timeout <ms>', 'How long to wait for a touch (default: 15000)')
		.option('-v, --verbose', 'Log workflow and store events')
		.hook('preAction', (thisCommand) => {
			configureLogging(thisCommand.opts<GlobalOptions>().verbose === true);
		})
		.addHelpText(
			'after',
			`
${dim('Getting started:')}
  $ hwseal enroll -c mail    Seal a secret to the plugged-in token
  $ hwseal show -c mail      Print it again (token required)
  $ hwseal status            See what this token holds
`,
		);

	program.addCommand(enrollCommand(ctx));
	program.addCommand(showCommand(ctx));
	program.addCommand(removeCommand(ctx));
	program.addCommand(listCommand(ctx));
	program.addCommand(statusCommand(ctx));

	return program;
}

export async function runCli(): Promise<void> {
	// Ctrl-C aborts a pending token wait; prompts handle it themselves.
	const controller = new AbortController();
	process.on('SIGINT', () => controller.abort());

	await createCli(createContext(controller.signal)).parseAsync();
}

export { createContext } from './context.js';
export type { GlobalOptions, SecretsContext } from './context.js';
export { enroll } from './commands/enroll.command.js';
export { show } from './commands/show.command.js';
export { remove } from './commands/remove.command.js';
export { list } from './commands/list.command.js';
export { status } from './commands/status.command.js';
