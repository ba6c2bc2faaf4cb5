import { Command } from 'commander';
import { requireContextName } from '../../lib/config.js';
import { reportFailure, withErrorHandler } from '../../lib/errors.js';
import type { GlobalOptions, SecretsContext } from '../context.js';

export interface ShowOptions extends GlobalOptions {
	readonly context?: string;
}

export async function show(ctx: SecretsContext, options: ShowOptions): Promise<number> {
	const context = requireContextName(options.context);
	const workflow = ctx.openWorkflow(options);

	const spinner = ctx.spinner('Touch your token…').start();
	const outcome = await workflow.recover(context);
	spinner.stop();

	if (!outcome.ok) return reportFailure('show', outcome.failure);

	console.log(outcome.value);
	return 0;
}

export function showCommand(ctx: SecretsContext): Command {
	return new Command('show')
		.description('Print a recovered secret to stdout')
		.requiredOption('-c, --context <name>', 'Name the secret is stored under')
		.action(async (_options: ShowOptions, command: Command) => {
			process.exitCode = await withErrorHandler('show', () =>
				show(ctx, command.optsWithGlobals<ShowOptions>()),
			);
		});
}
