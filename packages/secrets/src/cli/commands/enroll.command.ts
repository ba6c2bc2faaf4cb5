import { InvalidInputError } from '@hwseal/core';
import { Command } from 'commander';
import { requireContextName } from '../../lib/config.js';
import { reportFailure, withErrorHandler } from '../../lib/errors.js';
import type { GlobalOptions, SecretsContext } from '../context.js';
import { dim, successMark } from '../theme.js';

export interface EnrollOptions extends GlobalOptions {
	readonly context?: string;
}

export async function enroll(ctx: SecretsContext, options: EnrollOptions): Promise<number> {
	const context = requireContextName(options.context);
	const workflow = ctx.openWorkflow(options);
	const spinner = ctx.spinner('Touch your token to seal the secret…');

	const outcome = await workflow.enroll(context, async () => {
		const first = await ctx.readSecret(`Secret for "${context}"`);
		if (first === null || first.length === 0) return first;

		const second = await ctx.readSecret('Repeat to confirm');
		if (second === null) return null;
		if (first !== second) throw new InvalidInputError('entries do not match');

		spinner.start();
		return first;
	});
	spinner.stop();

	if (!outcome.ok) return reportFailure('enroll', outcome.failure);

	const { deviceIdentity, generation } = outcome.value;
	const note = generation > 1 ? dim(` (generation ${generation})`) : '';
	console.log(`  ${successMark(`Sealed "${context}" to token ${deviceIdentity}`)}${note}`);
	return 0;
}

export function enrollCommand(ctx: SecretsContext): Command {
	return new Command('enroll')
		.description('Seal a new secret (or a new generation of one) to the connected token')
		.requiredOption('-c, --context <name>', 'Name the secret is stored under')
		.action(async (_options: EnrollOptions, command: Command) => {
			process.exitCode = await withErrorHandler('enroll', () =>
				enroll(ctx, command.optsWithGlobals<EnrollOptions>()),
			);
		});
}
