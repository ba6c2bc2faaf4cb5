import { DuplicatePolicy, FailureCode, InvalidInputError } from '@hwseal/core';
import { exitCodeFor } from '@hwseal/sealer';
import chalk from 'chalk';
import { Command } from 'commander';
import { type GlobalOptions, VAULT_CONTEXT, type VaultContext } from '../context.js';
import { printFailure, runGuarded } from '../output.js';

export interface EnrollOptions extends GlobalOptions {
	readonly force?: boolean;
}

export async function enroll(ctx: VaultContext, options: EnrollOptions): Promise<number> {
	const policy = options.force ? DuplicatePolicy.REPLACE : DuplicatePolicy.REJECT;
	const workflow = ctx.openWorkflow(options, policy);
	const spinner = ctx.spinner('Touch your token to seal the master password…');

	const outcome = await workflow.enroll(VAULT_CONTEXT, async () => {
		const first = await ctx.readSecret('Master password: ');
		if (first === null || first.length === 0) return first;

		const second = await ctx.readSecret('Repeat master password: ');
		if (second === null) return null;
		if (first !== second) throw new InvalidInputError('passwords do not match');

		spinner.start();
		return first;
	});

	if (!outcome.ok) {
		spinner.stop();
		printFailure('enroll', outcome.failure);
		if (outcome.failure.code === FailureCode.INVALID_INPUT && outcome.failure.step === 'lookup') {
			console.error(chalk.dim('  re-run with --force to replace it'));
		}
		return exitCodeFor(outcome.failure);
	}

	spinner.succeed(`Master password sealed to token ${outcome.value.deviceIdentity}`);
	return 0;
}

export function enrollCommand(ctx: VaultContext): Command {
	return new Command('enroll')
		.description('Seal the master password to the connected token')
		.option('-f, --force', 'Replace an existing envelope for this token')
		.action(async (_options: EnrollOptions, command: Command) => {
			process.exitCode = await runGuarded('enroll', () =>
				enroll(ctx, command.optsWithGlobals<EnrollOptions>()),
			);
		});
}
