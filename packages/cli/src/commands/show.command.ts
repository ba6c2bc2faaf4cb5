import { DuplicatePolicy, type Outcome } from '@hwseal/core';
import { exitCodeFor } from '@hwseal/sealer';
import { Command } from 'commander';
import { type GlobalOptions, VAULT_CONTEXT, type VaultContext } from '../context.js';
import { printFailure, runGuarded } from '../output.js';

/** Shared by `show` and `unlock`: recover with a touch spinner running. */
export async function recoverMasterPassword(
	ctx: VaultContext,
	options: GlobalOptions,
): Promise<Outcome<string>> {
	const workflow = ctx.openWorkflow(options, DuplicatePolicy.REJECT);
	const spinner = ctx.spinner('Touch your token…').start();
	const outcome = await workflow.recover(VAULT_CONTEXT);
	spinner.stop();
	return outcome;
}

export async function show(ctx: VaultContext, options: GlobalOptions): Promise<number> {
	const outcome = await recoverMasterPassword(ctx, options);
	if (!outcome.ok) {
		printFailure('show', outcome.failure);
		return exitCodeFor(outcome.failure);
	}

	console.log(outcome.value);
	return 0;
}

export function showCommand(ctx: VaultContext): Command {
	return new Command('show')
		.description('Print the recovered master password to stdout')
		.action(async (_options: GlobalOptions, command: Command) => {
			process.exitCode = await runGuarded('show', () =>
				show(ctx, command.optsWithGlobals<GlobalOptions>()),
			);
		});
}
