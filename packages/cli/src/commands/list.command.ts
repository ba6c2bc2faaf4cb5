import { DuplicatePolicy } from '@hwseal/core';
import { exitCodeFor } from '@hwseal/sealer';
import chalk from 'chalk';
import { Command } from 'commander';
import { type GlobalOptions, VAULT_CONTEXT, type VaultContext } from '../context.js';
import { plural, printFailure, runGuarded } from '../output.js';

export async function list(ctx: VaultContext, options: GlobalOptions): Promise<number> {
	const outcome = await ctx.openWorkflow(options, DuplicatePolicy.REJECT).list();
	if (!outcome.ok) {
		printFailure('list', outcome.failure);
		return exitCodeFor(outcome.failure);
	}

	const devices = outcome.value;
	if (devices.length === 0) {
		console.log(chalk.dim('No tokens enrolled. Run `hwseal-vault enroll` first.'));
		return 0;
	}

	console.log(chalk.bold('Serial'.padEnd(14)) + chalk.bold('Envelopes'));
	for (const device of devices) {
		const count = device.generations[VAULT_CONTEXT] ?? 0;
		const other = device.contexts.filter((c) => c !== VAULT_CONTEXT).length;
		const note = other > 0 ? chalk.dim(`  (+${plural(other, 'other context')})`) : '';
		console.log(`${device.deviceIdentity.padEnd(14)}${count}${note}`);
	}
	return 0;
}

export function listCommand(ctx: VaultContext): Command {
	return new Command('list')
		.description('List enrolled tokens')
		.action(async (_options: GlobalOptions, command: Command) => {
			process.exitCode = await runGuarded('list', () =>
				list(ctx, command.optsWithGlobals<GlobalOptions>()),
			);
		});
}
