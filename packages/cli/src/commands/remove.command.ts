import { DuplicatePolicy } from '@hwseal/core';
import { type RemoveTarget, exitCodeFor } from '@hwseal/sealer';
import chalk from 'chalk';
import { Command } from 'commander';
import type { GlobalOptions, VaultContext } from '../context.js';
import { plural, printFailure, runGuarded } from '../output.js';

export interface RemoveOptions extends GlobalOptions {
	readonly yes?: boolean;
}

export async function remove(
	ctx: VaultContext,
	serial: string | undefined,
	options: RemoveOptions,
): Promise<number> {
	const workflow = ctx.openWorkflow(options, DuplicatePolicy.REJECT);
	const target: RemoveTarget = serial
		? { deviceIdentity: serial }
		: {
				detect: true,
				confirm: (deviceIdentity) =>
					options.yes
						? Promise.resolve(true)
						: ctx.confirm(`Remove the master password sealed to token ${deviceIdentity}?`),
			};

	const outcome = await workflow.remove(target);
	if (!outcome.ok) {
		printFailure('remove', outcome.failure);
		return exitCodeFor(outcome.failure);
	}

	const { deviceIdentity, removed } = outcome.value;
	console.log(`${chalk.green('✓')} Removed token ${deviceIdentity} (${plural(removed, 'envelope')})`);
	return 0;
}

export function removeCommand(ctx: VaultContext): Command {
	return new Command('remove')
		.description('Forget a token (the connected one if no serial is given)')
		.argument('[serial]', 'Token serial number')
		.option('-y, --yes', 'Skip the confirmation prompt')
		.action(async (serial: string | undefined, _options: RemoveOptions, command: Command) => {
			process.exitCode = await runGuarded('remove', () =>
				remove(ctx, serial, command.optsWithGlobals<RemoveOptions>()),
			);
		});
}
