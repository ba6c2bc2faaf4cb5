import { exitCodeFor } from '@hwseal/sealer';
import chalk from 'chalk';
import { Command } from 'commander';
import type { GlobalOptions, VaultContext } from '../context.js';
import { SESSION_ENV } from '../handoff.js';
import { printFailure, runGuarded } from '../output.js';
import { recoverMasterPassword } from './show.command.js';

export async function unlock(ctx: VaultContext, options: GlobalOptions): Promise<number> {
	const outcome = await recoverMasterPassword(ctx, options);
	if (!outcome.ok) {
		printFailure('unlock', outcome.failure);
		return exitCodeFor(outcome.failure);
	}

	const session = await ctx.handoff.unlock(outcome.value);
	console.error(chalk.dim(`  Vault unlocked. ${SESSION_ENV} is set until you exit this shell.`));
	return ctx.handoff.shell({ [SESSION_ENV]: session });
}

export function unlockCommand(ctx: VaultContext): Command {
	return new Command('unlock')
		.description('Unlock the Bitwarden vault and open a shell with BW_SESSION set')
		.action(async (_options: GlobalOptions, command: Command) => {
			process.exitCode = await runGuarded('unlock', () =>
				unlock(ctx, command.optsWithGlobals<GlobalOptions>()),
			);
		});
}
