import { Command } from 'commander';
import { reportFailure, withErrorHandler } from '../../lib/errors.js';
import type { GlobalOptions, SecretsContext } from '../context.js';
import { bold, brandDot, dim } from '../theme.js';
import { formatContexts } from './list.command.js';

export async function status(ctx: SecretsContext, options: GlobalOptions): Promise<number> {
	const workflow = ctx.openWorkflow(options);

	const identified = await workflow.identify();
	if (!identified.ok) return reportFailure('status', identified.failure);
	const deviceIdentity = identified.value;

	const listed = await workflow.list();
	if (!listed.ok) return reportFailure('status', listed.failure);
	const device = listed.value.find((d) => d.deviceIdentity === deviceIdentity);

	console.log(`  ${brandDot(device !== undefined)} ${bold(`Token ${deviceIdentity}`)}`);
	if (!device) {
		console.log(dim('      Nothing sealed to this token yet.'));
		return 0;
	}
	for (const row of formatContexts(device)) console.log(row);
	return 0;
}

export function statusCommand(ctx: SecretsContext): Command {
	return new Command('status')
		.description('Show the connected token and the secrets sealed to it')
		.action(async (_options: GlobalOptions, command: Command) => {
			process.exitCode = await withErrorHandler('status', () =>
				status(ctx, command.optsWithGlobals<GlobalOptions>()),
			);
		});
}
