import type { DeviceSummary } from '@hwseal/core';
import { Command } from 'commander';
import { reportFailure, withErrorHandler } from '../../lib/errors.js';
import type { GlobalOptions, SecretsContext } from '../context.js';
import { bold, brandDot, dim, plural } from '../theme.js';

const DEFAULT_LABEL = '(default)';

/** Context rows for one token, names padded to a common width. */
export function formatContexts(device: DeviceSummary): string[] {
	const names = device.contexts.map((c) => (c === '' ? DEFAULT_LABEL : c));
	const width = Math.max(...names.map((n) => n.length));

	return device.contexts.map((context, i) => {
		const padded = (names[i] ?? context).padEnd(width);
		const label = context === '' ? dim(padded) : padded;
		return `      ${label}  ${plural(device.generations[context] ?? 0, 'generation')}`;
	});
}

export async function list(ctx: SecretsContext, options: GlobalOptions): Promise<number> {
	const outcome = await ctx.openWorkflow(options).list();
	if (!outcome.ok) return reportFailure('list', outcome.failure);

	const devices = outcome.value;
	if (devices.length === 0) {
		console.log(dim('  No secrets sealed yet. Run `hwseal enroll -c <name>` to add one.'));
		return 0;
	}

	for (const device of devices) {
		console.log(`  ${brandDot(true)} ${bold(device.deviceIdentity)}`);
		for (const row of formatContexts(device)) console.log(row);
	}
	return 0;
}

export function listCommand(ctx: SecretsContext): Command {
	return new Command('list')
		.description('List tokens and the secrets sealed to each')
		.action(async (_options: GlobalOptions, command: Command) => {
			process.exitCode = await withErrorHandler('list', () =>
				list(ctx, command.optsWithGlobals<GlobalOptions>()),
			);
		});
}
