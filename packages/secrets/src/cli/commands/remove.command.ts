import type { RemoveTarget } from '@hwseal/sealer';
import { Command } from 'commander';
import { requireContextName } from '../../lib/config.js';
import { reportFailure, withErrorHandler } from '../../lib/errors.js';
import type { GlobalOptions, SecretsContext } from '../context.js';
import { plural, successMark } from '../theme.js';

export interface RemoveOptions extends GlobalOptions {
	readonly context?: string;
	readonly yes?: boolean;
}

export async function remove(
	ctx: SecretsContext,
	serial: string | undefined,
	options: RemoveOptions,
): Promise<number> {
	const context = options.context === undefined ? undefined : requireContextName(options.context);
	const workflow = ctx.openWorkflow(options);

	const question = (deviceIdentity: string) =>
		context === undefined
			? `Remove every secret sealed to token ${deviceIdentity}?`
			: `Remove "${context}" from token ${deviceIdentity}?`;

	const target: RemoveTarget = serial
		? { deviceIdentity: serial }
		: {
				detect: true,
				confirm: (deviceIdentity) =>
					options.yes ? Promise.resolve(true) : ctx.confirm(question(deviceIdentity)),
			};

	if (context === undefined) {
		const outcome = await workflow.remove(target);
		if (!outcome.ok) return reportFailure('remove', outcome.failure);

		const { deviceIdentity, removed } = outcome.value;
		console.log(`  ${successMark(`Removed token ${deviceIdentity} (${plural(removed, 'envelope')})`)}`);
		return 0;
	}

	const outcome = await workflow.removeContext(target, context);
	if (!outcome.ok) return reportFailure('remove', outcome.failure);

	const { deviceIdentity, removed } = outcome.value;
	console.log(
		`  ${successMark(`Removed "${context}" from token ${deviceIdentity} (${plural(removed, 'generation')})`)}`,
	);
	return 0;
}

export function removeCommand(ctx: SecretsContext): Command {
	return new Command('remove')
		.description('Forget a token, or one secret on it (the connected token if no serial is given)')
		.argument('[serial]', 'Token serial number')
		.option('-c, --context <name>', 'Remove only this secret')
		.option('-y, --yes', 'Skip the confirmation prompt')
		.action(async (serial: string | undefined, _options: RemoveOptions, command: Command) => {
			process.exitCode = await withErrorHandler('remove', () =>
				remove(ctx, serial, command.optsWithGlobals<RemoveOptions>()),
			);
		});
}
