import { EXIT_CODES, EXIT_UNEXPECTED, type Failure, SealError } from '@hwseal/core';
import { describeFailure } from '@hwseal/sealer';
import chalk from 'chalk';

export function printFailure(operation: string, failure: Failure): void {
	const { line, hint } = describeFailure(operation, failure);
	console.error(`${chalk.red('✕')} ${line}`);
	if (hint) console.error(chalk.dim(`  ${hint}`));
}

/**
 * Run a command body and turn anything it throws into one error line and an
 * exit status. Workflow failures never get here; they come back as Outcomes.
 */
export async function runGuarded(operation: string, body: () => Promise<number>): Promise<number> {
	try {
		return await body();
	} catch (error: unknown) {
		const message = error instanceof Error ? error.message : String(error);
		console.error(`${chalk.red('✕')} ${operation}: ${message}`);
		return error instanceof SealError ? EXIT_CODES[error.code] : EXIT_UNEXPECTED;
	}
}

export function plural(count: number, noun: string): string {
	return `${count} ${noun}${count === 1 ? '' : 's'}`;
}
