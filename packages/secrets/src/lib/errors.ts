import { EXIT_CODES, EXIT_UNEXPECTED, type Failure, FailureCode, SealError } from '@hwseal/core';
import { describeFailure, exitCodeFor } from '@hwseal/sealer';
import { dim, failMark } from '../cli/theme.js';

/** Ctrl-C inside an @inquirer prompt. */
export function isPromptExit(error: unknown): boolean {
	return error instanceof Error && error.name === 'ExitPromptError';
}

/** Print a workflow failure and return the exit status for it. */
export function reportFailure(operation: string, failure: Failure): number {
	const { line, hint } = describeFailure(operation, failure);
	console.error(`  ${failMark(line)}`);
	if (hint) console.error(`    ${dim(hint)}`);
	return exitCodeFor(failure);
}

/** Clean output, no stack traces. Resolves to the process exit status. */
export async function withErrorHandler(
	operation: string,
	body: () => Promise<number>,
): Promise<number> {
	try {
		return await body();
	} catch (error: unknown) {
		if (isPromptExit(error)) {
			console.error(dim('  Cancelled.'));
			return EXIT_CODES[FailureCode.CANCELLED];
		}
		const message = error instanceof Error ? error.message : String(error);
		console.error(`  ${failMark(`${operation}: ${message}`)}`);
		return error instanceof SealError ? EXIT_CODES[error.code] : EXIT_UNEXPECTED;
	}
}
