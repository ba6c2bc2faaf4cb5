import { EXIT_CODES, type Failure, FailureCode } from '@hwseal/core';

const STEP_LABELS: Record<Failure['step'], string> = {
	identify: 'detect token',
	input: 'read secret',
	derive: 'challenge token',
	decrypt: 'decrypt envelope',
	lookup: 'read store',
	persist: 'write store',
	confirm: 'confirm',
};

const HINTS: Partial<Record<FailureCode, string>> = {
	[FailureCode.PROVIDER_UNAVAILABLE]: 'insert the token and retry',
	[FailureCode.PROVIDER_ERROR]: 'touch the token when it blinks, or check the slot configuration',
	[FailureCode.AUTHENTICATION_FAILED]: 'wrong token or a tampered store',
};

/** `<operation>: <what failed>: <why>` on one line, plus an optional hint. */
export function describeFailure(operation: string, failure: Failure): { line: string; hint?: string } {
	return {
		line: `${operation}: ${STEP_LABELS[failure.step]} failed: ${failure.message}`,
		hint: HINTS[failure.code],
	};
}

export function exitCodeFor(failure: Failure): number {
	return EXIT_CODES[failure.code];
}
