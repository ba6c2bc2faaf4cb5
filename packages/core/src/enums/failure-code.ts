export enum FailureCode {
	PROVIDER_UNAVAILABLE = 'provider-unavailable',
	PROVIDER_ERROR = 'provider-error',
	NOT_FOUND = 'not-found',
	AUTHENTICATION_FAILED = 'authentication-failed',
	PERSISTENCE_ERROR = 'persistence-error',
	INVALID_INPUT = 'invalid-input',
	CANCELLED = 'cancelled',
}

/** Process exit status for each failure. 0 is success, 1 anything unexpected. */
export const EXIT_CODES: Readonly<Record<FailureCode, number>> = {
	[FailureCode.PROVIDER_UNAVAILABLE]: 2,
	[FailureCode.PROVIDER_ERROR]: 3,
	[FailureCode.NOT_FOUND]: 4,
	[FailureCode.AUTHENTICATION_FAILED]: 5,
	[FailureCode.PERSISTENCE_ERROR]: 6,
	[FailureCode.INVALID_INPUT]: 7,
	[FailureCode.CANCELLED]: 130,
};

export const EXIT_UNEXPECTED = 1;
