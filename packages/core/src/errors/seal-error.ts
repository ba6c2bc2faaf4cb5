import { FailureCode } from '../enums/failure-code.js';
import type { WorkflowStep } from '../types/outcome.js';

export class SealError extends Error {
	constructor(
		public readonly code: FailureCode,
		public readonly step: WorkflowStep,
		message: string,
	) {
		super(message);
		this.name = 'SealError';
	}
}

export class ProviderUnavailableError extends SealError {
	constructor(message = 'no hardware token detected', step: WorkflowStep = 'identify') {
		super(FailureCode.PROVIDER_UNAVAILABLE, step, message);
		this.name = 'ProviderUnavailableError';
	}
}

export class ProviderError extends SealError {
	constructor(message: string, step: WorkflowStep = 'derive') {
		super(FailureCode.PROVIDER_ERROR, step, message);
		this.name = 'ProviderError';
	}
}

export class NotFoundError extends SealError {
	constructor(message: string) {
		super(FailureCode.NOT_FOUND, 'lookup', message);
		this.name = 'NotFoundError';
	}
}

/**
 * Tag verification failed. The message never says why: wrong key, wrong
 * nonce and tampered bytes are indistinguishable on purpose.
 */
export class AuthenticationFailedError extends SealError {
	constructor() {
		super(FailureCode.AUTHENTICATION_FAILED, 'decrypt', 'envelope failed authentication');
		this.name = 'AuthenticationFailedError';
	}
}

export class PersistenceError extends SealError {
	constructor(message: string, step: WorkflowStep = 'persist') {
		super(FailureCode.PERSISTENCE_ERROR, step, message);
		this.name = 'PersistenceError';
	}
}

export class InvalidInputError extends SealError {
	constructor(message: string, step: WorkflowStep = 'input') {
		super(FailureCode.INVALID_INPUT, step, message);
		this.name = 'InvalidInputError';
	}
}

export class CancelledError extends SealError {
	constructor(message = 'cancelled', step: WorkflowStep = 'input') {
		super(FailureCode.CANCELLED, step, message);
		this.name = 'CancelledError';
	}
}
