import type { FailureCode } from '../enums/failure-code.js';

export type WorkflowStep = 'identify' | 'input' | 'derive' | 'decrypt' | 'lookup' | 'persist' | 'confirm';

export interface Failure {
	readonly code: FailureCode;
	readonly step: WorkflowStep;
	readonly message: string;
}

export type Outcome<T> = { readonly ok: true; readonly value: T } | { readonly ok: false; readonly failure: Failure };
