import { randomBytes } from 'node:crypto';
import {
	CancelledError,
	type DeviceIdentity,
	type DeviceSummary,
	DuplicatePolicy,
	type Envelope,
	type Failure,
	FailureCode,
	type IBundleRepository,
	type IChallengeResponseProvider,
	InvalidInputError,
	NotFoundError,
	type Outcome,
	type ProviderSlot,
	SealError,
	type WorkflowStep,
} from '@hwseal/core';
import { Logger } from '@nestjs/common';
import { describeContext } from './bundle-store.js';
import { DEFAULT_SLOT, DEFAULT_TIMEOUT_MS, SALT_LENGTH } from './constants.js';
import { wipe } from './encoding.js';
import { openEnvelope, sealEnvelope } from './envelope-codec.js';
import { deriveKey } from './key-derivation.js';

export interface SealWorkflowOptions {
	readonly slot?: ProviderSlot;
	readonly timeoutMs?: number;
	readonly duplicatePolicy?: DuplicatePolicy;
	readonly signal?: AbortSignal;
	/** CSPRNG for salts. Swappable for tests only. */
	readonly random?: (size: number) => Uint8Array;
	readonly clock?: () => Date;
}

/** Resolves to the secret, or `null` if the user backed out. */
export type SecretSource = () => Promise<string | null>;

export interface EnrollReceipt {
	readonly deviceIdentity: DeviceIdentity;
	readonly context: string;
	/** How many envelopes the token now holds for this context. */
	readonly generation: number;
}

export type RemoveTarget =
	| { readonly deviceIdentity: DeviceIdentity }
	| { readonly detect: true; readonly confirm: (deviceIdentity: DeviceIdentity) => Promise<boolean> };

export interface RemoveReceipt {
	readonly deviceIdentity: DeviceIdentity;
	readonly removed: number;
}

/**
 * Enroll, recover, remove and list, one transaction per call.
 * Every operation resolves to an Outcome; nothing is thrown past this class.
 */
export class SealWorkflow {
	private readonly logger = new Logger(SealWorkflow.name);
	private readonly slot: ProviderSlot;
	private readonly timeoutMs: number;
	private readonly duplicatePolicy: DuplicatePolicy;
	private readonly signal?: AbortSignal;
	private readonly random: (size: number) => Uint8Array;
	private readonly clock: () => Date;

	constructor(
		private readonly provider: IChallengeResponseProvider,
		private readonly repository: IBundleRepository,
		options: SealWorkflowOptions = {},
	) {
		this.slot = options.slot ?? DEFAULT_SLOT;
		this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
		this.duplicatePolicy = options.duplicatePolicy ?? DuplicatePolicy.APPEND;
		this.signal = options.signal;
		this.random = options.random ?? ((size) => new Uint8Array(randomBytes(size)));
		this.clock = options.clock ?? (() => new Date());
	}

	identify(): Promise<Outcome<DeviceIdentity>> {
		return this.run('identify', () => this.detectDevice());
	}

	enroll(context: string, obtainSecret: SecretSource): Promise<Outcome<EnrollReceipt>> {
		return this.run('identify', async (track) => {
			const deviceIdentity = await this.detectDevice();

			if (this.duplicatePolicy === DuplicatePolicy.REJECT) {
				track('lookup');
				const store = await this.repository.load();
				if (store.lookup(deviceIdentity, context)) {
					throw new InvalidInputError(
						`token ${deviceIdentity} is already enrolled for ${describeContext(context)}`,
						'lookup',
					);
				}
			}

			track('input');
			const secret = await obtainSecret();
			if (secret === null) throw new CancelledError('enrollment cancelled');
			if (secret.length === 0) throw new InvalidInputError('secret must not be empty');

			track('derive');
			const salt = this.random(SALT_LENGTH);
			const key = await deriveKey(this.provider, deviceIdentity, context, salt, this.callOptions());

			let envelope: Envelope;
			try {
				envelope = sealEnvelope(secret, key, context, salt, this.clock());
			} finally {
				wipe(key);
			}

			track('persist');
			const generation = await this.repository.update((store) =>
				store.insert(deviceIdentity, envelope, this.duplicatePolicy),
			);

			this.logger.log(
				`Enrolled ${describeContext(context)} for token ${deviceIdentity} (generation ${generation})`,
			);
			return { deviceIdentity, context, generation };
		});
	}

	/**
	 * Only the newest envelope for the context is tried. A tag failure there is
	 * final: older generations are never consulted as a fallback.
	 */
	recover(context: string): Promise<Outcome<string>> {
		return this.run('identify', async (track) => {
			const deviceIdentity = await this.detectDevice();

			track('lookup');
			const store = await this.repository.load();
			const envelope = store.lookup(deviceIdentity, context);
			if (!envelope) {
				throw new NotFoundError(
					`no envelope for ${describeContext(context)} on token ${deviceIdentity}`,
				);
			}

			track('derive');
			const key = await deriveKey(
				this.provider,
				deviceIdentity,
				envelope.context,
				envelope.salt,
				this.callOptions(),
			);

			track('decrypt');
			try {
				return openEnvelope(envelope, key);
			} finally {
				wipe(key);
			}
		});
	}

	remove(target: RemoveTarget): Promise<Outcome<RemoveReceipt>> {
		return this.run('identify', async (track) => {
			const deviceIdentity = await this.resolveTarget(target, track);

			track('persist');
			// Throwing inside the mutator skips the save, so a miss leaves the file untouched.
			const removed = await this.repository.update((store) => {
				const count = store.remove(deviceIdentity);
				if (count === 0) throw new NotFoundError(`token ${deviceIdentity} is not enrolled`);
				return count;
			});

			this.logger.log(`Removed token ${deviceIdentity} (${removed} envelope(s))`);
			return { deviceIdentity, removed };
		});
	}

	removeContext(target: RemoveTarget, context: string): Promise<Outcome<RemoveReceipt>> {
		return this.run('identify', async (track) => {
			const deviceIdentity = await this.resolveTarget(target, track);

			track('persist');
			const removed = await this.repository.update((store) => {
				const count = store.removeContext(deviceIdentity, context);
				if (count === 0) {
					throw new NotFoundError(
						`no envelope for ${describeContext(context)} on token ${deviceIdentity}`,
					);
				}
				return count;
			});

			this.logger.log(`Removed ${describeContext(context)} from token ${deviceIdentity}`);
			return { deviceIdentity, removed };
		});
	}

	list(): Promise<Outcome<DeviceSummary[]>> {
		return this.run('lookup', async () => {
			const store = await this.repository.load();
			return store.enumerate();
		});
	}

	// -----------------------------------------------------------------------
	// Internal
	// -----------------------------------------------------------------------

	private async detectDevice(): Promise<DeviceIdentity> {
		return this.provider.identity(this.callOptions());
	}

	private async resolveTarget(
		target: RemoveTarget,
		track: (step: WorkflowStep) => void,
	): Promise<DeviceIdentity> {
		if ('deviceIdentity' in target) return target.deviceIdentity;

		const deviceIdentity = await this.detectDevice();
		track('confirm');
		if (!(await target.confirm(deviceIdentity))) {
			throw new CancelledError('removal not confirmed', 'confirm');
		}
		return deviceIdentity;
	}

	private callOptions(): { slot: ProviderSlot; timeoutMs: number; signal?: AbortSignal } {
		return { slot: this.slot, timeoutMs: this.timeoutMs, signal: this.signal };
	}

	/**
	 * Runs one operation and folds any error into a Failure. `track` records
	 * the current step so unexpected errors still say where they happened.
	 */
	private async run<T>(
		firstStep: WorkflowStep,
		operation: (track: (step: WorkflowStep) => void) => Promise<T>,
	): Promise<Outcome<T>> {
		let step = firstStep;
		try {
			const value = await operation((next) => {
				step = next;
			});
			return { ok: true, value };
		} catch (error: unknown) {
			const failure = toFailure(error, step);
			this.logger.warn(`${failure.step}: ${failure.message}`);
			return { ok: false, failure };
		}
	}
}

function toFailure(error: unknown, step: WorkflowStep): Failure {
	if (error instanceof SealError) {
		return { code: error.code, step: error.step, message: error.message };
	}
	const message = error instanceof Error ? error.message : String(error);
	const code =
		step === 'identify' || step === 'derive'
			? FailureCode.PROVIDER_ERROR
			: step === 'persist' || step === 'lookup'
				? FailureCode.PERSISTENCE_ERROR
				: FailureCode.INVALID_INPUT;
	return { code, step, message };
}
