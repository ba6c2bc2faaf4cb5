import {
	type DeviceIdentity,
	type IChallengeResponseProvider,
	type ProviderSlot,
	ProviderUnavailableError,
	type SealError,
} from '@hwseal/core';

export type ScriptedResponse =
	| Uint8Array
	| ((challenge: Uint8Array, slot: ProviderSlot) => Uint8Array | Promise<Uint8Array>);

export interface ScriptedProviderOptions {
	/** `null` behaves like an unplugged token. */
	readonly identity: DeviceIdentity | null;
	readonly response?: ScriptedResponse;
	/** Thrown from challengeResponse instead of answering. */
	readonly failWith?: SealError;
}

export interface RecordedChallenge {
	readonly slot: ProviderSlot;
	readonly challenge: Uint8Array;
}

/** In-process stand-in for a token that answers from a script. */
export class ScriptedProvider implements IChallengeResponseProvider {
	readonly name = 'scripted';
	readonly challenges: RecordedChallenge[] = [];
	private options: ScriptedProviderOptions;

	constructor(options: ScriptedProviderOptions) {
		this.options = options;
	}

	/** Swap the script mid-test, e.g. to simulate a different token being plugged in. */
	reconfigure(options: Partial<ScriptedProviderOptions>): void {
		this.options = { ...this.options, ...options };
	}

	async identity(): Promise<DeviceIdentity> {
		if (this.options.identity === null) throw new ProviderUnavailableError();
		return this.options.identity;
	}

	async challengeResponse(slot: ProviderSlot, challenge: Uint8Array): Promise<Uint8Array> {
		if (this.options.identity === null) throw new ProviderUnavailableError(undefined, 'derive');
		if (this.options.failWith) throw this.options.failWith;

		this.challenges.push({ slot, challenge: new Uint8Array(challenge) });
		const { response } = this.options;
		if (response === undefined) return new Uint8Array(20);
		const bytes = typeof response === 'function' ? await response(challenge, slot) : response;
		// Callers wipe responses; hand out a copy so the script survives.
		return new Uint8Array(bytes);
	}
}
