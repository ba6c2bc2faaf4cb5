import type { DeviceIdentity, ProviderSlot } from '../types/device.js';

export interface ProviderCallOptions {
	/** Upper bound on the call, including any wait for a touch. */
	readonly timeoutMs?: number;
	readonly signal?: AbortSignal;
}

export interface IChallengeResponseProvider {
	readonly name: string;

	/**
	 * Serial of the connected token.
	 * Rejects with ProviderUnavailableError when no token is present.
	 */
	identity(options?: ProviderCallOptions): Promise<DeviceIdentity>;

	/**
	 * HMAC response from the given slot. May block until the user touches the token.
	 * Rejects with ProviderUnavailableError or ProviderError.
	 */
	challengeResponse(
		slot: ProviderSlot,
		challenge: Uint8Array,
		options?: ProviderCallOptions,
	): Promise<Uint8Array>;
}
