import { hkdfSync } from 'node:crypto';
import {
	type DeviceIdentity,
	type IChallengeResponseProvider,
	type ProviderCallOptions,
	type ProviderSlot,
	InvalidInputError,
	ProviderError,
	SealError,
} from '@hwseal/core';
import {
	DEFAULT_SLOT,
	DOMAIN_TAG,
	KDF_HASH,
	KEY_LENGTH,
	MAX_CHALLENGE_LENGTH,
	MAX_INFO_LENGTH,
	RESPONSE_LENGTH,
	SALT_LENGTH,
} from './constants.js';
import { wipe } from './encoding.js';

export interface DeriveKeyOptions extends ProviderCallOptions {
	readonly slot?: ProviderSlot;
}

/** `DOMAIN_TAG ‖ salt`, sent to the token as-is. */
export function buildChallenge(salt: Uint8Array): Uint8Array {
	if (salt.length !== SALT_LENGTH) {
		throw new InvalidInputError(`salt must be ${SALT_LENGTH} bytes, got ${salt.length}`, 'derive');
	}
	const challenge = new Uint8Array(Buffer.concat([DOMAIN_TAG, salt]));
	if (challenge.length > MAX_CHALLENGE_LENGTH) {
		throw new InvalidInputError(`challenge exceeds ${MAX_CHALLENGE_LENGTH} bytes`, 'derive');
	}
	return challenge;
}

/**
 * HKDF info: `u16be(len(context)) ‖ context ‖ deviceIdentity`, both UTF-8.
 * The length prefix keeps the context/identity boundary unambiguous.
 */
export function buildInfo(context: string, deviceIdentity: DeviceIdentity): Uint8Array {
	const ctx = Buffer.from(context, 'utf-8');
	const id = Buffer.from(deviceIdentity, 'utf-8');
	// hkdfSync rejects info longer than 1024 bytes.
	if (2 + ctx.length + id.length > MAX_INFO_LENGTH) {
		throw new InvalidInputError(
			`context and device identity exceed ${MAX_INFO_LENGTH - 2} bytes together`,
			'derive',
		);
	}
	const prefix = Buffer.alloc(2);
	prefix.writeUInt16BE(ctx.length, 0);
	return new Uint8Array(Buffer.concat([prefix, ctx, id]));
}

/** The pure half of derivation: token response in, 32-byte key out. */
export function expandKey(
	response: Uint8Array,
	deviceIdentity: DeviceIdentity,
	context: string,
	salt: Uint8Array,
): Uint8Array {
	const okm = hkdfSync(KDF_HASH, response, salt, buildInfo(context, deviceIdentity), KEY_LENGTH);
	return new Uint8Array(okm);
}

export async function deriveKey(
	provider: IChallengeResponseProvider,
	deviceIdentity: DeviceIdentity,
	context: string,
	salt: Uint8Array,
	options: DeriveKeyOptions = {},
): Promise<Uint8Array> {
	const challenge = buildChallenge(salt);
	const slot = options.slot ?? DEFAULT_SLOT;

	let response: Uint8Array;
	try {
		response = await provider.challengeResponse(slot, challenge, {
			timeoutMs: options.timeoutMs,
			signal: options.signal,
		});
	} catch (error: unknown) {
		if (error instanceof SealError) throw error;
		const msg = error instanceof Error ? error.message : String(error);
		throw new ProviderError(`challenge-response failed: ${msg}`);
	}

	try {
		if (response.length !== RESPONSE_LENGTH) {
			throw new ProviderError(
				`malformed response: expected ${RESPONSE_LENGTH} bytes, got ${response.length}`,
			);
		}
		return expandKey(response, deviceIdentity, context, salt);
	} finally {
		wipe(response);
	}
}
