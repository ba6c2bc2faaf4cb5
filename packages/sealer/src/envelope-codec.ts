import { createCipheriv, createDecipheriv, randomBytes } from 'node:crypto';
import { AuthenticationFailedError, type Envelope, InvalidInputError } from '@hwseal/core';
import { CIPHER, KEY_LENGTH, NONCE_LENGTH, TAG_LENGTH } from './constants.js';

export interface SealedPayload {
	readonly nonce: Uint8Array;
	readonly ciphertext: Uint8Array;
	readonly tag: Uint8Array;
}

/** AES-256-GCM with a fresh random nonce and no associated data. */
export function encrypt(plaintext: Uint8Array, key: Uint8Array): SealedPayload {
	if (key.length !== KEY_LENGTH) {
		throw new InvalidInputError(`key must be ${KEY_LENGTH} bytes, got ${key.length}`);
	}
	const nonce = randomBytes(NONCE_LENGTH);
	const cipher = createCipheriv(CIPHER, key, nonce, { authTagLength: TAG_LENGTH });
	const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()]);
	const tag = cipher.getAuthTag();

	return {
		nonce: new Uint8Array(nonce),
		ciphertext: new Uint8Array(ciphertext),
		tag: new Uint8Array(tag),
	};
}

/**
 * Verify then decrypt. Any malformed input or tag mismatch surfaces as
 * AuthenticationFailedError, and unverified plaintext is zeroed.
 */
export function decrypt(
	ciphertext: Uint8Array,
	key: Uint8Array,
	nonce: Uint8Array,
	tag: Uint8Array,
): Uint8Array {
	if (key.length !== KEY_LENGTH || nonce.length !== NONCE_LENGTH || tag.length !== TAG_LENGTH) {
		throw new AuthenticationFailedError();
	}

	const decipher = createDecipheriv(CIPHER, key, nonce, { authTagLength: TAG_LENGTH });
	decipher.setAuthTag(tag);

	const unverified = decipher.update(ciphertext);
	try {
		const tail = decipher.final();
		return new Uint8Array(Buffer.concat([unverified, tail]));
	} catch {
		throw new AuthenticationFailedError();
	} finally {
		unverified.fill(0);
	}
}

export function sealEnvelope(
	plaintext: string,
	key: Uint8Array,
	context: string,
	salt: Uint8Array,
	now: Date = new Date(),
): Envelope {
	const bytes = Buffer.from(plaintext, 'utf-8');
	try {
		const { nonce, ciphertext, tag } = encrypt(bytes, key);
		return { context, salt, nonce, ciphertext, tag, createdAt: now.toISOString() };
	} finally {
		bytes.fill(0);
	}
}

export function openEnvelope(envelope: Envelope, key: Uint8Array): string {
	const bytes = decrypt(envelope.ciphertext, key, envelope.nonce, envelope.tag);
	try {
		return Buffer.from(bytes).toString('utf-8');
	} finally {
		bytes.fill(0);
	}
}
