/** One sealed secret. Binary fields are raw bytes in memory, base64 on disk. */
export interface Envelope {
	readonly context: string;
	readonly salt: Uint8Array; // 32 bytes, fresh per envelope
	readonly nonce: Uint8Array; // 12 bytes, fresh per encryption
	readonly ciphertext: Uint8Array; // same length as the plaintext
	readonly tag: Uint8Array; // 16 bytes
	readonly createdAt: string;
}

export interface SerializedEnvelope {
	readonly context: string;
	readonly salt: string; // base64
	readonly nonce: string; // base64
	readonly ciphertext: string; // base64
	readonly tag: string; // base64
	readonly createdAt?: string;
}

export interface SerializedBundle {
	readonly version: 1;
	readonly algorithm: 'aes-256-gcm';
	readonly kdf: 'hkdf-sha256';
	readonly devices: Readonly<Record<string, readonly SerializedEnvelope[]>>;
}
