/** Prefix that separates this application's challenges from any other user of the slot. */
export const DOMAIN_TAG = Buffer.from('hwseal/v1/challenge', 'ascii');

/** Per-envelope HKDF salt, bytes. */
export const SALT_LENGTH = 32;
/** AES-GCM nonce, bytes. */
export const NONCE_LENGTH = 12;
/** AES-GCM authentication tag, bytes. */
export const TAG_LENGTH = 16;
/** Derived key length in bytes (AES-256). */
export const KEY_LENGTH = 32;
/** HMAC-SHA1 response from the token, bytes. */
export const RESPONSE_LENGTH = 20;
/** Largest challenge the token accepts in HMAC mode. */
export const MAX_CHALLENGE_LENGTH = 64;
/** HKDF info ceiling imposed by node:crypto. */
export const MAX_INFO_LENGTH = 1024;

export const CIPHER = 'aes-256-gcm';
export const KDF_HASH = 'sha256';

export const DEFAULT_SLOT = 2;
export const DEFAULT_TIMEOUT_MS = 15_000;
/** Largest delay Node timers accept; longer values fire after 1 ms. */
export const MAX_TIMEOUT_MS = 2_147_483_647;

export const STORE_VERSION = 1;
