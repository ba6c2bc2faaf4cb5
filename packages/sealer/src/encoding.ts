const BASE64_RE = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

export function isBase64(value: string): boolean {
	return BASE64_RE.test(value);
}

export function base64ToBytes(base64: string): Uint8Array {
	return new Uint8Array(Buffer.from(base64, 'base64'));
}

export function bytesToBase64(bytes: Uint8Array): string {
	return Buffer.from(bytes).toString('base64');
}

export function bytesToHex(bytes: Uint8Array): string {
	return Buffer.from(bytes).toString('hex');
}

export function wipe(...buffers: Uint8Array[]): void {
	for (const buf of buffers) buf.fill(0);
}
