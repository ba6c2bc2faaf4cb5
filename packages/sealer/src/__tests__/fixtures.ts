import type { IBundleRepository, IBundleStore } from '@hwseal/core';
import { BundleStore, parseBundle, serializeBundle } from '../bundle-store.js';

export const SERIAL = '16166389';
export const ZERO_RESPONSE = new Uint8Array(20);

/**
 * In-memory repository. Persists through the real JSON encoding so tests
 * exercise the same serialisation as the file-backed one.
 */
export class MemoryBundleRepository implements IBundleRepository {
	snapshot: string | undefined;
	saves = 0;

	async load(): Promise<BundleStore> {
		if (this.snapshot === undefined) return new BundleStore();
		return parseBundle(JSON.parse(this.snapshot));
	}

	async save(store: IBundleStore): Promise<void> {
		this.snapshot = JSON.stringify(serializeBundle(store));
		this.saves++;
	}

	async update<T>(mutate: (store: IBundleStore) => T): Promise<T> {
		const store = await this.load();
		const result = mutate(store);
		await this.save(store);
		return result;
	}
}

export function flipBit(bytes: Uint8Array, index: number, bit = 0): Uint8Array {
	const copy = new Uint8Array(bytes);
	copy[index] = (copy[index] ?? 0) ^ (1 << bit);
	return copy;
}

export function hex(bytes: Uint8Array): string {
	return Buffer.from(bytes).toString('hex');
}

/** Holds the live store object; skips serialisation for bulk tests. */
export class LiveBundleRepository implements IBundleRepository {
	readonly store = new BundleStore();

	async load(): Promise<BundleStore> {
		return this.store;
	}

	async save(): Promise<void> {}

	async update<T>(mutate: (store: IBundleStore) => T): Promise<T> {
		return mutate(this.store);
	}
}

/** Flip one bit of a stored envelope's field inside the repository snapshot. */
export function corruptSnapshot(
	repo: MemoryBundleRepository,
	deviceIdentity: string,
	index: number,
	field: 'salt' | 'nonce' | 'ciphertext' | 'tag',
	byte = -1,
): void {
	if (repo.snapshot === undefined) throw new Error('nothing saved yet');
	const doc = JSON.parse(repo.snapshot) as {
		devices: Record<string, Array<Record<string, string>>>;
	};
	const envelope = doc.devices[deviceIdentity]?.[index];
	if (!envelope) throw new Error(`no envelope ${deviceIdentity}[${index}]`);

	const bytes = Buffer.from(envelope[field] ?? '', 'base64');
	const at = byte < 0 ? bytes.length + byte : byte;
	bytes[at] = (bytes[at] ?? 0) ^ 0x01;
	envelope[field] = bytes.toString('base64');
	repo.snapshot = JSON.stringify(doc);
}
