import type { DuplicatePolicy } from '../enums/duplicate-policy.js';
import type { DeviceIdentity, DeviceSummary } from '../types/device.js';
import type { Envelope } from '../types/envelope.js';

export interface IBundleStore {
	lookup(deviceIdentity: DeviceIdentity, context: string): Envelope | undefined;
	lookupAll(deviceIdentity: DeviceIdentity, context: string): readonly Envelope[];
	/** Returns the number of envelopes held for the context after insertion. */
	insert(deviceIdentity: DeviceIdentity, envelope: Envelope, policy: DuplicatePolicy): number;
	/** Drops the whole device entry. Returns how many envelopes went with it. */
	remove(deviceIdentity: DeviceIdentity): number;
	/** Returns how many envelopes were dropped. */
	removeContext(deviceIdentity: DeviceIdentity, context: string): number;
	/** Devices in the order the store holds them; a reloaded store follows JSON key order. */
	enumerate(): DeviceSummary[];
	entries(): IterableIterator<[DeviceIdentity, readonly Envelope[]]>;
}

export interface IBundleRepository {
	/** An absent store loads as empty. */
	load(): Promise<IBundleStore>;
	save(store: IBundleStore): Promise<void>;
	/** Load, mutate and save as one step, serialised against other writers. */
	update<T>(mutate: (store: IBundleStore) => T): Promise<T>;
}
