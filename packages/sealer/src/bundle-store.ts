import {
	type DeviceIdentity,
	type DeviceSummary,
	DuplicatePolicy,
	type Envelope,
	type IBundleStore,
	InvalidInputError,
	PersistenceError,
	type SerializedBundle,
	type SerializedEnvelope,
} from '@hwseal/core';
import { z } from 'zod';
import { NONCE_LENGTH, SALT_LENGTH, STORE_VERSION, TAG_LENGTH } from './constants.js';
import { base64ToBytes, bytesToBase64, isBase64 } from './encoding.js';

// ---------------------------------------------------------------------------
// In-memory model
// ---------------------------------------------------------------------------

export class BundleStore implements IBundleStore {
	private readonly devices = new Map<DeviceIdentity, Envelope[]>();

	constructor(entries: Iterable<[DeviceIdentity, readonly Envelope[]]> = []) {
		for (const [deviceIdentity, envelopes] of entries) {
			if (envelopes.length > 0) this.devices.set(deviceIdentity, [...envelopes]);
		}
	}

	get size(): number {
		return this.devices.size;
	}

	has(deviceIdentity: DeviceIdentity): boolean {
		return this.devices.has(deviceIdentity);
	}

	/** Newest envelope for the context, if any. */
	lookup(deviceIdentity: DeviceIdentity, context: string): Envelope | undefined {
		const matches = this.lookupAll(deviceIdentity, context);
		return matches[matches.length - 1];
	}

	/** Every envelope for the context, oldest first. */
	lookupAll(deviceIdentity: DeviceIdentity, context: string): readonly Envelope[] {
		return (this.devices.get(deviceIdentity) ?? []).filter((e) => e.context === context);
	}

	insert(deviceIdentity: DeviceIdentity, envelope: Envelope, policy: DuplicatePolicy): number {
		const existing = this.devices.get(deviceIdentity) ?? [];
		const clash = existing.some((e) => e.context === envelope.context);

		if (policy === DuplicatePolicy.REJECT && clash) {
			throw new InvalidInputError(
				`token ${deviceIdentity} already has an envelope for ${describeContext(envelope.context)}`,
			);
		}

		const kept =
			policy === DuplicatePolicy.REPLACE
				? existing.filter((e) => e.context !== envelope.context)
				: existing;
		const next = [...kept, envelope];

		this.devices.set(deviceIdentity, next);
		return next.filter((e) => e.context === envelope.context).length;
	}

	remove(deviceIdentity: DeviceIdentity): number {
		const count = this.devices.get(deviceIdentity)?.length ?? 0;
		this.devices.delete(deviceIdentity);
		return count;
	}

	removeContext(deviceIdentity: DeviceIdentity, context: string): number {
		const existing = this.devices.get(deviceIdentity);
		if (!existing) return 0;

		const kept = existing.filter((e) => e.context !== context);
		if (kept.length === 0) {
			this.devices.delete(deviceIdentity);
		} else {
			this.devices.set(deviceIdentity, kept);
		}
		return existing.length - kept.length;
	}

	enumerate(): DeviceSummary[] {
		const summaries: DeviceSummary[] = [];
		for (const [deviceIdentity, envelopes] of this.devices) {
			const counts = new Map<string, number>();
			for (const { context } of envelopes) {
				counts.set(context, (counts.get(context) ?? 0) + 1);
			}
			summaries.push({
				deviceIdentity,
				contexts: [...counts.keys()],
				generations: Object.fromEntries(counts),
			});
		}
		return summaries;
	}

	entries(): IterableIterator<[DeviceIdentity, readonly Envelope[]]> {
		return this.devices.entries();
	}
}

export function describeContext(context: string): string {
	return context === '' ? 'the default context' : `context "${context}"`;
}

// ---------------------------------------------------------------------------
// Persisted representation
// ---------------------------------------------------------------------------

const base64Field = z.string().refine(isBase64, { message: 'not valid base64' });

const envelopeSchema = z.object({
	context: z.string(),
	salt: base64Field,
	nonce: base64Field,
	ciphertext: base64Field,
	tag: base64Field,
	createdAt: z.string().optional(),
});

const bundleSchema = z.object({
	version: z.literal(STORE_VERSION),
	algorithm: z.literal('aes-256-gcm'),
	kdf: z.literal('hkdf-sha256'),
	devices: z.record(z.string(), z.array(envelopeSchema)),
});

/** Unversioned layout: one field per serial holding an envelope or a list of them. */
const legacySchema = z.record(z.string(), z.union([envelopeSchema, z.array(envelopeSchema)]));

export function serializeBundle(store: IBundleStore): SerializedBundle {
	const devices = Object.fromEntries(
		[...store.entries()].map(([deviceIdentity, envelopes]) => [
			deviceIdentity,
			envelopes.map(serializeEnvelope),
		]),
	);
	return { version: STORE_VERSION, algorithm: 'aes-256-gcm', kdf: 'hkdf-sha256', devices };
}

export function parseBundle(raw: unknown): BundleStore {
	if (typeof raw === 'object' && raw !== null && 'version' in raw) {
		const parsed = bundleSchema.safeParse(raw);
		if (!parsed.success) {
			throw new PersistenceError(`invalid bundle store: ${formatIssue(parsed.error)}`, 'lookup');
		}
		return new BundleStore(
			Object.entries(parsed.data.devices).map(([id, list]) => [id, list.map(deserializeEnvelope)]),
		);
	}

	const legacy = legacySchema.safeParse(raw);
	if (!legacy.success) {
		throw new PersistenceError(`invalid bundle store: ${formatIssue(legacy.error)}`, 'lookup');
	}
	return new BundleStore(
		Object.entries(legacy.data).map(([id, value]) => [
			id,
			(Array.isArray(value) ? value : [value]).map(deserializeEnvelope),
		]),
	);
}

function serializeEnvelope(envelope: Envelope): SerializedEnvelope {
	return {
		context: envelope.context,
		salt: bytesToBase64(envelope.salt),
		nonce: bytesToBase64(envelope.nonce),
		ciphertext: bytesToBase64(envelope.ciphertext),
		tag: bytesToBase64(envelope.tag),
		...(envelope.createdAt ? { createdAt: envelope.createdAt } : {}),
	};
}

function deserializeEnvelope(serialized: z.infer<typeof envelopeSchema>): Envelope {
	const envelope: Envelope = {
		context: serialized.context,
		salt: base64ToBytes(serialized.salt),
		nonce: base64ToBytes(serialized.nonce),
		ciphertext: base64ToBytes(serialized.ciphertext),
		tag: base64ToBytes(serialized.tag),
		createdAt: serialized.createdAt ?? '',
	};

	expectLength('salt', envelope.salt, SALT_LENGTH);
	expectLength('nonce', envelope.nonce, NONCE_LENGTH);
	expectLength('tag', envelope.tag, TAG_LENGTH);
	return envelope;
}

function expectLength(field: string, bytes: Uint8Array, length: number): void {
	if (bytes.length !== length) {
		throw new PersistenceError(
			`invalid bundle store: ${field} must be ${length} bytes, got ${bytes.length}`,
			'lookup',
		);
	}
}

function formatIssue(error: z.ZodError): string {
	const [issue] = error.issues;
	if (!issue) return 'unrecognised layout';
	const path = issue.path.join('.');
	return path ? `${path}: ${issue.message}` : issue.message;
}
