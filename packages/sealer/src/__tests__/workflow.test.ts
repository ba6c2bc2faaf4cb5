import {
	DuplicatePolicy,
	FailureCode,
	type Outcome,
	ProviderError,
	type SerializedBundle,
} from '@hwseal/core';
import { describe, expect, it, vi } from 'vitest';
import { openEnvelope } from '../envelope-codec.js';
import { expandKey } from '../key-derivation.js';
import { ScriptedProvider } from '../providers/scripted.provider.js';
import { SealWorkflow } from '../workflow.js';
import {
	LiveBundleRepository,
	MemoryBundleRepository,
	SERIAL,
	ZERO_RESPONSE,
	corruptSnapshot,
	hex,
} from './fixtures.js';

const PASSPHRASE = 'correct horse battery staple';

function setup(options: { policy?: DuplicatePolicy } = {}) {
	const provider = new ScriptedProvider({ identity: SERIAL, response: ZERO_RESPONSE });
	const repo = new MemoryBundleRepository();
	const workflow = new SealWorkflow(provider, repo, { duplicatePolicy: options.policy });
	return { provider, repo, workflow };
}

function secret(value: string | null) {
	return async () => value;
}

function unwrap<T>(outcome: Outcome<T>): T {
	if (!outcome.ok) throw new Error(`expected success, got ${outcome.failure.code}: ${outcome.failure.message}`);
	return outcome.value;
}

function failureOf<T>(outcome: Outcome<T>) {
	if (outcome.ok) throw new Error('expected failure');
	return outcome.failure;
}

describe('SealWorkflow', () => {
	describe('enroll + recover scenario', () => {
		it('recovers the enrolled secret for the default context', async () => {
			const { workflow } = setup();

			const receipt = unwrap(await workflow.enroll('', secret(PASSPHRASE)));
			expect(receipt).toEqual({ deviceIdentity: SERIAL, context: '', generation: 1 });

			expect(unwrap(await workflow.recover(''))).toBe(PASSPHRASE);
		});

		it('reports not-found for an unenrolled context', async () => {
			const { workflow } = setup();
			unwrap(await workflow.enroll('', secret(PASSPHRASE)));

			const failure = failureOf(await workflow.recover('mail'));

			expect(failure).toEqual({
				code: FailureCode.NOT_FOUND,
				step: 'lookup',
				message: `no envelope for context "mail" on token ${SERIAL}`,
			});
		});

		it('reports authentication-failed when the last tag byte is flipped', async () => {
			const { workflow, repo } = setup();
			unwrap(await workflow.enroll('', secret(PASSPHRASE)));
			corruptSnapshot(repo, SERIAL, 0, 'tag');

			const failure = failureOf(await workflow.recover(''));

			expect(failure.code).toBe(FailureCode.AUTHENTICATION_FAILED);
			expect(failure.step).toBe('decrypt');
		});

		it.each(['salt', 'nonce', 'ciphertext'] as const)(
			'reports authentication-failed when the %s is tampered with',
			async (field) => {
				const { workflow, repo } = setup();
				unwrap(await workflow.enroll('', secret(PASSPHRASE)));
				corruptSnapshot(repo, SERIAL, 0, field, 0);

				expect(failureOf(await workflow.recover('')).code).toBe(FailureCode.AUTHENTICATION_FAILED);
			},
		);

		it('fails authentication when a different token answers with another secret', async () => {
			const { workflow, provider } = setup();
			unwrap(await workflow.enroll('', secret(PASSPHRASE)));
			provider.reconfigure({ response: new Uint8Array(20).fill(0xaa) });

			expect(failureOf(await workflow.recover('')).code).toBe(FailureCode.AUTHENTICATION_FAILED);
		});

		it('never finds an envelope enrolled under another serial', async () => {
			const { workflow, provider } = setup();
			unwrap(await workflow.enroll('', secret(PASSPHRASE)));
			provider.reconfigure({ identity: '7000001' });

			expect(failureOf(await workflow.recover('')).code).toBe(FailureCode.NOT_FOUND);
		});
	});

	describe('idempotent recovery', () => {
		it('returns the same plaintext twice without writing the store', async () => {
			const { workflow, repo } = setup();
			unwrap(await workflow.enroll('mail', secret('p@ss')));
			const snapshot = repo.snapshot;
			const saves = repo.saves;

			expect(unwrap(await workflow.recover('mail'))).toBe('p@ss');
			expect(unwrap(await workflow.recover('mail'))).toBe('p@ss');

			expect(repo.snapshot).toBe(snapshot);
			expect(repo.saves).toBe(saves);
		});
	});

	describe('enroll input handling', () => {
		it('checks for the token before asking for the secret', async () => {
			const { workflow, provider } = setup();
			provider.reconfigure({ identity: null });
			const source = vi.fn(secret(PASSPHRASE));

			const failure = failureOf(await workflow.enroll('', source));

			expect(failure.code).toBe(FailureCode.PROVIDER_UNAVAILABLE);
			expect(failure.step).toBe('identify');
			expect(source).not.toHaveBeenCalled();
		});

		it('rejects an empty secret', async () => {
			const { workflow, repo } = setup();

			const failure = failureOf(await workflow.enroll('', secret('')));

			expect(failure).toEqual({
				code: FailureCode.INVALID_INPUT,
				step: 'input',
				message: 'secret must not be empty',
			});
			expect(repo.saves).toBe(0);
		});

		it('treats a null secret as cancellation', async () => {
			const { workflow, repo } = setup();

			expect(failureOf(await workflow.enroll('', secret(null))).code).toBe(FailureCode.CANCELLED);
			expect(repo.saves).toBe(0);
		});

		it('surfaces a refused touch as provider-error and persists nothing', async () => {
			const { workflow, repo, provider } = setup();
			provider.reconfigure({ failWith: new ProviderError('touch timed out') });

			const failure = failureOf(await workflow.enroll('', secret(PASSPHRASE)));

			expect(failure).toEqual({
				code: FailureCode.PROVIDER_ERROR,
				step: 'derive',
				message: 'touch timed out',
			});
			expect(repo.saves).toBe(0);
		});

		it('maps unexpected repository errors to persistence-error', async () => {
			const { workflow, repo } = setup();
			vi.spyOn(repo, 'update').mockRejectedValueOnce(new Error('disk full'));

			const failure = failureOf(await workflow.enroll('', secret(PASSPHRASE)));

			expect(failure).toEqual({
				code: FailureCode.PERSISTENCE_ERROR,
				step: 'persist',
				message: 'disk full',
			});
		});

		it('uses the configured slot', async () => {
			const provider = new ScriptedProvider({ identity: SERIAL });
			const workflow = new SealWorkflow(provider, new MemoryBundleRepository(), { slot: 1 });

			unwrap(await workflow.enroll('', secret(PASSPHRASE)));

			expect(provider.challenges.map((c) => c.slot)).toEqual([1]);
		});
	});

	describe('oversized context', () => {
		it('fails at the derive step and stores nothing', async () => {
			const { workflow, repo } = setup();

			const failure = failureOf(await workflow.enroll('x'.repeat(1100), secret(PASSPHRASE)));

			expect(failure).toEqual({
				code: FailureCode.INVALID_INPUT,
				step: 'derive',
				message: 'context and device identity exceed 1022 bytes together',
			});
			expect(repo.saves).toBe(0);
		});
	});

	describe('duplicate enrollment', () => {
		it('append keeps generations and recovers the newest', async () => {
			const { workflow } = setup({ policy: DuplicatePolicy.APPEND });
			unwrap(await workflow.enroll('mail', secret('old')));

			const receipt = unwrap(await workflow.enroll('mail', secret('new')));

			expect(receipt.generation).toBe(2);
			expect(unwrap(await workflow.recover('mail'))).toBe('new');
		});

		it('does not fall back to an older generation when the newest fails authentication', async () => {
			const { workflow, repo } = setup({ policy: DuplicatePolicy.APPEND });
			unwrap(await workflow.enroll('mail', secret('old')));
			unwrap(await workflow.enroll('mail', secret('new')));
			corruptSnapshot(repo, SERIAL, 1, 'tag');

			expect(failureOf(await workflow.recover('mail')).code).toBe(FailureCode.AUTHENTICATION_FAILED);
		});

		it('ignores a corrupt older generation', async () => {
			const { workflow, repo } = setup({ policy: DuplicatePolicy.APPEND });
			unwrap(await workflow.enroll('mail', secret('old')));
			unwrap(await workflow.enroll('mail', secret('new')));
			corruptSnapshot(repo, SERIAL, 0, 'tag');

			expect(unwrap(await workflow.recover('mail'))).toBe('new');
		});

		it('reject refuses before prompting for the secret', async () => {
			const { workflow } = setup({ policy: DuplicatePolicy.REJECT });
			unwrap(await workflow.enroll('', secret('first')));
			const source = vi.fn(secret('second'));

			const failure = failureOf(await workflow.enroll('', source));

			expect(failure.code).toBe(FailureCode.INVALID_INPUT);
			expect(failure.step).toBe('lookup');
			expect(failure.message).toBe(`token ${SERIAL} is already enrolled for the default context`);
			expect(source).not.toHaveBeenCalled();
			expect(unwrap(await workflow.recover(''))).toBe('first');
		});

		it('replace keeps a single envelope per context', async () => {
			const { workflow, repo } = setup({ policy: DuplicatePolicy.REPLACE });
			unwrap(await workflow.enroll('', secret('first')));
			unwrap(await workflow.enroll('', secret('second')));

			const doc = JSON.parse(repo.snapshot ?? '{}') as SerializedBundle;
			expect(doc.devices[SERIAL]).toHaveLength(1);
			expect(unwrap(await workflow.recover(''))).toBe('second');
		});
	});

	describe('salt and nonce freshness', () => {
		it('1000 enrollments never reuse a salt or a nonce', async () => {
			const provider = new ScriptedProvider({ identity: SERIAL, response: ZERO_RESPONSE });
			const repo = new LiveBundleRepository();
			const workflow = new SealWorkflow(provider, repo);

			for (let i = 0; i < 1000; i++) {
				unwrap(await workflow.enroll('bulk', secret(`secret-${i}`)));
			}

			const envelopes = repo.store.lookupAll(SERIAL, 'bulk');
			expect(envelopes).toHaveLength(1000);
			expect(new Set(envelopes.map((e) => hex(e.salt))).size).toBe(1000);
			expect(new Set(envelopes.map((e) => hex(e.nonce))).size).toBe(1000);
		});
	});

	describe('remove', () => {
		it('removes an explicitly named device', async () => {
			const { workflow, provider } = setup();
			unwrap(await workflow.enroll('a', secret('1')));
			unwrap(await workflow.enroll('b', secret('2')));
			provider.reconfigure({ identity: null });

			const receipt = unwrap(await workflow.remove({ deviceIdentity: SERIAL }));

			expect(receipt).toEqual({ deviceIdentity: SERIAL, removed: 2 });
			expect(unwrap(await workflow.list())).toEqual([]);
		});

		it('asks for confirmation when the device is auto-detected', async () => {
			const { workflow } = setup();
			unwrap(await workflow.enroll('', secret(PASSPHRASE)));
			const confirm = vi.fn(async () => true);

			unwrap(await workflow.remove({ detect: true, confirm }));

			expect(confirm).toHaveBeenCalledWith(SERIAL);
			expect(failureOf(await workflow.recover('')).code).toBe(FailureCode.NOT_FOUND);
		});

		it('keeps the entry when confirmation is declined', async () => {
			const { workflow, repo } = setup();
			unwrap(await workflow.enroll('', secret(PASSPHRASE)));
			const saves = repo.saves;

			const failure = failureOf(await workflow.remove({ detect: true, confirm: async () => false }));

			expect(failure.code).toBe(FailureCode.CANCELLED);
			expect(failure.step).toBe('confirm');
			expect(repo.saves).toBe(saves);
			expect(unwrap(await workflow.recover(''))).toBe(PASSPHRASE);
		});

		it('reports not-found for an unknown device without writing', async () => {
			const { workflow, repo } = setup();

			const failure = failureOf(await workflow.remove({ deviceIdentity: '42' }));

			expect(failure).toEqual({
				code: FailureCode.NOT_FOUND,
				step: 'lookup',
				message: 'token 42 is not enrolled',
			});
			expect(repo.saves).toBe(0);
		});

		it('fails with provider-unavailable when auto-detection finds no token', async () => {
			const { workflow, provider } = setup();
			provider.reconfigure({ identity: null });
			const confirm = vi.fn(async () => true);

			expect(failureOf(await workflow.remove({ detect: true, confirm })).code).toBe(
				FailureCode.PROVIDER_UNAVAILABLE,
			);
			expect(confirm).not.toHaveBeenCalled();
		});

		it('removeContext drops one context and keeps the rest', async () => {
			const { workflow } = setup();
			unwrap(await workflow.enroll('mail', secret('1')));
			unwrap(await workflow.enroll('mail', secret('2')));
			unwrap(await workflow.enroll('bank', secret('3')));

			const receipt = unwrap(await workflow.removeContext({ deviceIdentity: SERIAL }, 'mail'));

			expect(receipt.removed).toBe(2);
			expect(failureOf(await workflow.recover('mail')).code).toBe(FailureCode.NOT_FOUND);
			expect(unwrap(await workflow.recover('bank'))).toBe('3');
		});

		it('removeContext reports not-found for an unknown context', async () => {
			const { workflow } = setup();
			unwrap(await workflow.enroll('mail', secret('1')));

			const failure = failureOf(await workflow.removeContext({ deviceIdentity: SERIAL }, 'bank'));

			expect(failure.message).toBe(`no envelope for context "bank" on token ${SERIAL}`);
		});
	});

	describe('injected randomness and clock', () => {
		it('seals under the supplied salt and timestamp', async () => {
			const salt = new Uint8Array(32).fill(9);
			const provider = new ScriptedProvider({ identity: SERIAL, response: ZERO_RESPONSE });
			const repo = new MemoryBundleRepository();
			const workflow = new SealWorkflow(provider, repo, {
				random: () => new Uint8Array(salt),
				clock: () => new Date('2026-01-02T03:04:05.000Z'),
			});

			unwrap(await workflow.enroll('mail', secret(PASSPHRASE)));

			const doc = JSON.parse(repo.snapshot ?? '{}') as SerializedBundle;
			const [stored] = doc.devices[SERIAL] ?? [];
			expect(stored?.salt).toBe(Buffer.from(salt).toString('base64'));
			expect(stored?.createdAt).toBe('2026-01-02T03:04:05.000Z');

			const envelope = (await repo.load()).lookup(SERIAL, 'mail');
			if (!envelope) throw new Error('envelope missing');
			const key = expandKey(ZERO_RESPONSE, SERIAL, 'mail', salt);
			expect(openEnvelope(envelope, key)).toBe(PASSPHRASE);
		});
	});

	describe('list', () => {
		it('enumerates devices and contexts without touching the token', async () => {
			const { workflow, provider } = setup();
			unwrap(await workflow.enroll('mail', secret('1')));
			unwrap(await workflow.enroll('', secret('2')));
			provider.reconfigure({ identity: null });

			expect(unwrap(await workflow.list())).toEqual([
				{ deviceIdentity: SERIAL, contexts: ['mail', ''], generations: { mail: 1, '': 1 } },
			]);
		});
	});

	describe('identify', () => {
		it('returns the connected serial', async () => {
			const { workflow } = setup();
			expect(unwrap(await workflow.identify())).toBe(SERIAL);
		});

		it('fails when no token is present', async () => {
			const { workflow, provider } = setup();
			provider.reconfigure({ identity: null });
			expect(failureOf(await workflow.identify())).toEqual({
				code: FailureCode.PROVIDER_UNAVAILABLE,
				step: 'identify',
				message: 'no hardware token detected',
			});
		});
	});
});
