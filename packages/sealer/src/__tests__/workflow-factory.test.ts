import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DuplicatePolicy, FailureCode, type Outcome } from '@hwseal/core';
import { Logger } from '@nestjs/common';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { SealConfig } from '../config.js';
import { configureLogging } from '../logging.js';
import { createWorkflow } from '../workflow-factory.js';
import { SERIAL } from './fixtures.js';

function unwrap<T>(outcome: Outcome<T>): T {
	if (!outcome.ok) throw new Error(`expected success, got ${outcome.failure.code}: ${outcome.failure.message}`);
	return outcome.value;
}

// ykinfo and ykchalresp stand-ins, written as small sh scripts.

describe('createWorkflow', () => {
	let dir: string;
	let config: SealConfig;

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), 'hwseal-factory-'));
		const ykinfoPath = join(dir, 'ykinfo');
		const ykchalrespPath = join(dir, 'ykchalresp');
		await writeFile(ykinfoPath, `#!/bin/sh\n[ "$*" = "-s -q" ] || exit 9\necho ${SERIAL}\n`, {
			mode: 0o755,
		});
		await writeFile(
			ykchalrespPath,
			`#!/bin/sh\n[ "$1" = "-1" ] || exit 9\necho ${'ab'.repeat(20)}\n`,
			{ mode: 0o755 },
		);
		config = {
			storePath: join(dir, 'store.json'),
			slot: 1,
			timeoutMs: 5000,
			ykinfoPath,
			ykchalrespPath,
		};
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	it('lists an absent store as empty', async () => {
		const workflow = createWorkflow(config, DuplicatePolicy.APPEND);

		expect(unwrap(await workflow.list())).toEqual([]);
	});

	it('seals through the configured tools and store, then recovers', async () => {
		const workflow = createWorkflow(config, DuplicatePolicy.APPEND);

		unwrap(await workflow.enroll('mail', async () => 'test-secret'));

		expect(unwrap(await workflow.recover('mail'))).toBe('test-secret');
		expect(unwrap(await workflow.list())).toEqual([
			{ deviceIdentity: SERIAL, contexts: ['mail'], generations: { mail: 1 } },
		]);
	});

	it('applies the duplicate policy it is given', async () => {
		const workflow = createWorkflow(config, DuplicatePolicy.REJECT);
		unwrap(await workflow.enroll('mail', async () => 'test-secret'));

		const second = await workflow.enroll('mail', async () => 'other-secret');

		expect(second.ok).toBe(false);
		if (!second.ok) {
			expect(second.failure.code).toBe(FailureCode.INVALID_INPUT);
			expect(second.failure.step).toBe('lookup');
		}
		expect(unwrap(await workflow.recover('mail'))).toBe('test-secret');
	});
});

describe('configureLogging', () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	it('silences Nest logging by default', () => {
		const override = vi.spyOn(Logger, 'overrideLogger').mockImplementation(() => undefined);

		configureLogging(false);

		expect(override).toHaveBeenCalledWith(false);
	});

	it('enables log, warn, error and debug when verbose', () => {
		const override = vi.spyOn(Logger, 'overrideLogger').mockImplementation(() => undefined);

		configureLogging(true);

		expect(override).toHaveBeenCalledWith(['log', 'warn', 'error', 'debug']);
	});
});
