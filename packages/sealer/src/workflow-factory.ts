import type { DuplicatePolicy } from '@hwseal/core';
import type { SealConfig } from './config.js';
import { FileBundleRepository } from './bundle-file.js';
import { YubiKeyProvider } from './providers/yubikey.provider.js';
import { SealWorkflow } from './workflow.js';

/** Wire the YubiKey provider and the JSON store behind one workflow. */
export function createWorkflow(
	config: SealConfig,
	duplicatePolicy: DuplicatePolicy,
	signal?: AbortSignal,
): SealWorkflow {
	const provider = new YubiKeyProvider({
		ykchalrespPath: config.ykchalrespPath,
		ykinfoPath: config.ykinfoPath,
		timeoutMs: config.timeoutMs,
	});
	const repository = new FileBundleRepository(config.storePath);

	return new SealWorkflow(provider, repository, {
		slot: config.slot,
		timeoutMs: config.timeoutMs,
		duplicatePolicy,
		signal,
	});
}
