import type { DuplicatePolicy } from '@hwseal/core';
import { type SealConfigFlags, type SealWorkflow, createWorkflow } from '@hwseal/sealer';
import ora, { type Ora } from 'ora';
import { resolveVaultConfig } from './config.js';
import { type Handoff, bitwardenHandoff } from './handoff.js';
import { promptConfirm, promptHidden } from './prompt.js';

/** The vault keeps one secret per token, under the empty context. */
export const VAULT_CONTEXT = '';

export interface GlobalOptions extends SealConfigFlags {
	readonly verbose?: boolean;
}

/** Everything a command touches outside its own logic. */
export interface VaultContext {
	openWorkflow(options: GlobalOptions, policy: DuplicatePolicy): SealWorkflow;
	readSecret(question: string): Promise<string | null>;
	confirm(question: string): Promise<boolean>;
	spinner(text: string): Ora;
	readonly handoff: Handoff;
}

export function createContext(signal: AbortSignal): VaultContext {
	return {
		openWorkflow: (options, policy) =>
			createWorkflow(resolveVaultConfig(options), policy, signal),
		readSecret: promptHidden,
		confirm: promptConfirm,
		spinner: (text) => ora({ text, indent: 2 }),
		handoff: bitwardenHandoff(),
	};
}
