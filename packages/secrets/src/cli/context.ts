import { confirm, password } from '@inquirer/prompts';
import { DuplicatePolicy } from '@hwseal/core';
import { type SealConfigFlags, type SealWorkflow, createWorkflow } from '@hwseal/sealer';
import ora, { type Ora } from 'ora';
import { resolveSecretsConfig } from '../lib/config.js';
import { isPromptExit } from '../lib/errors.js';
import { promptTheme } from './theme.js';

export interface GlobalOptions extends SealConfigFlags {
	readonly verbose?: boolean;
}

export interface SecretsContext {
	openWorkflow(options: GlobalOptions): SealWorkflow;
	/** `null` when the user backs out of the prompt. */
	readSecret(message: string): Promise<string | null>;
	confirm(message: string): Promise<boolean>;
	spinner(text: string): Ora;
}

export function createContext(signal: AbortSignal): SecretsContext {
	return {
		// Re-enrolling appends a generation; recovery opens the newest one.
		openWorkflow: (options) =>
			createWorkflow(resolveSecretsConfig(options), DuplicatePolicy.APPEND, signal),
		readSecret: async (message) => {
			try {
				return await password({ message, mask: '*', theme: promptTheme });
			} catch (error: unknown) {
				if (isPromptExit(error)) return null;
				throw error;
			}
		},
		confirm: async (message) => {
			try {
				return await confirm({ message, default: false, theme: promptTheme });
			} catch (error: unknown) {
				if (isPromptExit(error)) return false;
				throw error;
			}
		},
		spinner: (text) => ora({ text, indent: 2 }),
	};
}
