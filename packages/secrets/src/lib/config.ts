import { InvalidInputError } from '@hwseal/core';
import {
	type SealConfig,
	type SealConfigFlags,
	getConfigPath,
	loadConfigFile,
	parseSealConfig,
} from '@hwseal/sealer';

export const SECRETS_STORE_FILE = 'secrets.json';

// ---------------------------------------------------------------------------
// Context name validation
// ---------------------------------------------------------------------------

const MAX_CONTEXT_BYTES = 256;
const CONTROL_RE = /[\u0000-\u001f\u007f]/;

export function validateContextName(name: string): string | null {
	if (!name) return 'Context cannot be empty';
	if (Buffer.byteLength(name, 'utf-8') > MAX_CONTEXT_BYTES) {
		return `Context must be at most ${MAX_CONTEXT_BYTES} bytes of UTF-8`;
	}
	if (CONTROL_RE.test(name)) return 'Context cannot contain control characters';
	return null;
}

export function requireContextName(name: string | undefined): string {
	const problem = validateContextName(name ?? '');
	if (problem) throw new InvalidInputError(problem);
	return name ?? '';
}

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

export function resolveSecretsConfig(
	flags: SealConfigFlags,
	env: NodeJS.ProcessEnv = process.env,
	configPath: string = getConfigPath(),
): SealConfig {
	return parseSealConfig({
		defaultStoreFile: SECRETS_STORE_FILE,
		flags,
		env,
		file: loadConfigFile(configPath),
	});
}
