import {
	type SealConfig,
	type SealConfigFlags,
	getConfigPath,
	loadConfigFile,
	parseSealConfig,
} from '@hwseal/sealer';

export const VAULT_STORE_FILE = 'vault.json';

/** Flags, then HWSEAL_* variables, then ~/.hwseal/config.json, then defaults. */
export function resolveVaultConfig(
	flags: SealConfigFlags,
	env: NodeJS.ProcessEnv = process.env,
	configPath: string = getConfigPath(),
): SealConfig {
	return parseSealConfig({
		defaultStoreFile: VAULT_STORE_FILE,
		flags,
		env,
		file: loadConfigFile(configPath),
	});
}
