import 'reflect-metadata';

// Classes
export { BundleStore } from './bundle-store.js';
export { FileBundleRepository } from './bundle-file.js';
export { SealWorkflow } from './workflow.js';
export { YubiKeyProvider } from './providers/yubikey.provider.js';
export { ScriptedProvider } from './providers/scripted.provider.js';
export { CommandError, execFileRunner } from './providers/command-runner.js';

// Functions
export { buildChallenge, buildInfo, deriveKey, expandKey } from './key-derivation.js';
export { decrypt, encrypt, openEnvelope, sealEnvelope } from './envelope-codec.js';
export { describeContext, parseBundle, serializeBundle } from './bundle-store.js';
export {
	expandHome,
	getConfigDir,
	getConfigPath,
	loadConfigFile,
	parseSealConfig,
} from './config.js';
export { describeFailure, exitCodeFor } from './failure.js';
export { configureLogging, VERBOSE_LEVELS } from './logging.js';
export { createWorkflow } from './workflow-factory.js';
export { bytesToBase64, base64ToBytes } from './encoding.js';
export * from './constants.js';

// Types
export type { DeriveKeyOptions } from './key-derivation.js';
export type { SealedPayload } from './envelope-codec.js';
export type { FileBundleRepositoryOptions } from './bundle-file.js';
export type {
	EnrollReceipt,
	RemoveReceipt,
	RemoveTarget,
	SealWorkflowOptions,
	SecretSource,
} from './workflow.js';
export type { YubiKeyProviderOptions } from './providers/yubikey.provider.js';
export type {
	RecordedChallenge,
	ScriptedProviderOptions,
	ScriptedResponse,
} from './providers/scripted.provider.js';
export type {
	CommandFailureReason,
	CommandOptions,
	CommandResult,
	CommandRunner,
} from './providers/command-runner.js';
export type { FileConfig, ParseSealConfigInput, SealConfig, SealConfigFlags } from './config.js';
