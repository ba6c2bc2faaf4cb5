import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { InvalidInputError, type ProviderSlot } from '@hwseal/core';
import { z } from 'zod';
import { DEFAULT_SLOT, DEFAULT_TIMEOUT_MS, MAX_TIMEOUT_MS } from './constants.js';

export interface SealConfig {
	readonly storePath: string;
	readonly slot: ProviderSlot;
	readonly timeoutMs: number;
	readonly ykchalrespPath: string;
	readonly ykinfoPath: string;
}

/** Raw command-line values; anything left undefined falls through to env, file, default. */
export interface SealConfigFlags {
	readonly store?: string;
	readonly slot?: string;
	readonly timeout?: string;
}

const fileConfigSchema = z
	.object({
		storePath: z.string().min(1).optional(),
		slot: z.union([z.literal(1), z.literal(2)]).optional(),
		timeoutMs: z.number().int().positive().max(MAX_TIMEOUT_MS).optional(),
		ykchalrespPath: z.string().min(1).optional(),
		ykinfoPath: z.string().min(1).optional(),
	})
	.strict();

export type FileConfig = z.infer<typeof fileConfigSchema>;

const CONFIG_DIR = join(homedir(), '.hwseal');

export function getConfigDir(): string {
	return CONFIG_DIR;
}

export function getConfigPath(): string {
	return join(CONFIG_DIR, 'config.json');
}

export function expandHome(path: string): string {
	return path === '~' || path.startsWith('~/') ? join(homedir(), path.slice(1)) : path;
}

export function loadConfigFile(path: string = getConfigPath()): FileConfig {
	if (!existsSync(path)) return {};

	let parsed: unknown;
	try {
		parsed = JSON.parse(readFileSync(path, 'utf-8'));
	} catch {
		throw new InvalidInputError(`invalid config file at ${path}: not valid JSON`);
	}

	const result = fileConfigSchema.safeParse(parsed);
	if (!result.success) {
		const [issue] = result.error.issues;
		const where = issue?.path.join('.') || 'config';
		throw new InvalidInputError(`invalid config file at ${path}: ${where}: ${issue?.message ?? 'invalid'}`);
	}
	return result.data;
}

export interface ParseSealConfigInput {
	readonly defaultStoreFile: string;
	readonly flags?: SealConfigFlags;
	readonly env?: NodeJS.ProcessEnv;
	readonly file?: FileConfig;
}

/** Precedence: flag > environment > config file > default. */
export function parseSealConfig(input: ParseSealConfigInput): SealConfig {
	const flags = input.flags ?? {};
	const env = input.env ?? {};
	const file = input.file ?? {};

	const storePath =
		nonEmpty(flags.store) ??
		nonEmpty(env.HWSEAL_STORE) ??
		file.storePath ??
		join(CONFIG_DIR, input.defaultStoreFile);

	const slotRaw = nonEmpty(flags.slot) ?? nonEmpty(env.HWSEAL_SLOT);
	const slot = slotRaw === undefined ? (file.slot ?? DEFAULT_SLOT) : parseSlot(slotRaw);

	const timeoutRaw = nonEmpty(flags.timeout) ?? nonEmpty(env.HWSEAL_TIMEOUT_MS);
	const timeoutMs =
		timeoutRaw === undefined ? (file.timeoutMs ?? DEFAULT_TIMEOUT_MS) : parseTimeout(timeoutRaw);

	return {
		storePath: expandHome(storePath),
		slot,
		timeoutMs,
		ykchalrespPath: expandHome(nonEmpty(env.HWSEAL_YKCHALRESP) ?? file.ykchalrespPath ?? 'ykchalresp'),
		ykinfoPath: expandHome(nonEmpty(env.HWSEAL_YKINFO) ?? file.ykinfoPath ?? 'ykinfo'),
	};
}

function parseSlot(raw: string): ProviderSlot {
	if (raw === '1') return 1;
	if (raw === '2') return 2;
	throw new InvalidInputError(`slot must be 1 or 2, got "${raw}"`);
}

function parseTimeout(raw: string): number {
	const value = Number(raw);
	if (!/^\d+$/.test(raw) || !Number.isSafeInteger(value) || value <= 0) {
		throw new InvalidInputError(`timeout must be a positive number of milliseconds, got "${raw}"`);
	}
	if (value > MAX_TIMEOUT_MS) {
		throw new InvalidInputError(`timeout must be at most ${MAX_TIMEOUT_MS} ms, got "${raw}"`);
	}
	return value;
}

function nonEmpty(value: string | undefined): string | undefined {
	return value && value.length > 0 ? value : undefined;
}
