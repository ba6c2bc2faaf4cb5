import { mkdir, open, readFile, rename, stat, unlink, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import { type IBundleRepository, type IBundleStore, PersistenceError } from '@hwseal/core';
import { Logger } from '@nestjs/common';
import { BundleStore, parseBundle, serializeBundle } from './bundle-store.js';

export interface FileBundleRepositoryOptions {
	/** How long update() waits for another writer's lock. */
	readonly lockTimeoutMs?: number;
	/** A lock file older than this is assumed abandoned. */
	readonly staleLockMs?: number;
}

const LOCK_RETRY_MS = 50;

export class FileBundleRepository implements IBundleRepository {
	private readonly logger = new Logger(FileBundleRepository.name);
	private readonly lockTimeoutMs: number;
	private readonly staleLockMs: number;

	constructor(
		readonly path: string,
		options: FileBundleRepositoryOptions = {},
	) {
		this.lockTimeoutMs = options.lockTimeoutMs ?? 5_000;
		this.staleLockMs = options.staleLockMs ?? 30_000;
	}

	get lockPath(): string {
		return `${this.path}.lock`;
	}

	async load(): Promise<BundleStore> {
		let raw: string;
		try {
			raw = await readFile(this.path, 'utf-8');
		} catch (error: unknown) {
			if (errorCode(error) === 'ENOENT') return new BundleStore();
			throw new PersistenceError(`cannot read ${this.path}: ${describe(error)}`, 'lookup');
		}

		let parsed: unknown;
		try {
			parsed = JSON.parse(raw);
		} catch {
			throw new PersistenceError(`${this.path} is not valid JSON`, 'lookup');
		}
		return parseBundle(parsed);
	}

	/** Write to a temp file with 0600 permissions, then rename over the store. */
	async save(store: IBundleStore): Promise<void> {
		const tmpPath = `${this.path}.tmp`;
		try {
			await mkdir(dirname(this.path), { recursive: true, mode: 0o700 });
			await writeFile(tmpPath, `${JSON.stringify(serializeBundle(store), null, '\t')}\n`, {
				encoding: 'utf-8',
				mode: 0o600,
			});
			await rename(tmpPath, this.path);
		} catch (error: unknown) {
			await unlink(tmpPath).catch(() => undefined);
			throw new PersistenceError(`cannot write ${this.path}: ${describe(error)}`);
		}
		this.logger.log(`Saved bundle store to ${this.path}`);
	}

	async update<T>(mutate: (store: IBundleStore) => T): Promise<T> {
		const release = await this.acquireLock();
		try {
			const store = await this.load();
			const result = mutate(store);
			await this.save(store);
			return result;
		} finally {
			await release();
		}
	}

	// -----------------------------------------------------------------------
	// Advisory lock
	// -----------------------------------------------------------------------

	private async acquireLock(): Promise<() => Promise<void>> {
		await mkdir(dirname(this.path), { recursive: true, mode: 0o700 }).catch((error: unknown) => {
			throw new PersistenceError(`cannot create ${dirname(this.path)}: ${describe(error)}`);
		});

		const deadline = Date.now() + this.lockTimeoutMs;
		for (;;) {
			try {
				const handle = await open(this.lockPath, 'wx', 0o600);
				await handle.writeFile(`${process.pid}\n`);
				await handle.close();
				return async () => {
					await unlink(this.lockPath).catch((error: unknown) => {
						this.logger.warn(`Could not remove lock ${this.lockPath}: ${describe(error)}`);
					});
				};
			} catch (error: unknown) {
				if (errorCode(error) !== 'EEXIST') {
					throw new PersistenceError(`cannot lock ${this.path}: ${describe(error)}`);
				}
			}

			if (await this.clearStaleLock()) continue;

			if (Date.now() >= deadline) {
				throw new PersistenceError(
					`${this.path} is locked by another process (remove ${this.lockPath} if it is stale)`,
				);
			}
			this.logger.debug(`Waiting for lock ${this.lockPath}`);
			await sleep(LOCK_RETRY_MS);
		}
	}

	private async clearStaleLock(): Promise<boolean> {
		try {
			const { mtimeMs } = await stat(this.lockPath);
			if (Date.now() - mtimeMs < this.staleLockMs) return false;
			await unlink(this.lockPath);
			this.logger.warn(`Removed stale lock ${this.lockPath}`);
			return true;
		} catch (error: unknown) {
			// Released between our open() and stat(): just retry.
			return errorCode(error) === 'ENOENT';
		}
	}
}

function errorCode(error: unknown): string | undefined {
	if (typeof error === 'object' && error !== null && 'code' in error) {
		return typeof error.code === 'string' ? error.code : undefined;
	}
	return undefined;
}

function describe(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
