import { execFile } from 'node:child_process';

export interface CommandOptions {
	readonly timeoutMs?: number;
	readonly signal?: AbortSignal;
}

export interface CommandResult {
	readonly stdout: string;
	readonly stderr: string;
}

export type CommandFailureReason = 'not-found' | 'timeout' | 'aborted' | 'exit';

export class CommandError extends Error {
	constructor(
		public readonly reason: CommandFailureReason,
		public readonly stderr: string,
		public readonly exitCode?: number,
	) {
		super(stderr.trim() || reason);
		this.name = 'CommandError';
	}
}

export type CommandRunner = (
	file: string,
	args: readonly string[],
	options?: CommandOptions,
) => Promise<CommandResult>;

/** execFile without a shell; the child is killed on timeout or abort. */
export const execFileRunner: CommandRunner = (file, args, options = {}) =>
	new Promise((resolve, reject) => {
		execFile(
			file,
			[...args],
			{
				encoding: 'utf-8',
				timeout: options.timeoutMs ?? 0,
				signal: options.signal,
				windowsHide: true,
			},
			(error, stdout, stderr) => {
				if (!error) {
					resolve({ stdout, stderr });
					return;
				}
				if (error.name === 'AbortError') {
					reject(new CommandError('aborted', stderr));
				} else if (error.code === 'ENOENT') {
					reject(new CommandError('not-found', `${file}: command not found`));
				} else if (error.killed) {
					reject(new CommandError('timeout', stderr));
				} else {
					const exitCode = typeof error.code === 'number' ? error.code : undefined;
					reject(new CommandError('exit', stderr, exitCode));
				}
			},
		);
	});
