import { spawn } from 'node:child_process';

// ---------------------------------------------------------------------------
// Password-manager hand-off
//
//   bw unlock --raw --passwordenv HWSEAL_BW_PASSWORD   → session key on stdout
//   $SHELL  (BW_SESSION=<key>)                         → interactive subshell
//
// The master password only ever travels through the child's environment,
// never through argv.
// ---------------------------------------------------------------------------

export const PASSWORD_ENV = 'HWSEAL_BW_PASSWORD';
export const SESSION_ENV = 'BW_SESSION';

export interface Handoff {
	/** Unlock the vault and return the session key. */
	unlock(masterPassword: string): Promise<string>;
	/** Run an interactive shell with extra environment; resolves to its exit status. */
	shell(env: Readonly<Record<string, string>>): Promise<number>;
}

export interface HandoffOptions {
	readonly bwPath?: string;
	readonly shellPath?: string;
}

export function bitwardenHandoff(options: HandoffOptions = {}): Handoff {
	const bw = options.bwPath ?? 'bw';

	return {
		unlock: (masterPassword) =>
			new Promise((resolve, reject) => {
				const child = spawn(bw, ['unlock', '--raw', '--passwordenv', PASSWORD_ENV], {
					env: { ...process.env, [PASSWORD_ENV]: masterPassword },
					stdio: ['ignore', 'pipe', 'inherit'],
				});

				let stdout = '';
				child.stdout.setEncoding('utf-8');
				child.stdout.on('data', (chunk: string) => {
					stdout += chunk;
				});

				child.on('error', (error: NodeJS.ErrnoException) => {
					reject(
						error.code === 'ENOENT'
							? new Error(`${bw} not found; install the Bitwarden CLI`)
							: error,
					);
				});
				child.on('close', (code) => {
					const session = stdout.trim();
					if (code === 0 && session.length > 0) {
						resolve(session);
						return;
					}
					reject(new Error(`bw unlock exited with code ${code ?? 'unknown'}`));
				});
			}),

		shell: (env) =>
			new Promise((resolve, reject) => {
				const shell = options.shellPath ?? process.env.SHELL ?? '/bin/sh';
				const child = spawn(shell, [], { env: { ...process.env, ...env }, stdio: 'inherit' });
				child.on('error', reject);
				child.on('close', (code) => resolve(code ?? 0));
			}),
	};
}
