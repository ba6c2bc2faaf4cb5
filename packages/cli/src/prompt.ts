import { stderr, stdin } from 'node:process';
import { createInterface } from 'node:readline';
import { Writable } from 'node:stream';

export interface PromptStreams {
	readonly input: NodeJS.ReadableStream;
	readonly output: NodeJS.WritableStream;
	/** Raw keypress handling; Ctrl-C only reaches the prompt in this mode. */
	readonly terminal: boolean;
}

const defaultStreams = (): PromptStreams => ({
	input: stdin,
	output: stderr,
	terminal: stdin.isTTY === true,
});

/**
 * Prompt for hidden input (e.g. a master password). Typed characters are not
 * echoed. Resolves to `null` on Ctrl-C or end of input.
 *
 * Prompts go to stderr so stdout carries nothing but command output.
 */
export function promptHidden(
	question: string,
	streams: PromptStreams = defaultStreams(),
): Promise<string | null> {
	return new Promise((resolve) => {
		let muted = false;
		const output = new Writable({
			write(chunk, encoding, callback) {
				if (!muted) streams.output.write(chunk, encoding);
				callback();
			},
		});

		const rl = createInterface({ input: streams.input, output, terminal: streams.terminal });
		let answered = false;

		rl.on('SIGINT', () => rl.close());
		rl.on('close', () => {
			if (answered) return;
			streams.output.write('\n');
			resolve(null);
		});

		rl.question(question, (answer) => {
			answered = true;
			streams.output.write('\n');
			rl.close();
			resolve(answer);
		});
		muted = true;
	});
}

/** y/N question; anything but an explicit yes declines. */
export function promptConfirm(
	question: string,
	streams: PromptStreams = defaultStreams(),
): Promise<boolean> {
	return new Promise((resolve) => {
		const rl = createInterface({
			input: streams.input,
			output: streams.output,
			terminal: streams.terminal,
		});
		let answered = false;

		rl.on('SIGINT', () => rl.close());
		rl.on('close', () => {
			if (!answered) resolve(false);
		});

		rl.question(`${question} [y/N] `, (answer) => {
			answered = true;
			rl.close();
			resolve(/^y(es)?$/i.test(answer.trim()));
		});
	});
}
