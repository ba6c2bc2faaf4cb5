import chalk, { type ChalkInstance } from 'chalk';

// ---------------------------------------------------------------------------
// Palette
//
// Monochrome by default: bold for emphasis, dim for secondary.
// Color only where it carries meaning.
// ---------------------------------------------------------------------------

/** Success: checkmarks, sealed secrets. */
export const success: ChalkInstance = chalk.hex('#22c55e');

/** Danger: errors, removals. */
export const danger: ChalkInstance = chalk.hex('#ef4444');

/** Muted: secondary text, labels, separators. */
export const dim: ChalkInstance = chalk.dim;

export const bold: ChalkInstance = chalk.bold;

// ---------------------------------------------------------------------------
// Composite helpers
// ---------------------------------------------------------------------------

export function brandDot(active: boolean): string {
	return active ? '●' : dim('○');
}

export function successMark(text: string): string {
	return `${success('✓')} ${text}`;
}

export function failMark(text: string): string {
	return `${danger('✕')} ${text}`;
}

export const BRAND_BANNER = [
	'',
	`   ${bold('hwseal')}  ${dim('Secrets that only open with your token plugged in.')}`,
	'',
].join('\n');

// ---------------------------------------------------------------------------
// @inquirer/prompts theme
//
// Pass as `theme` option to confirm() and password()
// ---------------------------------------------------------------------------

export const promptTheme = {
	prefix: {
		idle: bold('?'),
		done: success('✓'),
	},
	style: {
		answer: (text: string) => bold(text),
		highlight: (text: string) => bold(text),
		key: (text: string) => bold(`<${text}>`),
		description: (text: string) => dim(text),
	},
};

export function plural(count: number, noun: string): string {
	return `${count} ${noun}${count === 1 ? '' : 's'}`;
}
