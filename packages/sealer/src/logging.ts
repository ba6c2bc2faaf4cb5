import { Logger } from '@nestjs/common';

export const VERBOSE_LEVELS = ['log', 'warn', 'error', 'debug'] as const;

/** Nest logging stays off unless --verbose is given. */
export function configureLogging(verbose: boolean): void {
	Logger.overrideLogger(verbose ? [...VERBOSE_LEVELS] : false);
}
