#!/usr/bin/env node
import 'reflect-metadata';
import { isatty } from 'node:tty';
import { runCli } from './cli/index.js';

if (process.argv.length <= 2 && isatty(0)) {
	// Interactive terminal with no args → show help
	process.argv.push('--help');
}

await runCli();
