import 'reflect-metadata';
import { createContext } from './context.js';
import { createProgram } from './program.js';

// Ctrl-C aborts a pending token wait instead of killing the process, so the
// store lock is always released.
const controller = new AbortController();
process.on('SIGINT', () => controller.abort());

await createProgram(createContext(controller.signal)).parseAsync();
