export * from './types/index.js';
export * from './interfaces/index.js';
export * from './errors/index.js';
export { DuplicatePolicy } from './enums/duplicate-policy.js';
export { EXIT_CODES, EXIT_UNEXPECTED, FailureCode } from './enums/failure-code.js';
