export { createProgram } from './program.js';
export { createContext, VAULT_CONTEXT } from './context.js';
export type { GlobalOptions, VaultContext } from './context.js';
export { resolveVaultConfig, VAULT_STORE_FILE } from './config.js';
export { bitwardenHandoff, PASSWORD_ENV, SESSION_ENV } from './handoff.js';
export type { Handoff, HandoffOptions } from './handoff.js';
export { promptConfirm, promptHidden } from './prompt.js';

export { enroll, enrollCommand } from './commands/enroll.command.js';
export { show, showCommand } from './commands/show.command.js';
export { unlock, unlockCommand } from './commands/unlock.command.js';
export { remove, removeCommand } from './commands/remove.command.js';
export { list, listCommand } from './commands/list.command.js';
