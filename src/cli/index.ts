/**
 * CLI module — thin wrapper over the client factory.
 * Parses arguments, delegates, sets exit codes.
 */

export { registerInspectCommand, registerCheckCommand } from './commands.js';
