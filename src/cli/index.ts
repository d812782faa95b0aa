/**
 * CLI module: thin wrapper over the workflow runner.
 * Parses arguments, delegates, handles exit codes.
 * No business logic lives here.
 */

export { registerRunCommand, registerReadmeCommand, collectVar } from './run.js';
