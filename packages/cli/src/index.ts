/**
 * @runelock/cli - Interactive front end
 */

export { COMMANDS, helpText, parseCommand, type CommandSpec, type SolverCommand } from './command.js';
export { CliOptionsSchema, USAGE, parseOptions, type CliOptions } from './options.js';
export { DEFAULT_LOCK_PATH, loadLock } from './lock-loader.js';
export {
  renderCounts,
  renderGrid,
  renderRings,
  renderState,
  renderTree,
  renderValidation,
} from './render.js';
export { Session, runSession, type SessionReply } from './session.js';
