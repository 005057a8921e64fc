/**
 * CLI module, a thin wrapper over core.
 * Parses arguments, delegates to core, handles exit codes.
 */

export {
  registerDashboardCommand,
  registerInventoryCommand,
  registerOfferCommand,
  registerStatsCommand,
} from './run.js';
export { mapKey, terminalInput } from './keys.js';
export type { KeyPress } from './keys.js';
