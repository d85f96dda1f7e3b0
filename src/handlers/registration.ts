/**
 * Handler Registration Module
 *
 * Builds the subcommand registry the command router dispatches into.
 */

import {
  createHelpHandler,
  createMatchHandler,
  createRetestHandler,
  createServersHandler,
  createTestHandler,
  createUpgradeHandler,
  type CommandDeps,
} from './commands/index.js';
import type { CommandHandler, CommandName } from './router.js';

/**
 * Register all command handlers.
 * Call this once during startup.
 */
export function registerAllCommandHandlers(deps: CommandDeps): Map<CommandName, CommandHandler> {
  const registry = new Map<CommandName, CommandHandler>();

  registry.set('servers', createServersHandler(deps));
  registry.set('test', createTestHandler(deps));
  registry.set('retest', createRetestHandler(deps));
  registry.set('upgrade', createUpgradeHandler(deps));
  registry.set('match', createMatchHandler(deps));
  registry.set('help', createHelpHandler(deps));

  return registry;
}
