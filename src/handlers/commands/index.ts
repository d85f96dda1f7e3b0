/**
 * Command Handlers Barrel Export
 *
 * Exports all command handler factories for registration.
 */

export { createServersHandler } from './servers.js';
export { createTestHandler } from './test.js';
export { createRetestHandler } from './retest.js';
export { createUpgradeHandler } from './upgrade.js';
export { createMatchHandler } from './match.js';
export { createHelpHandler } from './help.js';
export { createBatchRun, publishBatch, type CommandDeps } from './shared.js';
