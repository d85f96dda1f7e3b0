/**
 * Command handler fixture: a room with two servers, one of them unreachable
 */

import { defaultCompatibilityTable } from '../../src/domain/compatibility.js';
import type { CommandDeps } from '../../src/handlers/commands/shared.js';
import { BatchProber } from '../../src/services/BatchProber.js';
import { RoomResultsStore } from '../../src/services/RoomResultsStore.js';
import type { RoomCommandPayload } from '../../src/types.js';
import { createTestLogger, FakeMessenger, ok, StaticProbe, synapse } from './helpers.js';

export const ROOM = '!room:example.test';

export const logger = createTestLogger();

export function command(subcommand: string | undefined, args: string[] = [], eventId = '$command'): RoomCommandPayload {
  return {
    eventId,
    roomId: ROOM,
    sender: '@admin:example.test',
    command: 'servers',
    subcommand,
    args,
    timestamp: 1_700_000_000_000,
  };
}

export interface CommandFixture {
  messenger: FakeMessenger;
  probe: StaticProbe;
  store: RoomResultsStore;
  deps: CommandDeps;
}

/** one.test (two members) answers Synapse 1.60.0, bad.test cannot be reached */
export function createCommandFixture(): CommandFixture {
  const messenger = new FakeMessenger();
  messenger.members = ['@a:one.test', '@b:one.test', '@c:bad.test'];
  const probe = new StaticProbe(new Map([['one.test', ok(synapse('1.60.0'))]]));
  const store = new RoomResultsStore(logger);
  return {
    messenger,
    probe,
    store,
    deps: {
      messenger,
      batchProber: new BatchProber(probe, logger),
      store,
      table: defaultCompatibilityTable,
    },
  };
}

/** Published summary for the fixture room with one.test on the given Synapse version */
export function fixtureSummary(version: string): string {
  return (
    '### Versions\n\n' +
    `* 1 server with 2 members on Synapse ${version}\n\n` +
    '<details><summary>1 server failed</summary>\n\n' +
    "* bad.test (1 member): Server couldn't be reached\n\n" +
    '</details>'
  );
}
