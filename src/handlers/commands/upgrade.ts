/**
 * !servers upgrade <room version>
 *
 * Reports which servers in the room support a room version. Runs (or waits
 * for) a room test first when there are no stored results.
 */

import type { Logger } from 'pino';
import { plainNotice } from '../../messages/common.js';
import {
  buildUnknownRoomVersionNotice,
  buildUpgradeNotice,
  RESULTS_UNAVAILABLE_TEXT,
  USAGE_TEXT,
} from '../../messages/reports.js';
import { evaluateUpgrade } from '../../services/aggregate.js';
import type { RoomCommandPayload } from '../../types.js';
import { createBatchRun, type CommandDeps } from './shared.js';

export function createUpgradeHandler(deps: CommandDeps) {
  return async function handleUpgrade(payload: RoomCommandPayload, logger: Logger): Promise<void> {
    const { messenger, store, table } = deps;
    const { roomId, eventId } = payload;
    const [roomVersion] = payload.args;

    if (!roomVersion) {
      await messenger.sendNotice(roomId, plainNotice(USAGE_TEXT), eventId);
      return;
    }
    if (!table.isKnownRoomVersion(roomVersion)) {
      await messenger.sendNotice(roomId, buildUnknownRoomVersionNotice(roomVersion, table.roomVersions), eventId);
      return;
    }

    const batch = await store.cachedOrRun(roomId, createBatchRun(deps, payload, logger));
    if (!batch) {
      await messenger.sendNotice(roomId, plainNotice(RESULTS_UNAVAILABLE_TEXT), eventId);
      return;
    }

    const report = evaluateUpgrade(batch, table, roomVersion);
    logger.info(
      { roomVersion, outdated: report.outdated.length, unknown: report.unknown.servers },
      'Upgrade report built'
    );
    await messenger.sendNotice(roomId, buildUpgradeNotice(report, table.updated), eventId);
  };
}
