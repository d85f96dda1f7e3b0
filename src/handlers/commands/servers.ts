/**
 * !servers Command Handler
 *
 * Probes every server in the room and publishes the version summary.
 * A second request while a batch is running is turned away.
 */

import type { Logger } from 'pino';
import { plainNotice } from '../../messages/common.js';
import { ALREADY_RUNNING_TEXT } from '../../messages/reports.js';
import type { RoomCommandPayload } from '../../types.js';
import { createBatchRun, type CommandDeps } from './shared.js';

export function createServersHandler(deps: CommandDeps) {
  return async function handleServers(payload: RoomCommandPayload, logger: Logger): Promise<void> {
    const { roomId, eventId } = payload;

    if (deps.store.isRunning(roomId)) {
      await deps.messenger.sendNotice(roomId, plainNotice(ALREADY_RUNNING_TEXT), eventId);
      return;
    }

    const batch = await deps.store.runOrJoin(roomId, createBatchRun(deps, payload, logger));
    logger.info({ servers: batch.members.size, failed: batch.errors.size }, 'Room test finished');
  };
}
