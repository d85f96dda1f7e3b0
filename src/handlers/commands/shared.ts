/**
 * Pieces shared by the command handlers: their dependencies, the room batch
 * run and publishing of the batch summary.
 */

import type { Logger } from 'pino';
import type { CompatibilityTable } from '../../domain/compatibility.js';
import { buildLoadingNotice, buildMembersLoadedNotice, buildResultsNotice } from '../../messages/results.js';
import { membersByServer, type BatchProber, type BatchResult } from '../../services/BatchProber.js';
import type { RoomResultsStore } from '../../services/RoomResultsStore.js';
import type { RoomCommandPayload, RoomMessenger } from '../../types.js';

export interface CommandDeps {
  messenger: RoomMessenger;
  batchProber: BatchProber;
  store: RoomResultsStore;
  table: CompatibilityTable;
}

/**
 * Publish the batch summary: edit the existing message in place, or send a
 * new one and remember its ID. Callers hold the batch's publish lock once the
 * batch is visible to other commands.
 */
export async function publishBatch(
  messenger: RoomMessenger,
  roomId: string,
  batch: BatchResult,
  replyTo: string
): Promise<void> {
  const content = buildResultsNotice(batch);
  if (batch.messageId) {
    const result = await messenger.editNotice(roomId, batch.messageId, content);
    if (result.success) return;
  }
  const result = await messenger.sendNotice(roomId, content, replyTo);
  if (result.success && result.eventId) {
    batch.messageId = result.eventId;
  }
}

/**
 * The batch run for a room: load members, report progress, probe every
 * server and publish the summary.
 */
export function createBatchRun(
  deps: CommandDeps,
  payload: RoomCommandPayload,
  log: Logger
): () => Promise<BatchResult> {
  const { messenger, batchProber } = deps;
  const { roomId, eventId } = payload;

  return async () => {
    const loading = await messenger.sendNotice(roomId, buildLoadingNotice(), eventId);
    const progressId = loading.success ? loading.eventId : undefined;

    const members = membersByServer(await messenger.getJoinedMembers(roomId));
    const userCount = [...members.values()].reduce((sum, users) => sum + users.length, 0);
    log.info({ users: userCount, servers: members.size }, 'Member list loaded');

    const progress = buildMembersLoadedNotice(userCount, members.size);
    if (progressId) {
      await messenger.editNotice(roomId, progressId, progress);
    } else {
      await messenger.sendNotice(roomId, progress, eventId);
    }

    const batch = await batchProber.probeAll(members);
    batch.messageId = progressId;
    await publishBatch(messenger, roomId, batch, eventId);
    return batch;
  };
}
