/**
 * !servers retest <server>
 *
 * Re-probes one server from the room's stored results and edits the
 * published summary when the outcome changed.
 */

import type { Logger } from 'pino';
import { plainNotice } from '../../messages/common.js';
import {
  buildReprobeRejectionNotice,
  buildRetestingNotice,
  describeReprobeChange,
  USAGE_TEXT,
} from '../../messages/reports.js';
import type { RoomCommandPayload } from '../../types.js';
import { publishBatch, type CommandDeps } from './shared.js';

export function createRetestHandler(deps: Pick<CommandDeps, 'messenger' | 'batchProber' | 'store'>) {
  return async function handleRetest(payload: RoomCommandPayload, logger: Logger): Promise<void> {
    const { messenger, batchProber, store } = deps;
    const { roomId, eventId } = payload;
    const [serverName] = payload.args;

    if (!serverName) {
      await messenger.sendNotice(roomId, plainNotice(USAGE_TEXT), eventId);
      return;
    }

    const begin = store.beginReprobe(roomId, serverName);
    if (!begin.ok) {
      logger.debug({ serverName, reason: begin.reason }, 'Re-test rejected');
      await messenger.sendNotice(roomId, buildReprobeRejectionNotice(begin.reason), eventId);
      return;
    }

    const status = await messenger.sendNotice(roomId, buildRetestingNotice(serverName), eventId);
    const outcome = await batchProber.probeOne(serverName);
    const result = await store.completeReprobe(begin.ticket, outcome, (batch) =>
      publishBatch(messenger, roomId, batch, eventId)
    );
    logger.info({ serverName, change: result.change.kind, republished: result.republished }, 'Server re-tested');

    const reply = plainNotice(describeReprobeChange(serverName, result.change));
    if (status.success && status.eventId) {
      await messenger.editNotice(roomId, status.eventId, reply);
    } else {
      await messenger.sendNotice(roomId, reply, eventId);
    }
  };
}
