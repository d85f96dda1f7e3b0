/**
 * !servers test <server>
 *
 * Ad-hoc probe of one server. Nothing is stored.
 */

import type { Logger } from 'pino';
import { plainNotice } from '../../messages/common.js';
import { buildTestResultText, USAGE_TEXT } from '../../messages/reports.js';
import type { RoomCommandPayload } from '../../types.js';
import type { CommandDeps } from './shared.js';

export function createTestHandler(deps: Pick<CommandDeps, 'messenger' | 'batchProber'>) {
  return async function handleTest(payload: RoomCommandPayload, logger: Logger): Promise<void> {
    const { roomId, eventId } = payload;
    const [serverName] = payload.args;

    if (!serverName) {
      await deps.messenger.sendNotice(roomId, plainNotice(USAGE_TEXT), eventId);
      return;
    }

    const outcome = await deps.batchProber.probeOne(serverName);
    logger.info({ serverName, ok: outcome.ok }, 'Server tested');
    await deps.messenger.sendNotice(roomId, plainNotice(buildTestResultText(serverName, outcome)), eventId);
  };
}
