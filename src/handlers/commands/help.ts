import type { Logger } from 'pino';
import { plainNotice } from '../../messages/common.js';
import { USAGE_TEXT } from '../../messages/reports.js';
import type { RoomCommandPayload } from '../../types.js';
import type { CommandDeps } from './shared.js';

export function createHelpHandler(deps: Pick<CommandDeps, 'messenger'>) {
  return async function handleHelp(payload: RoomCommandPayload, _logger: Logger): Promise<void> {
    await deps.messenger.sendNotice(payload.roomId, plainNotice(USAGE_TEXT), payload.eventId);
  };
}
