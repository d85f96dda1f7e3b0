/**
 * !servers match <software> [operator] [version]
 */

import type { Logger } from 'pino';
import { InvalidFilterExpressionError } from '../../domain/errors.js';
import { parseVersionFilter, type VersionFilter } from '../../domain/filter.js';
import { plainNotice } from '../../messages/common.js';
import { buildMatchNotice, RESULTS_UNAVAILABLE_TEXT } from '../../messages/reports.js';
import { matchServers } from '../../services/aggregate.js';
import type { RoomCommandPayload } from '../../types.js';
import { createBatchRun, type CommandDeps } from './shared.js';

export function createMatchHandler(deps: CommandDeps) {
  return async function handleMatch(payload: RoomCommandPayload, logger: Logger): Promise<void> {
    const { messenger, store } = deps;
    const { roomId, eventId } = payload;

    let filter: VersionFilter;
    try {
      filter = parseVersionFilter(payload.args);
    } catch (error) {
      if (error instanceof InvalidFilterExpressionError) {
        await messenger.sendNotice(roomId, plainNotice(error.message), eventId);
        return;
      }
      throw error;
    }

    const batch = await store.cachedOrRun(roomId, createBatchRun(deps, payload, logger));
    if (!batch) {
      await messenger.sendNotice(roomId, plainNotice(RESULTS_UNAVAILABLE_TEXT), eventId);
      return;
    }

    const matches = matchServers(batch, filter);
    logger.debug({ software: filter.software, operator: filter.operator, matches: matches.length }, 'Match evaluated');
    await messenger.sendNotice(roomId, buildMatchNotice(matches), eventId);
  };
}
