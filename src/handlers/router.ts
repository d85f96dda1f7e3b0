/**
 * Command Router
 *
 * Turns room messages into command payloads and hands them to the handler
 * registered for the subcommand. Handler failures are logged and answered
 * with a generic reply so one bad command never reaches the sync loop.
 */

import type { Logger } from 'pino';
import { recordCommandProcessed } from '../infrastructure/metrics.js';
import { GENERIC_FAILURE_TEXT, USAGE_TEXT } from '../messages/reports.js';
import { plainNotice } from '../messages/common.js';
import type { RoomCommandPayload, RoomMessenger } from '../types.js';

export type CommandHandler = (payload: RoomCommandPayload, logger: Logger) => Promise<void>;

export type CommandName = 'servers' | 'test' | 'retest' | 'upgrade' | 'match' | 'help';

/** Words that address the bot, without the leading "!" */
export const COMMAND_WORDS: readonly string[] = ['servers', 'versions', 'server', 'version'];

export const SUBCOMMANDS: ReadonlyMap<string, CommandName> = new Map<string, CommandName>([
  ['test', 'test'],
  ['check', 'test'],
  ['version', 'test'],
  ['retest', 'retest'],
  ['recheck', 'retest'],
  ['upgrade', 'upgrade'],
  ['match', 'match'],
  ['help', 'help'],
]);

export interface RoomMessage {
  eventId: string;
  roomId: string;
  sender: string;
  body: string;
  timestamp: number;
}

/**
 * Parse a text message into a command payload, or null when the message is
 * not addressed to the bot.
 */
export function parseRoomCommand(message: RoomMessage): RoomCommandPayload | null {
  const [head, subcommand, ...args] = message.body.trim().split(/\s+/);
  if (!head?.startsWith('!')) return null;

  const command = head.slice(1).toLowerCase();
  if (!COMMAND_WORDS.includes(command)) return null;

  return {
    eventId: message.eventId,
    roomId: message.roomId,
    sender: message.sender,
    command,
    subcommand: subcommand?.toLowerCase(),
    args,
    timestamp: message.timestamp,
  };
}

export function resolveCommand(payload: RoomCommandPayload): CommandName | undefined {
  if (payload.subcommand === undefined) return 'servers';
  return SUBCOMMANDS.get(payload.subcommand);
}

/**
 * Create the dispatcher the sync consumer calls for every command
 */
export function createCommandRouter(
  messenger: RoomMessenger,
  handlers: ReadonlyMap<CommandName, CommandHandler>
): CommandHandler {
  return async function dispatch(payload: RoomCommandPayload, logger: Logger): Promise<void> {
    const name = resolveCommand(payload);
    const log = logger.child({
      command: name ?? payload.subcommand,
      roomId: payload.roomId,
      sender: payload.sender,
    });

    try {
      await messenger.markRead(payload.roomId, payload.eventId);
    } catch (error) {
      log.warn({ error }, 'Failed to mark command as read');
    }

    const handler = name ? handlers.get(name) : undefined;
    if (!name || !handler) {
      log.debug({ subcommand: payload.subcommand }, 'Unknown subcommand');
      await messenger.sendNotice(payload.roomId, plainNotice(USAGE_TEXT), payload.eventId);
      return;
    }

    const startedAt = Date.now();
    try {
      await handler(payload, log);
      recordCommandProcessed(name, 'success', (Date.now() - startedAt) / 1000);
    } catch (error) {
      recordCommandProcessed(name, 'error', (Date.now() - startedAt) / 1000);
      log.error({ error }, 'Error handling command');
      await messenger.sendNotice(payload.roomId, plainNotice(GENERIC_FAILURE_TEXT), payload.eventId);
    }
  };
}
