import { describe, it, expect, vi } from 'vitest';
import {
  createCommandRouter,
  parseRoomCommand,
  resolveCommand,
  type CommandHandler,
  type CommandName,
} from '../../src/handlers/router.js';
import { GENERIC_FAILURE_TEXT, USAGE_TEXT } from '../../src/messages/reports.js';
import type { RoomCommandPayload } from '../../src/types.js';
import { createTestLogger, FakeMessenger } from '../fixtures/helpers.js';

const logger = createTestLogger();

function message(body: string) {
  return {
    eventId: '$msg',
    roomId: '!room:example.test',
    sender: '@user:example.test',
    body,
    timestamp: 1_700_000_000_000,
  };
}

describe('parseRoomCommand', () => {
  it('parses a command word with subcommand and arguments', () => {
    expect(parseRoomCommand(message('!servers  MATCH Synapse >= 1.60'))).toEqual({
      eventId: '$msg',
      roomId: '!room:example.test',
      sender: '@user:example.test',
      command: 'servers',
      subcommand: 'match',
      args: ['Synapse', '>=', '1.60'],
      timestamp: 1_700_000_000_000,
    });
  });

  it.each(['!versions', '!server', '!Version', '  !servers  '])('accepts %s', (body) => {
    expect(parseRoomCommand(message(body))?.subcommand).toBeUndefined();
  });

  it.each(['servers', 'hello !servers', '!serverz', '!', ''])('ignores %j', (body) => {
    expect(parseRoomCommand(message(body))).toBeNull();
  });
});

describe('resolveCommand', () => {
  function payload(subcommand?: string): RoomCommandPayload {
    return { ...message(''), command: 'servers', subcommand, args: [] };
  }

  it.each([
    [undefined, 'servers'],
    ['check', 'test'],
    ['version', 'test'],
    ['recheck', 'retest'],
    ['upgrade', 'upgrade'],
    ['help', 'help'],
    ['constructor', undefined],
  ])('maps %s to %s', (subcommand, expected) => {
    expect(resolveCommand(payload(subcommand))).toBe(expected);
  });
});

describe('createCommandRouter', () => {
  function setup(handlers: Array<[CommandName, CommandHandler]>) {
    const messenger = new FakeMessenger();
    const dispatch = createCommandRouter(messenger, new Map(handlers));
    return { messenger, dispatch };
  }

  function command(body: string): RoomCommandPayload {
    const parsed = parseRoomCommand(message(body));
    if (!parsed) throw new Error(`not a command: ${body}`);
    return parsed;
  }

  it('marks the command read and runs the matching handler', async () => {
    const servers = vi.fn<CommandHandler>(async () => undefined);
    const { messenger, dispatch } = setup([['servers', servers]]);

    await dispatch(command('!servers'), logger);

    expect(messenger.read).toEqual(['$msg']);
    expect(servers).toHaveBeenCalledTimes(1);
    expect(messenger.sent).toEqual([]);
  });

  it('answers unknown subcommands with usage', async () => {
    const { messenger, dispatch } = setup([]);

    await dispatch(command('!servers frobnicate'), logger);

    expect(messenger.sent).toEqual([
      { roomId: '!room:example.test', content: { body: USAGE_TEXT }, replyTo: '$msg' },
    ]);
  });

  it('replies with a generic failure when a handler throws', async () => {
    const { messenger, dispatch } = setup([
      [
        'test',
        async () => {
          throw new Error('probe exploded');
        },
      ],
    ]);

    await expect(dispatch(command('!servers test one.test'), logger)).resolves.toBeUndefined();
    expect(messenger.sentBodies()).toEqual([GENERIC_FAILURE_TEXT]);
  });

  it('still runs the handler when the read receipt fails', async () => {
    const help = vi.fn<CommandHandler>(async () => undefined);
    const { messenger, dispatch } = setup([['help', help]]);
    messenger.markRead.mockRejectedValueOnce(new Error('M_UNKNOWN'));

    await dispatch(command('!servers help'), logger);

    expect(help).toHaveBeenCalledTimes(1);
  });
});
