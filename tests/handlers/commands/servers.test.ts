/**
 * Servers Command Handler Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { createServersHandler } from '../../../src/handlers/commands/servers.js';
import { createBatchRun } from '../../../src/handlers/commands/shared.js';
import { ALREADY_RUNNING_TEXT } from '../../../src/messages/reports.js';
import { command, createCommandFixture, fixtureSummary, logger, ROOM, type CommandFixture } from '../../fixtures/commands.js';

describe('servers command handler', () => {
  let fixture: CommandFixture;

  beforeEach(() => {
    fixture = createCommandFixture();
  });

  it('reports progress and edits the loading message into the summary', async () => {
    const { messenger, store, deps } = fixture;

    await createServersHandler(deps)(command(undefined), logger);

    expect(messenger.sent).toEqual([{ roomId: ROOM, content: { body: 'Loading member list...' }, replyTo: '$command' }]);
    expect(messenger.edits.map((edit) => [edit.eventId, edit.content.body])).toEqual([
      ['$event-1', 'Member list loaded, found 3 members on 2 servers. Now running federation tests'],
      ['$event-1', fixtureSummary('1.60.0')],
    ]);
    expect(store.get(ROOM)?.messageId).toBe('$event-1');
    expect(store.state(ROOM)).toBe('ready');
  });

  it('sends the summary as a new message when the loading notice could not be sent', async () => {
    const { messenger, store, deps } = fixture;
    messenger.sendNotice.mockResolvedValueOnce({ success: false, error: 'forbidden' });

    await createServersHandler(deps)(command(undefined), logger);

    expect(messenger.edits).toHaveLength(0);
    expect(messenger.sentBodies()).toEqual([
      'Member list loaded, found 3 members on 2 servers. Now running federation tests',
      fixtureSummary('1.60.0'),
    ]);
    expect(store.get(ROOM)?.messageId).toBe('$event-2');
  });

  it('turns away a second request while the room is being tested', async () => {
    const { messenger, probe, deps } = fixture;
    const handler = createServersHandler(deps);

    await Promise.all([
      handler(command(undefined, [], '$first'), logger),
      handler(command(undefined, [], '$second'), logger),
    ]);

    expect(messenger.sent.filter((notice) => notice.content.body === ALREADY_RUNNING_TEXT)).toEqual([
      { roomId: ROOM, content: { body: ALREADY_RUNNING_TEXT }, replyTo: '$second' },
    ]);
    expect(probe.calls).toEqual(['one.test', 'bad.test']);
  });

  it('lets a member list failure reach the router', async () => {
    const { messenger, store, deps } = fixture;
    messenger.getJoinedMembers.mockRejectedValue(new Error('M_FORBIDDEN'));

    await expect(createBatchRun(deps, command(undefined), logger)()).rejects.toThrow('M_FORBIDDEN');
    await expect(createServersHandler(deps)(command(undefined), logger)).rejects.toThrow('M_FORBIDDEN');
    expect(store.state(ROOM)).toBe('absent');
  });
});
