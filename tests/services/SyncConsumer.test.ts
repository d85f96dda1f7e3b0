import { describe, it, expect, vi, afterEach } from 'vitest';
import type { CommandHandler } from '../../src/handlers/router.js';
import { syncResponseSchema, type SyncRequest, type SyncResponse } from '../../src/services/MatrixRest.js';
import { SyncConsumer, type SyncClient } from '../../src/services/SyncConsumer.js';
import { createTestLogger } from '../fixtures/helpers.js';

const BOT = '@bot:example.test';
const ROOM = '!room:example.test';

function textMessage(eventId: string, sender: string, body: string, msgtype = 'm.text') {
  return {
    type: 'm.room.message',
    event_id: eventId,
    sender,
    origin_server_ts: 1_700_000_000_000,
    content: { msgtype, body },
  };
}

function syncResponse(nextBatch: string, events: unknown[] = [], invites: string[] = []): SyncResponse {
  return syncResponseSchema.parse({
    next_batch: nextBatch,
    rooms: {
      join: events.length > 0 ? { [ROOM]: { timeline: { events } } } : {},
      invite: Object.fromEntries(invites.map((roomId) => [roomId, {}])),
    },
  });
}

/** A long poll that only ends when the consumer aborts it */
function hang(request: SyncRequest): Promise<SyncResponse> {
  return new Promise((_resolve, reject) => {
    request.signal?.addEventListener('abort', () => reject(new Error('aborted')));
  });
}

function createClient(responses: Array<SyncResponse | Error>) {
  const sync = vi.fn<SyncClient['sync']>(async (request) => {
    const next = responses.shift();
    if (next === undefined) return hang(request);
    if (next instanceof Error) throw next;
    return next;
  });
  const client = {
    whoami: vi.fn<SyncClient['whoami']>(async () => BOT),
    joinRoom: vi.fn<SyncClient['joinRoom']>(async (roomId) => roomId),
    sync,
  } satisfies SyncClient;
  return client;
}

describe('SyncConsumer', () => {
  let consumer: SyncConsumer | undefined;

  afterEach(async () => {
    await consumer?.stop();
    consumer = undefined;
  });

  it('skips the backlog and joins rooms it was invited to', async () => {
    const client = createClient([
      syncResponse('s1', [textMessage('$old', '@user:example.test', '!servers')], ['!invited:example.test']),
    ]);
    const dispatch = vi.fn<CommandHandler>(async () => undefined);
    consumer = new SyncConsumer(client, dispatch, { timeoutMs: 30000 }, createTestLogger());

    await consumer.start();

    expect(client.sync.mock.calls[0]?.[0]).toEqual({ timeoutMs: 0 });
    expect(client.joinRoom).toHaveBeenCalledWith('!invited:example.test');
    await vi.waitFor(() => expect(client.sync).toHaveBeenCalledTimes(2));
    expect(client.sync.mock.calls[1]?.[0]).toMatchObject({ since: 's1', timeoutMs: 30000 });
    expect(dispatch).not.toHaveBeenCalled();
    expect(consumer.getStats().running).toBe(true);
  });

  it('dispatches commands from other users only', async () => {
    const client = createClient([
      syncResponse('s1'),
      syncResponse('s2', [
        textMessage('$own', BOT, '!servers'),
        textMessage('$notice', '@user:example.test', '!servers', 'm.notice'),
        textMessage('$chat', '@user:example.test', 'hello there'),
        { type: 'm.room.message', sender: '@user:example.test' },
        { type: 'm.reaction', event_id: '$react', sender: '@user:example.test', content: {} },
        textMessage('$cmd', '@user:example.test', '!servers test one.test'),
      ]),
    ]);
    const dispatch = vi.fn<CommandHandler>(async () => undefined);
    consumer = new SyncConsumer(client, dispatch, { timeoutMs: 30000 }, createTestLogger());

    await consumer.start();
    await vi.waitFor(() => expect(consumer?.getStats().processed).toBe(1));

    expect(dispatch).toHaveBeenCalledTimes(1);
    expect(dispatch.mock.calls[0]?.[0]).toEqual({
      eventId: '$cmd',
      roomId: ROOM,
      sender: '@user:example.test',
      command: 'servers',
      subcommand: 'test',
      args: ['one.test'],
      timestamp: 1_700_000_000_000,
    });
  });

  it('counts failed dispatches without stopping', async () => {
    const client = createClient([syncResponse('s1'), syncResponse('s2', [textMessage('$cmd', '@user:example.test', '!servers')])]);
    const dispatch = vi.fn<CommandHandler>(async () => {
      throw new Error('handler crashed');
    });
    consumer = new SyncConsumer(client, dispatch, { timeoutMs: 30000 }, createTestLogger());

    await consumer.start();
    await vi.waitFor(() => expect(consumer?.getStats().errored).toBe(1));

    expect(consumer.getStats()).toMatchObject({ processed: 0, running: true });
  });

  it('retries after a failed sync with the same token', async () => {
    const client = createClient([syncResponse('s1'), new Error('connection reset')]);
    consumer = new SyncConsumer(client, vi.fn<CommandHandler>(), { timeoutMs: 30000, retryDelayMs: 1 }, createTestLogger());

    await consumer.start();
    await vi.waitFor(() => expect(client.sync).toHaveBeenCalledTimes(3));

    expect(client.sync.mock.calls[2]?.[0]).toMatchObject({ since: 's1' });
  });

  it('waits for running commands when stopped', async () => {
    let finish: () => void = () => undefined;
    const dispatch = vi.fn<CommandHandler>(
      () =>
        new Promise<void>((resolve) => {
          finish = resolve;
        })
    );
    const client = createClient([syncResponse('s1'), syncResponse('s2', [textMessage('$cmd', '@user:example.test', '!servers')])]);
    const running = new SyncConsumer(client, dispatch, { timeoutMs: 30000 }, createTestLogger());

    await running.start();
    await vi.waitFor(() => expect(dispatch).toHaveBeenCalledTimes(1));

    let stopped = false;
    const stopping = running.stop().then(() => {
      stopped = true;
    });
    await new Promise((resolve) => setTimeout(resolve, 5));
    expect(stopped).toBe(false);

    finish();
    await stopping;
    expect(running.getStats()).toMatchObject({ processed: 1, running: false });
  });
});
