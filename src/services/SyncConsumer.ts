/**
 * Matrix Sync Consumer
 *
 * Long-polls /sync and turns new room messages into commands. The backlog
 * present at startup is skipped, invites are accepted and the bot's own
 * messages are ignored. Commands run alongside the sync loop so a long room
 * test never delays the next poll.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import type { Logger } from 'pino';
import { parseRoomCommand, type CommandHandler } from '../handlers/router.js';
import type { RoomCommandPayload } from '../types.js';
import { timelineEventSchema, type SyncRequest, type SyncResponse, type TimelineEvent } from './MatrixRest.js';

// --------------------------------------------------------------------------
// Types
// --------------------------------------------------------------------------

export interface SyncClient {
  whoami(): Promise<string>;
  sync(request: SyncRequest): Promise<SyncResponse>;
  joinRoom(roomIdOrAlias: string): Promise<string>;
}

export interface SyncConsumerOptions {
  timeoutMs: number;
  /** Pause after a failed sync before polling again */
  retryDelayMs?: number;
}

export interface SyncConsumerStats {
  processed: number;
  errored: number;
  running: boolean;
  lastSyncAt: number | null;
}

const DEFAULT_RETRY_DELAY_MS = 5000;

// --------------------------------------------------------------------------
// Consumer
// --------------------------------------------------------------------------

export class SyncConsumer {
  private readonly log: Logger;
  private readonly pending = new Set<Promise<void>>();
  private userId: string | null = null;
  private since: string | undefined;
  private running = false;
  private loop: Promise<void> | null = null;
  private controller: AbortController | null = null;
  private processed = 0;
  private errored = 0;
  private lastSyncAt: number | null = null;

  constructor(
    private readonly client: SyncClient,
    private readonly dispatch: CommandHandler,
    private readonly options: SyncConsumerOptions,
    logger: Logger
  ) {
    this.log = logger.child({ component: 'SyncConsumer' });
  }

  /**
   * Resolve the bot's own user ID, skip the backlog and start polling.
   * Resolves once the loop is running.
   */
  async start(): Promise<void> {
    if (this.running) return;

    this.userId = await this.client.whoami();
    const initial = await this.client.sync({ timeoutMs: 0 });
    this.since = initial.next_batch;
    this.lastSyncAt = Date.now();
    await this.acceptInvites(initial);

    this.running = true;
    this.loop = this.run();
    this.log.info({ userId: this.userId }, 'Sync consumer started');
  }

  /**
   * Stop polling and wait for commands already dispatched to finish
   */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    this.controller?.abort();
    await this.loop;
    await Promise.all([...this.pending]);
    this.log.info({ processed: this.processed, errored: this.errored }, 'Sync consumer stopped');
  }

  getStats(): SyncConsumerStats {
    return {
      processed: this.processed,
      errored: this.errored,
      running: this.running,
      lastSyncAt: this.lastSyncAt,
    };
  }

  /**
   * Handle one sync response: join invited rooms, then dispatch commands
   */
  async handleSync(response: SyncResponse): Promise<void> {
    await this.acceptInvites(response);

    for (const [roomId, room] of Object.entries(response.rooms?.join ?? {})) {
      for (const raw of room.timeline?.events ?? []) {
        const parsed = timelineEventSchema.safeParse(raw);
        if (!parsed.success) continue;

        const payload = this.toCommand(roomId, parsed.data);
        if (payload) {
          this.dispatchCommand(payload);
        }
      }
    }
  }

  private async run(): Promise<void> {
    while (this.running) {
      this.controller = new AbortController();
      try {
        const response = await this.client.sync({
          since: this.since,
          timeoutMs: this.options.timeoutMs,
          signal: this.controller.signal,
        });
        this.since = response.next_batch;
        this.lastSyncAt = Date.now();
        await this.handleSync(response);
      } catch (error) {
        if (!this.running) break;
        this.log.error({ error }, 'Sync failed, retrying');
        await sleep(this.options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS);
      }
    }
  }

  private toCommand(roomId: string, event: TimelineEvent): RoomCommandPayload | null {
    if (event.type !== 'm.room.message' || event.sender === this.userId) return null;

    const { msgtype, body } = event.content;
    if (msgtype !== 'm.text' || typeof body !== 'string') return null;

    return parseRoomCommand({
      eventId: event.event_id,
      roomId,
      sender: event.sender,
      body,
      timestamp: event.origin_server_ts ?? Date.now(),
    });
  }

  private dispatchCommand(payload: RoomCommandPayload): void {
    const task: Promise<void> = this.dispatch(payload, this.log)
      .then(
        () => {
          this.processed++;
        },
        (error: unknown) => {
          this.errored++;
          this.log.error({ error, roomId: payload.roomId }, 'Command dispatch failed');
        }
      )
      .finally(() => {
        this.pending.delete(task);
      });
    this.pending.add(task);
  }

  private async acceptInvites(response: SyncResponse): Promise<void> {
    for (const roomId of Object.keys(response.rooms?.invite ?? {})) {
      try {
        await this.client.joinRoom(roomId);
      } catch (error) {
        this.log.warn({ error, roomId }, 'Failed to join invited room');
      }
    }
  }
}
