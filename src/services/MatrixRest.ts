import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import { z } from 'zod';
import { ErrorCodes, MatrixApiError } from '../domain/errors.js';
import { matrixRequests } from '../infrastructure/metrics.js';
import type { NoticeContent, RoomMessenger, SendResult } from '../types.js';

const CLIENT_API = '/_matrix/client/v3';
const HTML_FORMAT = 'org.matrix.custom.html';

// --------------------------------------------------------------------------
// Response Schemas
// --------------------------------------------------------------------------

const matrixErrorSchema = z.object({
  errcode: z.string().optional(),
  error: z.string().optional(),
});

const eventIdResponseSchema = z.object({ event_id: z.string() });
const roomIdResponseSchema = z.object({ room_id: z.string() });
const whoamiResponseSchema = z.object({ user_id: z.string() });
const joinedMembersResponseSchema = z.object({
  joined: z.record(z.unknown()),
});
const emptyResponseSchema = z.object({}).passthrough();

export const timelineEventSchema = z
  .object({
    type: z.string(),
    event_id: z.string(),
    sender: z.string(),
    origin_server_ts: z.number().optional(),
    content: z.record(z.unknown()),
  })
  .passthrough();

export type TimelineEvent = z.infer<typeof timelineEventSchema>;

export const syncResponseSchema = z
  .object({
    next_batch: z.string(),
    rooms: z
      .object({
        join: z
          .record(
            z.object({
              timeline: z
                .object({
                  // Events that fail validation are dropped rather than failing the whole sync
                  events: z.array(z.unknown()).default([]),
                })
                .passthrough()
                .optional(),
            }).passthrough()
          )
          .default({}),
        invite: z.record(z.unknown()).default({}),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export type SyncResponse = z.infer<typeof syncResponseSchema>;

// --------------------------------------------------------------------------
// Message Content
// --------------------------------------------------------------------------

type NoticeBody = {
  msgtype: 'm.notice';
  body: string;
  format?: typeof HTML_FORMAT;
  formatted_body?: string;
};

function noticeBody(content: NoticeContent, prefix = ''): NoticeBody {
  const body: NoticeBody = { msgtype: 'm.notice', body: prefix + content.body };
  if (content.html !== undefined) {
    body.format = HTML_FORMAT;
    body.formatted_body = prefix + content.html;
  }
  return body;
}

/**
 * Content of a new notice, optionally as a reply to another event
 */
export function buildNoticeContent(content: NoticeContent, replyTo?: string): Record<string, unknown> {
  const body: Record<string, unknown> = { ...noticeBody(content) };
  if (replyTo) {
    body['m.relates_to'] = { 'm.in_reply_to': { event_id: replyTo } };
  }
  return body;
}

/**
 * Content replacing an earlier notice. Clients without edit support show the
 * "* "-prefixed fallback.
 */
export function buildEditContent(eventId: string, content: NoticeContent): Record<string, unknown> {
  return {
    ...noticeBody(content, '* '),
    'm.new_content': noticeBody(content),
    'm.relates_to': { rel_type: 'm.replace', event_id: eventId },
  };
}

// --------------------------------------------------------------------------
// Client
// --------------------------------------------------------------------------

export interface MatrixRestOptions {
  homeserverUrl: string;
  accessToken: string;
  fetch?: typeof fetch;
}

export interface SyncRequest {
  since?: string;
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * MatrixRestService talks to the homeserver's client-server API.
 *
 * Key methods:
 * - sendNotice/editNotice: publish and edit bot output (never throw)
 * - getJoinedMembers: room member list (throws MatrixApiError)
 * - joinRoom/markRead/whoami/sync: bot plumbing (throw MatrixApiError)
 */
export class MatrixRestService implements RoomMessenger {
  private readonly log: Logger;
  private readonly fetchFn: typeof fetch;
  private readonly baseUrl: string;

  constructor(
    private readonly options: MatrixRestOptions,
    logger: Logger
  ) {
    this.log = logger.child({ component: 'MatrixRest' });
    this.fetchFn = options.fetch ?? fetch;
    this.baseUrl = options.homeserverUrl.replace(/\/+$/, '') + CLIENT_API;
  }

  /**
   * Send an m.notice to a room
   */
  async sendNotice(roomId: string, content: NoticeContent, replyTo?: string): Promise<SendResult> {
    try {
      const response = await this.request(
        'PUT',
        `/rooms/${encodeURIComponent(roomId)}/send/m.room.message/${randomUUID()}`,
        eventIdResponseSchema,
        buildNoticeContent(content, replyTo)
      );
      this.log.debug({ roomId, eventId: response.event_id }, 'Sent notice');
      return { success: true, eventId: response.event_id };
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      this.log.error({ error, roomId }, 'Failed to send notice');
      return { success: false, error: message };
    }
  }

  /**
   * Replace the content of a notice sent earlier
   */
  async editNotice(roomId: string, eventId: string, content: NoticeContent): Promise<SendResult> {
    try {
      const response = await this.request(
        'PUT',
        `/rooms/${encodeURIComponent(roomId)}/send/m.room.message/${randomUUID()}`,
        eventIdResponseSchema,
        buildEditContent(eventId, content)
      );
      this.log.debug({ roomId, eventId, editEventId: response.event_id }, 'Edited notice');
      return { success: true, eventId: response.event_id };
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      this.log.error({ error, roomId, eventId }, 'Failed to edit notice');
      return { success: false, error: message };
    }
  }

  async getJoinedMembers(roomId: string): Promise<string[]> {
    const response = await this.request(
      'GET',
      `/rooms/${encodeURIComponent(roomId)}/joined_members`,
      joinedMembersResponseSchema
    );
    return Object.keys(response.joined);
  }

  async markRead(roomId: string, eventId: string): Promise<void> {
    await this.request(
      'POST',
      `/rooms/${encodeURIComponent(roomId)}/receipt/m.read/${encodeURIComponent(eventId)}`,
      emptyResponseSchema,
      {}
    );
  }

  async joinRoom(roomIdOrAlias: string): Promise<string> {
    const response = await this.request(
      'POST',
      `/join/${encodeURIComponent(roomIdOrAlias)}`,
      roomIdResponseSchema,
      {}
    );
    this.log.info({ roomId: response.room_id }, 'Joined room');
    return response.room_id;
  }

  async whoami(): Promise<string> {
    const response = await this.request('GET', '/account/whoami', whoamiResponseSchema);
    return response.user_id;
  }

  async sync(request: SyncRequest): Promise<SyncResponse> {
    const params = new URLSearchParams({ timeout: String(request.timeoutMs) });
    if (request.since) {
      params.set('since', request.since);
    }
    return this.request('GET', `/sync?${params.toString()}`, syncResponseSchema, undefined, request.signal);
  }

  // --------------------------------------------------------------------------
  // Transport
  // --------------------------------------------------------------------------

  private async request<T extends z.ZodTypeAny>(
    method: 'GET' | 'POST' | 'PUT',
    path: string,
    schema: T,
    body?: Record<string, unknown>,
    signal?: AbortSignal
  ): Promise<z.output<T>> {
    // Only the path before any query string goes into errors and logs
    const route = path.split('?')[0] ?? path;

    let response: Response;
    try {
      response = await this.fetchFn(this.baseUrl + path, {
        method,
        signal,
        headers: {
          Authorization: `Bearer ${this.options.accessToken}`,
          ...(body !== undefined ? { 'Content-Type': 'application/json' } : {}),
        },
        body: body !== undefined ? JSON.stringify(body) : undefined,
      });
    } catch (error) {
      matrixRequests.labels(method, 'error').inc();
      throw new MatrixApiError(`${method} ${route} failed`, { cause: error });
    }
    matrixRequests.labels(method, String(response.status)).inc();

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      throw new MatrixApiError(`${method} ${route} returned malformed JSON`, {
        status: response.status,
        code: ErrorCodes.MATRIX_INVALID_RESPONSE,
        cause: error,
      });
    }

    if (!response.ok) {
      const details = matrixErrorSchema.safeParse(payload);
      const errcode = details.success ? details.data.errcode : undefined;
      const reason = details.success && details.data.error ? `: ${details.data.error}` : '';
      throw new MatrixApiError(`${method} ${route} returned HTTP ${response.status}${reason}`, {
        status: response.status,
        errcode,
      });
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new MatrixApiError(`${method} ${route} returned an unexpected response`, {
        status: response.status,
        code: ErrorCodes.MATRIX_INVALID_RESPONSE,
      });
    }
    return parsed.data;
  }
}
