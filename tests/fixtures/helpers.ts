/**
 * Shared test doubles
 */

import pino, { type Logger } from 'pino';
import { vi } from 'vitest';
import { parseServerVersion, type ServerVersion } from '../../src/domain/server-version.js';
import type { NoticeContent, ProbeOutcome, RoomMessenger, SendResult, VersionProbe } from '../../src/types.js';

export function createTestLogger(): Logger {
  return pino({ level: 'silent' });
}

export function synapse(version: string): ServerVersion {
  return parseServerVersion('Synapse', version);
}

export function dendrite(version: string): ServerVersion {
  return parseServerVersion('Dendrite', version);
}

export interface SentNotice {
  roomId: string;
  content: NoticeContent;
  replyTo?: string;
}

export interface EditedNotice {
  roomId: string;
  eventId: string;
  content: NoticeContent;
}

/**
 * In-memory messenger recording everything the handlers publish.
 * Sent notices get IDs "$event-1", "$event-2", ...
 */
export class FakeMessenger implements RoomMessenger {
  readonly sent: SentNotice[] = [];
  readonly edits: EditedNotice[] = [];
  readonly read: string[] = [];
  members: string[] = [];

  readonly sendNotice = vi.fn(async (roomId: string, content: NoticeContent, replyTo?: string): Promise<SendResult> => {
    this.sent.push({ roomId, content, replyTo });
    return { success: true, eventId: `$event-${this.sent.length}` };
  });

  readonly editNotice = vi.fn(async (roomId: string, eventId: string, content: NoticeContent): Promise<SendResult> => {
    this.edits.push({ roomId, eventId, content });
    return { success: true, eventId: `$edit-${this.edits.length}` };
  });

  readonly getJoinedMembers = vi.fn(async (_roomId: string): Promise<string[]> => [...this.members]);

  readonly markRead = vi.fn(async (_roomId: string, eventId: string): Promise<void> => {
    this.read.push(eventId);
  });

  /** Bodies of everything sent, in order */
  sentBodies(): string[] {
    return this.sent.map((notice) => notice.content.body);
  }
}

/**
 * Probe answering from a fixed table; unknown servers fail as unreachable.
 */
export class StaticProbe implements VersionProbe {
  readonly calls: string[] = [];

  constructor(private readonly outcomes: Map<string, ProbeOutcome>) {}

  set(serverName: string, outcome: ProbeOutcome): void {
    this.outcomes.set(serverName, outcome);
  }

  async probe(serverName: string): Promise<ProbeOutcome> {
    this.calls.push(serverName);
    return (
      this.outcomes.get(serverName) ?? { ok: false, kind: 'unreachable', error: "Server couldn't be reached" }
    );
  }
}

export function ok(version: ServerVersion): ProbeOutcome {
  return { ok: true, version };
}

export function failed(error: string): ProbeOutcome {
  return { ok: false, kind: 'unreachable', error };
}

/** A promise with its settle functions exposed */
export function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void; reject: (error: unknown) => void } {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
