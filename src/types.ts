import type { ProbeFailureKind } from './domain/errors.js';
import type { ServerVersion } from './domain/server-version.js';

/**
 * Result of probing one server
 */
export type ProbeOutcome =
  | { ok: true; version: ServerVersion }
  | { ok: false; kind: ProbeFailureKind; error: string };

/**
 * Anything that can probe a single server by name
 */
export interface VersionProbe {
  probe(serverName: string): Promise<ProbeOutcome>;
}

/**
 * Room command parsed from an incoming m.room.message event
 */
export interface RoomCommandPayload {
  eventId: string;
  roomId: string;
  sender: string;
  /** Command word that was used, without the "!" ("servers", "versions", ...) */
  command: string;
  /** Subcommand, lower-cased, if one was given */
  subcommand?: string;
  /** Remaining whitespace-separated arguments */
  args: string[];
  timestamp: number;
}

/**
 * A notice with a plain-text body and an HTML rendering of the same content
 */
export interface NoticeContent {
  body: string;
  html?: string;
}

/**
 * Matrix REST service response types
 */
export interface SendResult {
  success: boolean;
  eventId?: string;
  error?: string;
}

/**
 * The part of the chat platform the command handlers talk to
 */
export interface RoomMessenger {
  sendNotice(roomId: string, content: NoticeContent, replyTo?: string): Promise<SendResult>;
  editNotice(roomId: string, eventId: string, content: NoticeContent): Promise<SendResult>;
  getJoinedMembers(roomId: string): Promise<string[]>;
  markRead(roomId: string, eventId: string): Promise<void>;
}
