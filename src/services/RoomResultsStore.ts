/**
 * Room Results Store
 *
 * Per-room state for the lifetime of the process:
 *   absent  -> running   first batch request for a room
 *   running -> ready     batch stored, in-flight marker cleared
 *   ready   -> ready     a new batch, or a single-server re-probe
 *
 * Concurrent batch requests for the same room share one in-flight promise
 * instead of starting a second batch. Results are never evicted.
 */

import type { Logger } from 'pino';
import { isComparable, sameServerVersion, compareServerVersions, type ServerVersion } from '../domain/server-version.js';
import type { ProbeOutcome } from '../types.js';
import { recordOutcome, type BatchResult } from './BatchProber.js';

export type RoomState = 'absent' | 'running' | 'ready';

/** What a server had before a re-probe */
export type PreviousOutcome = { ok: true; version: ServerVersion } | { ok: false; error: string };

export interface ReprobeTicket {
  readonly roomId: string;
  readonly serverName: string;
  readonly batch: BatchResult;
  readonly previous: PreviousOutcome;
}

export type ReprobeRejection = 'no-results' | 'not-member' | 'in-progress';

export type BeginReprobeResult =
  | { ok: true; ticket: ReprobeTicket }
  | { ok: false; reason: ReprobeRejection };

export type ReprobeChange =
  | { kind: 'unchanged'; version: ServerVersion }
  | { kind: 'updated' | 'downgraded'; previous: ServerVersion; current: ServerVersion }
  | { kind: 'switched'; previous: ServerVersion; current: ServerVersion }
  | { kind: 'recovered'; previousError: string; current: ServerVersion }
  | { kind: 'newly-failing'; previous: ServerVersion; error: string }
  | { kind: 'still-failing'; previousError: string; error: string };

export interface ReprobeResult {
  change: ReprobeChange;
  /** Whether the published summary was edited */
  republished: boolean;
}

/**
 * Classify how a server's outcome moved between two probes.
 */
export function classifyChange(previous: PreviousOutcome, current: ProbeOutcome): ReprobeChange {
  if (!current.ok) {
    return previous.ok
      ? { kind: 'newly-failing', previous: previous.version, error: current.error }
      : { kind: 'still-failing', previousError: previous.error, error: current.error };
  }
  if (!previous.ok) {
    return { kind: 'recovered', previousError: previous.error, current: current.version };
  }
  if (sameServerVersion(previous.version, current.version)) {
    return { kind: 'unchanged', version: current.version };
  }
  if (isComparable(previous.version, current.version)) {
    const direction = compareServerVersions(previous.version, current.version) < 0 ? 'updated' : 'downgraded';
    return { kind: direction, previous: previous.version, current: current.version };
  }
  return { kind: 'switched', previous: previous.version, current: current.version };
}

export function isVisibleChange(change: ReprobeChange): boolean {
  if (change.kind === 'unchanged') return false;
  if (change.kind === 'still-failing') return change.error !== change.previousError;
  return true;
}

export class RoomResultsStore {
  private readonly results = new Map<string, BatchResult>();
  private readonly inFlight = new Map<string, Promise<BatchResult>>();
  private readonly log: Logger;

  constructor(logger: Logger) {
    this.log = logger.child({ component: 'RoomResultsStore' });
  }

  state(roomId: string): RoomState {
    if (this.inFlight.has(roomId)) return 'running';
    return this.results.has(roomId) ? 'ready' : 'absent';
  }

  isRunning(roomId: string): boolean {
    return this.inFlight.has(roomId);
  }

  get(roomId: string): BatchResult | undefined {
    return this.results.get(roomId);
  }

  get roomCount(): number {
    return this.results.size;
  }

  get runningCount(): number {
    return this.inFlight.size;
  }

  /**
   * Run a batch for the room, or join the one already running. The marker
   * is in place before `run` starts and is removed however the batch ends.
   */
  async runOrJoin(roomId: string, run: () => Promise<BatchResult>): Promise<BatchResult> {
    const existing = this.inFlight.get(roomId);
    if (existing) {
      this.log.debug({ roomId }, 'Joining in-flight batch');
      return existing;
    }

    const task = Promise.resolve()
      .then(run)
      .then((batch) => {
        this.results.set(roomId, batch);
        return batch;
      });
    this.inFlight.set(roomId, task);

    try {
      return await task;
    } finally {
      this.inFlight.delete(roomId);
    }
  }

  /**
   * Stored results, or the results of a batch run (or joined) now.
   * Resolves undefined when nothing was stored even after waiting.
   */
  async cachedOrRun(roomId: string, run: () => Promise<BatchResult>): Promise<BatchResult | undefined> {
    const cached = this.results.get(roomId);
    if (cached) return cached;

    try {
      await this.runOrJoin(roomId, run);
    } catch (error) {
      this.log.error({ error, roomId }, 'Batch failed while waiting for results');
    }
    return this.results.get(roomId);
  }

  /**
   * Take a server out of the stored results before re-probing it. While the
   * ticket is open the server is in neither versions nor errors, which is
   * what rejects a second re-probe of the same server.
   */
  beginReprobe(roomId: string, serverName: string): BeginReprobeResult {
    const batch = this.results.get(roomId);
    if (!batch) return { ok: false, reason: 'no-results' };
    if (!batch.members.has(serverName)) return { ok: false, reason: 'not-member' };

    const version = batch.versions.get(serverName);
    if (version) {
      batch.versions.delete(serverName);
      return { ok: true, ticket: { roomId, serverName, batch, previous: { ok: true, version } } };
    }

    const error = batch.errors.get(serverName);
    if (error !== undefined) {
      batch.errors.delete(serverName);
      return { ok: true, ticket: { roomId, serverName, batch, previous: { ok: false, error } } };
    }

    return { ok: false, reason: 'in-progress' };
  }

  /**
   * Store the new outcome and, if it differs from the previous one,
   * republish the batch summary while holding the batch's publish lock.
   */
  async completeReprobe(
    ticket: ReprobeTicket,
    outcome: ProbeOutcome,
    publish: (batch: BatchResult) => Promise<void>
  ): Promise<ReprobeResult> {
    recordOutcome(ticket.batch, ticket.serverName, outcome);
    const change = classifyChange(ticket.previous, outcome);

    if (!isVisibleChange(change)) {
      return { change, republished: false };
    }

    this.log.info({ roomId: ticket.roomId, serverName: ticket.serverName, change: change.kind }, 'Re-probe changed results');
    await ticket.batch.publishLock.runExclusive(() => publish(ticket.batch));
    return { change, republished: true };
  }
}
