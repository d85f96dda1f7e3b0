/**
 * Batch Prober
 *
 * Probes every server of a room concurrently. Each outcome is recorded as
 * soon as its probe settles; a slow or failing server never holds up or
 * corrupts the results for the others. The batch finishes when every probe
 * has settled.
 */

import type { Logger } from 'pino';
import type { ServerVersion } from '../domain/server-version.js';
import { recordProbe, startActiveBatch } from '../infrastructure/metrics.js';
import type { ProbeOutcome, VersionProbe } from '../types.js';
import { INTERNAL_ERROR_MESSAGE } from './FederationTester.js';
import { PublishLock } from './PublishLock.js';

/**
 * Results of one batch for one room.
 *
 * Every server in `members` is in exactly one of `versions` or `errors`,
 * except while a re-probe for it is in flight.
 */
export interface BatchResult {
  /** Server name to user IDs, in the order servers were first seen */
  readonly members: ReadonlyMap<string, readonly string[]>;
  readonly versions: Map<string, ServerVersion>;
  readonly errors: Map<string, string>;
  /** Event ID of the published summary, edited in place on changes */
  messageId?: string;
  readonly publishLock: PublishLock;
}

export function createBatchResult(members: ReadonlyMap<string, readonly string[]>): BatchResult {
  return {
    members,
    versions: new Map(),
    errors: new Map(),
    publishLock: new PublishLock(),
  };
}

/**
 * Group user IDs ("@alice:example.org") by the server part of the ID.
 * IDs without a server part are skipped.
 */
export function membersByServer(userIds: readonly string[]): Map<string, string[]> {
  const servers = new Map<string, string[]>();
  for (const userId of userIds) {
    const separator = userId.indexOf(':');
    if (separator < 0 || separator === userId.length - 1) continue;
    const server = userId.slice(separator + 1);
    const users = servers.get(server);
    if (users) {
      users.push(userId);
    } else {
      servers.set(server, [userId]);
    }
  }
  return servers;
}

/** Store an outcome, replacing whatever the server had before */
export function recordOutcome(batch: BatchResult, serverName: string, outcome: ProbeOutcome): void {
  if (outcome.ok) {
    batch.errors.delete(serverName);
    batch.versions.set(serverName, outcome.version);
  } else {
    batch.versions.delete(serverName);
    batch.errors.set(serverName, outcome.error);
  }
}

export class BatchProber {
  private readonly log: Logger;

  constructor(
    private readonly prober: VersionProbe,
    logger: Logger
  ) {
    this.log = logger.child({ component: 'BatchProber' });
  }

  /** Probe one server; a rejected probe is recorded as an internal error */
  async probeOne(serverName: string): Promise<ProbeOutcome> {
    const startedAt = Date.now();
    let outcome: ProbeOutcome;
    try {
      outcome = await this.prober.probe(serverName);
    } catch (error) {
      this.log.error({ error, serverName }, 'Probe rejected unexpectedly');
      outcome = { ok: false, kind: 'internal', error: INTERNAL_ERROR_MESSAGE };
    }
    recordProbe(outcome.ok ? 'ok' : outcome.kind, (Date.now() - startedAt) / 1000);
    return outcome;
  }

  async probeAll(members: ReadonlyMap<string, readonly string[]>): Promise<BatchResult> {
    const batch = createBatchResult(members);
    const startedAt = Date.now();
    const done = startActiveBatch();

    try {
      await Promise.all(
        [...members.keys()].map(async (serverName) => {
          const outcome = await this.probeOne(serverName);
          recordOutcome(batch, serverName, outcome);
        })
      );
    } finally {
      done();
    }

    this.log.info(
      {
        servers: members.size,
        succeeded: batch.versions.size,
        failed: batch.errors.size,
        durationMs: Date.now() - startedAt,
      },
      'Batch probe complete'
    );
    return batch;
  }
}
