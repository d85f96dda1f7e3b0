/**
 * Results Aggregation
 *
 * Pure functions over a BatchResult: version groups for the summary, the
 * room upgrade report and version filter matches. Servers are always visited
 * in `members` order so the output does not depend on probe completion order.
 */

import type { CompatibilityTable } from '../domain/compatibility.js';
import { matchesFilter, type VersionFilter } from '../domain/filter.js';
import { compareForDisplay, sameServerVersion, type ServerVersion } from '../domain/server-version.js';
import type { BatchResult } from './BatchProber.js';

type BatchView = Pick<BatchResult, 'members' | 'versions'>;

export interface VersionGroup {
  version: ServerVersion;
  serverCount: number;
  users: string[];
}

export interface ServerEntry {
  serverName: string;
  version: ServerVersion;
  users: readonly string[];
}

export interface Tally {
  servers: number;
  users: number;
}

export interface UpgradeReport {
  roomVersion: string;
  upToDate: Tally;
  unknown: Tally;
  outdated: ServerEntry[];
  outdatedUsers: number;
  /** An outdated server runs a release newer than the table knows about */
  mayBeStale: boolean;
}

/** Successfully probed servers in first-seen order */
export function probedServers(batch: BatchView): ServerEntry[] {
  const entries: ServerEntry[] = [];
  for (const [serverName, users] of batch.members) {
    const version = batch.versions.get(serverName);
    if (version) {
      entries.push({ serverName, version, users });
    }
  }
  return entries;
}

/**
 * Group servers running the same version, newest first. Families are
 * ordered by display priority; ties keep first-seen order.
 */
export function groupByVersion(batch: BatchView): VersionGroup[] {
  const groups: VersionGroup[] = [];
  for (const { version, users } of probedServers(batch)) {
    const group = groups.find((candidate) => sameServerVersion(candidate.version, version));
    if (group) {
      group.serverCount += 1;
      group.users.push(...users);
    } else {
      groups.push({ version, serverCount: 1, users: [...users] });
    }
  }
  return groups.sort((a, b) => compareForDisplay(b.version, a.version));
}

/**
 * Which servers would be left behind if the room were upgraded.
 * Software missing from the table is counted separately, never as outdated.
 */
export function evaluateUpgrade(batch: BatchView, table: CompatibilityTable, roomVersion: string): UpgradeReport {
  const report: UpgradeReport = {
    roomVersion,
    upToDate: { servers: 0, users: 0 },
    unknown: { servers: 0, users: 0 },
    outdated: [],
    outdatedUsers: 0,
    mayBeStale: false,
  };

  for (const entry of probedServers(batch)) {
    const userCount = entry.users.length;
    if (!table.hasRequirements(entry.version)) {
      report.unknown.servers += 1;
      report.unknown.users += userCount;
    } else if (table.isCompatible(entry.version, roomVersion)) {
      report.upToDate.servers += 1;
      report.upToDate.users += userCount;
    } else {
      report.mayBeStale = report.mayBeStale || table.exceedsLatestKnown(entry.version);
      report.outdated.push(entry);
      report.outdatedUsers += userCount;
    }
  }
  return report;
}

export function matchServers(batch: BatchView, filter: VersionFilter): ServerEntry[] {
  return probedServers(batch).filter((entry) => matchesFilter(entry.version, filter));
}
