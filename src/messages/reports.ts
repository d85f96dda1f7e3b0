/**
 * Notices for the upgrade, match, test and retest commands.
 */

import { formatServerVersion, formatVersionNumber, type ServerVersion } from '../domain/server-version.js';
import type { ServerEntry, UpgradeReport } from '../services/aggregate.js';
import type { ReprobeChange, ReprobeRejection } from '../services/RoomResultsStore.js';
import type { NoticeContent } from '../types.js';
import {
  bulletList,
  details,
  escapeHtml,
  htmlList,
  joinUsers,
  plainNotice,
  pluralize,
  userLinkHtml,
  userLinkText,
} from './common.js';

// --------------------------------------------------------------------------
// Server lists
// --------------------------------------------------------------------------

function serverLineText({ serverName, version, users }: ServerEntry): string {
  return `${serverName} (${formatServerVersion(version)}) with ${joinUsers(users, userLinkText)}`;
}

function serverLineHtml({ serverName, version, users }: ServerEntry): string {
  return (
    `${escapeHtml(serverName)} (${escapeHtml(formatServerVersion(version))}) ` +
    `with ${joinUsers(users, userLinkHtml)}`
  );
}

// --------------------------------------------------------------------------
// Upgrade
// --------------------------------------------------------------------------

export function buildUpgradeNotice(report: UpgradeReport, tableUpdated: string): NoticeContent {
  const text: string[] = [];
  const html: string[] = [];
  const push = (part: string, htmlPart: string = escapeHtml(part)) => {
    text.push(part);
    html.push(htmlPart);
  };

  const { upToDate, unknown, outdated, outdatedUsers } = report;
  if (upToDate.servers > 0) {
    push(`${pluralize(upToDate.users, 'user')} on ${pluralize(upToDate.servers, 'server')} are up to date`);
  } else {
    push('Nobody is up to date 😿');
  }

  if (unknown.servers > 0) {
    const are = unknown.users > 1 ? 'are' : 'is';
    push(
      `${pluralize(unknown.users, 'user')} on ${pluralize(unknown.servers, 'server')} ${are} ` +
        "using unknown software or have faked their server's user agent"
    );
  }

  if (outdated.length > 0) {
    const are = outdatedUsers > 1 ? 'are' : 'is';
    const summary = `${pluralize(outdatedUsers, 'user')} on ${pluralize(outdated.length, 'server')} ${are} outdated`;
    push(
      details(summary, bulletList(outdated.map(serverLineText))),
      details(summary, htmlList(outdated.map(serverLineHtml)))
    );
  } else {
    push('Nobody is outdated 🎉');
  }

  if (report.mayBeStale) {
    const footnote = `<sub>Room version support table last updated on ${tableUpdated}</sub>`;
    push(footnote, footnote);
  }

  return { body: text.join('\n\n'), html: html.map((part) => `<p>${part}</p>`).join('\n') };
}

export function buildUnknownRoomVersionNotice(roomVersion: string, known: readonly string[]): NoticeContent {
  return plainNotice(`Unknown room version ${roomVersion}, known versions are ${known.join(', ')}`);
}

// --------------------------------------------------------------------------
// Match
// --------------------------------------------------------------------------

export function buildMatchNotice(matches: readonly ServerEntry[]): NoticeContent {
  if (matches.length === 0) {
    return plainNotice('No matches :(');
  }
  const users = matches.reduce((sum, entry) => sum + entry.users.length, 0);
  const heading = `Matched ${pluralize(users, 'user')} on ${pluralize(matches.length, 'server')}`;
  return {
    body: `${heading}\n\n${bulletList(matches.map(serverLineText))}`,
    html: `<p>${heading}</p>\n${htmlList(matches.map(serverLineHtml))}`,
  };
}

// --------------------------------------------------------------------------
// Test / Retest
// --------------------------------------------------------------------------

function code(serverName: string): string {
  return `\`${serverName}\``;
}

export function buildTestResultText(
  serverName: string,
  outcome: { ok: true; version: ServerVersion } | { ok: false; error: string }
): string {
  return outcome.ok
    ? `${code(serverName)} is on ${formatServerVersion(outcome.version)}`
    : `Testing ${code(serverName)} failed: ${outcome.error}`;
}

export function buildRetestingNotice(serverName: string): NoticeContent {
  return plainNotice(`Re-testing ${code(serverName)}...`);
}

export function describeReprobeChange(name: string, change: ReprobeChange): string {
  const serverName = code(name);
  switch (change.kind) {
    case 'unchanged':
      return `${serverName} is still on ${formatServerVersion(change.version)}`;
    case 'updated':
    case 'downgraded':
      return (
        `${serverName} ${change.kind} ${change.previous.software} ` +
        `from ${formatVersionNumber(change.previous)} to ${formatVersionNumber(change.current)}`
      );
    case 'switched':
      return `${serverName} switched from ${formatServerVersion(change.previous)} to ${formatServerVersion(change.current)}`;
    case 'recovered':
      return `${serverName} is back up and on ${formatServerVersion(change.current)}`;
    case 'newly-failing':
    case 'still-failing':
      return `Testing ${serverName} failed: ${change.error}`;
  }
}

const REPROBE_REJECTIONS: Record<ReprobeRejection, string> = {
  'no-results': 'No cached results. Please use `!servers` to test all servers in the room first.',
  'not-member':
    "That server isn't in the previous results. If the server joined recently, you must retest the whole room.",
  'in-progress': 'That server seems to be in the process of being retested.',
};

export function buildReprobeRejectionNotice(reason: ReprobeRejection): NoticeContent {
  return plainNotice(REPROBE_REJECTIONS[reason]);
}

export const ALREADY_RUNNING_TEXT = 'There is already a test in progress.';
export const RESULTS_UNAVAILABLE_TEXT = "Results are unavailable even after waiting for the test to finish 😿";
export const GENERIC_FAILURE_TEXT = 'Something went wrong while handling that command. Please try again.';

export const USAGE_TEXT = [
  'Usage:',
  '* `!servers` - test all servers in the room',
  '* `!servers test <server>` - test one server',
  '* `!servers retest <server>` - re-test one server from the previous results',
  '* `!servers upgrade <room version>` - show which servers would be left behind by a room upgrade',
  '* `!servers match <software> [operator] [version]` - show servers on a specific version. ' +
    'Operator can be `>`, `<`, `>=`, `<=`, `!=`, `=` or empty.',
].join('\n');
