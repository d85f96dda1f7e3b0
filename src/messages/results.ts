/**
 * Batch result notices: progress while loading and the version summary.
 *
 * The summary is a pure function of the batch, so re-rendering an unchanged
 * batch produces byte-identical text and the published message can be
 * edited in place.
 */

import { formatServerVersion } from '../domain/server-version.js';
import type { BatchResult } from '../services/BatchProber.js';
import { groupByVersion } from '../services/aggregate.js';
import type { NoticeContent } from '../types.js';
import { bulletList, details, escapeHtml, htmlList, plainNotice, pluralize } from './common.js';

type SummaryView = Pick<BatchResult, 'members' | 'versions' | 'errors'>;

export function buildLoadingNotice(): NoticeContent {
  return plainNotice('Loading member list...');
}

export function buildMembersLoadedNotice(userCount: number, serverCount: number): NoticeContent {
  return plainNotice(
    `Member list loaded, found ${pluralize(userCount, 'member')} ` +
      `on ${pluralize(serverCount, 'server')}. Now running federation tests`
  );
}

function versionLines(batch: SummaryView): string[] {
  return groupByVersion(batch).map(
    ({ version, serverCount, users }) =>
      `${pluralize(serverCount, 'server')} with ${pluralize(users.length, 'member')} on ${formatServerVersion(version)}`
  );
}

/** Failed servers in first-seen order */
function failures(batch: SummaryView): Array<{ serverName: string; members: string; error: string }> {
  const failed: Array<{ serverName: string; members: string; error: string }> = [];
  for (const [serverName, users] of batch.members) {
    const error = batch.errors.get(serverName);
    if (error !== undefined) {
      failed.push({ serverName, members: pluralize(users.length, 'member'), error });
    }
  }
  return failed;
}

/**
 * Markdown summary: grouped versions, then a collapsed list of failures.
 */
export function formatSummary(batch: SummaryView): string {
  const versions = `### Versions\n\n${bulletList(versionLines(batch))}`;
  const failed = failures(batch);
  if (failed.length === 0) {
    return versions;
  }
  const errorLines = failed.map(({ serverName, members, error }) => `${serverName} (${members}): ${error}`);
  return `${versions}\n\n${details(`${pluralize(failed.length, 'server')} failed`, bulletList(errorLines))}`;
}

export function formatSummaryHtml(batch: SummaryView): string {
  const lines = versionLines(batch).map(escapeHtml);
  const versions = lines.length > 0 ? `<h3>Versions</h3>\n${htmlList(lines)}` : '<h3>Versions</h3>';
  const failed = failures(batch);
  if (failed.length === 0) {
    return versions;
  }
  const errorLines = failed.map(
    ({ serverName, members, error }) => `${escapeHtml(serverName)} (${members}): ${escapeHtml(error)}`
  );
  return `${versions}\n${details(`${pluralize(failed.length, 'server')} failed`, htmlList(errorLines))}`;
}

export function buildResultsNotice(batch: SummaryView): NoticeContent {
  return { body: formatSummary(batch), html: formatSummaryHtml(batch) };
}
