/**
 * Federation Tester Client
 *
 * Probes a single homeserver through a federation tester endpoint and turns
 * its report into either a parsed ServerVersion or a classified ProbeError.
 *
 * Every probe is bounded by its own timeout. A timeout aborts the request
 * for that server only.
 */

import { z } from 'zod';
import type { Logger } from 'pino';
import { ProbeError, type ProbeFailureKind } from '../domain/errors.js';
import { formatServerVersion, parseServerVersion, type ServerVersion } from '../domain/server-version.js';
import type { ProbeOutcome, VersionProbe } from '../types.js';

// --------------------------------------------------------------------------
// Report Schema
// --------------------------------------------------------------------------

const connectionReportSchema = z
  .object({
    Checks: z
      .object({
        MatchingServerName: z.boolean().nullish(),
        ValidCertificates: z.boolean().nullish(),
        AllChecksOK: z.boolean().nullish(),
      })
      .passthrough()
      .nullish(),
    Keys: z.object({ server_name: z.string().nullish() }).passthrough().nullish(),
  })
  .passthrough();

export const federationReportSchema = z
  .object({
    FederationOK: z.boolean(),
    ConnectionErrors: z.record(z.unknown()).nullish(),
    ConnectionReports: z.record(connectionReportSchema).nullish(),
    Version: z
      .object({
        name: z.string().nullish(),
        version: z.string().nullish(),
      })
      .passthrough()
      .nullish(),
  })
  .passthrough();

export type FederationReport = z.infer<typeof federationReportSchema>;

export interface FederationTesterOptions {
  /** URL with a {server} placeholder */
  urlTemplate: string;
  timeoutMs: number;
  fetch?: typeof fetch;
}

export const TIMEOUT_MESSAGE = 'test timed out';
export const INTERNAL_ERROR_MESSAGE = 'internal error';
export const NO_VERSION_MESSAGE = 'server not responding to version requests';

// --------------------------------------------------------------------------
// Failure Classification
// --------------------------------------------------------------------------

/** Bracketed or multi-colon addresses are IPv6 */
export function isIpv6Address(address: string): boolean {
  return address.startsWith('[') || address.split(':').length > 2;
}

function pluralAddresses(count: number, total: number, family: 'IPv4' | 'IPv6'): string {
  return total > 1 ? `${count}/${total} ${family} addresses` : `${family} address`;
}

/**
 * Summarise why a server failed the federation test.
 *
 * Connection errors count as unreachable addresses. For addresses that did
 * connect, the first failing check wins: server name, then certificates,
 * then everything else. Identical reasons are reported once.
 */
export function describeFederationFailure(
  serverName: string,
  report: FederationReport
): { kind: ProbeFailureKind; message: string } {
  const failures = { v4: 0, v6: 0 };
  const connections = { v4: 0, v6: 0 };
  const successes = { v4: 0, v6: 0 };
  const seenReasons = new Set<string>();
  const reasonsWithAddress: Array<[string, string]> = [];
  let failedAddresses = 0;
  let identityFailure = false;
  let checkFailure = false;

  for (const address of Object.keys(report.ConnectionErrors ?? {})) {
    failures[isIpv6Address(address) ? 'v6' : 'v4'] += 1;
  }

  for (const [address, data] of Object.entries(report.ConnectionReports ?? {})) {
    const family = isIpv6Address(address) ? 'v6' : 'v4';
    connections[family] += 1;

    const checks = data.Checks;
    let reason: string | undefined;
    if (!checks?.MatchingServerName) {
      const got = data.Keys?.server_name ?? 'undefined';
      reason = `mismatching server name, tested: ${serverName}, got: ${got}`;
      identityFailure = true;
    } else if (!checks.ValidCertificates) {
      reason = 'invalid TLS certificates';
      identityFailure = true;
    } else if (!checks.AllChecksOK) {
      reason = 'some checks failed';
      checkFailure = true;
    } else {
      successes[family] += 1;
    }

    if (reason !== undefined) {
      failedAddresses += 1;
      if (!seenReasons.has(reason)) {
        seenReasons.add(reason);
        reasonsWithAddress.push([address, reason]);
      }
    }
  }

  const totalV4 = failures.v4 + connections.v4;
  const totalV6 = failures.v6 + connections.v6;
  const total = totalV4 + totalV6;

  if (total === 0) {
    return { kind: 'unreachable', message: 'No server addresses found' };
  }

  const messages: string[] = [];
  if (failures.v4 + failures.v6 === total) {
    messages.push(total === 1 ? "Server couldn't be reached" : "Server couldn't be reached on any address");
  } else {
    if (failures.v4) {
      messages.push(`${pluralAddresses(failures.v4, totalV4, 'IPv4')} couldn't be reached`);
    }
    if (failures.v6) {
      messages.push(`${pluralAddresses(failures.v6, totalV6, 'IPv6')} couldn't be reached`);
    }
  }

  if (reasonsWithAddress.length > 0) {
    const es = failedAddresses > 1 ? 'es' : '';
    const detail =
      reasonsWithAddress.length === 1
        ? (reasonsWithAddress[0]?.[1] ?? '')
        : reasonsWithAddress.map(([address, reason]) => `${address}: ${reason}`).join(', ');
    messages.push(`${failedAddresses}/${total} address${es} failed the test: ${detail}`);
  }

  const okParts: string[] = [];
  if (successes.v4) {
    okParts.push(totalV4 === 1 ? 'IPv4 is OK' : `${successes.v4}/${totalV4} IPv4 addresses are OK`);
  }
  if (successes.v6) {
    okParts.push(totalV6 === 1 ? 'IPv6 is OK' : `${successes.v6}/${totalV6} IPv6 addresses are OK`);
  }
  const suffix = okParts.length > 0 ? ` (${okParts.join(' and ')})` : '';

  const kind: ProbeFailureKind = identityFailure
    ? 'tls-identity'
    : checkFailure
      ? 'protocol-check'
      : failures.v4 + failures.v6 > 0
        ? 'unreachable'
        : 'protocol-check';

  if (messages.length === 0) {
    return { kind, message: 'federation not OK (unknown error)' + suffix };
  }
  const last = messages.pop();
  const message = messages.length > 0 ? `${messages.join(', ')} and ${last}` : `${last}`;
  return { kind, message: message + suffix };
}

// --------------------------------------------------------------------------
// Client
// --------------------------------------------------------------------------

export class FederationTester implements VersionProbe {
  private readonly log: Logger;
  private readonly fetchFn: typeof fetch;

  constructor(
    private readonly options: FederationTesterOptions,
    logger: Logger
  ) {
    this.log = logger.child({ component: 'FederationTester' });
    this.fetchFn = options.fetch ?? fetch;
  }

  reportUrl(serverName: string): string {
    return this.options.urlTemplate.replaceAll('{server}', encodeURIComponent(serverName));
  }

  /**
   * Probe a server, never rejecting. Unexpected errors become an opaque
   * internal-error outcome so that sibling probes are unaffected.
   */
  async probe(serverName: string): Promise<ProbeOutcome> {
    try {
      const version = await this.test(serverName);
      return { ok: true, version };
    } catch (error) {
      if (error instanceof ProbeError) {
        this.log.debug({ serverName, kind: error.kind, reason: error.message }, 'Federation test failed');
        return { ok: false, kind: error.kind, error: error.message };
      }
      this.log.error({ error, serverName }, 'Unexpected error during federation test');
      return { ok: false, kind: 'internal', error: INTERNAL_ERROR_MESSAGE };
    }
  }

  /**
   * @throws ProbeError describing why the server could not be tested
   */
  async test(serverName: string): Promise<ServerVersion> {
    this.log.debug({ serverName }, 'Testing server');
    const report = await this.withTimeout((signal) => this.fetchReport(serverName, signal));
    return interpretReport(serverName, report);
  }

  private async withTimeout<T>(run: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const error = new ProbeError('timeout', TIMEOUT_MESSAGE);
        reject(error);
        controller.abort(error);
      }, this.options.timeoutMs);
    });

    try {
      return await Promise.race([run(controller.signal), expired]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async fetchReport(serverName: string, signal: AbortSignal): Promise<FederationReport> {
    let response: Response;
    try {
      response = await this.fetchFn(this.reportUrl(serverName), {
        signal,
        headers: { Accept: 'application/json' },
      });
    } catch (error) {
      throw new ProbeError('internal', 'federation tester request failed', error);
    }

    if (!response.ok) {
      throw new ProbeError('internal', `federation tester returned HTTP ${response.status}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new ProbeError('internal', 'federation tester returned malformed JSON', error);
    }

    const parsed = federationReportSchema.safeParse(body);
    if (!parsed.success) {
      this.log.warn({ serverName, issues: parsed.error.issues.length }, 'Unexpected federation report shape');
      throw new ProbeError('internal', 'federation tester returned an unexpected report');
    }
    return parsed.data;
  }
}

/**
 * Turn a validated report into a version, or the reason there is none.
 * The reported software is kept in failure messages for auditing.
 */
export function interpretReport(serverName: string, report: FederationReport): ServerVersion {
  const name = report.Version?.name;
  const version = report.Version?.version;

  if (!report.FederationOK) {
    const failure = describeFederationFailure(serverName, report);
    if (name && version) {
      const info = formatServerVersion(parseServerVersion(name, version));
      throw new ProbeError(failure.kind, `${failure.message} // ${info}`);
    }
    throw new ProbeError(failure.kind, failure.message);
  }

  if (!name || !version) {
    throw new ProbeError('no-version-info', NO_VERSION_MESSAGE);
  }
  return parseServerVersion(name, version);
}
