/**
 * Server Version Values
 *
 * A parsed homeserver version, tagged with the software family it came from.
 * Each family orders versions with its own scheme:
 *   - pep440: Synapse
 *   - semver: Dendrite, Conduit, Catalyst
 *   - opaque: anything else, ordered as plain strings
 *
 * Values of different families are never ordered against each other; only
 * the display priority table below puts them in a stable order for output.
 */

import { SemVer } from 'semver';
import { SchemeMismatchError, InvalidFilterExpressionError } from './errors.js';
import { comparePep440, formatPep440, tryParsePep440, type Pep440Version } from './pep440-lite.js';

export type VersionScheme = 'pep440' | 'semver' | 'opaque';

export interface Pep440ServerVersion {
  readonly scheme: 'pep440';
  readonly software: string;
  readonly version: Pep440Version;
}

export interface SemverServerVersion {
  readonly scheme: 'semver';
  readonly software: string;
  readonly version: SemVer;
}

export interface OpaqueServerVersion {
  readonly scheme: 'opaque';
  readonly software: string;
  readonly version: string;
}

export type ServerVersion = Pep440ServerVersion | SemverServerVersion | OpaqueServerVersion;

/** Canonical name and scheme of the families with a native version scheme */
interface KnownFamily {
  name: string;
  scheme: 'pep440' | 'semver';
}

const KNOWN_FAMILIES: ReadonlyMap<string, KnownFamily> = new Map<string, KnownFamily>([
  ['synapse', { name: 'Synapse', scheme: 'pep440' }],
  ['dendrite', { name: 'Dendrite', scheme: 'semver' }],
  ['conduit', { name: 'Conduit', scheme: 'semver' }],
  ['catalyst', { name: 'Catalyst', scheme: 'semver' }],
]);

/** Display ordering between families; unlisted software ranks 0 */
export const DISPLAY_PRIORITY: ReadonlyMap<string, number> = new Map<string, number>([
  ['Synapse', 100],
  ['construct', 50],
  ['Conduit', 40],
  ['Dendrite', 10],
]);

// --------------------------------------------------------------------------
// Parsing
// --------------------------------------------------------------------------

type ParseAttempt =
  | { ok: true; value: ServerVersion }
  | { ok: false; software: string; scheme: VersionScheme; reason: string };

function attemptParse(software: string, raw: string): ParseAttempt {
  const family = KNOWN_FAMILIES.get(software.trim().toLowerCase());
  if (!family) {
    return { ok: true, value: { scheme: 'opaque', software, version: raw } };
  }

  if (family.scheme === 'pep440') {
    // Synapse appends build details after a space: "1.60.0 (b=main,abc123)"
    const head = raw.trim().split(' ')[0] ?? '';
    const parsed = tryParsePep440(head);
    if (!parsed) {
      return { ok: false, software: family.name, scheme: 'pep440', reason: `Invalid version: '${raw}'` };
    }
    return { ok: true, value: { scheme: 'pep440', software: family.name, version: parsed } };
  }

  try {
    return { ok: true, value: { scheme: 'semver', software: family.name, version: new SemVer(raw.trim()) } };
  } catch (error) {
    const reason = error instanceof Error ? error.message : `Invalid Version: ${raw}`;
    return { ok: false, software: family.name, scheme: 'semver', reason };
  }
}

/**
 * Parse a version reported by a server. Never throws: a version that does
 * not fit its family's scheme is kept as an opaque token.
 */
export function parseServerVersion(software: string, raw: string): ServerVersion {
  const attempt = attemptParse(software, raw);
  if (attempt.ok) return attempt.value;
  return { scheme: 'opaque', software: attempt.software, version: raw };
}

/**
 * Parse a version typed by a user in a filter expression.
 * @throws InvalidFilterExpressionError when a known family's version does not parse
 */
export function parseFilterVersion(software: string, raw: string): ServerVersion {
  const attempt = attemptParse(software, raw);
  if (!attempt.ok) {
    throw new InvalidFilterExpressionError(attempt.reason);
  }
  return attempt.value;
}

// --------------------------------------------------------------------------
// Comparison
// --------------------------------------------------------------------------

export function sameFamily(a: ServerVersion, b: ServerVersion): boolean {
  return a.software.toLowerCase() === b.software.toLowerCase();
}

export function isComparable(a: ServerVersion, b: ServerVersion): boolean {
  return a.scheme === b.scheme && sameFamily(a, b);
}

/**
 * Order two versions of the same family.
 * @throws SchemeMismatchError when the families or schemes differ
 */
export function compareServerVersions(a: ServerVersion, b: ServerVersion): -1 | 0 | 1 {
  if (!isComparable(a, b)) {
    throw new SchemeMismatchError(formatServerVersion(a), formatServerVersion(b));
  }
  if (a.scheme === 'pep440' && b.scheme === 'pep440') {
    return comparePep440(a.version, b.version);
  }
  if (a.scheme === 'semver' && b.scheme === 'semver') {
    return a.version.compare(b.version);
  }
  if (a.scheme === 'opaque' && b.scheme === 'opaque') {
    if (a.version === b.version) return 0;
    return a.version < b.version ? -1 : 1;
  }
  throw new SchemeMismatchError(formatServerVersion(a), formatServerVersion(b));
}

export function sameServerVersion(a: ServerVersion, b: ServerVersion): boolean {
  return isComparable(a, b) && compareServerVersions(a, b) === 0;
}

export function displayPriority(software: string): number {
  return DISPLAY_PRIORITY.get(software) ?? 0;
}

/**
 * Display ordering: native ordering within a family, family priority across
 * families. Not a compatibility decision.
 */
export function compareForDisplay(a: ServerVersion, b: ServerVersion): number {
  if (isComparable(a, b)) {
    return compareServerVersions(a, b);
  }
  return Math.sign(displayPriority(a.software) - displayPriority(b.software));
}

// --------------------------------------------------------------------------
// Rendering
// --------------------------------------------------------------------------

export function formatVersionNumber(value: ServerVersion): string {
  switch (value.scheme) {
    case 'pep440':
      return formatPep440(value.version);
    case 'semver':
      return value.version.build.length > 0
        ? `${value.version.version}+${value.version.build.join('.')}`
        : value.version.version;
    case 'opaque':
      return value.version;
  }
}

/** "Synapse 1.60.0" */
export function formatServerVersion(value: ServerVersion): string {
  return `${value.software} ${formatVersionNumber(value)}`;
}
