/**
 * Room Version Compatibility Table
 *
 * For each homeserver implementation, which room versions it can join:
 * unconditionally, never, or from a minimum release onwards.
 *
 * The table is loaded from data/room-versions.json and validated at start-up.
 * Adding a new release or room version requires editing only the JSON file.
 */

import { z } from 'zod';
import roomVersionData from '../data/room-versions.json' with { type: 'json' };
import { CompatibilityTableError, SchemeMismatchError, UnknownSoftwareError } from './errors.js';
import {
  compareServerVersions,
  formatServerVersion,
  isComparable,
  parseServerVersion,
  type ServerVersion,
  type VersionScheme,
} from './server-version.js';

// --------------------------------------------------------------------------
// Types
// --------------------------------------------------------------------------

export type Requirement =
  | { readonly kind: 'always' }
  | { readonly kind: 'never' }
  | { readonly kind: 'minimum'; readonly version: ServerVersion };

export interface SoftwareRequirements {
  readonly software: string;
  readonly scheme: VersionScheme;
  /** Newest release known when the table was last updated */
  readonly latest?: ServerVersion;
  readonly rooms: ReadonlyMap<string, Requirement>;
}

// --------------------------------------------------------------------------
// Schema
// --------------------------------------------------------------------------

const softwareRowSchema = z.object({
  scheme: z.enum(['pep440', 'semver', 'opaque']),
  latest: z.string().min(1).optional(),
  notes: z.record(z.string()).optional(),
  rooms: z.record(z.union([z.boolean(), z.string().min(1)])),
});

const tableSchema = z.object({
  updated: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'updated must be a YYYY-MM-DD date'),
  roomVersions: z.array(z.string().regex(/^[\d.]+$/)).min(1),
  software: z.record(softwareRowSchema),
});

export type CompatibilityTableData = z.input<typeof tableSchema>;

// --------------------------------------------------------------------------
// Table
// --------------------------------------------------------------------------

export class CompatibilityTable {
  private readonly knownRooms: ReadonlySet<string>;

  constructor(
    readonly updated: string,
    readonly roomVersions: readonly string[],
    private readonly rows: ReadonlyMap<string, SoftwareRequirements>
  ) {
    this.knownRooms = new Set(roomVersions);
  }

  isKnownRoomVersion(roomVersion: string): boolean {
    return this.knownRooms.has(roomVersion);
  }

  /**
   * The requirements row for a version's family, if the table has one for
   * the scheme the version was parsed with.
   */
  requirementsFor(version: ServerVersion): SoftwareRequirements | undefined {
    const row = this.rows.get(version.software.toLowerCase());
    if (!row || row.scheme !== version.scheme) return undefined;
    return row;
  }

  hasRequirements(version: ServerVersion): boolean {
    return this.requirementsFor(version) !== undefined;
  }

  /**
   * @throws UnknownSoftwareError when the family has no row; check
   * hasRequirements() first to tell unknown software from outdated software
   */
  isCompatible(version: ServerVersion, roomVersion: string): boolean {
    const row = this.requirementsFor(version);
    if (!row) {
      throw new UnknownSoftwareError(version.software);
    }

    const requirement = row.rooms.get(roomVersion);
    if (!requirement) return false;

    switch (requirement.kind) {
      case 'always':
        return true;
      case 'never':
        return false;
      case 'minimum':
        if (!isComparable(version, requirement.version)) {
          throw new SchemeMismatchError(formatServerVersion(version), formatServerVersion(requirement.version));
        }
        return compareServerVersions(version, requirement.version) >= 0;
    }
  }

  /**
   * Whether the version is newer than anything the table knows about,
   * meaning the table may be out of date. Advisory only.
   */
  exceedsLatestKnown(version: ServerVersion): boolean {
    const latest = this.requirementsFor(version)?.latest;
    if (!latest || !isComparable(version, latest)) return false;
    return compareServerVersions(version, latest) > 0;
  }
}

// --------------------------------------------------------------------------
// Loading
// --------------------------------------------------------------------------

function parseRowVersion(software: string, scheme: VersionScheme, raw: string, field: string): ServerVersion {
  const version = parseServerVersion(software, raw);
  if (version.scheme !== scheme) {
    throw new CompatibilityTableError(
      `room-versions.json ${software}.${field}: "${raw}" is not a valid ${scheme} version`
    );
  }
  return version;
}

/** Validate raw table data; fail-fast on malformed rows */
export function loadCompatibilityTable(data: unknown): CompatibilityTable {
  const result = tableSchema.safeParse(data);
  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new CompatibilityTableError(`room-versions.json validation failed:\n${errors.join('\n')}`);
  }

  const { updated, roomVersions, software } = result.data;
  const known = new Set(roomVersions);
  const rows = new Map<string, SoftwareRequirements>();

  for (const [name, row] of Object.entries(software)) {
    const rooms = new Map<string, Requirement>();
    for (const [roomVersion, entry] of Object.entries(row.rooms)) {
      if (!known.has(roomVersion)) {
        throw new CompatibilityTableError(`room-versions.json ${name}.rooms: unknown room version "${roomVersion}"`);
      }
      if (typeof entry === 'boolean') {
        rooms.set(roomVersion, entry ? { kind: 'always' } : { kind: 'never' });
      } else {
        const version = parseRowVersion(name, row.scheme, entry, `rooms.${roomVersion}`);
        rooms.set(roomVersion, { kind: 'minimum', version });
      }
    }

    rows.set(
      name.toLowerCase(),
      Object.freeze({
        software: name,
        scheme: row.scheme,
        latest: row.latest ? parseRowVersion(name, row.scheme, row.latest, 'latest') : undefined,
        rooms,
      })
    );
  }

  return new CompatibilityTable(updated, Object.freeze([...roomVersions]), rows);
}

export const defaultCompatibilityTable: CompatibilityTable = loadCompatibilityTable(roomVersionData);
