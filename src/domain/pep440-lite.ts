/**
 * PEP440-Lite: release versions in the PEP 440 scheme Synapse publishes
 *
 * Supports the public version scheme of PEP 440 plus local labels:
 *   - Release: "1.60.0", "1.60"
 *   - Epoch: "1!2.0"
 *   - Pre-releases: "1.42.0rc2", "1.0.0a1", "1.0.0-beta.3"
 *   - Post/dev releases: "1.0.0.post1", "1.0.0-1", "1.65.0.dev0"
 *   - Local labels: "1.60.0+hotfix.2"
 *
 * Ordering follows PEP 440: dev < pre (a < b < rc) < final < post,
 * and trailing zeros in the release segment are insignificant.
 */

export type PreReleaseTag = 'a' | 'b' | 'rc';

export interface Pep440Version {
  readonly epoch: number;
  readonly release: readonly number[];
  readonly pre?: readonly [PreReleaseTag, number];
  readonly post?: number;
  readonly dev?: number;
  readonly local?: readonly (string | number)[];
}

const VERSION_PATTERN = new RegExp(
  '^\\s*v?' +
    '(?:(\\d+)!)?' + // epoch
    '(\\d+(?:\\.\\d+)*)' + // release
    '(?:[-_.]?(alpha|a|beta|b|preview|pre|c|rc)[-_.]?(\\d+)?)?' + // pre
    '(?:-(\\d+)|[-_.]?(post|rev|r)[-_.]?(\\d+)?)?' + // post
    '(?:[-_.]?(dev)[-_.]?(\\d+)?)?' + // dev
    '(?:\\+([a-z0-9]+(?:[-_.][a-z0-9]+)*))?' + // local
    '\\s*$',
  'i'
);

const PRE_TAGS: Record<string, PreReleaseTag> = {
  a: 'a',
  alpha: 'a',
  b: 'b',
  beta: 'b',
  c: 'rc',
  pre: 'rc',
  preview: 'rc',
  rc: 'rc',
};

const PRE_RANK: Record<PreReleaseTag, number> = { a: 0, b: 1, rc: 2 };

/** Parse a version string, throwing on anything PEP 440 does not accept */
export function parsePep440(input: string): Pep440Version {
  const parsed = tryParsePep440(input);
  if (!parsed) {
    throw new Error(`Invalid version: ${input}`);
  }
  return parsed;
}

export function tryParsePep440(input: string): Pep440Version | null {
  const match = VERSION_PATTERN.exec(input);
  if (!match) return null;

  const [, epoch, release, preTag, preNumber, implicitPost, postTag, postNumber, devTag, devNumber, local] =
    match;
  if (release === undefined) return null;

  const version: {
    epoch: number;
    release: number[];
    pre?: [PreReleaseTag, number];
    post?: number;
    dev?: number;
    local?: (string | number)[];
  } = {
    epoch: epoch ? Number(epoch) : 0,
    release: release.split('.').map(Number),
  };

  if (preTag) {
    const tag = PRE_TAGS[preTag.toLowerCase()];
    if (!tag) return null;
    version.pre = [tag, preNumber ? Number(preNumber) : 0];
  }
  if (implicitPost !== undefined) {
    version.post = Number(implicitPost);
  } else if (postTag) {
    version.post = postNumber ? Number(postNumber) : 0;
  }
  if (devTag) {
    version.dev = devNumber ? Number(devNumber) : 0;
  }
  if (local) {
    version.local = local
      .toLowerCase()
      .split(/[-_.]/)
      .map((part) => (/^\d+$/.test(part) ? Number(part) : part));
  }
  return version;
}

/** Render the normalized form, e.g. "1.42.0rc2" or "1.0.0.post1.dev2" */
export function formatPep440(version: Pep440Version): string {
  let out = version.epoch !== 0 ? `${version.epoch}!` : '';
  out += version.release.join('.');
  if (version.pre) out += `${version.pre[0]}${version.pre[1]}`;
  if (version.post !== undefined) out += `.post${version.post}`;
  if (version.dev !== undefined) out += `.dev${version.dev}`;
  if (version.local) out += `+${version.local.join('.')}`;
  return out;
}

/** Compare two versions: -1 (a<b), 0 (a==b), 1 (a>b) */
export function comparePep440(a: Pep440Version, b: Pep440Version): -1 | 0 | 1 {
  return (
    compareNumber(a.epoch, b.epoch) ||
    compareTuple(a.release, b.release) ||
    compareTuple(preKey(a), preKey(b)) ||
    compareNumber(a.post ?? -Infinity, b.post ?? -Infinity) ||
    compareNumber(a.dev ?? Infinity, b.dev ?? Infinity) ||
    compareLocal(a.local, b.local)
  );
}

function compareNumber(a: number, b: number): -1 | 0 | 1 {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

// Missing segments pad with zero, so "1.60" equals "1.60.0".
function compareTuple(a: readonly number[], b: readonly number[]): -1 | 0 | 1 {
  const length = Math.max(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const result = compareNumber(a[i] ?? 0, b[i] ?? 0);
    if (result !== 0) return result;
  }
  return 0;
}

function preKey(version: Pep440Version): number[] {
  if (!version.pre) {
    // A bare dev release sorts before every pre-release of the same release.
    if (version.post === undefined && version.dev !== undefined) return [-Infinity, 0];
    return [Infinity, 0];
  }
  return [PRE_RANK[version.pre[0]], version.pre[1]];
}

// Numeric segments sort after alphanumeric ones; a longer label wins a shared prefix.
function compareLocal(
  a: readonly (string | number)[] | undefined,
  b: readonly (string | number)[] | undefined
): -1 | 0 | 1 {
  if (!a && !b) return 0;
  if (!a) return -1;
  if (!b) return 1;
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const left = a[i];
    const right = b[i];
    if (left === undefined || right === undefined) break;
    if (typeof left === 'number' && typeof right === 'number') {
      const result = compareNumber(left, right);
      if (result !== 0) return result;
    } else if (typeof left === 'number') {
      return 1;
    } else if (typeof right === 'number') {
      return -1;
    } else if (left !== right) {
      return left < right ? -1 : 1;
    }
  }
  return compareNumber(a.length, b.length);
}
