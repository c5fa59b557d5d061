// packages/core/src/utils/semver.ts — major.minor.patch parsing and comparison

export interface SemVer {
  major: number;
  minor: number;
  patch: number;
}

const SEMVER_PATTERN = /(\d+)\.(\d+)\.(\d+)/;

/**
 * Extract the first `major.minor.patch` found in `text`
 * (e.g. "v22.9.0", "tool 4.0.6 (freebsd)"). Returns null if none.
 */
export function parseVersion(text: string): SemVer | null {
  const match = SEMVER_PATTERN.exec(text);
  if (!match) return null;
  return {
    major: Number.parseInt(match[1], 10),
    minor: Number.parseInt(match[2], 10),
    patch: Number.parseInt(match[3], 10),
  };
}

/** Numeric per-component comparison: negative, zero or positive. */
export function compareVersions(a: SemVer, b: SemVer): number {
  if (a.major !== b.major) return a.major - b.major;
  if (a.minor !== b.minor) return a.minor - b.minor;
  return a.patch - b.patch;
}

export function formatVersion(v: SemVer): string {
  return `${v.major}.${v.minor}.${v.patch}`;
}

/** True when `actual` is at least `minimum`. Unparseable input never satisfies. */
export function satisfiesMinimum(actual: string, minimum: string): boolean {
  const a = parseVersion(actual);
  const m = parseVersion(minimum);
  if (!a || !m) return false;
  return compareVersions(a, m) >= 0;
}

export function isSemVer(text: string): boolean {
  return /^v?\d+\.\d+\.\d+$/.test(text);
}
