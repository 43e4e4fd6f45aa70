import { SEVERITIES, type SemverVersion, type Severity } from './types';

const NUMERIC_IDENT = /^(0|[1-9]\d*)$/;

function compareIdentifier(a: string, b: string): number {
  const aNum = NUMERIC_IDENT.test(a);
  const bNum = NUMERIC_IDENT.test(b);
  if (aNum && bNum) {
    if (a.length !== b.length) return a.length < b.length ? -1 : 1;
    return a === b ? 0 : a < b ? -1 : 1;
  }
  if (aNum) return -1;
  if (bNum) return 1;
  return a === b ? 0 : a < b ? -1 : 1;
}

/**
 * SemVer 2.0 pre-release precedence. An empty list is a normal release and
 * ranks above any pre-release of the same version.
 */
export function comparePrerelease(a: readonly string[], b: readonly string[]): number {
  if (a.length === 0 && b.length === 0) return 0;
  if (a.length === 0) return 1;
  if (b.length === 0) return -1;
  const shared = Math.min(a.length, b.length);
  for (let i = 0; i < shared; i++) {
    const cmp = compareIdentifier(a[i] ?? '', b[i] ?? '');
    if (cmp !== 0) return cmp;
  }
  return a.length === b.length ? 0 : a.length < b.length ? -1 : 1;
}

export function compareVersions(a: SemverVersion, b: SemverVersion): number {
  if (a.major !== b.major) return a.major < b.major ? -1 : 1;
  if (a.minor !== b.minor) return a.minor < b.minor ? -1 : 1;
  if (a.patch !== b.patch) return a.patch < b.patch ? -1 : 1;
  return comparePrerelease(a.pre, b.pre);
}

export function samePrerelease(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((id, i) => id === b[i]);
}

export function formatVersion(v: SemverVersion): string {
  const base = `${v.major}.${v.minor}.${v.patch}`;
  return v.pre.length > 0 ? `${base}-${v.pre.join('.')}` : base;
}

/** 0 for `major`, growing towards `non-semver`. */
export function severityRank(severity: Severity): number {
  return SEVERITIES.indexOf(severity);
}

export function isAtLeast(severity: Severity, threshold: Severity): boolean {
  return severityRank(severity) <= severityRank(threshold);
}

export function isSeverity(value: unknown): value is Severity {
  return typeof value === 'string' && SEVERITIES.some((s) => s === value);
}
