import type { VersionTag } from '@shared/contracts';

const STAGING_SUFFIX = '.tmp';
const DELETING_SUFFIX = '.del';

export function parseVersionTag(value: string): VersionTag | null {
  const match = value.trim().match(/^[vV]?(\d+)\.(\d+)\.(\d+)$/);
  if (!match) {
    return null;
  }

  const tag = {
    major: Number(match[1]),
    minor: Number(match[2]),
    patch: Number(match[3])
  };

  return isSafeComponent(tag.major) && isSafeComponent(tag.minor) && isSafeComponent(tag.patch) ? tag : null;
}

export function formatVersionTag(tag: VersionTag): string {
  return `${tag.major}.${tag.minor}.${tag.patch}`;
}

export function compareVersionTags(left: VersionTag, right: VersionTag): number {
  if (left.major !== right.major) {
    return left.major - right.major;
  }
  if (left.minor !== right.minor) {
    return left.minor - right.minor;
  }
  return left.patch - right.patch;
}

export function isNewerVersionTag(candidate: VersionTag, current: VersionTag | null): boolean {
  return current === null || compareVersionTags(candidate, current) > 0;
}

export function sameVersionTag(left: VersionTag | null, right: VersionTag | null): boolean {
  if (!left || !right) {
    return left === right;
  }

  return compareVersionTags(left, right) === 0;
}

export function versionTagToDirectoryName(tag: VersionTag): string {
  return `v${tag.major}_${tag.minor}_${tag.patch}`;
}

export function stagingDirectoryName(tag: VersionTag): string {
  return `${versionTagToDirectoryName(tag)}${STAGING_SUFFIX}`;
}

export function deletingDirectoryName(tag: VersionTag): string {
  return `${versionTagToDirectoryName(tag)}${DELETING_SUFFIX}`;
}

/**
 * Only bare finalized names (`v1_2_3`) parse; staging and deleting names return null.
 */
export function parseVersionDirectoryName(name: string): VersionTag | null {
  const match = name.match(/^v(\d+)_(\d+)_(\d+)$/);
  if (!match) {
    return null;
  }

  return parseVersionTag(`${match[1]}.${match[2]}.${match[3]}`);
}

export function isTransientDirectoryName(name: string): boolean {
  return /^v\d+_\d+_\d+\.(?:tmp|del)$/.test(name);
}

function isSafeComponent(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}
