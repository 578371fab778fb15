export interface SemanticVersion {
  major: number;
  minor: number;
  patch: number;
}

const SEMVER_PATTERN = /^(\d+)\.(\d+)\.(\d+)$/;

/** Parses a strict MAJOR.MINOR.PATCH string; anything else is null */
export function parseVersion(
  version: string | null | undefined,
): SemanticVersion | null {
  const match = SEMVER_PATTERN.exec(version?.trim() ?? '');
  if (!match) {
    return null;
  }
  return {
    major: Number(match[1]),
    minor: Number(match[2]),
    patch: Number(match[3]),
  };
}

/**
 * True when major or minor differ. Patch releases never count as drift,
 * and an unparseable side is never reported as drifted.
 */
export function hasVersionDrift(
  version: string | null | undefined,
  current: string,
): boolean {
  const old = parseVersion(version);
  const now = parseVersion(current);
  if (!old || !now) {
    return false;
  }
  return old.major !== now.major || old.minor !== now.minor;
}
