import semver from 'semver';
import type { ReplaceDirection } from '../../interfaces/sync-plan';

export interface VersionComparison {
  differ: boolean;
  direction: ReplaceDirection;
}

/**
 * Versions are opaque unless both sides parse as (loose) semantic versions.
 * Opaque versions differ when their strings differ, with no ordering.
 */
export function compareVersions(from: string, to: string): VersionComparison {
  const fromVersion = semver.parse(from, { loose: true });
  const toVersion = semver.parse(to, { loose: true });

  if (fromVersion && toVersion) {
    const order = semver.compare(fromVersion, toVersion, { loose: true });
    return {
      differ: order !== 0,
      direction: order < 0 ? 'upgrade' : 'downgrade',
    };
  }

  return { differ: from !== to, direction: 'unordered' };
}
