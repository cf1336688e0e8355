import type { MinecraftStructure, ModInfo, SideSupport } from '../../interfaces/mod-info';
import type {
  PlanSummary,
  SyncAction,
  SyncPlan,
} from '../../interfaces/sync-plan';
import { compareVersions } from './version-utils';

export interface CompareOptions {
  /** Mod ids never touched; they surface as `skip(ignored)` instead */
  ignore?: Iterable<string>;
  /** Side declarations that win over the archives' own, on both sides */
  sides?: Readonly<Record<string, SideSupport>>;
}

function withSide(
  mod: ModInfo | undefined,
  side: SideSupport | undefined,
): ModInfo | undefined {
  if (!mod || !side || mod.sideSupport === side) {
    return mod;
  }
  return { ...mod, sideSupport: side };
}

function conflictedIds(...structures: MinecraftStructure[]): Set<string> {
  const ids = new Set<string>();
  for (const structure of structures) {
    for (const conflict of structure.conflicts) {
      ids.add(conflict.modId);
    }
  }
  return ids;
}

function decideClientOnly(mod: ModInfo): SyncAction | null {
  if (mod.sideSupport === 'client-only') {
    return null;
  }
  return { type: 'upload', modId: mod.modId, source: mod };
}

function decideServerOnly(mod: ModInfo): SyncAction | null {
  switch (mod.sideSupport) {
    case 'client-only':
    case 'server-only':
      return null;
    case 'unknown':
      return {
        type: 'skip',
        modId: mod.modId,
        reason: 'server-only-or-unknown-extra',
      };
    case 'both':
      return { type: 'remove', modId: mod.modId, target: mod };
  }
}

function decidePresentOnBoth(client: ModInfo, server: ModInfo): SyncAction | null {
  if (client.contentHash === server.contentHash) {
    return null;
  }

  if (
    client.sideSupport !== 'unknown' &&
    server.sideSupport !== 'unknown' &&
    client.sideSupport !== server.sideSupport
  ) {
    return {
      type: 'skip',
      modId: client.modId,
      reason: 'side-support-disagreement',
    };
  }

  const versions = compareVersions(server.version, client.version);
  if (!versions.differ) {
    return {
      type: 'skip',
      modId: client.modId,
      reason: 'ambiguous-same-version-different-content',
    };
  }

  return {
    type: 'replace',
    modId: client.modId,
    fromVersion: server.version,
    toVersion: client.version,
    direction: versions.direction,
    source: client,
    target: server,
  };
}

export function decideAction(
  client: ModInfo | undefined,
  server: ModInfo | undefined,
): SyncAction | null {
  if (client && server) {
    return decidePresentOnBoth(client, server);
  }
  if (client) {
    return decideClientOnly(client);
  }
  if (server) {
    return decideServerOnly(server);
  }
  return null;
}

export function summarizePlan(actions: readonly SyncAction[]): PlanSummary {
  const summary: PlanSummary = {
    uploads: 0,
    removals: 0,
    replacements: 0,
    skips: 0,
  };
  for (const action of actions) {
    switch (action.type) {
      case 'upload':
        summary.uploads++;
        break;
      case 'remove':
        summary.removals++;
        break;
      case 'replace':
        summary.replacements++;
        break;
      case 'skip':
        summary.skips++;
        break;
    }
  }
  return summary;
}

/**
 * Decide what the server needs so its mods match the client's. Pure: the
 * same two structures always give the same plan, ordered by mod id, with at
 * most one action per id. Ids with conflicting duplicate archives on either
 * side are left out and listed in `conflicts`.
 */
export function comparePlan(
  client: MinecraftStructure,
  server: MinecraftStructure,
  options: CompareOptions = {},
): SyncPlan {
  const ignored = new Set(options.ignore ?? []);
  const sides = new Map(Object.entries(options.sides ?? {}));
  const excluded = conflictedIds(client, server);
  const ids = new Set([...client.mods.keys(), ...server.mods.keys()]);

  const actions: SyncAction[] = [];
  for (const modId of [...ids].sort()) {
    if (excluded.has(modId)) {
      continue;
    }

    const side = sides.get(modId);
    const action = decideAction(
      withSide(client.mods.get(modId), side),
      withSide(server.mods.get(modId), side),
    );
    if (!action) {
      continue;
    }

    actions.push(
      ignored.has(modId) ? { type: 'skip', modId, reason: 'ignored' } : action,
    );
  }

  return {
    actions,
    conflicts: [...excluded].sort(),
    summary: summarizePlan(actions),
  };
}
