import type { ModInfo } from './mod-info';
import type { ConnectorErrorKind } from '../utils/errors';

/**
 * Why a mod was deliberately left alone
 */
export type SkipReason =
  | 'server-only-or-unknown-extra'
  | 'ambiguous-same-version-different-content'
  | 'side-support-disagreement'
  | 'ignored';

export type ReplaceDirection = 'upgrade' | 'downgrade' | 'unordered';

export interface UploadAction {
  type: 'upload';
  modId: string;
  source: ModInfo;
}

export interface RemoveAction {
  type: 'remove';
  modId: string;
  target: ModInfo;
}

export interface ReplaceAction {
  type: 'replace';
  modId: string;
  fromVersion: string;
  toVersion: string;
  direction: ReplaceDirection;
  source: ModInfo;
  target: ModInfo;
}

export interface SkipAction {
  type: 'skip';
  modId: string;
  reason: SkipReason;
}

export type SyncAction = UploadAction | RemoveAction | ReplaceAction | SkipAction;

export interface PlanSummary {
  uploads: number;
  removals: number;
  replacements: number;
  skips: number;
}

/**
 * Ordered, deterministic set of actions that brings a server in line with a client
 */
export interface SyncPlan {
  actions: SyncAction[];
  conflicts: string[]; // mod ids excluded because of duplicate archives
  summary: PlanSummary;
}

export type ActionStatus = 'succeeded' | 'failed' | 'skipped' | 'not-attempted';

export interface ActionResult {
  action: SyncAction;
  status: ActionStatus;
  error?: {
    kind: ConnectorErrorKind;
    message: string;
  };
}

export interface ExecutionCounts {
  succeeded: number;
  failed: number;
  skipped: number;
  notAttempted: number;
}

export type AbortInfo =
  | { reason: 'connection'; kind: ConnectorErrorKind; message: string }
  | { reason: 'cancelled' };

export interface ExecutionReport {
  results: ActionResult[];
  counts: ExecutionCounts;
  aborted?: AbortInfo;
}
