/**
 * Type Definitions for the index migrator
 */

export type ClusterStatus = 'green' | 'yellow' | 'red';

export interface ClusterHealth {
  clusterName?: string;
  status: ClusterStatus;
}

/**
 * Store-native filter predicate attached to an alias
 */
export type AliasFilter = Record<string, unknown>;

export type AliasAction =
  | { type: 'add'; index: string; alias: string; filter?: AliasFilter }
  | { type: 'remove'; index: string; alias: string };

/**
 * Alias Resolver output
 */
export interface AliasResolution {
  alias: string;
  updateRequired: boolean;
  /** empty when the alias points at no index yet */
  currentIndex: string;
  requiredIndex: string;
}

/**
 * Orchestrator phases
 */
export enum MigrationPhase {
  NOT_STARTED = 'NotStarted',
  HEALTH_GATE = 'HealthGate',
  ALIAS_CHECK = 'AliasCheck',
  UP_TO_DATE = 'UpToDate',
  PROVISIONING = 'Provisioning',
  READ_ONLY_LOCK = 'ReadOnlyLock',
  COPYING = 'Copying',
  CUTOVER_PENDING = 'CutoverPending',
  DONE = 'Done',
  FAILED = 'Failed',
}

export interface MigrationStatus {
  phase: MigrationPhase;
  progress: string;
  /** true once a migration attempt has completed, success or failure */
  migrationCheck: boolean;
  migrationError: Error | null;
  startedAt?: Date;
  completedAt?: Date;
}

export interface MigrationOutcome {
  alias: string;
  updated: boolean;
  fromIndex: string;
  toIndex: string;
  documents?: number;
}

/**
 * Settings the orchestrator needs for one run
 */
export interface MigrationSettings {
  aliasName: string;
  indexVersion: string;
  mappingFile: string;
  aliasFilterFile?: string;
  unfilteredAlias?: string;
  pollIntervalMs: number;
  /** 0 polls without bound */
  maxStallErrors: number;
  /** 0 polls without bound */
  readOnlyMaxRetries: number;
}

export interface ProgressEvent {
  phase: MigrationPhase;
  progress: string;
}
