/**
 * Migration error taxonomy
 */

export enum MigrationErrorCode {
  NO_INDEX_VERSION = 'NO_INDEX_VERSION',
  NO_CLUSTER_CLIENT = 'NO_CLUSTER_CLIENT',
  CLUSTER_UNHEALTHY = 'CLUSTER_UNHEALTHY',
  INCONSISTENT_ALIAS = 'INCONSISTENT_ALIAS',
  INDEX_ALREADY_EXISTS = 'INDEX_ALREADY_EXISTS',
  READ_ONLY_STALLED = 'READ_ONLY_STALLED',
  REINDEX_STALLED = 'REINDEX_STALLED',
  MIGRATION_CANCELLED = 'MIGRATION_CANCELLED',
  MIGRATION_INPUT = 'MIGRATION_INPUT',
}

export class MigrationError extends Error {
  constructor(
    message: string,
    public readonly code: MigrationErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'MigrationError';
  }
}

export class NoIndexVersionError extends MigrationError {
  constructor() {
    super('No index version has been specified', MigrationErrorCode.NO_INDEX_VERSION);
    this.name = 'NoIndexVersionError';
  }
}

export class NoClusterClientError extends MigrationError {
  constructor() {
    super('No cluster client available', MigrationErrorCode.NO_CLUSTER_CLIENT);
    this.name = 'NoClusterClientError';
  }
}

export class ClusterUnhealthyError extends MigrationError {
  constructor(public readonly status: string) {
    super(`Cluster is ${status}`, MigrationErrorCode.CLUSTER_UNHEALTHY, { status });
    this.name = 'ClusterUnhealthyError';
  }
}

export class InconsistentAliasError extends MigrationError {
  constructor(
    public readonly alias: string,
    public readonly indices: readonly string[]
  ) {
    super(
      `alias ${alias} points to multiple indices: [${indices.join(' ')}]`,
      MigrationErrorCode.INCONSISTENT_ALIAS,
      { alias, indices: [...indices] }
    );
    this.name = 'InconsistentAliasError';
  }
}

export class IndexAlreadyExistsError extends MigrationError {
  constructor(public readonly index: string) {
    super(`index [${index}] already exists`, MigrationErrorCode.INDEX_ALREADY_EXISTS, { index });
    this.name = 'IndexAlreadyExistsError';
  }
}

export class ReadOnlyStalledError extends MigrationError {
  constructor(public readonly index: string) {
    super(
      `setting index read-only ${index}: process may have stalled`,
      MigrationErrorCode.READ_ONLY_STALLED,
      { index }
    );
    this.name = 'ReadOnlyStalledError';
  }
}

export class ReindexStalledError extends MigrationError {
  constructor(
    public readonly index: string,
    public readonly documents: number
  ) {
    super(
      `reindexing into ${index}: process may have stalled`,
      MigrationErrorCode.REINDEX_STALLED,
      { index, documents }
    );
    this.name = 'ReindexStalledError';
  }
}

export class MigrationCancelledError extends MigrationError {
  constructor(reason = 'migration was cancelled') {
    super(reason, MigrationErrorCode.MIGRATION_CANCELLED);
    this.name = 'MigrationCancelledError';
  }
}

export class MigrationInputError extends MigrationError {
  constructor(
    message: string,
    public readonly path: string
  ) {
    super(message, MigrationErrorCode.MIGRATION_INPUT, { path });
    this.name = 'MigrationInputError';
  }
}

export function isMigrationError(error: unknown): error is MigrationError {
  return error instanceof MigrationError;
}

/**
 * Normalizes anything thrown into an Error so it can be stored and reported
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
