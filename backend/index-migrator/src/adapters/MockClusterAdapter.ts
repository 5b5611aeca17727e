/**
 * Mock Cluster Adapter
 * ユニットテスト用のインメモリ OpenSearch クラスタ
 */

import { AliasAction, AliasFilter, ClusterHealth, ClusterStatus } from '../types';
import { IndexAlreadyExistsError } from '../utils/errors';
import { BaseClusterAdapter } from './ClusterAdapter';

export type MockDocumentSource = Record<string, unknown>;

export interface MockDocument {
  id: string;
  source: MockDocumentSource;
}

export type MockOperation =
  | 'ping'
  | 'getClusterHealth'
  | 'getAliasedIndices'
  | 'createIndex'
  | 'setWriteBlock'
  | 'getWriteBlock'
  | 'countDocuments'
  | 'startReindex'
  | 'updateAliases';

/**
 * Error shaped like an OpenSearch response error
 */
export class MockClusterError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly type: string
  ) {
    super(message);
    this.name = 'MockClusterError';
  }
}

/**
 * MockClusterAdapter Configuration
 */
export interface MockClusterConfig {
  clusterStatus?: ClusterStatus;

  /**
   * reindex 中、宛先のカウント1回ごとにコピーされるドキュメント数
   */
  reindexBatchSize?: number;

  /**
   * 宛先がこの件数に達したら reindex が止まる（ストールの再現）
   */
  reindexStallAt?: number;

  /**
   * write block が有効になるまでに必要な setWriteBlock 呼び出し回数
   */
  writeBlockVisibleAfter?: number;

  /**
   * 遅延をシミュレート（ミリ秒）
   */
  simulateDelay?: number;

  /**
   * ping 失敗をシミュレート
   */
  simulateConnectionFailure?: boolean;
}

interface MockIndex {
  name: string;
  mapping: string;
  documents: Map<string, MockDocumentSource>;
  writeBlock?: boolean;
  writeBlockRequests: number;
}

interface MockReindexTask {
  id: string;
  source: string;
  dest: string;
  pending: MockDocument[];
}

interface InjectedFailure {
  error: Error;
  remaining: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readField(source: MockDocumentSource, field: string): unknown {
  let current: unknown = source;
  for (const part of field.split('.')) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

function fieldMatches(value: unknown, expected: unknown): boolean {
  if (Array.isArray(value)) {
    return value.some((item) => item === expected);
  }
  return value === expected;
}

function clauseList(value: unknown): AliasFilter[] {
  if (value === undefined) {
    return [];
  }
  const list = Array.isArray(value) ? value : [value];
  return list.filter(isRecord);
}

function singleField(clause: unknown, kind: string): [string, unknown] {
  if (!isRecord(clause)) {
    throw new MockClusterError(`[${kind}] malformed query`, 400, 'parsing_exception');
  }
  const entries = Object.entries(clause);
  if (entries.length !== 1) {
    throw new MockClusterError(`[${kind}] query doesn't support multiple fields`, 400, 'parsing_exception');
  }
  return entries[0];
}

/**
 * Evaluates the subset of the query DSL used for alias filters
 */
export function matchesFilter(filter: AliasFilter, source: MockDocumentSource): boolean {
  const entries = Object.entries(filter);
  if (entries.length !== 1) {
    throw new MockClusterError('query must contain exactly one clause', 400, 'parsing_exception');
  }

  const [kind, body] = entries[0];
  switch (kind) {
    case 'match_all':
      return true;

    case 'term':
    case 'match': {
      const [field, condition] = singleField(body, kind);
      const expected = isRecord(condition)
        ? condition.value ?? condition.query
        : condition;
      return fieldMatches(readField(source, field), expected);
    }

    case 'terms': {
      const [field, values] = singleField(body, kind);
      if (!Array.isArray(values)) {
        throw new MockClusterError('[terms] query requires an array', 400, 'parsing_exception');
      }
      const value = readField(source, field);
      return values.some((expected) => fieldMatches(value, expected));
    }

    case 'exists': {
      if (!isRecord(body) || typeof body.field !== 'string') {
        throw new MockClusterError('[exists] requires a field', 400, 'parsing_exception');
      }
      const value = readField(source, body.field);
      if (Array.isArray(value)) {
        return value.length > 0;
      }
      return value !== undefined && value !== null;
    }

    case 'bool': {
      if (!isRecord(body)) {
        throw new MockClusterError('[bool] malformed query', 400, 'parsing_exception');
      }
      const required = [...clauseList(body.must), ...clauseList(body.filter)];
      const should = clauseList(body.should);
      const mustNot = clauseList(body.must_not);

      if (!required.every((clause) => matchesFilter(clause, source))) {
        return false;
      }
      if (mustNot.some((clause) => matchesFilter(clause, source))) {
        return false;
      }
      if (should.length > 0 && required.length === 0) {
        return should.some((clause) => matchesFilter(clause, source));
      }
      return true;
    }

    default:
      throw new MockClusterError(`unknown query [${kind}]`, 400, 'parsing_exception');
  }
}

/**
 * MockClusterAdapter
 * インデックス・エイリアス・write block・非同期 reindex を再現する
 */
export class MockClusterAdapter extends BaseClusterAdapter {
  private readonly config: Required<Omit<MockClusterConfig, 'reindexStallAt'>> &
    Pick<MockClusterConfig, 'reindexStallAt'>;
  private readonly indices: Map<string, MockIndex> = new Map();
  private readonly aliases: Map<string, Map<string, AliasFilter | undefined>> = new Map();
  private readonly tasks: MockReindexTask[] = [];
  private readonly failures: Map<MockOperation, InjectedFailure> = new Map();
  private readonly calls: Map<MockOperation, number> = new Map();
  private taskCounter = 0;
  private closed = false;

  constructor(config: MockClusterConfig = {}) {
    super('MockCluster');
    this.config = {
      clusterStatus: config.clusterStatus ?? 'green',
      reindexBatchSize: config.reindexBatchSize ?? 50,
      reindexStallAt: config.reindexStallAt,
      writeBlockVisibleAfter: config.writeBlockVisibleAfter ?? 1,
      simulateDelay: config.simulateDelay ?? 0,
      simulateConnectionFailure: config.simulateConnectionFailure ?? false,
    };
  }

  async ping(): Promise<void> {
    await this.enter('ping');
    if (this.config.simulateConnectionFailure) {
      throw new MockClusterError('connect ECONNREFUSED', 0, 'connection_error');
    }
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  async getClusterHealth(): Promise<ClusterHealth> {
    await this.enter('getClusterHealth');
    return { clusterName: 'mock-cluster', status: this.config.clusterStatus };
  }

  async getAliasedIndices(alias: string): Promise<string[]> {
    await this.enter('getAliasedIndices');
    return this.aliasedIndices(alias);
  }

  async createIndex(index: string, mappingDocument: string): Promise<void> {
    await this.enter('createIndex');

    if (this.indices.has(index)) {
      throw new IndexAlreadyExistsError(index);
    }
    if (this.aliases.has(index)) {
      throw new MockClusterError(
        `Invalid index name [${index}], an alias with the same name already exists`,
        400,
        'invalid_index_name_exception'
      );
    }
    try {
      JSON.parse(mappingDocument);
    } catch {
      throw new MockClusterError('failed to parse index mapping', 400, 'mapper_parsing_exception');
    }

    this.indices.set(index, {
      name: index,
      mapping: mappingDocument,
      documents: new Map(),
      writeBlockRequests: 0,
    });
  }

  async setWriteBlock(index: string): Promise<void> {
    await this.enter('setWriteBlock');
    const target = this.requireIndex(index);

    target.writeBlockRequests++;
    if (target.writeBlockRequests >= this.config.writeBlockVisibleAfter) {
      target.writeBlock = true;
    }
  }

  async getWriteBlock(index: string): Promise<boolean | undefined> {
    await this.enter('getWriteBlock');
    return this.requireIndex(index).writeBlock;
  }

  async countDocuments(indexOrAlias: string): Promise<number> {
    await this.enter('countDocuments');

    const index = this.indices.get(indexOrAlias);
    if (index) {
      this.advanceReindex(index);
      return index.documents.size;
    }

    const bindings = this.aliases.get(indexOrAlias);
    if (!bindings) {
      throw this.noSuchIndex(indexOrAlias);
    }

    let total = 0;
    for (const [name, filter] of bindings) {
      const target = this.requireIndex(name);
      this.advanceReindex(target);
      for (const source of target.documents.values()) {
        if (!filter || matchesFilter(filter, source)) {
          total++;
        }
      }
    }
    return total;
  }

  async startReindex(source: string, dest: string): Promise<string> {
    await this.enter('startReindex');
    const from = this.requireIndex(source);
    this.requireIndex(dest);

    this.taskCounter++;
    const task: MockReindexTask = {
      id: `mock-node:${this.taskCounter}`,
      source,
      dest,
      // reindex はスナップショット時点のドキュメントをコピーする
      pending: [...from.documents].map(([id, doc]) => ({ id, source: { ...doc } })),
    };
    this.tasks.push(task);
    return task.id;
  }

  async updateAliases(actions: AliasAction[]): Promise<void> {
    await this.enter('updateAliases');

    // 全アクションを検証してから一括適用する
    for (const action of actions) {
      this.requireIndex(action.index);
      if (action.type === 'remove' && !this.aliases.get(action.alias)?.has(action.index)) {
        throw new MockClusterError(`aliases [${action.alias}] missing`, 404, 'aliases_not_found_exception');
      }
      if (action.type === 'add' && this.indices.has(action.alias)) {
        throw new MockClusterError(
          `an index exists with the same name as the alias [${action.alias}]`,
          400,
          'invalid_alias_name_exception'
        );
      }
      if (action.type === 'add' && action.filter) {
        matchesFilter(action.filter, {});
      }
    }

    for (const action of actions) {
      const bindings = this.aliases.get(action.alias) ?? new Map<string, AliasFilter | undefined>();
      if (action.type === 'add') {
        bindings.set(action.index, action.filter);
      } else {
        bindings.delete(action.index);
      }

      if (bindings.size > 0) {
        this.aliases.set(action.alias, bindings);
      } else {
        this.aliases.delete(action.alias);
      }
    }
  }

  // ========================================
  // テスト用ヘルパー
  // ========================================

  /**
   * インデックスを追加（テスト用）
   */
  addIndex(name: string, documents: MockDocument[] = [], mapping = '{}'): void {
    const index: MockIndex = {
      name,
      mapping,
      documents: new Map(),
      writeBlockRequests: 0,
    };
    for (const doc of documents) {
      index.documents.set(doc.id, { ...doc.source });
    }
    this.indices.set(name, index);
  }

  /**
   * エイリアスを直接設定（テスト用）
   */
  putAlias(alias: string, index: string, filter?: AliasFilter): void {
    this.requireIndex(index);
    const bindings = this.aliases.get(alias) ?? new Map<string, AliasFilter | undefined>();
    bindings.set(index, filter);
    this.aliases.set(alias, bindings);
  }

  /**
   * ドキュメントを書き込む。write block 中は cluster_block_exception
   */
  indexDocument(indexOrAlias: string, doc: MockDocument): void {
    const name = this.indices.has(indexOrAlias)
      ? indexOrAlias
      : this.writeTargetOf(indexOrAlias);
    const index = this.requireIndex(name);

    if (index.writeBlock) {
      throw new MockClusterError(
        `index [${name}] blocked by: [FORBIDDEN/8/index write (api)];`,
        403,
        'cluster_block_exception'
      );
    }
    index.documents.set(doc.id, { ...doc.source });
  }

  /**
   * 次の N 回の呼び出しを失敗させる（テスト用）
   */
  failNext(operation: MockOperation, error: Error, times = 1): void {
    this.failures.set(operation, { error, remaining: times });
  }

  setClusterStatus(status: ClusterStatus): void {
    this.config.clusterStatus = status;
  }

  hasIndex(name: string): boolean {
    return this.indices.has(name);
  }

  getMapping(name: string): string | undefined {
    return this.indices.get(name)?.mapping;
  }

  getAliasFilter(alias: string, index: string): AliasFilter | undefined {
    return this.aliases.get(alias)?.get(index);
  }

  getDocumentCount(name: string): number {
    return this.requireIndex(name).documents.size;
  }

  getReindexTasks(): ReadonlyArray<{ id: string; source: string; dest: string }> {
    return this.tasks.map(({ id, source, dest }) => ({ id, source, dest }));
  }

  getCallCount(operation: MockOperation): number {
    return this.calls.get(operation) ?? 0;
  }

  isClosed(): boolean {
    return this.closed;
  }

  // ========================================
  // プライベートヘルパー
  // ========================================

  private async enter(operation: MockOperation): Promise<void> {
    this.calls.set(operation, this.getCallCount(operation) + 1);

    if (this.config.simulateDelay) {
      await new Promise((resolve) => setTimeout(resolve, this.config.simulateDelay));
    }

    const failure = this.failures.get(operation);
    if (failure) {
      failure.remaining--;
      if (failure.remaining <= 0) {
        this.failures.delete(operation);
      }
      throw failure.error;
    }
  }

  private aliasedIndices(alias: string): string[] {
    return [...(this.aliases.get(alias)?.keys() ?? [])].sort();
  }

  private writeTargetOf(alias: string): string {
    const indices = this.aliasedIndices(alias);
    if (indices.length !== 1) {
      throw new MockClusterError(
        `no write index is defined for alias [${alias}]`,
        400,
        'illegal_argument_exception'
      );
    }
    return indices[0];
  }

  private advanceReindex(dest: MockIndex): void {
    for (const task of this.tasks) {
      if (task.dest !== dest.name || task.pending.length === 0) {
        continue;
      }

      let budget = this.config.reindexBatchSize;
      while (budget > 0 && task.pending.length > 0) {
        const stallAt = this.config.reindexStallAt;
        if (stallAt !== undefined && dest.documents.size >= stallAt) {
          return;
        }
        const next = task.pending.shift();
        if (next) {
          dest.documents.set(next.id, next.source);
        }
        budget--;
      }
    }
  }

  private requireIndex(name: string): MockIndex {
    const index = this.indices.get(name);
    if (!index) {
      throw this.noSuchIndex(name);
    }
    return index;
  }

  private noSuchIndex(name: string): MockClusterError {
    return new MockClusterError(`no such index [${name}]`, 404, 'index_not_found_exception');
  }
}
