/**
 * Migration Orchestrator
 * ヘルスチェック → エイリアス確認 → インデックス作成 → read-only → コピー → 切り替え
 * の順で1回のマイグレーションを実行する
 */

import { ClusterAdapter } from '../adapters';
import { AliasFilter, MigrationOutcome, MigrationPhase, MigrationSettings } from '../types';
import { ClusterUnhealthyError, NoIndexVersionError, toError } from '../utils/errors';
import { readAliasFilter, readMappingDocument } from '../utils/files';
import { createLogger } from '../utils/logger';
import { throwIfCancelled } from '../utils/sleep';
import { AliasCutover } from './AliasCutover';
import { AliasResolver } from './AliasResolver';
import { IndexProvisioner } from './IndexProvisioner';
import { MigrationStatusStore } from './MigrationStatusStore';
import { ReadOnlyGate } from './ReadOnlyGate';
import { ReindexMonitor } from './ReindexMonitor';

const logger = createLogger('MigrationOrchestrator');

export interface MigrationOrchestratorConfig {
  settings: MigrationSettings;
  status: MigrationStatusStore;
}

export class MigrationOrchestrator {
  private readonly settings: MigrationSettings;
  private readonly status: MigrationStatusStore;

  constructor(config: MigrationOrchestratorConfig) {
    this.settings = config.settings;
    this.status = config.status;
  }

  /**
   * 1回のマイグレーションを実行し、結果をステータスに1回だけ記録する
   */
  async migrate(adapter: ClusterAdapter, signal?: AbortSignal): Promise<MigrationOutcome> {
    this.status.begin();

    try {
      const outcome = await this.runPhases(adapter, signal);
      this.status.complete(null);
      return outcome;
    } catch (error) {
      const failure = toError(error);
      logger.error('Index migration failed', {
        alias: this.settings.aliasName,
        phase: this.status.snapshot().phase,
        error: failure,
      });
      this.status.complete(failure);
      throw failure;
    }
  }

  private async runPhases(adapter: ClusterAdapter, signal?: AbortSignal): Promise<MigrationOutcome> {
    const { aliasName, indexVersion, pollIntervalMs } = this.settings;

    // HealthGate
    if (!indexVersion) {
      throw new NoIndexVersionError();
    }
    const health = await adapter.getClusterHealth();
    if (health.status !== 'green') {
      throw new ClusterUnhealthyError(health.status);
    }
    this.status.setProgress('starting');

    // AliasCheck
    this.enter(MigrationPhase.ALIAS_CHECK, signal);
    const resolution = await new AliasResolver(adapter).resolve(aliasName, indexVersion);
    const { currentIndex, requiredIndex } = resolution;

    if (!resolution.updateRequired) {
      this.enter(MigrationPhase.UP_TO_DATE, signal);
      logger.info('Index is up-to-date', { alias: aliasName, index: currentIndex });
      return { alias: aliasName, updated: false, fromIndex: currentIndex, toIndex: currentIndex };
    }

    // Provisioning
    this.enter(MigrationPhase.PROVISIONING, signal);
    const mapping = await readMappingDocument(this.settings.mappingFile);
    await new IndexProvisioner(adapter).createIndex(requiredIndex, mapping);

    let documents: number | undefined;
    if (currentIndex) {
      // ReadOnlyLock
      this.enter(MigrationPhase.READ_ONLY_LOCK, signal);
      const gate = new ReadOnlyGate(adapter, { pollIntervalMs });
      await gate.setReadOnly(currentIndex);
      await gate.waitUntilReadOnly(currentIndex, this.settings.readOnlyMaxRetries, signal);

      // Copying
      this.enter(MigrationPhase.COPYING, signal);
      const monitor = new ReindexMonitor(adapter, {
        pollIntervalMs,
        maxErrors: this.settings.maxStallErrors,
        onProgress: (progress) => this.status.setProgress(progress),
      });
      documents = await monitor.beginCopy(currentIndex, requiredIndex);
      await monitor.waitForCompletion(requiredIndex, documents, signal);
    }

    // CutoverPending
    this.enter(MigrationPhase.CUTOVER_PENDING, signal);
    let filter: AliasFilter | undefined;
    if (this.settings.aliasFilterFile) {
      filter = await readAliasFilter(this.settings.aliasFilterFile);
    }

    const cutover = new AliasCutover(adapter);
    await cutover.updateAlias(aliasName, filter, currentIndex, requiredIndex);
    if (this.settings.unfilteredAlias) {
      await cutover.repointUnfiltered(this.settings.unfilteredAlias, requiredIndex);
    }

    logger.info('Index migration completed', { from: currentIndex, to: requiredIndex, documents });
    return {
      alias: aliasName,
      updated: true,
      fromIndex: currentIndex,
      toIndex: requiredIndex,
      documents,
    };
  }

  private enter(phase: MigrationPhase, signal?: AbortSignal): void {
    throwIfCancelled(signal);
    this.status.setPhase(phase);
    logger.debug('Entering phase', { phase, alias: this.settings.aliasName });
  }
}
