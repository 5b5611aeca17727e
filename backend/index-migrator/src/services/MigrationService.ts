/**
 * Migration Service
 * 接続が届くたびにハンドルを差し替え、マイグレーションを1回実行する。
 * 試行は直列化され、失敗しても次の接続イベントまで再試行しない
 */

import { ClusterAdapter } from '../adapters';
import { createLogger } from '../utils/logger';
import { ClusterClientHolder } from './ClusterClientHolder';
import { ConnectionSupervisor } from './ConnectionSupervisor';
import { MigrationOrchestrator } from './MigrationOrchestrator';

const logger = createLogger('MigrationService');

export interface MigrationServiceConfig {
  orchestrator: MigrationOrchestrator;
  holder: ClusterClientHolder;
}

export class MigrationService {
  private readonly orchestrator: MigrationOrchestrator;
  private readonly holder: ClusterClientHolder;
  private queue: Promise<void> = Promise.resolve();
  private controller: AbortController | null = null;
  private stopped = false;

  constructor(config: MigrationServiceConfig) {
    this.orchestrator = config.orchestrator;
    this.holder = config.holder;
  }

  /**
   * supervisor の 'connected' イベントを購読する
   */
  attach(supervisor: ConnectionSupervisor): void {
    supervisor.on('connected', (adapter) => {
      void this.handleConnection(adapter);
    });
  }

  /**
   * 接続を受け取り試行をキューに積む。実行中の試行があれば完了を待つ
   */
  handleConnection(adapter: ClusterAdapter): Promise<void> {
    this.queue = this.queue.then(() => this.runAttempt(adapter));
    return this.queue;
  }

  isRunning(): boolean {
    return this.controller !== null;
  }

  /**
   * キュー内の試行がすべて終わるまで待つ
   */
  idle(): Promise<void> {
    return this.queue;
  }

  /**
   * 実行中の試行をキャンセルし、以降の接続を無視する
   */
  async stop(): Promise<void> {
    this.stopped = true;
    this.controller?.abort();
    await this.queue;
  }

  private async runAttempt(adapter: ClusterAdapter): Promise<void> {
    if (this.stopped) {
      logger.info('Service stopped, ignoring cluster connection', { adapter: adapter.getName() });
      return;
    }

    await this.holder.set(adapter);

    const controller = new AbortController();
    this.controller = controller;
    try {
      const outcome = await this.orchestrator.migrate(adapter, controller.signal);
      logger.info('Migration attempt finished', { ...outcome });
    } catch (error) {
      // 失敗はステータスに記録済み。次の接続イベントまで待つ
      logger.warn('Migration attempt failed, waiting for the next cluster connection', { error });
    } finally {
      this.controller = null;
    }
  }
}
