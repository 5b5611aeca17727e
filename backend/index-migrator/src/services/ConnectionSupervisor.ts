/**
 * Connection Supervisor
 * 接続できるまで一定間隔で再試行し、成功したら 'connected' を通知する
 */

import { EventEmitter } from 'events';
import { ClusterAdapter } from '../adapters';
import { MigrationCancelledError, toError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { sleep } from '../utils/sleep';

const logger = createLogger('ConnectionSupervisor');

export interface ConnectionSupervisorConfig {
  /** クライアントを作成し接続確認まで行う */
  connect: () => Promise<ClusterAdapter>;
  retryIntervalMs: number;
}

export interface ConnectionSupervisor {
  on(event: 'connected', listener: (adapter: ClusterAdapter) => void): this;
  on(event: 'connectionFailed', listener: (error: Error, attempt: number) => void): this;
}

export class ConnectionSupervisor extends EventEmitter {
  private readonly config: ConnectionSupervisorConfig;
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;

  constructor(config: ConnectionSupervisorConfig) {
    super();
    this.config = config;
  }

  isRunning(): boolean {
    return this.controller !== null;
  }

  /**
   * 接続ループを開始。既に実行中なら何もしない
   */
  start(): void {
    if (this.controller) {
      return;
    }

    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.connectLoop(controller.signal).finally(() => {
      if (this.controller === controller) {
        this.controller = null;
      }
    });
  }

  /**
   * 新しい接続を確立し直す（新しいマイグレーション試行のきっかけになる）
   */
  async reconnect(): Promise<void> {
    await this.stop();
    this.start();
  }

  async stop(): Promise<void> {
    this.controller?.abort();
    await this.loop;
    this.loop = null;
  }

  /**
   * 現在の接続ループの完了を待つ（テスト用）
   */
  async settled(): Promise<void> {
    await this.loop;
  }

  private async connectLoop(signal: AbortSignal): Promise<void> {
    let attempt = 0;

    while (!signal.aborted) {
      attempt++;
      try {
        const adapter = await this.config.connect();

        if (signal.aborted) {
          await adapter.close();
          return;
        }

        logger.info('Cluster connection established', { adapter: adapter.getName(), attempt });
        this.emit('connected', adapter);
        return;
      } catch (error) {
        const failure = toError(error);
        logger.error('Could not connect to the cluster', {
          attempt,
          retryInMs: this.config.retryIntervalMs,
          error: failure,
        });
        this.emit('connectionFailed', failure, attempt);
      }

      try {
        await sleep(this.config.retryIntervalMs, signal);
      } catch (error) {
        if (error instanceof MigrationCancelledError) {
          logger.info('Connection retry loop stopped');
          return;
        }
        throw error;
      }
    }
  }
}
