/**
 * Migration Status Store
 * マイグレーション状態の単一オーナーな記録。ヘルスチェックはスナップショットを読む
 */

import { EventEmitter } from 'events';
import { MigrationPhase, MigrationStatus, ProgressEvent } from '../types';

export const INITIAL_PROGRESS = 'not started';

export interface MigrationStatusStore {
  on(event: 'phase', listener: (event: ProgressEvent) => void): this;
  on(event: 'progress', listener: (event: ProgressEvent) => void): this;
  on(event: 'completed', listener: (status: Readonly<MigrationStatus>) => void): this;
}

export class MigrationStatusStore extends EventEmitter {
  private status: Readonly<MigrationStatus> = Object.freeze({
    phase: MigrationPhase.NOT_STARTED,
    progress: INITIAL_PROGRESS,
    migrationCheck: false,
    migrationError: null,
  });

  /**
   * 現在の状態（凍結済みスナップショット）
   */
  snapshot(): Readonly<MigrationStatus> {
    return this.status;
  }

  /**
   * 新しい試行の開始。前回の結果はクリアされる
   */
  begin(): void {
    this.replace({
      phase: MigrationPhase.HEALTH_GATE,
      progress: this.status.progress,
      migrationCheck: false,
      migrationError: null,
      startedAt: new Date(),
    });
    this.emit('phase', this.event());
  }

  setPhase(phase: MigrationPhase): void {
    if (phase === this.status.phase) {
      return;
    }
    this.replace({ ...this.status, phase });
    this.emit('phase', this.event());
  }

  setProgress(progress: string): void {
    this.replace({ ...this.status, progress });
    this.emit('progress', this.event());
  }

  /**
   * 試行結果を記録。1回の試行につき1回だけ呼ばれる
   */
  complete(error: Error | null): void {
    this.replace({
      ...this.status,
      phase: error ? MigrationPhase.FAILED : MigrationPhase.DONE,
      migrationCheck: true,
      migrationError: error,
      completedAt: new Date(),
    });
    this.emit('completed', this.status);
  }

  private replace(next: MigrationStatus): void {
    this.status = Object.freeze(next);
  }

  private event(): ProgressEvent {
    return { phase: this.status.phase, progress: this.status.progress };
  }
}
