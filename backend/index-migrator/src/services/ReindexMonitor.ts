/**
 * Copy / Completion Monitor
 * 非同期 reindex を開始し、宛先のドキュメント数が期待値に達するまで監視する
 *
 * 停止検知: 直近5回の件数を保持し、ウィンドウが埋まった時点で最古と最新が
 * 同じならエラーを1つ数えてウィンドウを現在値のみにリセットする。
 * 件数取得の失敗も同じカウンターに数える。
 */

import { ClusterAdapter } from '../adapters';
import { ReindexStalledError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { sleep, throwIfCancelled } from '../utils/sleep';

const logger = createLogger('ReindexMonitor');

export const STALL_WINDOW_SIZE = 5;

export interface ReindexMonitorConfig {
  pollIntervalMs: number;
  /** 0 は無制限 */
  maxErrors: number;
  onProgress?: (progress: string) => void;
}

export interface CompletionCheck {
  done: boolean;
  currentCount: number;
}

export function formatReindexProgress(currentCount: number, expectedCount: number): string {
  return `${currentCount} / ${expectedCount} documents reindexed`;
}

export class ReindexMonitor {
  constructor(
    private readonly adapter: ClusterAdapter,
    private readonly config: ReindexMonitorConfig
  ) {}

  /**
   * ソースの件数を期待値として読み取り、reindex を開始する
   */
  async beginCopy(source: string, dest: string): Promise<number> {
    logger.info('Reindexing', { from: source, to: dest });

    // 宛先が数えられない場合はコピーを始めない
    await this.adapter.countDocuments(dest);
    const expectedCount = await this.adapter.countDocuments(source);
    const task = await this.adapter.startReindex(source, dest);

    logger.info('Reindex started', { from: source, to: dest, expectedCount, task });
    return expectedCount;
  }

  async checkCompletion(dest: string, expectedCount: number): Promise<CompletionCheck> {
    const currentCount = await this.adapter.countDocuments(dest);
    return { done: currentCount === expectedCount, currentCount };
  }

  async waitForCompletion(dest: string, expectedCount: number, signal?: AbortSignal): Promise<void> {
    const { maxErrors } = this.config;
    const history: number[] = [];
    let errorCount = 0;
    let lastCount = 0;

    for (;;) {
      throwIfCancelled(signal);

      let check: CompletionCheck | undefined;
      try {
        check = await this.checkCompletion(dest, expectedCount);
        lastCount = check.currentCount;
      } catch (error) {
        logger.error('Failed to obtain reindex status', { index: dest, error });
        errorCount++;
        if (maxErrors > 0 && errorCount >= maxErrors) {
          this.reportProgress(lastCount, expectedCount);
          throw error;
        }
      }

      this.reportProgress(lastCount, expectedCount);

      if (check) {
        if (check.done) {
          logger.info('Reindex complete', { index: dest, documents: check.currentCount });
          return;
        }

        history.push(check.currentCount);
        if (history.length > STALL_WINDOW_SIZE) {
          history.shift();

          if (history[0] === check.currentCount) {
            logger.error('Reindexing process may have stalled', {
              index: dest,
              documents: check.currentCount,
            });
            errorCount++;
            if (maxErrors > 0 && errorCount >= maxErrors) {
              throw new ReindexStalledError(dest, check.currentCount);
            }
            history.splice(0, history.length, check.currentCount);
          }
        }
      }

      await sleep(this.config.pollIntervalMs, signal);
    }
  }

  private reportProgress(currentCount: number, expectedCount: number): void {
    const progress = formatReindexProgress(currentCount, expectedCount);
    logger.debug('Reindex progress', { progress });
    this.config.onProgress?.(progress);
  }
}
