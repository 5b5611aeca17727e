/**
 * Read-Only Gate
 * コピー前にソースインデックスへの書き込みを止め、設定の反映を確認する
 */

import { ClusterAdapter } from '../adapters';
import { ReadOnlyStalledError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { sleep, throwIfCancelled } from '../utils/sleep';

const logger = createLogger('ReadOnlyGate');

export interface ReadOnlyGateConfig {
  pollIntervalMs: number;
}

export class ReadOnlyGate {
  constructor(
    private readonly adapter: ClusterAdapter,
    private readonly config: ReadOnlyGateConfig
  ) {}

  async setReadOnly(index: string): Promise<void> {
    logger.info('Setting to read-only', { index });
    await this.adapter.setWriteBlock(index);
  }

  /**
   * index.blocks.write が true になるまでポーリングする。
   * 確認できない度に read-only を再設定し、maxRetries 回連続で失敗したら中断する（0 は無制限）
   */
  async waitUntilReadOnly(index: string, maxRetries: number, signal?: AbortSignal): Promise<void> {
    let failures = 0;

    for (;;) {
      throwIfCancelled(signal);

      let observed: boolean | undefined;
      let lastError: unknown;
      try {
        observed = await this.adapter.getWriteBlock(index);
      } catch (error) {
        logger.error('Failed to obtain index settings', { index, error });
        lastError = error;
      }

      if (observed === true) {
        logger.info('Index is read-only', { index, attempts: failures + 1 });
        return;
      }

      if (lastError === undefined) {
        logger.warn(observed === undefined ? 'Index settings have no write block' : 'Index is not read-only', {
          index,
        });
      }

      failures++;
      if (maxRetries > 0 && failures >= maxRetries) {
        throw lastError ?? new ReadOnlyStalledError(index);
      }

      try {
        await this.setReadOnly(index);
      } catch (error) {
        logger.warn('Retrying read-only setting failed', { index, error });
      }

      await sleep(this.config.pollIntervalMs, signal);
    }
  }
}
