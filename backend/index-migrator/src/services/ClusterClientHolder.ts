/**
 * Cluster Client Holder
 * 現在のクラスタハンドルを保持し、丸ごと差し替える
 */

import { ClusterAdapter } from '../adapters';
import { NoClusterClientError } from '../utils/errors';
import { createLogger } from '../utils/logger';

const logger = createLogger('ClusterClientHolder');

export class ClusterClientHolder {
  private current: ClusterAdapter | null = null;

  /**
   * ハンドルを差し替える。以前のハンドルは閉じる
   */
  async set(adapter: ClusterAdapter): Promise<void> {
    const previous = this.current;
    this.current = adapter;
    logger.info('Injected cluster connection', { adapter: adapter.getName() });

    if (previous && previous !== adapter) {
      try {
        await previous.close();
      } catch (error) {
        logger.warn('Failed to close previous cluster connection', { error });
      }
    }
  }

  get(): ClusterAdapter | null {
    return this.current;
  }

  require(): ClusterAdapter {
    if (!this.current) {
      throw new NoClusterClientError();
    }
    return this.current;
  }

  async clear(): Promise<void> {
    const previous = this.current;
    this.current = null;
    if (previous) {
      await previous.close();
    }
  }
}
