/**
 * Index Provisioner
 */

import { ClusterAdapter } from '../adapters';
import { createLogger } from '../utils/logger';

const logger = createLogger('IndexProvisioner');

export class IndexProvisioner {
  constructor(private readonly adapter: ClusterAdapter) {}

  /**
   * 新しいインデックスを作成。既存インデックスは再利用も削除もしない
   */
  async createIndex(name: string, mappingDocument: string): Promise<void> {
    logger.info('Creating new index', { index: name, mappingBytes: mappingDocument.length });
    await this.adapter.createIndex(name, mappingDocument);
  }
}
