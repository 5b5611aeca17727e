/**
 * Alias Resolver
 * エイリアスが指すインデックスを調べ、必要なインデックス名と比較する
 */

import { ClusterAdapter } from '../adapters';
import { AliasResolution } from '../types';
import { InconsistentAliasError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { indexMatchesVersion, requiredIndexName } from '../utils/version';

const logger = createLogger('AliasResolver');

export class AliasResolver {
  constructor(private readonly adapter: ClusterAdapter) {}

  /**
   * エイリアスを解決する。2つ以上のインデックスを指す場合は InconsistentAliasError
   */
  async resolve(alias: string, version: string): Promise<AliasResolution> {
    const indices = await this.adapter.getAliasedIndices(alias);
    const requiredIndex = requiredIndexName(alias, version);

    if (indices.length > 1) {
      throw new InconsistentAliasError(alias, indices);
    }

    if (indices.length === 0) {
      logger.info('No current index alias', { alias, requiredIndex });
      return { alias, updateRequired: true, currentIndex: '', requiredIndex };
    }

    const currentIndex = indices[0];
    const updateRequired = !indexMatchesVersion(alias, currentIndex, version);
    logger.info('Current index alias', { alias, currentIndex, requiredIndex, updateRequired });

    return { alias, updateRequired, currentIndex, requiredIndex };
  }
}
