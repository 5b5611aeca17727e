/**
 * Alias Cutover
 * 旧インデックスからのエイリアス削除と新インデックスへの追加を1リクエストで行う
 */

import { ClusterAdapter } from '../adapters';
import { AliasAction, AliasFilter } from '../types';
import { createLogger } from '../utils/logger';

const logger = createLogger('AliasCutover');

export class AliasCutover {
  constructor(private readonly adapter: ClusterAdapter) {}

  /**
   * oldIndex が空の場合（初回作成）は削除アクションを含めない
   */
  async updateAlias(
    alias: string,
    filter: AliasFilter | undefined,
    oldIndex: string,
    newIndex: string
  ): Promise<void> {
    logger.info('Updating index alias', { alias, from: oldIndex, to: newIndex, filter });

    const actions: AliasAction[] = [];
    if (oldIndex) {
      actions.push({ type: 'remove', index: oldIndex, alias });
    }
    actions.push({ type: 'add', index: newIndex, alias, ...(filter && { filter }) });

    await this.adapter.updateAliases(actions);
  }

  /**
   * フィルター無しのエイリアスを新インデックスへ移す。
   * 現在の割り当ての取得に失敗した場合は警告のみで追加だけ行う
   */
  async repointUnfiltered(alias: string, newIndex: string): Promise<void> {
    let carriers: string[] = [];
    try {
      carriers = await this.adapter.getAliasedIndices(alias);
    } catch (error) {
      logger.warn('Could not read unfiltered alias, adding without removal', { alias, error });
    }

    const actions: AliasAction[] = carriers
      .filter((index) => index !== newIndex)
      .map((index): AliasAction => ({ type: 'remove', index, alias }));
    actions.push({ type: 'add', index: newIndex, alias });

    logger.info('Updating unfiltered alias', { alias, from: carriers, to: newIndex });
    await this.adapter.updateAliases(actions);
  }
}
