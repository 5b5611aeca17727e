/**
 * Cluster Abstraction Layer
 * マイグレーションのコアが使うクラスタ操作の共通インターフェース
 */

import { AliasAction, ClusterHealth } from '../types';

/**
 * ClusterAdapter Interface
 * OpenSearch クラスタ（またはインメモリ実装）へのハンドル
 */
export interface ClusterAdapter {
  /**
   * アダプター名を取得
   */
  getName(): string;

  /**
   * 接続確認
   */
  ping(): Promise<void>;

  /**
   * 接続を閉じる
   */
  close(): Promise<void>;

  getClusterHealth(): Promise<ClusterHealth>;

  /**
   * エイリアスが指しているインデックス一覧（ソート済み）
   */
  getAliasedIndices(alias: string): Promise<string[]>;

  /**
   * インデックスを作成。既に存在する場合は IndexAlreadyExistsError
   */
  createIndex(index: string, mappingDocument: string): Promise<void>;

  /**
   * index.blocks.write を true に設定
   */
  setWriteBlock(index: string): Promise<void>;

  /**
   * index.blocks.write の現在値。設定が無い場合は undefined
   */
  getWriteBlock(index: string): Promise<boolean | undefined>;

  /**
   * ドキュメント数（エイリアスの場合はフィルター適用後）
   */
  countDocuments(indexOrAlias: string): Promise<number>;

  /**
   * 非同期 reindex を開始し、タスクIDを返す
   */
  startReindex(source: string, dest: string): Promise<string>;

  /**
   * エイリアス操作を1リクエストでアトミックに適用
   */
  updateAliases(actions: AliasAction[]): Promise<void>;
}

/**
 * ClusterAdapter基底クラス
 */
export abstract class BaseClusterAdapter implements ClusterAdapter {
  protected readonly name: string;

  constructor(name: string) {
    this.name = name;
  }

  getName(): string {
    return this.name;
  }

  abstract ping(): Promise<void>;
  abstract close(): Promise<void>;
  abstract getClusterHealth(): Promise<ClusterHealth>;
  abstract getAliasedIndices(alias: string): Promise<string[]>;
  abstract createIndex(index: string, mappingDocument: string): Promise<void>;
  abstract setWriteBlock(index: string): Promise<void>;
  abstract getWriteBlock(index: string): Promise<boolean | undefined>;
  abstract countDocuments(indexOrAlias: string): Promise<number>;
  abstract startReindex(source: string, dest: string): Promise<string>;
  abstract updateAliases(actions: AliasAction[]): Promise<void>;

  /**
   * エラーハンドリングヘルパー
   */
  protected handleError(error: unknown, context: string): Error {
    if (error instanceof Error) {
      error.message = `${context}: ${error.message}`;
      return error;
    }
    return new Error(`${context}: ${String(error)}`);
  }
}
