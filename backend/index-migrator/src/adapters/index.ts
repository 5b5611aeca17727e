/**
 * Cluster Adapters
 * クラスタアダプターのエクスポート
 */

// 基底クラス・インターフェース
export { BaseClusterAdapter } from './ClusterAdapter';
export type { ClusterAdapter } from './ClusterAdapter';

// 実装クラス
export { OpenSearchClusterAdapter } from './OpenSearchClusterAdapter';
export type { OpenSearchApi } from './OpenSearchClusterAdapter';

export { MockClusterAdapter, MockClusterError, matchesFilter } from './MockClusterAdapter';
export type {
  MockClusterConfig,
  MockDocument,
  MockDocumentSource,
  MockOperation,
} from './MockClusterAdapter';

// クライアント生成
export { createOpenSearchClient, connectOpenSearch } from './opensearch-client';
export type { ClusterAuthMode, ClusterConnectionSettings } from './opensearch-client';
