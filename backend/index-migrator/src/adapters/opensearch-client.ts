/**
 * OpenSearch Client Factory
 * 認証モードに応じて OpenSearch クライアントを構築する
 */

import { Client, ClientOptions } from '@opensearch-project/opensearch';
import { AwsSigv4Signer } from '@opensearch-project/opensearch/aws';
import { defaultProvider } from '@aws-sdk/credential-provider-node';
import { createLogger } from '../utils/logger';
import { OpenSearchClusterAdapter } from './OpenSearchClusterAdapter';

const logger = createLogger('OpenSearchClient');

export type ClusterAuthMode = 'aws' | 'none';

export interface ClusterConnectionSettings {
  endpoint: string;
  region: string;
  auth: ClusterAuthMode;
  /** 全レスポンスを debug レベルで記録 */
  trace: boolean;
}

/**
 * OpenSearch クライアントを作成（接続確認は行わない）
 */
export function createOpenSearchClient(settings: ClusterConnectionSettings): Client {
  const options: ClientOptions = {
    ...(settings.auth === 'aws'
      ? AwsSigv4Signer({
          region: settings.region,
          service: 'es',
          getCredentials: () => {
            const credentialsProvider = defaultProvider();
            return credentialsProvider();
          },
        })
      : {}),
    node: settings.endpoint,
    requestTimeout: 30000,
    maxRetries: 3,
    sniffOnStart: false,
  };

  const client = new Client(options);

  if (settings.trace) {
    client.on('response', (error, result) => {
      logger.debug('OpenSearch response', {
        method: result?.meta.request.params.method,
        path: result?.meta.request.params.path,
        statusCode: result?.statusCode,
        ...(error && { error: error.message }),
      });
    });
  }

  return client;
}

/**
 * クライアントを作成し ping で接続を確認する。失敗時はクライアントを閉じる
 */
export async function connectOpenSearch(
  settings: ClusterConnectionSettings
): Promise<OpenSearchClusterAdapter> {
  const client = createOpenSearchClient(settings);
  const adapter = new OpenSearchClusterAdapter(client);

  try {
    await adapter.ping();
  } catch (error) {
    await adapter.close();
    throw error;
  }

  logger.info('Connected to OpenSearch', {
    endpoint: settings.endpoint,
    auth: settings.auth,
  });
  return adapter;
}
