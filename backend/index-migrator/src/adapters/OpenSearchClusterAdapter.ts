/**
 * OpenSearch Cluster Adapter
 * @opensearch-project/opensearch クライアントをラップし、レスポンスを zod で検証する
 */

import { z } from 'zod';
import { AliasAction, ClusterHealth } from '../types';
import { IndexAlreadyExistsError } from '../utils/errors';
import { extractStoreErrorType } from '../utils/safe-json';
import { createLogger } from '../utils/logger';
import { BaseClusterAdapter } from './ClusterAdapter';

const logger = createLogger('OpenSearchClusterAdapter');

const ClusterHealthSchema = z.object({
  cluster_name: z.string().optional(),
  status: z.enum(['green', 'yellow', 'red']),
});

const AliasesSchema = z.record(
  z.object({
    aliases: z.record(z.unknown()).default({}),
  })
);

const IndexSettingsSchema = z.record(
  z.object({
    settings: z.object({
      index: z
        .object({
          blocks: z
            .object({
              write: z.union([z.string(), z.boolean()]).optional(),
            })
            .passthrough()
            .optional(),
        })
        .passthrough(),
    }),
  })
);

const CountSchema = z.object({ count: z.number() });

const ReindexTaskSchema = z.object({ task: z.string() });

interface ApiResult {
  body: unknown;
  statusCode?: number | null;
}

/**
 * アダプターが使う @opensearch-project/opensearch Client の API
 */
export interface OpenSearchApi {
  ping(): Promise<unknown>;
  close(): Promise<void>;
  cluster: {
    health(): Promise<ApiResult>;
  };
  indices: {
    getAlias(params: { name: string }): Promise<ApiResult>;
    create(params: { index: string; body: string }): Promise<ApiResult>;
    putSettings(params: { index: string; body: Record<string, unknown> }): Promise<ApiResult>;
    getSettings(params: { index: string }): Promise<ApiResult>;
    updateAliases(params: { body: { actions: Array<Record<string, unknown>> } }): Promise<ApiResult>;
  };
  count(params: { index: string }): Promise<ApiResult>;
  reindex(params: {
    body: { source: { index: string }; dest: { index: string } };
    wait_for_completion: boolean;
  }): Promise<ApiResult>;
}

/**
 * ResponseError の statusCode（getter）を読む
 */
function statusCodeOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('statusCode' in error)) {
    return undefined;
  }
  return typeof error.statusCode === 'number' ? error.statusCode : undefined;
}

function storeErrorTypeOf(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('body' in error)) {
    return undefined;
  }
  return extractStoreErrorType(error.body);
}

/**
 * OpenSearchClusterAdapter
 */
export class OpenSearchClusterAdapter extends BaseClusterAdapter {
  private readonly client: OpenSearchApi;

  constructor(client: OpenSearchApi, name = 'OpenSearch') {
    super(name);
    this.client = client;
  }

  async ping(): Promise<void> {
    await this.client.ping();
  }

  async close(): Promise<void> {
    await this.client.close();
  }

  async getClusterHealth(): Promise<ClusterHealth> {
    const response = await this.client.cluster.health();
    const health = ClusterHealthSchema.parse(response.body);

    return {
      clusterName: health.cluster_name,
      status: health.status,
    };
  }

  async getAliasedIndices(alias: string): Promise<string[]> {
    try {
      const response = await this.client.indices.getAlias({ name: alias });
      const aliases = AliasesSchema.parse(response.body);

      return Object.entries(aliases)
        .filter(([, entry]) => Object.prototype.hasOwnProperty.call(entry.aliases, alias))
        .map(([index]) => index)
        .sort();
    } catch (error) {
      // 存在しないエイリアスは 404 で返る
      if (statusCodeOf(error) === 404) {
        return [];
      }
      throw this.handleError(error, `reading alias ${alias}`);
    }
  }

  async createIndex(index: string, mappingDocument: string): Promise<void> {
    try {
      await this.client.indices.create({
        index,
        body: mappingDocument,
      });
    } catch (error) {
      if (storeErrorTypeOf(error) === 'resource_already_exists_exception') {
        throw new IndexAlreadyExistsError(index);
      }
      throw error;
    }
  }

  async setWriteBlock(index: string): Promise<void> {
    await this.client.indices.putSettings({
      index,
      body: { 'index.blocks.write': true },
    });
  }

  async getWriteBlock(index: string): Promise<boolean | undefined> {
    const response = await this.client.indices.getSettings({ index });
    const settings = IndexSettingsSchema.parse(response.body);
    const write = settings[index]?.settings.index.blocks?.write;

    if (write === undefined) {
      return undefined;
    }
    return typeof write === 'boolean' ? write : write.toLowerCase() === 'true';
  }

  async countDocuments(indexOrAlias: string): Promise<number> {
    const response = await this.client.count({ index: indexOrAlias });
    return CountSchema.parse(response.body).count;
  }

  async startReindex(source: string, dest: string): Promise<string> {
    const response = await this.client.reindex({
      body: {
        source: { index: source },
        dest: { index: dest },
      },
      wait_for_completion: false,
    });

    const { task } = ReindexTaskSchema.parse(response.body);
    logger.debug('Reindex task started', { source, dest, task });
    return task;
  }

  async updateAliases(actions: AliasAction[]): Promise<void> {
    await this.client.indices.updateAliases({
      body: {
        actions: actions.map((action) =>
          action.type === 'add'
            ? {
                add: {
                  index: action.index,
                  alias: action.alias,
                  ...(action.filter && { filter: action.filter }),
                },
              }
            : { remove: { index: action.index, alias: action.alias } }
        ),
      },
    });
  }
}
