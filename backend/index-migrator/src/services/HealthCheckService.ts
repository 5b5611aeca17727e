/**
 * Health Check Service
 * 接続状態・クラスタの状態・マッピングの移行状態を報告する
 */

import { ClusterHealth } from '../types';
import { toError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { ClusterClientHolder } from './ClusterClientHolder';
import { MigrationStatusStore } from './MigrationStatusStore';

const logger = createLogger('HealthCheckService');

export const DEFAULT_CHECK_TIMEOUT_MS = 10000;

export type CheckSeverity = 1 | 2 | 3;

/**
 * チェック関数の結果
 */
export interface CheckerResult {
  ok: boolean;
  output: string;
  error?: Error;
}

export interface HealthCheckDefinition {
  id: string;
  name: string;
  severity: CheckSeverity;
  businessImpact: string;
  technicalSummary: string;
  checker: () => Promise<CheckerResult>;
}

export interface HealthCheckResult {
  id: string;
  name: string;
  ok: boolean;
  severity: CheckSeverity;
  businessImpact: string;
  technicalSummary: string;
  panicGuide: string;
  checkOutput: string;
  lastUpdated: string;
}

export interface HealthReport {
  schemaVersion: 1;
  systemCode: string;
  name: string;
  description: string;
  checks: HealthCheckResult[];
  ok: boolean;
}

export interface HealthCheckServiceConfig {
  holder: ClusterClientHolder;
  status: MigrationStatusStore;
  indexVersion: string;
  systemCode: string;
  panicGuideUrl: string;
  name?: string;
  description?: string;
  timeoutMs?: number;
}

export const CONNECTIVITY_NO_CLIENT =
  'Could not connect to the cluster, please check the application parameters/env variables, and restart the service.';

/**
 * 失敗時の checkOutput。出力とエラーを連結する
 */
export function formatCheckOutput(result: CheckerResult): string {
  if (result.ok || !result.error) {
    return result.output;
  }
  if (!result.output) {
    return result.error.message;
  }
  const separator = /[.:]$/.test(result.output) ? ' ' : ': ';
  return `${result.output}${separator}${result.error.message}`;
}

export class HealthCheckService {
  private readonly config: HealthCheckServiceConfig;
  private readonly timeoutMs: number;

  constructor(config: HealthCheckServiceConfig) {
    this.config = config;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_CHECK_TIMEOUT_MS;
  }

  async connectivityChecker(): Promise<CheckerResult> {
    const adapter = this.config.holder.get();
    if (!adapter) {
      return { ok: false, output: '', error: new Error(CONNECTIVITY_NO_CLIENT) };
    }

    try {
      await adapter.getClusterHealth();
    } catch (error) {
      return { ok: false, output: 'Could not connect to the cluster', error: toError(error) };
    }
    return { ok: true, output: 'Successfully connected to the cluster' };
  }

  async clusterHealthChecker(): Promise<CheckerResult> {
    const adapter = this.config.holder.get();
    if (!adapter) {
      return {
        ok: false,
        output: "Couldn't check the cluster's health.",
        error: new Error("Couldn't establish connectivity."),
      };
    }

    let health: ClusterHealth;
    try {
      health = await adapter.getClusterHealth();
    } catch (error) {
      return { ok: false, output: 'Cluster is not healthy', error: toError(error) };
    }

    if (health.status !== 'green') {
      return { ok: false, output: `Cluster is ${health.status}` };
    }
    return { ok: true, output: 'Cluster is healthy' };
  }

  async mappingsChecker(): Promise<CheckerResult> {
    const status = this.config.status.snapshot();
    const version = this.config.indexVersion;

    if (status.migrationError) {
      return {
        ok: false,
        output: 'Index mappings were not migrated successfully',
        error: status.migrationError,
      };
    }
    if (!status.migrationCheck) {
      return {
        ok: false,
        output: `Index mappings migration to version ${version} is in progress (${status.progress})`,
      };
    }
    return { ok: true, output: `Index mappings are at version ${version}` };
  }

  checks(): HealthCheckDefinition[] {
    return [
      {
        id: 'cluster-connectivity',
        name: 'Check connectivity to the cluster',
        severity: 1,
        businessImpact: 'Could not connect to the search cluster',
        technicalSummary:
          'Connection to the cluster could not be created. Please check the endpoint and credentials.',
        checker: () => this.connectivityChecker(),
      },
      {
        id: 'cluster-health',
        name: 'Check cluster health',
        severity: 1,
        businessImpact: 'Full or partial degradation in serving requests from the cluster',
        technicalSummary: 'The cluster is not healthy.',
        checker: () => this.clusterHealthChecker(),
      },
      {
        id: 'index-mappings',
        name: 'Check index mappings version',
        severity: 2,
        businessImpact: 'Search results may not be as expected for the data set.',
        technicalSummary: 'Index mappings may not have been migrated.',
        checker: () => this.mappingsChecker(),
      },
    ];
  }

  async runCheck(definition: HealthCheckDefinition): Promise<HealthCheckResult> {
    const result = await this.withTimeout(definition);
    if (!result.ok) {
      logger.warn('Health check failed', { check: definition.id, output: formatCheckOutput(result) });
    }

    return {
      id: definition.id,
      name: definition.name,
      ok: result.ok,
      severity: definition.severity,
      businessImpact: definition.businessImpact,
      technicalSummary: definition.technicalSummary,
      panicGuide: this.config.panicGuideUrl,
      checkOutput: formatCheckOutput(result),
      lastUpdated: new Date().toISOString(),
    };
  }

  async report(): Promise<HealthReport> {
    const checks = await Promise.all(this.checks().map((check) => this.runCheck(check)));

    return {
      schemaVersion: 1,
      systemCode: this.config.systemCode,
      name: this.config.name ?? 'Index Migrator',
      description: this.config.description ?? 'Migrates the search index behind its alias',
      checks,
      ok: checks.every((check) => check.ok),
    };
  }

  /**
   * Good-to-go はクラスタの状態のみで判定する
   */
  async goodToGo(): Promise<boolean> {
    const result = await this.clusterHealthChecker();
    return result.ok;
  }

  private withTimeout(definition: HealthCheckDefinition): Promise<CheckerResult> {
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<CheckerResult>((resolve) => {
      timer = setTimeout(() => {
        resolve({
          ok: false,
          output: `Health check timed out after ${this.timeoutMs}ms`,
        });
      }, this.timeoutMs);
    });

    const run = definition
      .checker()
      .catch((error: unknown): CheckerResult => ({ ok: false, output: '', error: toError(error) }));

    return Promise.race([run, timeout]).finally(() => clearTimeout(timer));
  }
}
