/**
 * Index Migrator CLI
 * serve（デフォルト）/ migrate / check コマンド
 */

import { Server } from 'http';
import { Command } from 'commander';
import { connectOpenSearch } from './adapters';
import {
  loadMigratorConfig,
  MigratorConfig,
  toConnectionSettings,
  toMigrationSettings,
} from './config/migrator-config';
import { createHealthServer } from './server';
import {
  AliasResolver,
  ClusterClientHolder,
  ConnectionSupervisor,
  HealthCheckService,
  MigrationOrchestrator,
  MigrationService,
  MigrationStatusStore,
} from './services';
import { isMigrationError, NoIndexVersionError } from './utils/errors';
import { createLogger, flushLogs, setLogLevel } from './utils/logger';

const logger = createLogger('Main');

export const PACKAGE_NAME = 'index-alias-migrator';
export const VERSION = '1.0.0';

/**
 * CLI フラグ（commander が camelCase に変換したもの）
 */
export interface CliOptions {
  port?: string;
  endpoint?: string;
  region?: string;
  auth?: string;
  alias?: string;
  indexVersion?: string;
  mappingFile?: string;
  aliasFilterFile?: string;
  unfilteredAlias?: string;
  pollInterval?: string;
  maxStallErrors?: string;
  readOnlyMaxRetries?: string;
  trace?: boolean;
  logLevel?: string;
}

/**
 * CLI フラグを設定キーに対応付ける
 */
export function toOverrides(options: CliOptions): Record<string, unknown> {
  return {
    port: options.port,
    endpoint: options.endpoint,
    region: options.region,
    auth: options.auth,
    aliasName: options.alias,
    indexVersion: options.indexVersion,
    mappingFile: options.mappingFile,
    aliasFilterFile: options.aliasFilterFile,
    unfilteredAlias: options.unfilteredAlias,
    pollIntervalMs: options.pollInterval,
    maxStallErrors: options.maxStallErrors,
    readOnlyMaxRetries: options.readOnlyMaxRetries,
    trace: options.trace,
    logLevel: options.logLevel,
  };
}

function resolveConfig(options: CliOptions): MigratorConfig {
  const config = loadMigratorConfig({ overrides: toOverrides(options) });
  setLogLevel(config.logLevel);
  return config;
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

/**
 * ヘルスサーバーとマイグレーションサービスを起動
 */
async function serve(options: CliOptions): Promise<void> {
  const config = resolveConfig(options);

  const status = new MigrationStatusStore();
  const holder = new ClusterClientHolder();
  const orchestrator = new MigrationOrchestrator({ settings: toMigrationSettings(config), status });
  const service = new MigrationService({ orchestrator, holder });
  const supervisor = new ConnectionSupervisor({
    connect: () => connectOpenSearch(toConnectionSettings(config)),
    retryIntervalMs: config.connectRetryIntervalMs,
  });
  service.attach(supervisor);

  const health = new HealthCheckService({
    holder,
    status,
    indexVersion: config.indexVersion,
    systemCode: config.systemCode,
    panicGuideUrl: config.panicGuideUrl,
  });
  const app = createHealthServer({ health, buildInfo: { name: PACKAGE_NAME, version: VERSION } });

  const server = app.listen(config.port, () => {
    logger.info(`Health endpoints listening on port ${config.port}`);
  });

  status.on('phase', (event) => logger.info('Migration phase changed', { ...event }));

  logger.info('Starting index migrator', {
    alias: config.aliasName,
    version: config.indexVersion || '(none)',
    endpoint: config.endpoint,
  });
  supervisor.start();

  const shutdown = async (signal: string): Promise<void> => {
    logger.info(`Received ${signal}, shutting down`);
    await supervisor.stop();
    await service.stop();
    await holder.clear();
    await closeServer(server);
    await flushLogs();
  };

  const onSignal = (signal: NodeJS.Signals) => {
    shutdown(signal)
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('Shutdown failed', { error });
        process.exit(1);
      });
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);
}

/**
 * 1回だけ接続してマイグレーションを実行
 */
async function migrate(options: CliOptions): Promise<void> {
  const config = resolveConfig(options);
  const status = new MigrationStatusStore();
  const orchestrator = new MigrationOrchestrator({ settings: toMigrationSettings(config), status });
  status.on('progress', (event) => logger.info(`Progress: ${event.progress}`));

  const adapter = await connectOpenSearch(toConnectionSettings(config));
  const controller = new AbortController();
  const onSignal = () => controller.abort();
  process.once('SIGINT', onSignal);

  try {
    const outcome = await orchestrator.migrate(adapter, controller.signal);

    console.log('\n========================================');
    console.log('Index Migration');
    console.log('========================================\n');
    console.log(`  Alias: ${outcome.alias}`);
    console.log(`  Updated: ${outcome.updated}`);
    console.log(`  From: ${outcome.fromIndex || '(none)'}`);
    console.log(`  To: ${outcome.toIndex}`);
    if (outcome.documents !== undefined) {
      console.log(`  Documents: ${outcome.documents}`);
    }
  } finally {
    process.removeListener('SIGINT', onSignal);
    await adapter.close();
  }
}

/**
 * エイリアスの解決結果を表示（書き込みは行わない）
 */
async function check(options: CliOptions): Promise<void> {
  const config = resolveConfig(options);
  if (!config.indexVersion) {
    throw new NoIndexVersionError();
  }

  const adapter = await connectOpenSearch(toConnectionSettings(config));
  try {
    const resolution = await new AliasResolver(adapter).resolve(config.aliasName, config.indexVersion);

    console.log(`  Alias: ${resolution.alias}`);
    console.log(`  Current: ${resolution.currentIndex || '(none)'}`);
    console.log(`  Required: ${resolution.requiredIndex}`);
    console.log(`  Update required: ${resolution.updateRequired}`);
  } finally {
    await adapter.close();
  }
}

function withClusterOptions(command: Command): Command {
  return command
    .option('--endpoint <url>', 'Cluster endpoint')
    .option('--region <region>', 'AWS region used for request signing')
    .option('--auth <mode>', 'Authentication mode: aws or none')
    .option('--alias <name>', 'Primary index alias')
    .option('--index-version <version>', 'Required index version (semver)')
    .option('--mapping-file <path>', 'Index mapping document')
    .option('--alias-filter-file <path>', 'Alias filter document')
    .option('--unfiltered-alias <name>', 'Secondary alias updated without filter')
    .option('--poll-interval <ms>', 'Poll interval in milliseconds')
    .option('--max-stall-errors <count>', 'Copy error budget, 0 for unbounded')
    .option('--read-only-max-retries <count>', 'Read-only confirmation budget, 0 for unbounded')
    .option('--trace', 'Log every cluster response')
    .option('--log-level <level>', 'Log level');
}

function action(run: (options: CliOptions) => Promise<void>): (options: CliOptions) => Promise<void> {
  return async (options) => {
    try {
      await run(options);
    } catch (error) {
      logger.error('Command failed', {
        ...(isMigrationError(error) ? { code: error.code } : {}),
        error,
      });
      process.exitCode = 1;
    }
  };
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('index-migrator')
    .description('Zero-downtime index migration behind an alias')
    .version(VERSION);

  withClusterOptions(
    program.command('serve', { isDefault: true }).description('Run health endpoints and migrate on every connection')
  )
    .option('--port <number>', 'HTTP port for health endpoints')
    .action(action(serve));

  withClusterOptions(
    program.command('migrate').description('Connect once and run one migration attempt')
  ).action(action(migrate));

  withClusterOptions(
    program.command('check').description('Show the alias resolution without writing anything')
  ).action(action(check));

  return program;
}
