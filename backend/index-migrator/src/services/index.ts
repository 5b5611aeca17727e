/**
 * Services Module
 * 各種サービスクラスのエクスポート
 */

export { AliasResolver } from './AliasResolver';

export { IndexProvisioner } from './IndexProvisioner';

export { ReadOnlyGate } from './ReadOnlyGate';
export type { ReadOnlyGateConfig } from './ReadOnlyGate';

export { ReindexMonitor, STALL_WINDOW_SIZE, formatReindexProgress } from './ReindexMonitor';
export type { ReindexMonitorConfig, CompletionCheck } from './ReindexMonitor';

export { AliasCutover } from './AliasCutover';

export { MigrationOrchestrator } from './MigrationOrchestrator';
export type { MigrationOrchestratorConfig } from './MigrationOrchestrator';

export { MigrationStatusStore, INITIAL_PROGRESS } from './MigrationStatusStore';

export { ClusterClientHolder } from './ClusterClientHolder';

export { ConnectionSupervisor } from './ConnectionSupervisor';
export type { ConnectionSupervisorConfig } from './ConnectionSupervisor';

export { MigrationService } from './MigrationService';
export type { MigrationServiceConfig } from './MigrationService';

export {
  HealthCheckService,
  DEFAULT_CHECK_TIMEOUT_MS,
  CONNECTIVITY_NO_CLIENT,
  formatCheckOutput,
} from './HealthCheckService';
export type {
  CheckerResult,
  CheckSeverity,
  HealthCheckDefinition,
  HealthCheckResult,
  HealthCheckServiceConfig,
  HealthReport,
} from './HealthCheckService';
