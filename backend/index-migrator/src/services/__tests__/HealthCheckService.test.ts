import { describe, it, expect, beforeEach } from '@jest/globals';
import { MockClusterAdapter } from '../../adapters';
import { ClusterClientHolder } from '../ClusterClientHolder';
import {
  CONNECTIVITY_NO_CLIENT,
  formatCheckOutput,
  HealthCheckDefinition,
  HealthCheckService,
} from '../HealthCheckService';
import { MigrationStatusStore } from '../MigrationStatusStore';

const PANIC_GUIDE = 'https://runbooks.example.com/index-migrator';

describe('formatCheckOutput', () => {
  it('returns the output of a passing check', () => {
    expect(formatCheckOutput({ ok: true, output: 'Cluster is healthy' })).toBe('Cluster is healthy');
  });

  it('returns the output when a failure carries no error', () => {
    expect(formatCheckOutput({ ok: false, output: 'Cluster is yellow' })).toBe('Cluster is yellow');
  });

  it('returns the error alone when there is no output', () => {
    expect(formatCheckOutput({ ok: false, output: '', error: new Error('boom') })).toBe('boom');
  });

  it('joins output and error with a colon', () => {
    expect(formatCheckOutput({ ok: false, output: 'Cluster is not healthy', error: new Error('boom') })).toBe(
      'Cluster is not healthy: boom'
    );
  });

  it('joins with a space after punctuation', () => {
    expect(formatCheckOutput({ ok: false, output: 'Check failed.', error: new Error('boom') })).toBe(
      'Check failed. boom'
    );
  });
});

describe('HealthCheckService', () => {
  let holder: ClusterClientHolder;
  let status: MigrationStatusStore;
  let service: HealthCheckService;

  beforeEach(() => {
    holder = new ClusterClientHolder();
    status = new MigrationStatusStore();
    service = new HealthCheckService({
      holder,
      status,
      indexVersion: '2.0.0',
      systemCode: 'index-migrator',
      panicGuideUrl: PANIC_GUIDE,
    });
  });

  describe('connectivityChecker', () => {
    it('fails without a client', async () => {
      const result = await service.connectivityChecker();

      expect(result.ok).toBe(false);
      expect(formatCheckOutput(result)).toBe(CONNECTIVITY_NO_CLIENT);
    });

    it('fails when the cluster does not answer', async () => {
      const adapter = new MockClusterAdapter();
      adapter.failNext('getClusterHealth', new Error('connect ECONNREFUSED'));
      await holder.set(adapter);

      const result = await service.connectivityChecker();

      expect(formatCheckOutput(result)).toBe('Could not connect to the cluster: connect ECONNREFUSED');
    });

    it('passes when the cluster answers', async () => {
      await holder.set(new MockClusterAdapter({ clusterStatus: 'red' }));

      await expect(service.connectivityChecker()).resolves.toEqual({
        ok: true,
        output: 'Successfully connected to the cluster',
      });
    });
  });

  describe('clusterHealthChecker', () => {
    it('fails without a client', async () => {
      const result = await service.clusterHealthChecker();

      expect(formatCheckOutput(result)).toBe("Couldn't check the cluster's health. Couldn't establish connectivity.");
    });

    it('reports a status other than green', async () => {
      await holder.set(new MockClusterAdapter({ clusterStatus: 'yellow' }));

      await expect(service.clusterHealthChecker()).resolves.toEqual({ ok: false, output: 'Cluster is yellow' });
    });

    it('reports a failed health request', async () => {
      const adapter = new MockClusterAdapter();
      adapter.failNext('getClusterHealth', new Error('Request timed out'));
      await holder.set(adapter);

      const result = await service.clusterHealthChecker();

      expect(formatCheckOutput(result)).toBe('Cluster is not healthy: Request timed out');
    });

    it('passes on green', async () => {
      await holder.set(new MockClusterAdapter());

      await expect(service.clusterHealthChecker()).resolves.toEqual({ ok: true, output: 'Cluster is healthy' });
    });
  });

  describe('mappingsChecker', () => {
    it('reports a migration in progress with its progress', async () => {
      status.begin();
      status.setProgress('3 / 9 documents reindexed');

      await expect(service.mappingsChecker()).resolves.toEqual({
        ok: false,
        output: 'Index mappings migration to version 2.0.0 is in progress (3 / 9 documents reindexed)',
      });
    });

    it('reports a failed migration', async () => {
      status.begin();
      status.complete(new Error('Cluster is red'));

      const result = await service.mappingsChecker();

      expect(formatCheckOutput(result)).toBe('Index mappings were not migrated successfully: Cluster is red');
    });

    it('passes once the migration completed', async () => {
      status.begin();
      status.complete(null);

      await expect(service.mappingsChecker()).resolves.toEqual({
        ok: true,
        output: 'Index mappings are at version 2.0.0',
      });
    });
  });

  describe('runCheck', () => {
    it('fails a check that does not answer in time', async () => {
      const slow = new HealthCheckService({
        holder,
        status,
        indexVersion: '2.0.0',
        systemCode: 'index-migrator',
        panicGuideUrl: PANIC_GUIDE,
        timeoutMs: 5,
      });
      const definition: HealthCheckDefinition = {
        id: 'hanging',
        name: 'Hanging check',
        severity: 3,
        businessImpact: 'None',
        technicalSummary: 'Never answers',
        checker: () => new Promise(() => undefined),
      };

      const result = await slow.runCheck(definition);

      expect(result.ok).toBe(false);
      expect(result.checkOutput).toBe('Health check timed out after 5ms');
    });

    it('reports a checker that throws', async () => {
      const definition: HealthCheckDefinition = {
        id: 'throwing',
        name: 'Throwing check',
        severity: 3,
        businessImpact: 'None',
        technicalSummary: 'Throws',
        checker: () => Promise.reject(new Error('unexpected')),
      };

      const result = await service.runCheck(definition);

      expect(result).toMatchObject({ id: 'throwing', ok: false, checkOutput: 'unexpected', panicGuide: PANIC_GUIDE });
    });
  });

  describe('report', () => {
    it('is ok when every check passes', async () => {
      await holder.set(new MockClusterAdapter());
      status.begin();
      status.complete(null);

      const report = await service.report();

      expect(report).toMatchObject({
        schemaVersion: 1,
        systemCode: 'index-migrator',
        name: 'Index Migrator',
        ok: true,
      });
      expect(report.checks.map((check) => check.id)).toEqual([
        'cluster-connectivity',
        'cluster-health',
        'index-mappings',
      ]);
      expect(report.checks.map((check) => check.severity)).toEqual([1, 1, 2]);
    });

    it('is not ok while the migration is pending', async () => {
      await holder.set(new MockClusterAdapter());

      const report = await service.report();

      expect(report.ok).toBe(false);
      expect(report.checks[2]).toMatchObject({
        ok: false,
        checkOutput: 'Index mappings migration to version 2.0.0 is in progress (not started)',
      });
    });
  });

  describe('goodToGo', () => {
    it('follows the cluster health only', async () => {
      await expect(service.goodToGo()).resolves.toBe(false);

      await holder.set(new MockClusterAdapter());
      await expect(service.goodToGo()).resolves.toBe(true);
    });
  });
});
