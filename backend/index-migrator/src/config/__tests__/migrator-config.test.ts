import { describe, it, expect } from '@jest/globals';
import {
  loadFromEnvironment,
  loadMigratorConfig,
  toConnectionSettings,
  toMigrationSettings,
} from '../migrator-config';

describe('loadFromEnvironment', () => {
  it('maps environment variables to configuration keys', () => {
    const input = loadFromEnvironment({
      INDEX_ALIAS: 'places',
      INDEX_VERSION: '1.4.0',
      POLL_INTERVAL_MS: '500',
    });

    expect(input.aliasName).toBe('places');
    expect(input.indexVersion).toBe('1.4.0');
    expect(input.pollIntervalMs).toBe('500');
    expect(input.endpoint).toBeUndefined();
  });

  it('treats empty values as unset', () => {
    const input = loadFromEnvironment({ INDEX_ALIAS: '', UNFILTERED_ALIAS: '   ' });

    expect(input.aliasName).toBeUndefined();
    expect(input.unfilteredAlias).toBeUndefined();
  });
});

describe('loadMigratorConfig', () => {
  it('applies defaults', () => {
    const config = loadMigratorConfig({ env: {} });

    expect(config).toMatchObject({
      port: 8080,
      endpoint: 'http://localhost:9200',
      auth: 'none',
      aliasName: 'concepts',
      indexVersion: '',
      mappingFile: './mapping.json',
      pollIntervalMs: 60000,
      maxStallErrors: 3,
      readOnlyMaxRetries: 5,
      connectRetryIntervalMs: 60000,
      trace: false,
      logLevel: 'info',
    });
    expect(config.aliasFilterFile).toBeUndefined();
    expect(config.unfilteredAlias).toBeUndefined();
  });

  it('coerces environment strings', () => {
    const config = loadMigratorConfig({
      env: {
        PORT: '9000',
        MAX_STALL_ERRORS: '0',
        OPENSEARCH_TRACE: 'true',
        OPENSEARCH_AUTH: 'aws',
        INDEX_VERSION: '2.1.0',
      },
    });

    expect(config.port).toBe(9000);
    expect(config.maxStallErrors).toBe(0);
    expect(config.trace).toBe(true);
    expect(config.auth).toBe('aws');
    expect(config.indexVersion).toBe('2.1.0');
  });

  it('lets overrides win over the environment', () => {
    const config = loadMigratorConfig({
      env: { INDEX_ALIAS: 'places', INDEX_VERSION: '1.0.0' },
      overrides: { indexVersion: '3.0.0', aliasName: undefined },
    });

    expect(config.indexVersion).toBe('3.0.0');
    expect(config.aliasName).toBe('places');
  });

  it('rejects a version that is not semantic', () => {
    expect(() => loadMigratorConfig({ env: { INDEX_VERSION: 'latest' } })).toThrow(
      'Invalid migrator configuration:\n  - indexVersion: Index version must be a semantic version'
    );
  });

  it('rejects an invalid endpoint', () => {
    expect(() => loadMigratorConfig({ env: { OPENSEARCH_ENDPOINT: 'not a url' } })).toThrow(
      '  - endpoint: Cluster endpoint must be a valid URL'
    );
  });

  it('rejects an alias with uppercase letters', () => {
    expect(() => loadMigratorConfig({ overrides: { aliasName: 'Concepts' }, env: {} })).toThrow(
      '  - aliasName: Alias name must be lowercase and start with a letter or digit'
    );
  });

  it('lists every invalid setting', () => {
    let message = '';
    try {
      loadMigratorConfig({ env: { PORT: '0', OPENSEARCH_AUTH: 'basic' } });
    } catch (error) {
      message = error instanceof Error ? error.message : String(error);
    }

    expect(message.split('\n')).toHaveLength(3);
    expect(message).toContain('  - port: ');
    expect(message).toContain('  - auth: ');
  });
});

describe('settings projections', () => {
  const config = loadMigratorConfig({
    env: {
      OPENSEARCH_ENDPOINT: 'https://search.example.com',
      AWS_REGION: 'us-east-1',
      INDEX_VERSION: '2.0.0',
      ALIAS_FILTER_FILE: './filter.json',
      UNFILTERED_ALIAS: 'all-concepts',
    },
  });

  it('derives the migration settings', () => {
    expect(toMigrationSettings(config)).toEqual({
      aliasName: 'concepts',
      indexVersion: '2.0.0',
      mappingFile: './mapping.json',
      aliasFilterFile: './filter.json',
      unfilteredAlias: 'all-concepts',
      pollIntervalMs: 60000,
      maxStallErrors: 3,
      readOnlyMaxRetries: 5,
    });
  });

  it('derives the connection settings', () => {
    expect(toConnectionSettings(config)).toEqual({
      endpoint: 'https://search.example.com',
      region: 'us-east-1',
      auth: 'none',
      trace: false,
    });
  });
});
