import * as path from 'path';
import { MockDocument } from '../../adapters';
import { MigrationSettings } from '../../types';

export const FIXTURES = path.join(__dirname, '..', '..', '__fixtures__');

export const MAPPING_FILE = path.join(FIXTURES, 'new-mapping.json');
export const FILTER_FILE = path.join(FIXTURES, 'alias-filter.json');

/**
 * 偶数番目が tier=primary、奇数番目が tier=secondary のドキュメント
 */
export function makeDocuments(count: number): MockDocument[] {
  return Array.from({ length: count }, (_, i) => ({
    id: `concept-${i}`,
    source: {
      prefLabel: `Concept ${i}`,
      tier: i % 2 === 0 ? 'primary' : 'secondary',
    },
  }));
}

export function makeSettings(overrides: Partial<MigrationSettings> = {}): MigrationSettings {
  return {
    aliasName: 'concepts',
    indexVersion: '2.0.0',
    mappingFile: MAPPING_FILE,
    pollIntervalMs: 1,
    maxStallErrors: 3,
    readOnlyMaxRetries: 5,
    ...overrides,
  };
}
