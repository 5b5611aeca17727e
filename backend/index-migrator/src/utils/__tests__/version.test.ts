import { describe, it, expect } from '@jest/globals';
import {
  indexMatchesVersion,
  indexVersionSuffix,
  isValidVersion,
  requiredIndexName,
} from '../version';

describe('index version helpers', () => {
  it('builds the required index name from alias and version', () => {
    expect(requiredIndexName('concepts', '1.2.0')).toBe('concepts-1.2.0');
  });

  it('extracts the version suffix of an index created for the alias', () => {
    expect(indexVersionSuffix('concepts', 'concepts-1.2.0')).toBe('1.2.0');
    expect(indexVersionSuffix('concepts', 'concepts-')).toBeUndefined();
    expect(indexVersionSuffix('concepts', 'people-1.2.0')).toBeUndefined();
  });

  it('validates semantic versions', () => {
    expect(isValidVersion('1.2.0')).toBe(true);
    expect(isValidVersion('v1.2.0')).toBe(true);
    expect(isValidVersion('1.2')).toBe(false);
    expect(isValidVersion('latest')).toBe(false);
  });

  describe('indexMatchesVersion', () => {
    it('matches the exact required name', () => {
      expect(indexMatchesVersion('concepts', 'concepts-1.2.0', '1.2.0')).toBe(true);
    });

    it('compares versions structurally', () => {
      expect(indexMatchesVersion('concepts', 'concepts-v1.2.0', '1.2.0')).toBe(true);
      expect(indexMatchesVersion('concepts', 'concepts-1.2.0', 'v1.2.0')).toBe(true);
    });

    it('rejects other versions and unrelated indices', () => {
      expect(indexMatchesVersion('concepts', 'concepts-1.1.0', '1.2.0')).toBe(false);
      expect(indexMatchesVersion('concepts', 'concepts-old', '1.2.0')).toBe(false);
      expect(indexMatchesVersion('concepts', 'people-1.2.0', '1.2.0')).toBe(false);
    });
  });
});
