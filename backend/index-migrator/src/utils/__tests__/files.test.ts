import { describe, it, expect } from '@jest/globals';
import * as path from 'path';
import { MigrationInputError } from '../errors';
import { readAliasFilter, readMappingDocument } from '../files';

const FIXTURES = path.join(__dirname, '..', '..', '__fixtures__');

describe('document loading', () => {
  it('reads the mapping document verbatim', async () => {
    const mapping = await readMappingDocument(path.join(FIXTURES, 'new-mapping.json'));

    expect(JSON.parse(mapping)).toEqual({
      mappings: {
        properties: {
          id: { type: 'keyword' },
          prefLabel: { type: 'text' },
          tier: { type: 'keyword' },
        },
      },
    });
  });

  it('fails with MigrationInputError for a missing mapping file', async () => {
    const missing = path.join(FIXTURES, 'missing.json');

    await expect(readMappingDocument(missing)).rejects.toBeInstanceOf(MigrationInputError);
    await expect(readMappingDocument(missing)).rejects.toMatchObject({ path: missing });
  });

  it('parses the alias filter', async () => {
    await expect(readAliasFilter(path.join(FIXTURES, 'alias-filter.json'))).resolves.toEqual({
      term: { tier: 'primary' },
    });
  });

  it('rejects a filter that is not valid JSON', async () => {
    const file = path.join(FIXTURES, 'invalid-filter.json');
    await expect(readAliasFilter(file)).rejects.toThrow(`alias filter ${file} is not valid JSON`);
  });

  it('rejects a filter that is not an object', async () => {
    const file = path.join(FIXTURES, 'array-filter.json');
    await expect(readAliasFilter(file)).rejects.toThrow(`alias filter ${file} must be a JSON object`);
  });
});
