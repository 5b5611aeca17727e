/**
 * Mapping / alias filter document loading
 */

import { promises as fs } from 'fs';
import { AliasFilter } from '../types';
import { MigrationInputError } from './errors';

async function readDocument(filePath: string, kind: string): Promise<string> {
  try {
    return await fs.readFile(filePath, 'utf8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new MigrationInputError(`unable to read ${kind} ${filePath}: ${reason}`, filePath);
  }
}

/**
 * Reads the index mapping document. The contents are passed to the cluster as-is.
 */
export function readMappingDocument(filePath: string): Promise<string> {
  return readDocument(filePath, 'index mapping');
}

/**
 * Reads and parses an alias filter document. The document must be a single
 * JSON object holding a query clause.
 */
export async function readAliasFilter(filePath: string): Promise<AliasFilter> {
  const raw = await readDocument(filePath, 'alias filter');

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new MigrationInputError(`alias filter ${filePath} is not valid JSON: ${reason}`, filePath);
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new MigrationInputError(`alias filter ${filePath} must be a JSON object`, filePath);
  }
  if (Object.keys(parsed).length === 0) {
    throw new MigrationInputError(`alias filter ${filePath} is empty`, filePath);
  }

  return Object.fromEntries(Object.entries(parsed));
}
