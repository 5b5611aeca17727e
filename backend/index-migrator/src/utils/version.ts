/**
 * Index naming and version comparison
 *
 * Index names follow `{alias}-{version}`. Versions are compared as semantic
 * versions, so `concepts-1.2.0` satisfies a required version of `v1.2.0`.
 */

import semver from 'semver';

export function requiredIndexName(alias: string, version: string): string {
  return `${alias}-${version}`;
}

/**
 * Returns the version suffix of an index created for `alias`, or undefined
 * when the index does not follow the naming scheme.
 */
export function indexVersionSuffix(alias: string, indexName: string): string | undefined {
  const prefix = `${alias}-`;
  if (!indexName.startsWith(prefix) || indexName.length === prefix.length) {
    return undefined;
  }
  return indexName.slice(prefix.length);
}

export function isValidVersion(version: string): boolean {
  return semver.valid(version) !== null;
}

export function indexMatchesVersion(alias: string, indexName: string, version: string): boolean {
  if (indexName === requiredIndexName(alias, version)) {
    return true;
  }

  const suffix = indexVersionSuffix(alias, indexName);
  if (suffix === undefined || !isValidVersion(suffix) || !isValidVersion(version)) {
    return false;
  }

  return semver.eq(suffix, version);
}
