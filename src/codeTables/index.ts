import type { CodeTable } from './CodeTable';
import * as cloudTables from './cloudTables';
import * as marineTables from './marineTables';
import * as miscTables from './miscTables';
import * as precipitationTables from './precipitationTables';
import * as visibilityTables from './visibilityTables';
import * as windTables from './windTables';

export * from './CodeTable';
export * from './cloudTables';
export * from './marineTables';
export * from './miscTables';
export * from './precipitationTables';
export * from './visibilityTables';
export * from './windTables';

type AnyTable = CodeTable<unknown>;

function isCodeTable(candidate: unknown): candidate is AnyTable {
  return typeof candidate === 'object'
    && candidate !== null
    && 'id' in candidate
    && 'decode' in candidate
    && 'encode' in candidate;
}

/**
 * Every code table keyed by its export name (e.g. `codeTable4377`), for
 * lookups by tooling and tests.
 */
export const codeTableRegistry: ReadonlyMap<string, AnyTable> = new Map(
  [cloudTables, marineTables, miscTables, precipitationTables, visibilityTables, windTables]
    .flatMap((module) => Object.entries(module))
    .filter((entry): entry is [string, AnyTable] => entry[0].startsWith('codeTable') && isCodeTable(entry[1])),
);
