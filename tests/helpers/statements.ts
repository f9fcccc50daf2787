/**
 * Test helpers for statements and authority rules
 */

import type { SQLStatement } from '../../src/statement/types.js';
import type {
  AuthorityLogger,
  AuthorityRule,
  CredentialRecord,
  Privileges,
} from '../../src/authority/types.js';
import { formatGrantee, type Grantee } from '../../src/authority/grantee.js';
import { vi, type Mock } from 'vitest';

export const SELECT: SQLStatement = { category: 'DML', type: 'select', tables: ['orders'] };
export const INSERT: SQLStatement = { category: 'DML', type: 'insert', tables: ['orders'] };
export const UPDATE: SQLStatement = { category: 'DML', type: 'update', tables: ['orders'] };
export const DELETE: SQLStatement = { category: 'DML', type: 'delete', tables: ['orders'] };
export const SHOW_DATABASES: SQLStatement = { category: 'DAL', type: 'show_databases' };
export const BEGIN: SQLStatement = { category: 'TCL', type: 'begin' };

/**
 * Rule store stub keyed by exact "user@host"
 */
export function stubRule(entries: {
  readonly users?: readonly CredentialRecord[];
  readonly privileges?: ReadonlyMap<string, Privileges>;
}): AuthorityRule {
  return {
    findUser: (grantee: Grantee) =>
      entries.users?.find(user => formatGrantee(user.grantee) === formatGrantee(grantee)),
    findPrivileges: (grantee: Grantee) => entries.privileges?.get(formatGrantee(grantee)),
  };
}

/**
 * Logger that records calls without printing
 */
export function silentLogger(): AuthorityLogger & { debug: Mock; warn: Mock } {
  return { debug: vi.fn(), warn: vi.fn() };
}
