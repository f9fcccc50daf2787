/**
 * Privilege Classifier
 *
 * Maps a parsed statement to the single privilege kind that governs it.
 * Dispatch is two-level: statement category, then exact statement type.
 * Statement types with no mapping resolve to null; deciding what to do
 * with them is the checker's job.
 */

import type { PrivilegeType } from './privilege.js';
import type { DDLStatement, DMLStatement, SQLStatement } from '../statement/types.js';

/**
 * Resolve the privilege kind a statement requires
 *
 * Pure and total: depends only on the statement's category and type.
 */
export function resolvePrivilege(statement: SQLStatement): PrivilegeType | null {
  switch (statement.category) {
    case 'DAL':
      return statement.type === 'show_databases' ? 'SHOW_DB' : null;
    case 'DML':
      return resolveDMLPrivilege(statement);
    case 'DDL':
      return resolveDDLPrivilege(statement);
    case 'DCL':
    case 'TCL':
    case 'OTHER':
      return null;
    default: {
      const unhandled: never = statement;
      return unhandled;
    }
  }
}

function resolveDMLPrivilege(statement: DMLStatement): PrivilegeType | null {
  switch (statement.type) {
    case 'select':
      return 'SELECT';
    case 'insert':
      return 'INSERT';
    case 'update':
      return 'UPDATE';
    case 'delete':
      return 'DELETE';
    default:
      return null;
  }
}

function resolveDDLPrivilege(statement: DDLStatement): PrivilegeType | null {
  switch (statement.type) {
    case 'alter_database':
      return 'ALTER_ANY_DATABASE';
    case 'alter_table':
      return 'ALTER';
    case 'create_database':
      return 'CREATE_DATABASE';
    case 'create_table':
      return 'CREATE_TABLE';
    case 'create_function':
      return 'CREATE_FUNCTION';
    case 'drop_table':
    case 'drop_database':
      return 'DROP';
    case 'truncate':
      return 'TRUNCATE';
    default:
      return null;
  }
}
