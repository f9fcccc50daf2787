/**
 * SQL Statement Type Definitions
 *
 * Typed representation of an already-parsed SQL statement, organized the way
 * statement families are: a coarse category first, then the exact statement
 * type within it. Statements are read-only values.
 */

/**
 * Coarse statement category
 */
export type StatementCategory = 'DML' | 'DDL' | 'DAL' | 'DCL' | 'TCL' | 'OTHER';

/**
 * Data manipulation statement types
 */
export type DMLStatementType =
  | 'select'
  | 'insert'
  | 'update'
  | 'delete'
  | 'replace'
  | 'call'
  | 'load_data';

/**
 * Data definition statement types
 */
export type DDLStatementType =
  | 'create_database'
  | 'alter_database'
  | 'drop_database'
  | 'create_table'
  | 'alter_table'
  | 'drop_table'
  | 'rename_table'
  | 'truncate'
  | 'create_index'
  | 'drop_index'
  | 'create_view'
  | 'alter_view'
  | 'drop_view'
  | 'create_function'
  | 'drop_function'
  | 'create_procedure'
  | 'drop_procedure';

/**
 * Database administration statement types
 */
export type DALStatementType = 'show_databases' | 'show_tables' | 'describe' | 'use' | 'set';

/**
 * Data control statement types
 */
export type DCLStatementType = 'grant' | 'revoke' | 'create_user' | 'drop_user';

/**
 * Transaction control statement types
 */
export type TCLStatementType = 'begin' | 'commit' | 'rollback' | 'savepoint';

interface StatementBase<C extends StatementCategory, T extends string> {
  readonly category: C;
  readonly type: T;

  /** Original SQL text, when the statement came from one */
  readonly sql?: string;
}

export interface DMLStatement extends StatementBase<'DML', DMLStatementType> {
  /** Tables the statement reads or writes, unqualified */
  readonly tables?: readonly string[];
}

export interface DDLStatement extends StatementBase<'DDL', DDLStatementType> {
  /** Name of the database, table, view or routine being defined */
  readonly name?: string;
}

export interface DALStatement extends StatementBase<'DAL', DALStatementType> {
  readonly name?: string;
}

export type DCLStatement = StatementBase<'DCL', DCLStatementType>;

export type TCLStatement = StatementBase<'TCL', TCLStatementType>;

/**
 * Anything the upstream parser produced that fits no other category
 */
export type OtherStatement = StatementBase<'OTHER', 'unknown'>;

/**
 * Parsed SQL statement
 */
export type SQLStatement =
  | DMLStatement
  | DDLStatement
  | DALStatement
  | DCLStatement
  | TCLStatement
  | OtherStatement;
