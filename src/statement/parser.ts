/**
 * Statement Recognizer
 *
 * Turns SQL text into the typed statement the checker works on by matching
 * leading keywords. This is not a SQL parser: it reads just enough of the
 * statement to know its category, its type and the object it names.
 *
 * Supports:
 * - SELECT, WITH ... SELECT|UPDATE|DELETE, INSERT, REPLACE, UPDATE, DELETE, CALL, LOAD DATA
 * - CREATE/ALTER/DROP DATABASE|SCHEMA, TABLE, INDEX, VIEW, FUNCTION, PROCEDURE
 * - TRUNCATE, RENAME TABLE
 * - SHOW DATABASES, SHOW TABLES, DESCRIBE, USE, SET
 * - GRANT, REVOKE, CREATE USER, DROP USER
 * - BEGIN/START TRANSACTION, COMMIT, ROLLBACK, SAVEPOINT
 */

import { stripQuotes, unqualify } from '../utils/identifier.js';
import { ParseError } from '../errors/index.js';
import type {
  DALStatement,
  DALStatementType,
  DDLStatement,
  DDLStatementType,
  DMLStatement,
  DMLStatementType,
  SQLStatement,
} from './types.js';

// Bare, backtick- or double-quoted identifier, optionally qualified
const NAME = '((?:`[^`]+`|"[^"]+"|[\\w$]+)(?:\\.(?:`[^`]+`|"[^"]+"|[\\w$]+))*)';

// CREATE [OR REPLACE] [ALGORITHM=...] [DEFINER=...] [SQL SECURITY ...]
const ROUTINE_PREFIX =
  '(?:\\s+OR\\s+REPLACE)?(?:\\s+ALGORITHM\\s*=\\s*\\w+)?(?:\\s+DEFINER\\s*=\\s*\\S+)?(?:\\s+SQL\\s+SECURITY\\s+\\w+)?';

interface RecognitionRule {
  readonly pattern: RegExp;
  readonly build: (match: RegExpExecArray, sql: string) => SQLStatement;
}

function rule(source: string, build: RecognitionRule['build']): RecognitionRule {
  return { pattern: new RegExp(`^${source}`, 'i'), build };
}

function dml(type: DMLStatementType, sql: string, tables: readonly string[]): DMLStatement {
  return tables.length > 0 ? { category: 'DML', type, tables, sql } : { category: 'DML', type, sql };
}

function ddl(type: DDLStatementType, sql: string, name: string | undefined): DDLStatement {
  return name === undefined ? { category: 'DDL', type, sql } : { category: 'DDL', type, name, sql };
}

function dal(type: DALStatementType, sql: string, name: string | undefined): DALStatement {
  return name === undefined ? { category: 'DAL', type, sql } : { category: 'DAL', type, name, sql };
}

function table(name: string | undefined): string | undefined {
  return name === undefined ? undefined : unqualify(name);
}

function database(name: string | undefined): string | undefined {
  return name === undefined ? undefined : stripQuotes(name);
}

/**
 * Tables named after FROM or JOIN, in order of appearance
 */
function referencedTables(sql: string): string[] {
  const pattern = new RegExp(`\\b(?:FROM|JOIN)\\s+${NAME}`, 'gi');
  const tables: string[] = [];
  for (const match of sql.matchAll(pattern)) {
    const name = table(match[1]);
    if (name !== undefined && !tables.includes(name)) {
      tables.push(name);
    }
  }
  return tables;
}

// Statements a WITH clause may introduce
const CTE_TARGETS: ReadonlySet<DMLStatementType> = new Set<DMLStatementType>(['select', 'update', 'delete']);

/**
 * Text following the common table expressions of a WITH statement
 *
 * The list ends at the first top-level closing parenthesis not followed by
 * another definition (",") or by the AS of a column list.
 */
function cteBody(sql: string): string | undefined {
  let depth = 0;
  let quote: string | undefined;
  for (let i = 0; i < sql.length; i++) {
    const char = sql.charAt(i);
    if (quote !== undefined) {
      if (char === quote) {
        quote = undefined;
      }
    } else if (char === "'" || char === '"' || char === '`') {
      quote = char;
    } else if (char === '(') {
      depth++;
    } else if (char === ')') {
      depth--;
      if (depth === 0) {
        const rest = sql.substring(i + 1).trim();
        if (!rest.startsWith(',') && !/^AS\b/i.test(rest)) {
          return rest;
        }
      } else if (depth < 0) {
        return undefined;
      }
    }
  }
  return undefined;
}

/**
 * A WITH statement takes the type of the statement after its CTE list.
 * Anything but SELECT, UPDATE or DELETE there is unrecognized.
 */
function withStatement(sql: string): SQLStatement {
  const body = cteBody(sql);
  const statement = body === undefined ? undefined : recognize(body);
  if (statement?.category === 'DML' && CTE_TARGETS.has(statement.type)) {
    return dml(statement.type, sql, statement.tables ?? []);
  }
  return { category: 'OTHER', type: 'unknown', sql };
}

const RULES: readonly RecognitionRule[] = [
  // DML
  rule('WITH\\b', (_, sql) => withStatement(sql)),
  rule('SELECT\\b', (_, sql) => dml('select', sql, referencedTables(sql))),
  rule(`INSERT\\s+(?:(?:LOW_PRIORITY|DELAYED|HIGH_PRIORITY|IGNORE)\\s+)*(?:INTO\\s+)?${NAME}`, (m, sql) =>
    dml('insert', sql, [unqualify(m[1] ?? '')])
  ),
  rule(`REPLACE\\s+(?:(?:LOW_PRIORITY|DELAYED)\\s+)?(?:INTO\\s+)?${NAME}`, (m, sql) =>
    dml('replace', sql, [unqualify(m[1] ?? '')])
  ),
  rule(`UPDATE\\s+(?:(?:LOW_PRIORITY|IGNORE)\\s+)*${NAME}`, (m, sql) =>
    dml('update', sql, [unqualify(m[1] ?? '')])
  ),
  rule(`DELETE\\b.*?\\bFROM\\s+${NAME}`, (m, sql) => dml('delete', sql, [unqualify(m[1] ?? '')])),
  rule(`CALL\\s+${NAME}`, (_, sql) => dml('call', sql, [])),
  rule('LOAD\\s+DATA\\b', (_, sql) => {
    const target = new RegExp(`\\bINTO\\s+TABLE\\s+${NAME}`, 'i').exec(sql);
    const name = table(target?.[1]);
    return dml('load_data', sql, name === undefined ? [] : [name]);
  }),

  // DCL before DDL: CREATE USER / DROP USER share the CREATE/DROP keywords
  rule('GRANT\\b', (_, sql) => ({ category: 'DCL', type: 'grant', sql })),
  rule('REVOKE\\b', (_, sql) => ({ category: 'DCL', type: 'revoke', sql })),
  rule('CREATE\\s+USER\\b', (_, sql) => ({ category: 'DCL', type: 'create_user', sql })),
  rule('DROP\\s+USER\\b', (_, sql) => ({ category: 'DCL', type: 'drop_user', sql })),

  // DDL
  rule(`CREATE\\s+(?:DATABASE|SCHEMA)\\s+(?:IF\\s+NOT\\s+EXISTS\\s+)?${NAME}`, (m, sql) =>
    ddl('create_database', sql, database(m[1]))
  ),
  // The database name is optional: ALTER DATABASE CHARACTER SET ... targets the current one
  rule(
    `ALTER\\s+(?:DATABASE|SCHEMA)\\b(?:\\s+(?!(?:DEFAULT|CHARACTER|CHARSET|COLLATE|ENCRYPTION|READ)\\b)${NAME})?`,
    (m, sql) =>
    ddl('alter_database', sql, database(m[1]))
  ),
  rule(`DROP\\s+(?:DATABASE|SCHEMA)\\s+(?:IF\\s+EXISTS\\s+)?${NAME}`, (m, sql) =>
    ddl('drop_database', sql, database(m[1]))
  ),
  rule(`CREATE\\s+(?:TEMPORARY\\s+)?TABLE\\s+(?:IF\\s+NOT\\s+EXISTS\\s+)?${NAME}`, (m, sql) =>
    ddl('create_table', sql, table(m[1]))
  ),
  rule(`ALTER\\s+(?:ONLINE\\s+|IGNORE\\s+)?TABLE\\s+${NAME}`, (m, sql) =>
    ddl('alter_table', sql, table(m[1]))
  ),
  rule(`DROP\\s+(?:TEMPORARY\\s+)?TABLE\\s+(?:IF\\s+EXISTS\\s+)?${NAME}`, (m, sql) =>
    ddl('drop_table', sql, table(m[1]))
  ),
  rule(`RENAME\\s+TABLE\\s+${NAME}`, (m, sql) => ddl('rename_table', sql, table(m[1]))),
  rule(`TRUNCATE\\s+(?:TABLE\\s+)?${NAME}`, (m, sql) => ddl('truncate', sql, table(m[1]))),
  rule(`CREATE\\s+(?:(?:UNIQUE|FULLTEXT|SPATIAL)\\s+)?INDEX\\s+${NAME}`, (m, sql) =>
    ddl('create_index', sql, table(m[1]))
  ),
  rule(`DROP\\s+INDEX\\s+${NAME}`, (m, sql) => ddl('drop_index', sql, table(m[1]))),
  rule(`CREATE${ROUTINE_PREFIX}\\s+VIEW\\s+${NAME}`, (m, sql) => ddl('create_view', sql, table(m[1]))),
  rule(`ALTER${ROUTINE_PREFIX}\\s+VIEW\\s+${NAME}`, (m, sql) => ddl('alter_view', sql, table(m[1]))),
  rule(`DROP\\s+VIEW\\s+(?:IF\\s+EXISTS\\s+)?${NAME}`, (m, sql) => ddl('drop_view', sql, table(m[1]))),
  rule(`CREATE${ROUTINE_PREFIX}\\s+FUNCTION\\s+(?:IF\\s+NOT\\s+EXISTS\\s+)?${NAME}`, (m, sql) =>
    ddl('create_function', sql, table(m[1]))
  ),
  rule(`DROP\\s+FUNCTION\\s+(?:IF\\s+EXISTS\\s+)?${NAME}`, (m, sql) =>
    ddl('drop_function', sql, table(m[1]))
  ),
  rule(`CREATE${ROUTINE_PREFIX}\\s+PROCEDURE\\s+(?:IF\\s+NOT\\s+EXISTS\\s+)?${NAME}`, (m, sql) =>
    ddl('create_procedure', sql, table(m[1]))
  ),
  rule(`DROP\\s+PROCEDURE\\s+(?:IF\\s+EXISTS\\s+)?${NAME}`, (m, sql) =>
    ddl('drop_procedure', sql, table(m[1]))
  ),

  // DAL
  rule('SHOW\\s+(?:DATABASES|SCHEMAS)\\b', (_, sql) => dal('show_databases', sql, undefined)),
  rule(`SHOW\\s+(?:FULL\\s+)?TABLES\\b(?:\\s+(?:FROM|IN)\\s+${NAME})?`, (m, sql) =>
    dal('show_tables', sql, database(m[1]))
  ),
  rule(`(?:DESC|DESCRIBE)\\s+${NAME}`, (m, sql) => dal('describe', sql, table(m[1]))),
  rule(`USE\\s+${NAME}`, (m, sql) => dal('use', sql, database(m[1]))),
  rule('SET\\b', (_, sql) => dal('set', sql, undefined)),

  // TCL
  rule('(?:BEGIN|START\\s+TRANSACTION)\\b', (_, sql) => ({ category: 'TCL', type: 'begin', sql })),
  rule('COMMIT\\b', (_, sql) => ({ category: 'TCL', type: 'commit', sql })),
  rule('ROLLBACK\\b', (_, sql) => ({ category: 'TCL', type: 'rollback', sql })),
  rule('SAVEPOINT\\b', (_, sql) => ({ category: 'TCL', type: 'savepoint', sql })),
];

/**
 * Recognize a single SQL statement
 *
 * Statements no rule recognizes come back as category OTHER.
 *
 * @throws ParseError when the input holds no statement at all
 */
export function parseStatement(sql: string): SQLStatement {
  const normalized = sql
    .replace(/\/\*[\s\S]*?\*\//g, ' ') // Remove block comments
    .replace(/--.*$/gm, '') // Remove line comments
    .replace(/\s+/g, ' ') // Normalize whitespace
    .trim()
    .replace(/\s*;$/, '');

  if (!normalized) {
    throw new ParseError('SQL statement is empty', sql);
  }

  return recognize(normalized) ?? { category: 'OTHER', type: 'unknown', sql: normalized };
}

function recognize(sql: string): SQLStatement | undefined {
  for (const { pattern, build } of RULES) {
    const match = pattern.exec(sql);
    if (match) {
      return build(match, sql);
    }
  }
  return undefined;
}
