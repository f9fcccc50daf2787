/**
 * Privilege kinds
 *
 * Closed set of operation categories a grantee can hold. The classifier maps
 * statements onto a subset of these; the rest are grantable but not yet
 * required by any statement type.
 */

export const PRIVILEGE_TYPES = [
  'SELECT',
  'INSERT',
  'UPDATE',
  'DELETE',
  'CREATE',
  'CREATE_DATABASE',
  'CREATE_TABLE',
  'CREATE_VIEW',
  'CREATE_FUNCTION',
  'CREATE_PROCEDURE',
  'CREATE_USER',
  'CREATE_TMP_TABLE',
  'ALTER',
  'ALTER_ANY_DATABASE',
  'ALTER_ROUTINE',
  'DROP',
  'TRUNCATE',
  'INDEX',
  'REFERENCES',
  'EXECUTE',
  'SHOW_DB',
  'SHOW_VIEW',
  'GRANT',
  'LOCK_TABLES',
  'RELOAD',
  'SHUTDOWN',
  'PROCESS',
  'FILE',
  'SUPER',
  'REPL_SLAVE',
  'REPL_CLIENT',
  'EVENT',
  'TRIGGER',
] as const;

export type PrivilegeType = (typeof PRIVILEGE_TYPES)[number];

const PRIVILEGE_TYPE_SET: ReadonlySet<string> = new Set(PRIVILEGE_TYPES);

/**
 * Narrow a string to a privilege kind
 */
export function isPrivilegeType(value: string): value is PrivilegeType {
  return PRIVILEGE_TYPE_SET.has(value);
}

/**
 * Normalize a privilege name as written in configuration
 *
 * Accepts any case and either spaces or underscores: "create table",
 * "Create_Table" and "CREATE_TABLE" are the same kind. Returns null for
 * names outside the set.
 */
export function normalizePrivilegeName(name: string): PrivilegeType | null {
  const normalized = name.trim().replace(/\s+/g, '_').toUpperCase();
  return isPrivilegeType(normalized) ? normalized : null;
}
