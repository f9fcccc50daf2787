/**
 * SQLite Authority Rule Store
 *
 * Stores users, database visibility and privilege grants in SQLite tables.
 * Implements the AuthorityRule interface. Every lookup reads the tables at
 * call time; nothing is cached.
 */

import type Database from 'better-sqlite3';
import type { AuthorityRule, CredentialRecord, Privileges } from '../authority/types.js';
import type { AuthenticationMethod } from '../utils/constants.js';
import {
  AUTH_METHOD_BCRYPT,
  AUTH_METHOD_PLAINTEXT,
  DEFAULT_AUTHENTICATION_METHOD,
  HOST_WILDCARD,
} from '../utils/constants.js';
import { grantee as createGrantee, formatGrantee, type Grantee } from '../authority/grantee.js';
import { isPrivilegeType, type PrivilegeType } from '../authority/privilege.js';
import { GrantedPrivileges } from '../authority/privileges.js';
import { ConfigurationError } from '../errors/index.js';

interface UserRow {
  username: string;
  hostname: string;
  password: string;
  authentication_method: string;
}

/**
 * SQLite-based authority rule
 */
export class SqliteAuthorityRule implements AuthorityRule {
  private db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
    this.initializeSchema();
  }

  /**
   * Initialize database schema for authority storage
   */
  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS _authority_users (
        username TEXT NOT NULL,
        hostname TEXT NOT NULL,
        password TEXT NOT NULL,
        authentication_method TEXT NOT NULL,
        PRIMARY KEY (username, hostname)
      )
    `);

    // Databases visible to a user; '*' means all of them
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS _authority_database_grants (
        username TEXT NOT NULL,
        hostname TEXT NOT NULL,
        database_name TEXT NOT NULL,
        PRIMARY KEY (username, hostname, database_name),
        FOREIGN KEY (username, hostname) REFERENCES _authority_users(username, hostname) ON DELETE CASCADE
      )
    `);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS _authority_privileges (
        username TEXT NOT NULL,
        hostname TEXT NOT NULL,
        privilege TEXT NOT NULL,
        PRIMARY KEY (username, hostname, privilege),
        FOREIGN KEY (username, hostname) REFERENCES _authority_users(username, hostname) ON DELETE CASCADE
      )
    `);
  }

  /**
   * Store a user
   *
   * @throws ConfigurationError if the user already exists
   */
  createUser(
    grantee: Grantee,
    password: string,
    authenticationMethod: AuthenticationMethod = DEFAULT_AUTHENTICATION_METHOD
  ): void {
    const existing = this.db
      .prepare('SELECT 1 FROM _authority_users WHERE username = ? AND hostname = ?')
      .get(grantee.username, grantee.hostname);

    if (existing !== undefined) {
      throw new ConfigurationError(`User '${formatGrantee(grantee)}' already exists`, 'users');
    }

    this.db
      .prepare(
        'INSERT INTO _authority_users (username, hostname, password, authentication_method) VALUES (?, ?, ?, ?)'
      )
      .run(grantee.username, grantee.hostname, password, authenticationMethod);
  }

  /**
   * Make databases visible to a user
   */
  grantDatabases(grantee: Grantee, databases: readonly string[]): void {
    const user = this.requireUser(grantee);
    const insert = this.db.prepare(
      'INSERT OR IGNORE INTO _authority_database_grants (username, hostname, database_name) VALUES (?, ?, ?)'
    );
    const insertAll = this.db.transaction((names: readonly string[]) => {
      for (const name of names) {
        insert.run(user.username, user.hostname, name);
      }
    });
    insertAll(databases);
  }

  /**
   * Grant privilege kinds to a user
   */
  grantPrivileges(grantee: Grantee, privileges: readonly PrivilegeType[]): void {
    const user = this.requireUser(grantee);
    const insert = this.db.prepare(
      'INSERT OR IGNORE INTO _authority_privileges (username, hostname, privilege) VALUES (?, ?, ?)'
    );
    const insertAll = this.db.transaction((kinds: readonly PrivilegeType[]) => {
      for (const kind of kinds) {
        insert.run(user.username, user.hostname, kind);
      }
    });
    insertAll(privileges);
  }

  findUser(grantee: Grantee): CredentialRecord | undefined {
    const row = this.findUserRow(grantee);
    if (row === undefined) {
      return undefined;
    }

    const record: CredentialRecord = {
      grantee: createGrantee(row.username, row.hostname),
      password: row.password,
    };
    const method = toAuthenticationMethod(row.authentication_method);
    return method === undefined ? record : { ...record, authenticationMethod: method };
  }

  findPrivileges(grantee: Grantee): Privileges | undefined {
    const row = this.findUserRow(grantee);
    if (row === undefined) {
      return undefined;
    }

    const databases = this.db
      .prepare(
        'SELECT database_name FROM _authority_database_grants WHERE username = ? AND hostname = ?'
      )
      .all(row.username, row.hostname) as Array<{ database_name: string }>;

    const privileges = this.db
      .prepare('SELECT privilege FROM _authority_privileges WHERE username = ? AND hostname = ?')
      .all(row.username, row.hostname) as Array<{ privilege: string }>;

    return new GrantedPrivileges({
      databases: databases.map(r => r.database_name),
      privileges: privileges.map(r => r.privilege).filter(isPrivilegeType),
    });
  }

  /**
   * Look up a user row, preferring an exact host, then the wildcard host,
   * then the lowest hostname
   */
  private findUserRow(grantee: Grantee): UserRow | undefined {
    return this.db
      .prepare(
        `SELECT username, hostname, password, authentication_method FROM _authority_users
         WHERE username = ?
         AND (lower(hostname) = lower(?) OR hostname = ? OR ? = ?)
         ORDER BY CASE WHEN lower(hostname) = lower(?) THEN 0 WHEN hostname = ? THEN 1 ELSE 2 END, hostname
         LIMIT 1`
      )
      .get(
        grantee.username,
        grantee.hostname,
        HOST_WILDCARD,
        grantee.hostname,
        HOST_WILDCARD,
        grantee.hostname,
        HOST_WILDCARD
      ) as UserRow | undefined;
  }

  /**
   * Grants go to the stored user with exactly this host
   */
  private requireUser(grantee: Grantee): Grantee {
    const row = this.db
      .prepare('SELECT 1 FROM _authority_users WHERE username = ? AND hostname = ?')
      .get(grantee.username, grantee.hostname);
    if (row === undefined) {
      throw new ConfigurationError(`Unknown user '${formatGrantee(grantee)}'`, 'users');
    }
    return grantee;
  }
}

/**
 * Methods written by other tools are left off the record; validators then
 * treat the password as plaintext.
 */
function toAuthenticationMethod(value: string): AuthenticationMethod | undefined {
  if (value === AUTH_METHOD_BCRYPT || value === AUTH_METHOD_PLAINTEXT) {
    return value;
  }
  return undefined;
}
