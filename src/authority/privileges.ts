/**
 * Privilege set implementations
 */

import type { Privileges } from './types.js';
import { PRIVILEGE_TYPES, type PrivilegeType } from './privilege.js';
import { DATABASE_WILDCARD } from '../utils/constants.js';
import { identifiersEqual } from '../utils/identifier.js';

/**
 * Every database visible, every privilege held
 */
export class AllPermittedPrivileges implements Privileges {
  hasDatabase(_databaseName: string): boolean {
    return true;
  }

  hasPrivileges(_privileges: ReadonlySet<PrivilegeType>): boolean {
    return true;
  }
}

/**
 * Explicit databases and privilege kinds
 *
 * Database names compare case-insensitively; "*" grants every database.
 */
export class GrantedPrivileges implements Privileges {
  private readonly databases: readonly string[];
  private readonly privileges: ReadonlySet<PrivilegeType>;

  constructor(grants: {
    readonly databases: Iterable<string>;
    readonly privileges: Iterable<PrivilegeType>;
  }) {
    this.databases = [...grants.databases];
    this.privileges = new Set(grants.privileges);
  }

  hasDatabase(databaseName: string): boolean {
    return this.databases.some(
      database => database === DATABASE_WILDCARD || identifiersEqual(database, databaseName)
    );
  }

  hasPrivileges(privileges: ReadonlySet<PrivilegeType>): boolean {
    for (const privilege of privileges) {
      if (this.privileges.has(privilege)) {
        return true;
      }
    }
    return false;
  }
}

/**
 * Visibility limited to mapped databases, every privilege held on them
 */
export class DatabasePermittedPrivileges extends GrantedPrivileges {
  constructor(databases: Iterable<string>) {
    super({ databases, privileges: PRIVILEGE_TYPES });
  }
}
