/**
 * Authority Type Definitions
 *
 * Interfaces the checker consumes from the authority rule store. The store
 * owns grants and credentials; the checker only reads them.
 */

import type { Grantee } from './grantee.js';
import type { PrivilegeType } from './privilege.js';
import type { AuthenticationMethod } from '../utils/constants.js';

/**
 * Privileges held by one grantee
 */
export interface Privileges {
  /**
   * Whether the grantee can see a database
   */
  hasDatabase(databaseName: string): boolean;

  /**
   * Whether the grantee holds at least one of the given kinds
   */
  hasPrivileges(privileges: ReadonlySet<PrivilegeType>): boolean;
}

/**
 * Stored credential for a grantee
 */
export interface CredentialRecord {
  readonly grantee: Grantee;

  /** Stored password or password hash, compared only by a validator */
  readonly password: string;

  readonly authenticationMethod?: AuthenticationMethod;
}

/**
 * Compares a stored credential with what the client sent
 */
export type CredentialValidator = (record: CredentialRecord, cipher: unknown) => boolean;

/**
 * Authority rule store
 *
 * Lookups are synchronous and read the store's state at call time.
 */
export interface AuthorityRule {
  /**
   * Find the credential record for a grantee
   */
  findUser(grantee: Grantee): CredentialRecord | undefined;

  /**
   * Find the privileges held by a grantee
   */
  findPrivileges(grantee: Grantee): Privileges | undefined;
}

/**
 * Logger used by the checker and rule builders
 */
export type AuthorityLogger = Pick<Console, 'debug' | 'warn'>;
