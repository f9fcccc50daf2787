/**
 * Authority Checker
 *
 * Decides whether a grantee may run a statement against a database.
 * Enforcement throws; probes return booleans.
 */

import type { AuthorityLogger, AuthorityRule, CredentialValidator } from './types.js';
import type { Grantee } from './grantee.js';
import type { SQLStatement } from '../statement/types.js';
import { formatGrantee } from './grantee.js';
import { resolvePrivilege } from './classifier.js';
import { UnauthorizedOperationError, UnknownDatabaseError } from '../errors/index.js';

export interface AuthorityCheckerOptions {
  /** Receives a debug line for every denial (default: console) */
  readonly logger?: AuthorityLogger;
}

/**
 * Authority checker bound to one grantee
 *
 * A null grantee is a trusted internal caller: every check passes.
 * An empty username is still a grantee and goes through every check.
 */
export class AuthorityChecker {
  private readonly logger: AuthorityLogger;

  constructor(
    private readonly rule: AuthorityRule,
    private readonly grantee: Grantee | null,
    options: AuthorityCheckerOptions = {}
  ) {
    this.logger = options.logger ?? console;
  }

  /**
   * Check a client credential against the stored one
   *
   * The comparison itself belongs to the validator; its result is returned
   * unchanged. No stored record means not authenticated.
   */
  isAuthenticated(validator: CredentialValidator, cipher: unknown): boolean {
    if (this.grantee === null) {
      return false;
    }
    const record = this.rule.findUser(this.grantee);
    return record !== undefined && validator(record, cipher);
  }

  /**
   * Whether the grantee can see a database
   */
  isAuthorized(databaseName: string): boolean {
    if (this.grantee === null) {
      return true;
    }
    return this.rule.findPrivileges(this.grantee)?.hasDatabase(databaseName) ?? false;
  }

  /**
   * Enforce database visibility and the statement's privilege
   *
   * @param databaseName - Target database, or null/undefined when the statement is not database-scoped
   * @throws UnknownDatabaseError when the database is not visible to the grantee
   * @throws UnauthorizedOperationError when the required privilege is missing or the statement has none
   */
  checkPrivileges(databaseName: string | null | undefined, statement: SQLStatement): void {
    if (this.grantee === null) {
      return;
    }

    const privileges = this.rule.findPrivileges(this.grantee);

    if (databaseName !== null && databaseName !== undefined) {
      if (!privileges?.hasDatabase(databaseName)) {
        this.logger.debug(
          `Denied ${formatGrantee(this.grantee)}: database '${databaseName}' is not visible`
        );
        throw new UnknownDatabaseError(databaseName);
      }
    }

    const privilege = resolvePrivilege(statement);
    if (privilege === null || !privileges?.hasPrivileges(new Set([privilege]))) {
      this.logger.debug(
        `Denied ${formatGrantee(this.grantee)}: ${statement.category} ${statement.type} requires ${privilege ?? 'an unmapped privilege'}`
      );
      throw new UnauthorizedOperationError(privilege ?? '');
    }
  }
}
