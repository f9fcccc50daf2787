/**
 * SQL Authority
 *
 * Privilege resolution and fail-closed authorization for parsed SQL
 * statements, with pluggable credential validation and rule stores.
 */

// Export checker and classifier
export { AuthorityChecker } from './authority/checker.js';
export type { AuthorityCheckerOptions } from './authority/checker.js';
export { resolvePrivilege } from './authority/classifier.js';

// Export privileges
export { PRIVILEGE_TYPES, isPrivilegeType, normalizePrivilegeName } from './authority/privilege.js';
export type { PrivilegeType } from './authority/privilege.js';
export {
  AllPermittedPrivileges,
  DatabasePermittedPrivileges,
  GrantedPrivileges,
} from './authority/privileges.js';

// Export grantees
export { grantee, parseGrantee, formatGrantee, granteeMatches } from './authority/grantee.js';
export type { Grantee } from './authority/grantee.js';

// Export rules and configuration
export { InMemoryAuthorityRule, createAuthorityRule } from './authority/rule.js';
export type { CreateAuthorityRuleOptions } from './authority/rule.js';
export { parseUserDatabaseMappings } from './authority/config.js';
export type {
  AuthorityConfig,
  AuthorityUserConfig,
  AuthorityGrantConfig,
  PrivilegeProviderConfig,
} from './authority/config.js';
export { SqliteAuthorityRule } from './storage/sqlite-rule-store.js';
export type {
  AuthorityRule,
  AuthorityLogger,
  CredentialRecord,
  CredentialValidator,
  Privileges,
} from './authority/types.js';

// Export credential validators
export {
  plaintextValidator,
  bcryptValidator,
  recordMethodValidator,
  validatorFor,
} from './auth/validators.js';

// Export statements
export { parseStatement } from './statement/parser.js';
export type {
  SQLStatement,
  StatementCategory,
  DMLStatement,
  DMLStatementType,
  DDLStatement,
  DDLStatementType,
  DALStatement,
  DALStatementType,
  DCLStatement,
  DCLStatementType,
  TCLStatement,
  TCLStatementType,
  OtherStatement,
} from './statement/types.js';

// Export errors
export {
  AuthorityError,
  UnknownDatabaseError,
  UnauthorizedOperationError,
  ConfigurationError,
  ParseError,
} from './errors/index.js';
