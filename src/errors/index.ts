/**
 * Error types for SQL Authority
 */

/**
 * Base error class for SQL Authority errors
 */
export class AuthorityError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AuthorityError';
    Object.setPrototypeOf(this, AuthorityError.prototype);
  }
}

/**
 * Thrown when the target database is not visible to the grantee
 *
 * Reported as "unknown" rather than "denied" so that databases the grantee
 * cannot see are indistinguishable from databases that do not exist.
 */
export class UnknownDatabaseError extends AuthorityError {
  public readonly databaseName: string;
  public readonly sqlState = '42000';
  public readonly vendorCode = 1049;

  constructor(databaseName: string) {
    super(`Unknown database '${databaseName}'`);
    this.name = 'UnknownDatabaseError';
    this.databaseName = databaseName;
    Object.setPrototypeOf(this, UnknownDatabaseError.prototype);
  }
}

/**
 * Thrown when the grantee lacks the privilege a statement requires
 *
 * `privilege` is empty when the statement has no privilege mapping.
 */
export class UnauthorizedOperationError extends AuthorityError {
  public readonly privilege: string;
  public readonly sqlState = '44000';

  constructor(privilege: string) {
    super(`Access denied for operation ${privilege}.`);
    this.name = 'UnauthorizedOperationError';
    this.privilege = privilege;
    Object.setPrototypeOf(this, UnauthorizedOperationError.prototype);
  }
}

/**
 * Error thrown for invalid authority configuration or store content
 */
export class ConfigurationError extends AuthorityError {
  public readonly setting?: string | undefined;

  constructor(message: string, setting?: string) {
    super(message);
    this.name = 'ConfigurationError';
    if (setting !== undefined) this.setting = setting;
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * Error thrown when SQL text cannot be recognized at all
 */
export class ParseError extends AuthorityError {
  public readonly sql?: string | undefined;

  constructor(message: string, sql?: string) {
    super(message);
    this.name = 'ParseError';
    if (sql !== undefined) this.sql = sql;
    Object.setPrototypeOf(this, ParseError.prototype);
  }
}
