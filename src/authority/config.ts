/**
 * Authority Configuration
 *
 * Declarative description of users and how their privileges are provided.
 */

import type { AuthenticationMethod } from '../utils/constants.js';
import {
  DEFAULT_AUTHENTICATION_METHOD,
  MAPPING_ASSIGNMENT,
  MAPPING_ENTRY_SEPARATOR,
  PROVIDER_ALL_PERMITTED,
  PROVIDER_DATABASE_PERMITTED,
  PROVIDER_GRANTED,
} from '../utils/constants.js';
import { ConfigurationError } from '../errors/index.js';
import { formatGrantee, parseGrantee, type Grantee } from './grantee.js';
import { normalizePrivilegeName, type PrivilegeType } from './privilege.js';

/**
 * A configured user
 */
export interface AuthorityUserConfig {
  /** "user@host"; host defaults to "%" */
  readonly user: string;

  readonly password: string;

  /** How the stored password is compared (default: plaintext) */
  readonly authenticationMethod?: AuthenticationMethod;
}

/**
 * Explicit grants for one user
 */
export interface AuthorityGrantConfig {
  readonly user: string;
  readonly databases: readonly string[];

  /** Privilege names, in any case, with spaces or underscores */
  readonly privileges: readonly string[];
}

/**
 * Where user privileges come from
 */
export type PrivilegeProviderConfig =
  | { readonly type: typeof PROVIDER_ALL_PERMITTED }
  | {
      readonly type: typeof PROVIDER_DATABASE_PERMITTED;

      /** "root@%=db1,alice@%=sales" */
      readonly userDatabaseMappings: string;
    }
  | {
      readonly type: typeof PROVIDER_GRANTED;
      readonly grants: readonly AuthorityGrantConfig[];
    };

/**
 * Authority configuration
 */
export interface AuthorityConfig {
  readonly users: readonly AuthorityUserConfig[];

  /** Privilege provider (default: all permitted) */
  readonly provider?: PrivilegeProviderConfig;
}

/**
 * Validated user entry
 */
export interface ResolvedUser {
  readonly grantee: Grantee;
  readonly password: string;
  readonly authenticationMethod: AuthenticationMethod;
}

/**
 * Validated grant entry
 */
export interface ResolvedGrant {
  readonly databases: readonly string[];
  readonly privileges: readonly PrivilegeType[];
}

/**
 * Parse "user@host=database" mappings
 *
 * Entries are comma separated; a user may appear in several entries.
 * Keys of the result are formatted grantees ("alice@%").
 *
 * @example
 * parseUserDatabaseMappings('root@%=db1,alice@%=sales,alice@%=hr')
 * // => Map { 'root@%' => Set { 'db1' }, 'alice@%' => Set { 'sales', 'hr' } }
 */
export function parseUserDatabaseMappings(mappings: string): Map<string, Set<string>> {
  const result = new Map<string, Set<string>>();

  for (const rawEntry of mappings.split(MAPPING_ENTRY_SEPARATOR)) {
    const entry = rawEntry.trim();
    if (entry.length === 0) {
      continue;
    }

    const index = entry.indexOf(MAPPING_ASSIGNMENT);
    const user = index < 0 ? '' : entry.substring(0, index).trim();
    const database = index < 0 ? '' : entry.substring(index + 1).trim();
    if (user.length === 0 || database.length === 0) {
      throw new ConfigurationError(
        `Invalid user database mapping '${entry}', expected 'user@host=database'`,
        'userDatabaseMappings'
      );
    }

    const key = formatGrantee(parseGrantee(user));
    const databases = result.get(key) ?? new Set<string>();
    databases.add(database);
    result.set(key, databases);
  }

  return result;
}

/**
 * Validate configured users
 *
 * Usernames must be non-empty and "user@host" unique.
 */
export function resolveUsers(users: readonly AuthorityUserConfig[]): ResolvedUser[] {
  const seen = new Set<string>();

  return users.map(user => {
    const resolved = parseGrantee(user.user);
    if (resolved.username.length === 0) {
      throw new ConfigurationError('Username is required', 'users');
    }

    const key = formatGrantee(resolved);
    if (seen.has(key)) {
      throw new ConfigurationError(`User '${key}' is configured more than once`, 'users');
    }
    seen.add(key);

    return {
      grantee: resolved,
      password: user.password,
      authenticationMethod: user.authenticationMethod ?? DEFAULT_AUTHENTICATION_METHOD,
    };
  });
}

/**
 * Validate explicit grants against the configured users
 *
 * Several grants for one user are merged.
 */
export function resolveGrants(
  grants: readonly AuthorityGrantConfig[],
  users: readonly ResolvedUser[]
): Map<string, ResolvedGrant> {
  const known = new Set(users.map(user => formatGrantee(user.grantee)));
  const result = new Map<string, ResolvedGrant>();

  for (const grant of grants) {
    const key = formatGrantee(parseGrantee(grant.user));
    if (!known.has(key)) {
      throw new ConfigurationError(`Grant references unknown user '${key}'`, 'grants');
    }

    const privileges = grant.privileges.map(name => {
      const privilege = normalizePrivilegeName(name);
      if (privilege === null) {
        throw new ConfigurationError(`Unknown privilege '${name}' for user '${key}'`, 'grants');
      }
      return privilege;
    });

    const existing = result.get(key);
    result.set(key, {
      databases: [...(existing?.databases ?? []), ...grant.databases],
      privileges: [...(existing?.privileges ?? []), ...privileges],
    });
  }

  return result;
}
