/**
 * In-memory authority rule
 *
 * Built once from an AuthorityConfig. Usernames match exactly; lookups
 * prefer an exact (case-insensitive) host over a wildcard one.
 */

import type { AuthorityLogger, AuthorityRule, CredentialRecord, Privileges } from './types.js';
import type { AuthorityConfig, ResolvedUser } from './config.js';
import { parseUserDatabaseMappings, resolveGrants, resolveUsers } from './config.js';
import { formatGrantee, granteeMatches, type Grantee } from './grantee.js';
import { AllPermittedPrivileges, DatabasePermittedPrivileges, GrantedPrivileges } from './privileges.js';
import { ConfigurationError } from '../errors/index.js';
import { DEFAULT_PRIVILEGE_PROVIDER } from '../utils/constants.js';

interface RuleEntry {
  readonly user: CredentialRecord;
  readonly privileges: Privileges | undefined;
}

export class InMemoryAuthorityRule implements AuthorityRule {
  private readonly entries: readonly RuleEntry[];

  constructor(entries: readonly RuleEntry[]) {
    this.entries = entries;
  }

  findUser(grantee: Grantee): CredentialRecord | undefined {
    return this.find(grantee)?.user;
  }

  findPrivileges(grantee: Grantee): Privileges | undefined {
    return this.find(grantee)?.privileges;
  }

  private find(grantee: Grantee): RuleEntry | undefined {
    const host = grantee.hostname.toLowerCase();
    return (
      this.entries.find(
        ({ user }) =>
          user.grantee.username === grantee.username && user.grantee.hostname.toLowerCase() === host
      ) ?? this.entries.find(entry => granteeMatches(entry.user.grantee, grantee))
    );
  }
}

export interface CreateAuthorityRuleOptions {
  /** Warned about users left without privileges (default: console) */
  readonly logger?: AuthorityLogger;
}

/**
 * Build an authority rule from configuration
 *
 * @throws ConfigurationError for duplicate users, unknown privilege names,
 * malformed mappings, or mappings that name unconfigured users
 */
export function createAuthorityRule(
  config: AuthorityConfig,
  options: CreateAuthorityRuleOptions = {}
): InMemoryAuthorityRule {
  const logger = options.logger ?? console;
  const users = resolveUsers(config.users);
  const resolvePrivileges = privilegeResolver(config, users);

  const entries = users.map(user => {
    const privileges = resolvePrivileges(user);
    if (privileges === undefined) {
      logger.warn(`User '${formatGrantee(user.grantee)}' has no privileges`);
    }
    return {
      user: {
        grantee: user.grantee,
        password: user.password,
        authenticationMethod: user.authenticationMethod,
      },
      privileges,
    };
  });

  return new InMemoryAuthorityRule(entries);
}

function privilegeResolver(
  config: AuthorityConfig,
  users: readonly ResolvedUser[]
): (user: ResolvedUser) => Privileges | undefined {
  const provider = config.provider ?? { type: DEFAULT_PRIVILEGE_PROVIDER };

  switch (provider.type) {
    case 'ALL_PERMITTED': {
      const all = new AllPermittedPrivileges();
      return () => all;
    }
    case 'DATABASE_PERMITTED': {
      const mappings = parseUserDatabaseMappings(provider.userDatabaseMappings);
      const known = new Set(users.map(user => formatGrantee(user.grantee)));
      for (const key of mappings.keys()) {
        if (!known.has(key)) {
          throw new ConfigurationError(
            `User database mapping references unknown user '${key}'`,
            'userDatabaseMappings'
          );
        }
      }
      return user => {
        const databases = mappings.get(formatGrantee(user.grantee));
        return databases === undefined ? undefined : new DatabasePermittedPrivileges(databases);
      };
    }
    case 'GRANTED': {
      const grants = resolveGrants(provider.grants, users);
      return user => {
        const grant = grants.get(formatGrantee(user.grantee));
        return grant === undefined ? undefined : new GrantedPrivileges(grant);
      };
    }
    default: {
      const unhandled: never = provider;
      return unhandled;
    }
  }
}
