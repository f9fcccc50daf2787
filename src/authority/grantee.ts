/**
 * Grantee helpers
 *
 * A grantee is the identity a request runs as: a username plus the host it
 * connects from. Hostname "%" matches any host.
 */

import { GRANTEE_SEPARATOR, HOST_WILDCARD } from '../utils/constants.js';
import { ConfigurationError } from '../errors/index.js';

export interface Grantee {
  readonly username: string;
  readonly hostname: string;
}

/**
 * Create a grantee, defaulting the host to the wildcard
 */
export function grantee(username: string, hostname: string = HOST_WILDCARD): Grantee {
  return Object.freeze({ username, hostname: hostname || HOST_WILDCARD });
}

/**
 * Parse "user@host" notation
 *
 * The last "@" separates the host, so usernames may contain "@".
 *
 * @example
 * parseGrantee('alice@%') // => { username: 'alice', hostname: '%' }
 * parseGrantee('bob') // => { username: 'bob', hostname: '%' }
 */
export function parseGrantee(value: string): Grantee {
  const trimmed = value.trim();
  const index = trimmed.lastIndexOf(GRANTEE_SEPARATOR);
  if (index < 0) {
    return grantee(trimmed);
  }

  const username = trimmed.substring(0, index);
  if (username.length === 0) {
    throw new ConfigurationError(`Grantee '${value}' has no username`, 'user');
  }
  return grantee(username, trimmed.substring(index + 1));
}

/**
 * Format a grantee as "user@host"
 */
export function formatGrantee(value: Grantee): string {
  return `${value.username}${GRANTEE_SEPARATOR}${value.hostname}`;
}

/**
 * Whether a stored grantee covers a requesting grantee
 *
 * Usernames must match exactly. Hosts match when either side is the
 * wildcard, otherwise case-insensitively.
 */
export function granteeMatches(stored: Grantee, requested: Grantee): boolean {
  if (stored.username !== requested.username) {
    return false;
  }
  if (stored.hostname === HOST_WILDCARD || requested.hostname === HOST_WILDCARD) {
    return true;
  }
  return stored.hostname.toLowerCase() === requested.hostname.toLowerCase();
}
