/**
 * Application Constants
 *
 * Centralized constants for magic strings used throughout the library.
 */

// Grantees
export const HOST_WILDCARD = '%';
export const GRANTEE_SEPARATOR = '@';

// Databases
export const DATABASE_WILDCARD = '*';

// Privilege providers
export const PROVIDER_ALL_PERMITTED = 'ALL_PERMITTED' as const;
export const PROVIDER_DATABASE_PERMITTED = 'DATABASE_PERMITTED' as const;
export const PROVIDER_GRANTED = 'GRANTED' as const;
export const DEFAULT_PRIVILEGE_PROVIDER = PROVIDER_ALL_PERMITTED;

// Authentication
export const AUTH_METHOD_PLAINTEXT = 'plaintext' as const;
export const AUTH_METHOD_BCRYPT = 'bcrypt' as const;
export const DEFAULT_AUTHENTICATION_METHOD = AUTH_METHOD_PLAINTEXT;

// User/database mapping syntax: "root@%=db1,alice@%=sales"
export const MAPPING_ENTRY_SEPARATOR = ',';
export const MAPPING_ASSIGNMENT = '=';

// Type Guards
export type PrivilegeProviderType =
  | typeof PROVIDER_ALL_PERMITTED
  | typeof PROVIDER_DATABASE_PERMITTED
  | typeof PROVIDER_GRANTED;
export type AuthenticationMethod = typeof AUTH_METHOD_PLAINTEXT | typeof AUTH_METHOD_BCRYPT;
