/**
 * Credential validators
 *
 * Comparison predicates handed to AuthorityChecker.isAuthenticated. Each one
 * decides on its own what a matching cipher looks like.
 */

import bcrypt from 'bcryptjs';
import { timingSafeEqual } from 'crypto';
import type { CredentialRecord, CredentialValidator } from '../authority/types.js';
import { AUTH_METHOD_BCRYPT, AUTH_METHOD_PLAINTEXT, DEFAULT_AUTHENTICATION_METHOD } from '../utils/constants.js';
import { ConfigurationError } from '../errors/index.js';

function toBuffer(cipher: unknown): Buffer | null {
  if (typeof cipher === 'string') {
    return Buffer.from(cipher, 'utf8');
  }
  if (Buffer.isBuffer(cipher)) {
    return cipher;
  }
  return null;
}

/**
 * Cipher must equal the stored password byte for byte
 */
export const plaintextValidator: CredentialValidator = (record, cipher) => {
  const actual = toBuffer(cipher);
  if (actual === null) {
    return false;
  }
  const expected = Buffer.from(record.password, 'utf8');
  return actual.length === expected.length && timingSafeEqual(actual, expected);
};

/**
 * Cipher is the clear password; the stored password is a bcrypt hash
 *
 * A stored password that is not a valid hash never matches.
 */
export const bcryptValidator: CredentialValidator = (record, cipher) => {
  if (typeof cipher !== 'string') {
    return false;
  }
  try {
    return bcrypt.compareSync(cipher, record.password);
  } catch (error) {
    // Stored password is not a bcrypt hash (invalid salt version)
    return false;
  }
};

/**
 * Pick the validator for an authentication method
 *
 * @throws ConfigurationError for an unknown method
 */
export function validatorFor(method: string): CredentialValidator {
  switch (method) {
    case AUTH_METHOD_PLAINTEXT:
      return plaintextValidator;
    case AUTH_METHOD_BCRYPT:
      return bcryptValidator;
    default:
      throw new ConfigurationError(`Unknown authentication method '${method}'`, 'authenticationMethod');
  }
}

/**
 * Validator that compares with whatever method the stored record names
 */
export const recordMethodValidator: CredentialValidator = (record: CredentialRecord, cipher) =>
  validatorFor(record.authenticationMethod ?? DEFAULT_AUTHENTICATION_METHOD)(record, cipher);
