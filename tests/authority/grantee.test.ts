/**
 * Grantee Tests
 */

import { describe, test, expect } from 'vitest';
import { formatGrantee, grantee, granteeMatches, parseGrantee } from '../../src/authority/grantee.js';
import { ConfigurationError } from '../../src/errors/index.js';

describe('Grantee', () => {
  describe('grantee()', () => {
    test('Defaults the host to the wildcard', () => {
      expect(grantee('alice')).toEqual({ username: 'alice', hostname: '%' });
    });

    test('Treats an empty host as the wildcard', () => {
      expect(grantee('alice', '')).toEqual({ username: 'alice', hostname: '%' });
    });

    test('Is frozen', () => {
      expect(Object.isFrozen(grantee('alice', 'localhost'))).toBe(true);
    });
  });

  describe('parseGrantee()', () => {
    test('Parses user@host', () => {
      expect(parseGrantee('alice@localhost')).toEqual({ username: 'alice', hostname: 'localhost' });
    });

    test('Parses user without host', () => {
      expect(parseGrantee('bob')).toEqual({ username: 'bob', hostname: '%' });
    });

    test('Splits on the last @', () => {
      expect(parseGrantee('ops@example.com@10.0.0.1')).toEqual({
        username: 'ops@example.com',
        hostname: '10.0.0.1',
      });
    });

    test('Trims surrounding whitespace', () => {
      expect(parseGrantee('  root@%  ')).toEqual({ username: 'root', hostname: '%' });
    });

    test('Rejects a missing username', () => {
      expect(() => parseGrantee('@localhost')).toThrow(ConfigurationError);
    });
  });

  describe('formatGrantee()', () => {
    test('Formats user@host', () => {
      expect(formatGrantee(grantee('alice', '%'))).toBe('alice@%');
      expect(formatGrantee(parseGrantee('root@127.0.0.1'))).toBe('root@127.0.0.1');
    });
  });

  describe('granteeMatches()', () => {
    test('Wildcard stored host matches any host', () => {
      expect(granteeMatches(grantee('alice', '%'), grantee('alice', '10.0.0.1'))).toBe(true);
    });

    test('Wildcard requested host matches any stored host', () => {
      expect(granteeMatches(grantee('alice', 'localhost'), grantee('alice', '%'))).toBe(true);
    });

    test('Hosts compare case-insensitively', () => {
      expect(granteeMatches(grantee('alice', 'LocalHost'), grantee('alice', 'localhost'))).toBe(true);
    });

    test('Different hosts do not match', () => {
      expect(granteeMatches(grantee('alice', 'localhost'), grantee('alice', '10.0.0.1'))).toBe(false);
    });

    test('Usernames compare exactly', () => {
      expect(granteeMatches(grantee('alice', '%'), grantee('Alice', '%'))).toBe(false);
      expect(granteeMatches(grantee('alice', '%'), grantee('', '%'))).toBe(false);
    });
  });
});
