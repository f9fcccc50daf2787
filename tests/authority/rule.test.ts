/**
 * Authority Configuration and In-Memory Rule Tests
 */

import { describe, test, expect, beforeEach } from 'vitest';
import { createAuthorityRule } from '../../src/authority/rule.js';
import { parseUserDatabaseMappings } from '../../src/authority/config.js';
import { AuthorityChecker } from '../../src/authority/checker.js';
import { grantee } from '../../src/authority/grantee.js';
import { ConfigurationError } from '../../src/errors/index.js';
import { INSERT, SELECT, silentLogger } from '../helpers/statements.js';

describe('parseUserDatabaseMappings', () => {
  test('Parses user@host=database entries', () => {
    const mappings = parseUserDatabaseMappings('root@%=db1,alice@%=sales');

    expect([...mappings.keys()]).toEqual(['root@%', 'alice@%']);
    expect([...(mappings.get('alice@%') ?? [])]).toEqual(['sales']);
  });

  test('Merges repeated users', () => {
    const mappings = parseUserDatabaseMappings('alice@%=sales, alice@%=hr');
    expect([...(mappings.get('alice@%') ?? [])]).toEqual(['sales', 'hr']);
  });

  test('Defaults the host to the wildcard', () => {
    const mappings = parseUserDatabaseMappings('alice=sales');
    expect(mappings.has('alice@%')).toBe(true);
  });

  test('Skips empty entries', () => {
    expect(parseUserDatabaseMappings(' , ,').size).toBe(0);
    expect(parseUserDatabaseMappings('alice@%=sales,').size).toBe(1);
  });

  test.each(['alice@%', 'alice@%=', '=sales'])('Rejects malformed entry %j', entry => {
    expect(() => parseUserDatabaseMappings(entry)).toThrow(ConfigurationError);
  });
});

describe('createAuthorityRule', () => {
  let logger: ReturnType<typeof silentLogger>;

  beforeEach(() => {
    logger = silentLogger();
  });

  describe('Users', () => {
    test('Stores credentials with the default authentication method', () => {
      const rule = createAuthorityRule({ users: [{ user: 'alice@%', password: 'test-secret' }] }, { logger });

      expect(rule.findUser(grantee('alice', '%'))).toEqual({
        grantee: { username: 'alice', hostname: '%' },
        password: 'test-secret',
        authenticationMethod: 'plaintext',
      });
    });

    test('Wildcard host matches any requesting host', () => {
      const rule = createAuthorityRule({ users: [{ user: 'alice', password: 'p' }] }, { logger });
      expect(rule.findUser(grantee('alice', '192.168.0.5'))?.password).toBe('p');
    });

    test('Prefers the exact host over the wildcard', () => {
      const rule = createAuthorityRule(
        {
          users: [
            { user: 'alice@%', password: 'anywhere' },
            { user: 'alice@localhost', password: 'local' },
          ],
        },
        { logger }
      );

      expect(rule.findUser(grantee('alice', 'localhost'))?.password).toBe('local');
      expect(rule.findUser(grantee('alice', '10.0.0.1'))?.password).toBe('anywhere');
    });

    test('Usernames match case-sensitively', () => {
      const rule = createAuthorityRule({ users: [{ user: 'root@%', password: 'r' }] }, { logger });
      const checker = new AuthorityChecker(rule, grantee('ROOT', '%'), { logger });

      expect(rule.findUser(grantee('ROOT', '%'))).toBeUndefined();
      expect(rule.findPrivileges(grantee('ROOT', '%'))).toBeUndefined();
      expect(() => checker.checkPrivileges('sales', SELECT)).toThrow("Unknown database 'sales'");
    });

    test('Users differing only in case resolve to their own entries', () => {
      const rule = createAuthorityRule(
        {
          users: [
            { user: 'Alice@%', password: 'upper' },
            { user: 'alice@%', password: 'lower' },
          ],
        },
        { logger }
      );

      expect(rule.findUser(grantee('alice', '%'))?.password).toBe('lower');
      expect(rule.findUser(grantee('Alice', '%'))?.password).toBe('upper');
      expect(rule.findUser(grantee('alice', '10.0.0.1'))?.password).toBe('lower');
    });

    test('Hosts match case-insensitively', () => {
      const rule = createAuthorityRule(
        { users: [{ user: 'alice@LocalHost', password: 'local' }] },
        { logger }
      );
      expect(rule.findUser(grantee('alice', 'localhost'))?.password).toBe('local');
    });

    test('Unknown users are absent', () => {
      const rule = createAuthorityRule({ users: [] }, { logger });
      expect(rule.findUser(grantee('bob'))).toBeUndefined();
      expect(rule.findPrivileges(grantee('bob'))).toBeUndefined();
    });

    test('Rejects duplicate users', () => {
      expect(() =>
        createAuthorityRule(
          {
            users: [
              { user: 'alice', password: 'a' },
              { user: 'alice@%', password: 'b' },
            ],
          },
          { logger }
        )
      ).toThrow("User 'alice@%' is configured more than once");
    });
  });

  describe('ALL_PERMITTED provider', () => {
    test('Is the default', () => {
      const rule = createAuthorityRule({ users: [{ user: 'root@%', password: 'r' }] }, { logger });
      const privileges = rule.findPrivileges(grantee('root'));

      expect(privileges?.hasDatabase('anything')).toBe(true);
      expect(privileges?.hasPrivileges(new Set(['DROP'] as const))).toBe(true);
      expect(logger.warn).not.toHaveBeenCalled();
    });
  });

  describe('DATABASE_PERMITTED provider', () => {
    test('Limits visibility to mapped databases', () => {
      const rule = createAuthorityRule(
        {
          users: [{ user: 'alice@%', password: 'a' }],
          provider: { type: 'DATABASE_PERMITTED', userDatabaseMappings: 'alice@%=sales' },
        },
        { logger }
      );
      const checker = new AuthorityChecker(rule, grantee('alice'), { logger });

      expect(checker.isAuthorized('sales')).toBe(true);
      expect(checker.isAuthorized('hr')).toBe(false);
      expect(() => checker.checkPrivileges('sales', INSERT)).not.toThrow();
    });

    test('Unmapped users have no privileges and are warned about', () => {
      const rule = createAuthorityRule(
        {
          users: [
            { user: 'alice@%', password: 'a' },
            { user: 'bob@%', password: 'b' },
          ],
          provider: { type: 'DATABASE_PERMITTED', userDatabaseMappings: 'alice@%=sales' },
        },
        { logger }
      );

      expect(rule.findPrivileges(grantee('bob'))).toBeUndefined();
      expect(logger.warn).toHaveBeenCalledTimes(1);
      expect(logger.warn).toHaveBeenCalledWith("User 'bob@%' has no privileges");
    });

    test('Rejects mappings for unconfigured users', () => {
      expect(() =>
        createAuthorityRule(
          {
            users: [{ user: 'alice@%', password: 'a' }],
            provider: { type: 'DATABASE_PERMITTED', userDatabaseMappings: 'mallory@%=sales' },
          },
          { logger }
        )
      ).toThrow("User database mapping references unknown user 'mallory@%'");
    });
  });

  describe('GRANTED provider', () => {
    const config = {
      users: [
        { user: 'alice@%', password: 'a' },
        { user: 'carol@%', password: 'c' },
      ],
      provider: {
        type: 'GRANTED' as const,
        grants: [
          { user: 'alice@%', databases: ['sales'], privileges: ['select'] },
          { user: 'alice@%', databases: ['hr'], privileges: ['Create Table'] },
        ],
      },
    };

    test('Merges grants for one user', () => {
      const rule = createAuthorityRule(config, { logger });
      const privileges = rule.findPrivileges(grantee('alice'));

      expect(privileges?.hasDatabase('sales')).toBe(true);
      expect(privileges?.hasDatabase('hr')).toBe(true);
      expect(privileges?.hasPrivileges(new Set(['SELECT'] as const))).toBe(true);
      expect(privileges?.hasPrivileges(new Set(['CREATE_TABLE'] as const))).toBe(true);
      expect(privileges?.hasPrivileges(new Set(['INSERT'] as const))).toBe(false);
    });

    test('Enforces the sales scenario through the checker', () => {
      const rule = createAuthorityRule(config, { logger });
      const checker = new AuthorityChecker(rule, grantee('alice', '%'), { logger });

      expect(() => checker.checkPrivileges('sales', SELECT)).not.toThrow();
      expect(() => checker.checkPrivileges('sales', INSERT)).toThrow(
        'Access denied for operation INSERT.'
      );
      expect(() => checker.checkPrivileges('finance', SELECT)).toThrow(
        "Unknown database 'finance'"
      );
    });

    test('Users without grants are warned about', () => {
      createAuthorityRule(config, { logger });
      expect(logger.warn).toHaveBeenCalledWith("User 'carol@%' has no privileges");
    });

    test('Rejects unknown privilege names', () => {
      expect(() =>
        createAuthorityRule(
          {
            users: [{ user: 'alice@%', password: 'a' }],
            provider: {
              type: 'GRANTED',
              grants: [{ user: 'alice@%', databases: ['sales'], privileges: ['SELECT', 'FLY'] }],
            },
          },
          { logger }
        )
      ).toThrow("Unknown privilege 'FLY' for user 'alice@%'");
    });

    test('Rejects grants for unconfigured users', () => {
      expect(() =>
        createAuthorityRule(
          {
            users: [],
            provider: { type: 'GRANTED', grants: [{ user: 'bob', databases: [], privileges: [] }] },
          },
          { logger }
        )
      ).toThrow("Grant references unknown user 'bob@%'");
    });
  });
});
