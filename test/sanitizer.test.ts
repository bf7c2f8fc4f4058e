/**
 * Identity sanitizer tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import type { IdentityRow } from '../src/database.js';
import {
  buildDisplayName,
  describeIdentity,
  hasControlCharacters,
  isDeactivatedCredential,
  isServiceAccount,
  isValidDistinguishedName,
  isValidLogin,
  normalizeDistinguishedName,
  normalizeLogin,
  sanitizeIdentity,
} from '../src/sanitizer.js';

function row(fields: Partial<IdentityRow> = {}): IdentityRow {
  return {
    id: 1,
    login: 'alice',
    forename: 'Alice',
    surname: 'Smith',
    dn: '/DC=org/DC=example/CN=Alice Smith',
    passwd: 'xyzhash',
    ...fields,
  };
}

describe('Identity Sanitizer', () => {
  describe('normalization', () => {
    it('should trim and lowercase logins', () => {
      assert.strictEqual(normalizeLogin(' Foo.Bar '), 'foo.bar');
    });

    it('should clear digit-only distinguished names', () => {
      assert.strictEqual(normalizeDistinguishedName('123456'), '');
      assert.strictEqual(normalizeDistinguishedName('  42 '), '');
    });

    it('should clear unknown placeholders', () => {
      assert.strictEqual(normalizeDistinguishedName('unknown'), '');
      assert.strictEqual(normalizeDistinguishedName('/unknown/CN=x'), '');
      assert.strictEqual(normalizeDistinguishedName('/O=Unknown/CN=Jane'), '');
    });

    it('should keep and trim real distinguished names', () => {
      assert.strictEqual(
        normalizeDistinguishedName(' /O=Org/CN=Jane Doe '),
        '/O=Org/CN=Jane Doe'
      );
    });

    it('should join non-empty name parts with one space', () => {
      assert.strictEqual(buildDisplayName('Jane', 'Doe'), 'Jane Doe');
      assert.strictEqual(buildDisplayName('', 'Doe'), 'Doe');
      assert.strictEqual(buildDisplayName('Jane', ''), 'Jane');
      assert.strictEqual(buildDisplayName('', ''), '');
    });
  });

  describe('predicates', () => {
    it('should detect control characters', () => {
      assert.strictEqual(hasControlCharacters('a\tb'), true);
      assert.strictEqual(hasControlCharacters('a\x00'), true);
      assert.strictEqual(hasControlCharacters('\x1f'), true);
      assert.strictEqual(hasControlCharacters('plain text'), false);
      assert.strictEqual(hasControlCharacters('\x7f'), false);
    });

    it('should accept distinguished names with a naming authority and a CN', () => {
      assert.strictEqual(isValidDistinguishedName('/O=Org/CN=Jane Doe'), true);
      assert.strictEqual(
        isValidDistinguishedName(
          '/DC=ch/DC=cern/OU=Organic Units/OU=Users/CN=jdoe/CN=123456/CN=Jane Doe'
        ),
        true
      );
      assert.strictEqual(isValidDistinguishedName('/C=US/O=Lab/OU=People/CN=Bob'), true);
      assert.strictEqual(isValidDistinguishedName(''), true);
    });

    it('should reject malformed distinguished names', () => {
      assert.strictEqual(isValidDistinguishedName('/O=Org/CN='), false);
      assert.strictEqual(isValidDistinguishedName('/OU=Users/CN=Jane'), false);
      assert.strictEqual(isValidDistinguishedName('O=Org/CN=Jane'), false);
      assert.strictEqual(isValidDistinguishedName('/O=Org'), false);
    });

    it('should accept handles, special suffixes and email logins', () => {
      assert.strictEqual(isValidLogin('alice_2'), true);
      assert.strictEqual(isValidLogin('bob.nocern'), true);
      assert.strictEqual(isValidLogin('carol.notcms'), true);
      assert.strictEqual(isValidLogin('svc@host.org'), true);
      assert.strictEqual(isValidLogin('first.last@mail.example.info'), true);
    });

    it('should reject other logins', () => {
      assert.strictEqual(isValidLogin('foo.bar'), false);
      assert.strictEqual(isValidLogin('Alice'), false);
      assert.strictEqual(isValidLogin('a b'), false);
      assert.strictEqual(isValidLogin('svc@host.toolongtld'), false);
      assert.strictEqual(isValidLogin('svc@host'), false);
    });

    it('should accept the empty login (known permissive case)', () => {
      assert.strictEqual(isValidLogin(''), true);
    });

    it('should recognize service accounts', () => {
      assert.strictEqual(isServiceAccount('svc@host.org', '/O=Org/CN=svc', '*'), true);
      assert.strictEqual(isServiceAccount('svc', '/O=Org/CN=svc', '*'), false);
      assert.strictEqual(isServiceAccount('svc@host.org', '', '*'), false);
      assert.strictEqual(isServiceAccount('svc@host.org', '/O=Org/CN=svc', '**'), false);
    });

    it('should recognize deactivated credentials', () => {
      assert.strictEqual(isDeactivatedCredential('*'), true);
      assert.strictEqual(isDeactivatedCredential('!*hash'), true);
      assert.strictEqual(isDeactivatedCredential('Removed 2020'), true);
      assert.strictEqual(isDeactivatedCredential('removed'), false);
      assert.strictEqual(isDeactivatedCredential('hash'), false);
    });
  });

  describe('sanitizeIdentity', () => {
    it('should keep a valid identity and build its record', () => {
      const result = sanitizeIdentity(row({ login: ' Alice ' }));
      assert.deepStrictEqual(result, {
        kind: 'keep',
        locked: false,
        record: {
          id: 1,
          login: 'alice',
          name: 'Alice Smith',
          distinguishedName: '/DC=org/DC=example/CN=Alice Smith',
          credentialHash: 'xyzhash',
          roles: new Map(),
        },
      });
    });

    it('should treat null fields as empty strings', () => {
      const result = sanitizeIdentity({
        id: 3,
        login: null,
        forename: null,
        surname: null,
        dn: null,
        passwd: 'hash',
      });
      assert.strictEqual(result.kind, 'keep');
      if (result.kind === 'keep') {
        assert.strictEqual(result.record.login, '');
        assert.strictEqual(result.record.name, '');
        assert.strictEqual(result.record.distinguishedName, '');
      }
    });

    it('should clear a digit-only DN and keep the identity', () => {
      const result = sanitizeIdentity(row({ dn: '123456' }));
      assert.strictEqual(result.kind, 'keep');
      if (result.kind === 'keep') {
        assert.strictEqual(result.record.distinguishedName, '');
      }
    });

    it('should retain a well-formed DN', () => {
      const result = sanitizeIdentity(row({ dn: '/O=Org/CN=Jane Doe' }));
      assert.strictEqual(result.kind, 'keep');
      if (result.kind === 'keep') {
        assert.strictEqual(result.record.distinguishedName, '/O=Org/CN=Jane Doe');
      }
    });

    it('should discard an empty CN as unsafe', () => {
      assert.deepStrictEqual(sanitizeIdentity(row({ dn: '/O=Org/CN=' })), {
        kind: 'discard',
        reason: 'unsafe',
      });
    });

    it('should discard an invalid login as unsafe', () => {
      assert.deepStrictEqual(sanitizeIdentity(row({ login: 'foo.bar' })), {
        kind: 'discard',
        reason: 'unsafe',
      });
    });

    it('should discard control characters in any checked field', () => {
      for (const fields of [
        { login: 'ali\x01ce' },
        { forename: 'Al\nice' },
        { surname: 'Smi\tth' },
        { dn: '/O=Org/CN=Jane\x00' },
      ]) {
        assert.deepStrictEqual(sanitizeIdentity(row(fields)), {
          kind: 'discard',
          reason: 'unsafe',
        });
      }
    });

    it('should report unsafe before deactivated', () => {
      assert.deepStrictEqual(
        sanitizeIdentity(row({ login: 'bad\x02', passwd: '*' })),
        { kind: 'discard', reason: 'unsafe' }
      );
    });

    it('should lock an identity with no credential', () => {
      const result = sanitizeIdentity(row({ passwd: '' }));
      assert.strictEqual(result.kind, 'keep');
      if (result.kind === 'keep') {
        assert.strictEqual(result.locked, true);
        assert.strictEqual(result.record.credentialHash, '*');
      }
    });

    it('should lock an identity with a null credential', () => {
      const result = sanitizeIdentity(row({ passwd: null }));
      assert.strictEqual(result.kind, 'keep');
      if (result.kind === 'keep') {
        assert.strictEqual(result.record.credentialHash, '*');
      }
    });

    it('should keep a service account despite the lock sentinel', () => {
      const result = sanitizeIdentity(
        row({ login: 'svc@host.org', dn: '/O=Org/CN=svc', passwd: '*' })
      );
      assert.strictEqual(result.kind, 'keep');
      if (result.kind === 'keep') {
        assert.strictEqual(result.locked, false);
        assert.strictEqual(result.record.credentialHash, '*');
      }
    });

    it('should discard a locked plain login as deactivated', () => {
      assert.deepStrictEqual(sanitizeIdentity(row({ login: 'alice', passwd: '*' })), {
        kind: 'discard',
        reason: 'deactivated',
      });
    });

    it('should discard removed credentials as deactivated', () => {
      assert.deepStrictEqual(
        sanitizeIdentity(row({ login: 'svc@host.org', passwd: 'Removed' })),
        { kind: 'discard', reason: 'deactivated' }
      );
    });
  });

  describe('describeIdentity', () => {
    it('should name id, login, dn and names', () => {
      assert.strictEqual(
        describeIdentity(row({ id: 5, login: 'bob', dn: '', forename: 'Bob', surname: null }), 'discarding'),
        'discarding id=5 login="bob" dn="" name="Bob"'
      );
    });
  });
});
