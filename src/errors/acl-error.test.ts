import { describe, test, expect } from 'vitest';
import { AclError, ErrFacet } from './acl-error.js';
import {
  Credential,
  ErrCredentialExpired,
  ErrInsufficientCapability,
  ErrRemoteNotFound,
  ErrRemoteUnauthorized,
  ErrTransport,
  HasStatus,
  NotFound,
  Remote,
  Unauthorized,
} from './errors.js';

describe('AclError', () => {
  describe('define', () => {
    test('code is prefixed with the boundary domain', () => {
      const err = ErrRemoteNotFound.create({ status: 404, resource: 'item 42' });
      expect(err.code).toBe('remote.not_found');
      expect(err.domain).toBe('remote');
      expect(err.message).toBe('Not found: item 42');
    });

    test('context is appended to the message', () => {
      const err = ErrRemoteNotFound.create({ status: 404, resource: 'item 42' }, 'while resolving path');
      expect(err.message).toBe('Not found: item 42: while resolving path');
      expect(err.context).toBe('while resolving path');
    });

    test('is() matches only its own definition', () => {
      const err = ErrRemoteNotFound.create({ status: 404, resource: 'x' });
      expect(ErrRemoteNotFound.is(err)).toBe(true);
      expect(ErrTransport.is(err)).toBe(false);
      expect(ErrRemoteNotFound.is(new Error('x'))).toBe(false);
    });

    test('data carries facet and custom props', () => {
      const err = ErrRemoteUnauthorized.create({ status: 401, tokenExpired: true, resource: 'permissions of 1' });
      expect(err.data).toEqual({ status: 401, tokenExpired: true, resource: 'permissions of 1' });
      expect(err.message).toBe('Token expired or invalid: permissions of 1');
    });
  });

  describe('facets', () => {
    test('has() checks facet membership', () => {
      const err = ErrRemoteNotFound.create({ status: 404, resource: 'x' });
      expect(AclError.has(err, NotFound)).toBe(true);
      expect(AclError.has(err, Unauthorized)).toBe(false);
    });

    test('has() narrows data facets', () => {
      const err: unknown = ErrRemoteNotFound.create({ status: 404, resource: 'x' });
      if (!AclError.has(err, HasStatus)) throw new Error('expected HasStatus');
      expect(err.data.status).toBe(404);
    });

    test('a new facet composes into a new definition', () => {
      const Retryable = ErrFacet.marker('Retryable');
      const ErrFlaky = Remote.define('flaky', { facets: [Retryable], message: () => 'flaky' });
      expect(AclError.has(ErrFlaky.create({}), Retryable)).toBe(true);
    });
  });

  describe('boundaries', () => {
    test('is() matches by domain', () => {
      const err = ErrCredentialExpired.create({ remote: 'work', remedy: 'rclone config reconnect work:' });
      expect(Credential.is(err)).toBe(true);
      expect(Remote.is(err)).toBe(false);
    });
  });

  test('insufficient capability names the login step', () => {
    const err = ErrInsufficientCapability.create({ required: 'full', actual: 'read-only', source: 'foreign' });
    expect(err.message).toBe(
      'Operation requires full permissions (Files.ReadWrite.All), but the available foreign token is read-only. ' +
        'Run "acl-inspector login" to authorize write access.',
    );
  });

  describe('wrap', () => {
    test('plain errors become unknown AclErrors', () => {
      const wrapped = AclError.wrap(new Error('boom'));
      expect(wrapped.code).toBe('unknown');
      expect(wrapped.message).toBe('boom');
    });

    test('AclErrors are returned unchanged', () => {
      const err = ErrRemoteNotFound.create({ status: 404, resource: 'x' });
      expect(AclError.wrap(err)).toBe(err);
    });
  });

  test('cause chain in toJSON and prettyPrint', () => {
    const err = ErrCredentialExpired.create({ remote: 'work', remedy: 'rclone config reconnect work:' }, undefined, new Error('HTTP 400'));
    expect(err.toJSON().cause).toEqual({ code: 'unknown', domain: 'unknown', message: 'HTTP 400', data: {}, facets: [] });
    expect(err.prettyPrint()).toBe(
      'AclError: credential.expired: Token for remote "work" has expired and could not be refreshed. Run: rclone config reconnect work:\n' +
        '  └ caused by: unknown: HTTP 400',
    );
  });
});
