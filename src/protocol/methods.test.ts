import { describe, it, expect } from 'vitest';

import { makeNotification, makeRequest, makeResult } from './codec.js';
import { classify, readServerParam, stripServerParam } from './methods.js';

describe('classify', () => {
  it('should separate initialize from other requests', () => {
    expect(classify(makeRequest(1, 'initialize')).type).toBe('initialize');
    expect(classify(makeRequest(1, 'tools/list')).type).toBe('request');
  });

  it('should recognise the handshake notification', () => {
    expect(classify(makeNotification('notifications/initialized')).type).toBe('initialized');
  });

  it('should extract the request id of a cancellation', () => {
    const call = classify(makeNotification('notifications/cancelled', { requestId: 'r-9', reason: 'user' }));
    expect(call).toEqual({
      type: 'cancelled',
      notification: makeNotification('notifications/cancelled', { requestId: 'r-9', reason: 'user' }),
      requestId: 'r-9',
    });
  });

  it('should leave requestId out when it is not an id', () => {
    const call = classify(makeNotification('notifications/cancelled', { requestId: { nested: true } }));
    expect(call.type).toBe('cancelled');
    expect('requestId' in call).toBe(false);
  });

  it('should treat other notifications and replies generically', () => {
    expect(classify(makeNotification('notifications/roots/list_changed')).type).toBe('notification');
    expect(classify(makeResult(4, {})).type).toBe('response');
  });
});

describe('params.server', () => {
  it('should read the server name', () => {
    expect(readServerParam({ server: 'github' })).toBe('github');
    expect(readServerParam({ other: 1 })).toBeUndefined();
    expect(readServerParam(undefined)).toBeUndefined();
  });

  it('should flag unusable names with null', () => {
    expect(readServerParam({ server: '' })).toBeNull();
    expect(readServerParam({ server: 3 })).toBeNull();
  });

  it('should strip the routing field and keep the rest', () => {
    expect(stripServerParam({ server: 'github', name: 'search', arguments: { q: 'x' } })).toEqual({
      name: 'search',
      arguments: { q: 'x' },
    });
    const untouched = { name: 'search' };
    expect(stripServerParam(untouched)).toBe(untouched);
    expect(stripServerParam(undefined)).toBeUndefined();
  });
});
