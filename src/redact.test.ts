import { describe, expect, it } from 'vitest';
import { DEFAULT_MASK_KEYS, extendDefaultMaskKeys, isPlainObject, makeMask, redact } from './redact';

describe('redact', () => {
  it('masks sensitive keys at any depth', () => {
    const body = { userid: 'ops', credentials: { password: 'test-secret' } };

    expect(redact(body, ['password'])).toEqual({ userid: 'ops', credentials: { password: '***' } });
    expect(body.credentials.password).toBe('test-secret');
  });

  it('matches keys case-insensitively by default', () => {
    const headers = { 'X-API-Session': 'test-session', Accept: 'application/json' };

    expect(redact(headers, DEFAULT_MASK_KEYS)).toEqual({ 'X-API-Session': '***', Accept: 'application/json' });
    expect(redact(headers, DEFAULT_MASK_KEYS, { ciKeys: false })).toEqual(headers);
  });

  it('matches partial keys when asked', () => {
    expect(redact({ 'ssh-password': 'test-secret' }, ['password'], { partialMatch: true }))
      .toEqual({ 'ssh-password': '***' });
  });

  it('uses a custom replacement', () => {
    expect(redact({ password: 'test-secret' }, ['password'], '[hidden]')).toEqual({ password: '[hidden]' });
  });

  it('copies maps, sets, errors and class instances', () => {
    class Credentials {
      constructor(readonly userid: string, readonly password: string) {}
    }

    expect(redact(new Map([['password', 'test-secret'], ['host', 'hmc1']]), ['password']))
      .toEqual([['password', '***'], ['host', 'hmc1']]);
    expect(redact(new Set(['a', 'b']), ['password'])).toEqual(['a', 'b']);
    expect(redact(new Error('denied'), ['password'])).toEqual({ name: 'Error', message: 'denied' });
    expect(redact(new Credentials('ops', 'test-secret'), ['password'])).toEqual({ userid: 'ops', password: '***' });
  });

  it('summarizes binary payloads', () => {
    expect(redact({ image: new Uint8Array(3) }, ['password'])).toEqual({ image: '[Binary 3 bytes]' });
  });

  it('guards cycles and depth', () => {
    const cpc: Record<string, unknown> = { name: 'CPC1' };
    cpc.self = cpc;

    expect(redact(cpc, ['password'])).toEqual({ name: 'CPC1', self: '[Circular]' });
    expect(redact({ a: { b: { c: 1 } } }, ['password'], { maxDepth: 2 })).toEqual({ a: { b: '[DepthLimit]' } });
  });

  it('returns primitives as they are', () => {
    expect(redact('test-secret', ['password'])).toBe('test-secret');
    expect(redact(null, ['password'])).toBeNull();
  });
});

describe('makeMask', () => {
  it('uses the default key set', () => {
    const mask = makeMask();

    expect(mask({ 'api-session': 'test-session', name: 'PART1' })).toEqual({ 'api-session': '***', name: 'PART1' });
  });

  it('masks nothing for an empty key list', () => {
    const value = { password: 'test-secret' };

    expect(makeMask([])(value)).toBe(value);
  });

  it('picks up keys added to the default set', () => {
    extendDefaultMaskKeys(['boot-device-secret']);

    expect(makeMask()({ 'boot-device-secret': 'x' })).toEqual({ 'boot-device-secret': '***' });
  });
});

describe('isPlainObject', () => {
  it('accepts object literals and null-prototype objects only', () => {
    expect(isPlainObject({ force: true })).toBe(true);
    expect(isPlainObject(Object.create(null))).toBe(true);
    expect(isPlainObject([])).toBe(false);
    expect(isPlainObject(new Date())).toBe(false);
    expect(isPlainObject('force')).toBe(false);
  });
});
