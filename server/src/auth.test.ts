import { describe, it, expect } from 'vitest';
import { AuthGate, hashAuthMessage, resolveCredentials, safeTokenCompare } from './auth.js';

describe('hashAuthMessage', () => {
  it('produces the SHA3-512 hex digest', () => {
    expect(hashAuthMessage('abc')).toBe(
      'b751850b1a57168a5693cd924b6b096e08f621827444f70d884f5d0240d2712e10e116e9192af3c91a7ec57647e3934057340b4cf408d5a56592f8274eec53f0',
    );
  });
});

describe('safeTokenCompare', () => {
  it('matches equal strings only', () => {
    expect(safeTokenCompare('same', 'same')).toBe(true);
    expect(safeTokenCompare('same', 'different')).toBe(false);
    expect(safeTokenCompare('', '')).toBe(true);
  });
});

describe('resolveCredentials', () => {
  it('hashes both secrets', () => {
    expect(resolveCredentials('admin', 'test-secret')).toEqual({
      userHash: hashAuthMessage('admin'),
      passwordHash: hashAuthMessage('test-secret'),
    });
  });

  it('disables auth when either side is missing', () => {
    expect(resolveCredentials('admin', undefined)).toBeNull();
    expect(resolveCredentials(undefined, 'test-secret')).toBeNull();
    expect(resolveCredentials('', 'test-secret')).toBeNull();
  });
});

describe('AuthGate.decide', () => {
  const user = hashAuthMessage('admin');
  const password = hashAuthMessage('test-secret');
  const gate = new AuthGate({ userHash: user, passwordHash: password });

  it('accepts the configured pair', () => {
    expect(gate.enabled).toBe(true);
    expect(gate.decide(user, password)).toBe(true);
  });

  it('rejects a wrong user or password', () => {
    expect(gate.decide(user, hashAuthMessage('nope'))).toBe(false);
    expect(gate.decide(hashAuthMessage('root'), password)).toBe(false);
    expect(gate.decide(password, user)).toBe(false);
  });

  it('rejects plaintext secrets', () => {
    expect(gate.decide('admin', 'test-secret')).toBe(false);
  });

  it('accepts anything when no credentials are configured', () => {
    const open = new AuthGate(null);
    expect(open.enabled).toBe(false);
    expect(open.decide('', '')).toBe(true);
    expect(open.decide('anything', 'else')).toBe(true);
  });
});
