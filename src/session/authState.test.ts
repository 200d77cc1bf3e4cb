import { describe, expect, it } from 'vitest';
import { AuthState } from './authState.js';

describe('AuthState', () => {
  it('starts absent', () => {
    const auth = new AuthState();

    expect(auth.present).toBe(false);
    expect(auth.token).toBeNull();
    expect(auth.slot).toEqual({ status: 'absent' });
  });

  it('stores a token', () => {
    const auth = new AuthState();
    auth.set('test-token');

    expect(auth.present).toBe(true);
    expect(auth.token).toBe('test-token');
    expect(auth.slot).toEqual({ status: 'present', token: 'test-token' });
  });

  it('overwrites a previous token', () => {
    const auth = new AuthState();
    auth.set('first-token');
    auth.set('second-token');

    expect(auth.token).toBe('second-token');
  });

  it('clears the token', () => {
    const auth = new AuthState();
    auth.set('test-token');
    auth.clear();

    expect(auth.present).toBe(false);
    expect(auth.token).toBeNull();
  });

  it('keeps instances independent', () => {
    const a = new AuthState();
    const b = new AuthState();
    a.set('test-token');

    expect(b.token).toBeNull();
  });
});
