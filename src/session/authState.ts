/** Login state of one client instance. */
export type AuthSlot = { status: 'absent' } | { status: 'present'; token: string };

/**
 * Holder of a single bearer token, owned by exactly one client.
 *
 * Set on login, overwritten on reconnect, cleared on logout. The backend owns expiry.
 */
export class AuthState {
  #slot: AuthSlot = { status: 'absent' };

  /** Current slot. */
  get slot(): Readonly<AuthSlot> {
    return this.#slot;
  }

  /** Token, or `null` when absent. */
  get token(): string | null {
    return this.#slot.status === 'present' ? this.#slot.token : null;
  }

  /** Whether a token is held. */
  get present(): boolean {
    return this.#slot.status === 'present';
  }

  /** Stores a token, replacing any previous one. */
  set(token: string): void {
    this.#slot = { status: 'present', token };
  }

  /** Drops the token. */
  clear(): void {
    this.#slot = { status: 'absent' };
  }
}
