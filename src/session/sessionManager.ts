import { Agent, type Dispatcher } from 'undici';

/** Options of the default pooled {@link Agent}. */
export interface PoolOptions {
  /**
   * Upper bound of sockets per origin.
   * @default 16
   */
  connections?: number;
  /**
   * How long an idle socket is kept open, in milliseconds.
   * @default 4000
   */
  keepAliveTimeout?: number;
  /**
   * Ceiling for keep-alive hints sent by the server, in milliseconds.
   * @default 600000
   */
  keepAliveMaxTimeout?: number;
}

/** Builds the dispatcher a {@link SessionManager} hands out. */
export type PoolFactory = () => Dispatcher;

/** Factory producing a keep-alive agent with bounded connections. */
export function createPoolFactory({
  connections = 16,
  keepAliveTimeout = 4_000,
  keepAliveMaxTimeout = 600_000,
}: PoolOptions = {}): PoolFactory {
  return () => new Agent({ connections, keepAliveTimeout, keepAliveMaxTimeout });
}

/**
 * Owns one lazily created connection pool shared by every client handed this manager.
 *
 * The pool is created by the first {@link SessionManager.acquire} call and returned
 * unchanged afterwards. Clients that are not given a manager use {@link SessionManager.shared}.
 */
export class SessionManager {
  /** Process-wide manager, created on first use. */
  static #shared: SessionManager | null = null;

  /** Builds the pool on first acquire. */
  #factory: PoolFactory;
  /** The pool, once created. */
  #pool: Dispatcher | null = null;

  /** Creates a manager; nothing is allocated until the pool is first acquired */
  constructor(factory: PoolFactory = createPoolFactory()) {
    this.#factory = factory;
  }

  /**
   * Process-wide manager used by clients that are not given one.
   */
  static shared(): SessionManager {
    SessionManager.#shared ??= new SessionManager();
    return SessionManager.#shared;
  }

  /** Whether the pool has been created. */
  get created(): boolean {
    return this.#pool !== null;
  }

  /**
   * Returns the pool, creating it on the first call.
   * Creation is synchronous, so concurrent first callers all observe the same instance.
   */
  acquire(): Dispatcher {
    this.#pool ??= this.#factory();
    return this.#pool;
  }

  /**
   * Closes the pool. Meant for process shutdown; a later acquire creates a fresh pool.
   */
  async close(): Promise<void> {
    const pool = this.#pool;
    this.#pool = null;
    await pool?.close();
  }
}
