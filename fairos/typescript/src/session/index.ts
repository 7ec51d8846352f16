/**
 * Session token storage.
 *
 * The server hands out one session cookie per login; the client keeps the
 * latest token per username and attaches it to authenticated calls.
 */

/**
 * Session store interface.
 *
 * Implementations need no internal locking: session-mutating calls for the same
 * username are expected to be serialized by the caller.
 */
export interface SessionStore {
  /** Returns the token held for the user, if any. */
  get(username: string): string | undefined;
  /** Stores the token for the user, replacing any previous one. */
  set(username: string, token: string): void;
  /** Forgets the user's token. */
  remove(username: string): void;
}

/**
 * Map-backed session store, private to one client instance.
 */
export class InMemorySessionStore implements SessionStore {
  private readonly tokens = new Map<string, string>();

  get(username: string): string | undefined {
    return this.tokens.get(username);
  }

  set(username: string, token: string): void {
    this.tokens.set(username, token);
  }

  remove(username: string): void {
    this.tokens.delete(username);
  }

  /** Usernames that currently hold a session. */
  usernames(): string[] {
    return [...this.tokens.keys()];
  }
}

/**
 * Creates an empty in-memory session store.
 */
export function createSessionStore(): SessionStore {
  return new InMemorySessionStore();
}
