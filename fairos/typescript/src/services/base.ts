/**
 * Plumbing shared by the domain services.
 */

import { FairOSError, mapRemoteError } from '../errors';
import type { ErrorDomain } from '../errors';
import type { Logger } from '../observability';
import type { SessionStore } from '../session';
import type { RequestExecutor } from '../transport';

/**
 * What every service is built from.
 */
export interface ServiceContext {
  executor: RequestExecutor;
  sessions: SessionStore;
  logger: Logger;
}

/**
 * Base class binding a service to its error domain.
 */
export abstract class DomainService {
  protected readonly executor: RequestExecutor;
  protected readonly sessions: SessionStore;
  protected readonly logger: Logger;

  protected constructor(
    protected readonly domain: ErrorDomain,
    context: ServiceContext
  ) {
    this.executor = context.executor;
    this.sessions = context.sessions;
    this.logger = context.logger.child({ service: domain });
  }

  /**
   * Session token of a logged-in user.
   */
  protected tokenFor(username: string): string {
    const token = this.sessions.get(username);
    if (token === undefined) {
      throw FairOSError.notLoggedIn(username);
    }
    return token;
  }

  /**
   * Runs a call, mapping remote rejections onto this service's domain.
   */
  protected async call<T>(operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      throw mapRemoteError(this.domain, error);
    }
  }
}

/**
 * Decodes a base64 string holding a JSON document.
 */
export function decodeBase64Json<T>(encoded: string, path: string): T {
  const text = Buffer.from(encoded, 'base64').toString('utf-8');
  try {
    return JSON.parse(text);
  } catch (error) {
    throw FairOSError.decode(
      `Response from ${path} holds a value that is not JSON`,
      error instanceof Error ? error : undefined
    );
  }
}

/** Plain code-unit ordering for names. */
export function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
