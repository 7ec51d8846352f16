/**
 * User accounts and sessions.
 */

import { z } from 'zod';
import { FairOSError } from '../errors';
import { MessageResponseSchema } from '../transport';
import type { SignupResult, UserExport, UserInfo } from '../types';
import { DomainService, ServiceContext } from './base';

const SignupResponseSchema = z.object({
  address: z.string(),
  mnemonic: z.string().nullish(),
});

const ImportResponseSchema = z.object({ address: z.string() });

const PresentResponseSchema = z.object({ present: z.boolean() });

const LoggedInResponseSchema = z.object({ loggedin: z.boolean() });

const UserStatResponseSchema = z.object({
  user_name: z.string(),
  address: z.string(),
});

/**
 * User service interface.
 */
export interface UserService {
  /**
   * Creates an account and opens a session for it. The server generates a
   * mnemonic when none is given and returns it once.
   */
  signup(username: string, password: string, mnemonic?: string): Promise<SignupResult>;

  login(username: string, password: string): Promise<void>;

  /**
   * Imports an existing account by address. Resolves the address.
   */
  importWithAddress(username: string, password: string, address: string): Promise<string>;

  /**
   * Imports an existing account by mnemonic. Resolves the address.
   */
  importWithMnemonic(username: string, password: string, mnemonic: string): Promise<string>;

  delete(username: string, password: string): Promise<void>;

  exists(username: string): Promise<boolean>;

  isLoggedIn(username: string): Promise<boolean>;

  logout(username: string): Promise<void>;

  export(username: string): Promise<UserExport>;

  info(username: string): Promise<UserInfo>;
}

/**
 * Default user service implementation.
 */
export class DefaultUserService extends DomainService implements UserService {
  constructor(context: ServiceContext) {
    super('user', context);
  }

  async signup(username: string, password: string, mnemonic?: string): Promise<SignupResult> {
    const { data, sessionToken } = await this.call(() =>
      this.executor.post(
        '/user/signup',
        { user_name: username, password, mnemonic: mnemonic ?? null },
        SignupResponseSchema
      )
    );
    this.openSession(username, sessionToken);
    return data.mnemonic ? { address: data.address, mnemonic: data.mnemonic } : { address: data.address };
  }

  async login(username: string, password: string): Promise<void> {
    const { sessionToken } = await this.call(() =>
      this.executor.post('/user/login', { user_name: username, password }, MessageResponseSchema)
    );
    this.openSession(username, sessionToken);
  }

  async importWithAddress(username: string, password: string, address: string): Promise<string> {
    return this.importUser(username, { user_name: username, password, address });
  }

  async importWithMnemonic(username: string, password: string, mnemonic: string): Promise<string> {
    return this.importUser(username, { user_name: username, password, mnemonic });
  }

  async delete(username: string, password: string): Promise<void> {
    const token = this.tokenFor(username);
    await this.call(() =>
      this.executor.delete('/user/delete', { password }, MessageResponseSchema, { token })
    );
    this.sessions.remove(username);
  }

  async exists(username: string): Promise<boolean> {
    const res = await this.call(() =>
      this.executor.get('/user/present', { user_name: username }, PresentResponseSchema)
    );
    return res.present;
  }

  async isLoggedIn(username: string): Promise<boolean> {
    const res = await this.call(() =>
      this.executor.get('/user/isloggedin', { user_name: username }, LoggedInResponseSchema)
    );
    return res.loggedin;
  }

  async logout(username: string): Promise<void> {
    const token = this.tokenFor(username);
    await this.call(() =>
      this.executor.post('/user/logout', undefined, MessageResponseSchema, { token })
    );
    this.sessions.remove(username);
    this.logger.debug('Session closed', { username });
  }

  async export(username: string): Promise<UserExport> {
    const token = this.tokenFor(username);
    const { data } = await this.call(() =>
      this.executor.post('/user/export', undefined, UserStatResponseSchema, { token })
    );
    return { username: data.user_name, address: data.address };
  }

  async info(username: string): Promise<UserInfo> {
    const token = this.tokenFor(username);
    const res = await this.call(() =>
      this.executor.get('/user/stat', {}, UserStatResponseSchema, { token })
    );
    return { username: res.user_name, address: res.address };
  }

  private async importUser(username: string, body: Record<string, string>): Promise<string> {
    const { data, sessionToken } = await this.call(() =>
      this.executor.post('/user/import', body, ImportResponseSchema)
    );
    this.openSession(username, sessionToken);
    return data.address;
  }

  private openSession(username: string, sessionToken: string | undefined): void {
    if (sessionToken === undefined) {
      throw FairOSError.decode('Server did not set a session cookie');
    }
    this.sessions.set(username, sessionToken);
    this.logger.debug('Session opened', { username });
  }
}

/**
 * Creates a user service.
 */
export function createUserService(context: ServiceContext): UserService {
  return new DefaultUserService(context);
}
