/**
 * Shared test helpers.
 */

import { FairOSClient } from '../client';
import { FairOSError } from '../errors';
import type { Logger } from '../observability';
import { FairOSSimulator } from '../simulation';
import type { SimulatorOptions } from '../simulation';

export const PASSWORD = 'test-secret';

/** Fixed clock, Unix seconds. */
export const NOW = 1_700_000_000;

/**
 * Returns the FairOSError a call throws.
 */
export function errorOf(fn: () => unknown): FairOSError {
  try {
    fn();
  } catch (error) {
    if (error instanceof FairOSError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected the call to throw');
}

/**
 * Returns the FairOSError a promise rejects with.
 */
export async function rejectionOf(promise: Promise<unknown>): Promise<FairOSError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof FairOSError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected the promise to reject');
}

/**
 * A client wired to a fresh simulator.
 */
export function simulatedClient(options: SimulatorOptions = {}): {
  client: FairOSClient;
  simulator: FairOSSimulator;
} {
  const simulator = new FairOSSimulator({ now: () => NOW, ...options });
  const client = FairOSClient.builder().transport(simulator).build();
  return { client, simulator };
}

/**
 * Signs a user up and creates an open pod for them.
 */
export async function userWithPod(client: FairOSClient, username: string, pod: string): Promise<void> {
  await client.user.signup(username, PASSWORD);
  await client.pod.create(username, pod, PASSWORD);
}

export interface LoggedEntry {
  level: 'debug' | 'info' | 'warn' | 'error';
  message: string;
  context: Record<string, unknown>;
}

/**
 * Logger that keeps every entry, children included.
 */
export class RecordingLogger implements Logger {
  readonly entries: LoggedEntry[];
  private readonly base: Record<string, unknown>;

  constructor(entries: LoggedEntry[] = [], base: Record<string, unknown> = {}) {
    this.entries = entries;
    this.base = base;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.entries.push({ level: 'debug', message, context: { ...this.base, ...context } });
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.entries.push({ level: 'info', message, context: { ...this.base, ...context } });
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.entries.push({ level: 'warn', message, context: { ...this.base, ...context } });
  }

  error(message: string, _error?: Error, context?: Record<string, unknown>): void {
    this.entries.push({ level: 'error', message, context: { ...this.base, ...context } });
  }

  child(context: Record<string, unknown>): Logger {
    return new RecordingLogger(this.entries, { ...this.base, ...context });
  }
}
