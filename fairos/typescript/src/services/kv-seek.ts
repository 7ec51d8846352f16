/**
 * Range iteration over a key-value store.
 */

import { z } from 'zod';
import { FairOSError, mapRemoteError } from '../errors';
import type { Logger } from '../observability';
import { RequestExecutor, decodeJson, unwrap } from '../transport';
import type { SizeHint } from '../types';

/** Remote message that marks the end of a seek. */
export const SEEK_END_MESSAGE = 'no next element';

const NO_CONTENT = 204;

const SeekNextResponseSchema = z.object({
  keys: z.array(z.string()).nullable(),
  values: z.string(),
});

export interface KeyValueSeekParams {
  executor: RequestExecutor;
  logger: Logger;
  token: string;
  pod: string;
  store: string;
  limit?: number;
  signal?: AbortSignal;
  strict?: boolean;
}

/**
 * Single-pass stream of `[key, value]` pairs from a positioned seek cursor.
 *
 * Each step issues one `GET /kv/seek/next`. The stream ends on HTTP 204, on a
 * rejection carrying the end message, or after `limit` pairs. Other rejections
 * end it too and are logged, unless `strict` is set.
 *
 * @example
 * ```typescript
 * const seek = await client.kv.seek('alice', 'pod1', 'table', { startKey: 'bcd' });
 * for await (const [key, value] of seek) {
 *   console.log(key, value);
 * }
 * ```
 */
export class KeyValueSeek implements AsyncIterable<[string, string]> {
  private readonly params: KeyValueSeekParams;
  private consumed = false;
  private yielded = 0;

  constructor(params: KeyValueSeekParams) {
    this.params = params;
  }

  /**
   * Bounds on the number of pairs left.
   */
  sizeHint(): SizeHint {
    const { limit } = this.params;
    return { lower: 0, upper: limit === undefined ? undefined : limit - this.yielded };
  }

  [Symbol.asyncIterator](): AsyncIterator<[string, string]> {
    if (this.consumed) {
      throw FairOSError.stream('Seek stream has already been consumed');
    }
    this.consumed = true;
    return this.pairs();
  }

  /**
   * Collects every remaining pair.
   */
  async toArray(): Promise<Array<[string, string]>> {
    const result: Array<[string, string]> = [];
    for await (const pair of this) {
      result.push(pair);
    }
    return result;
  }

  private async *pairs(): AsyncGenerator<[string, string]> {
    const { limit } = this.params;
    while (limit === undefined || this.yielded < limit) {
      const pair = await this.next();
      if (pair === undefined) {
        return;
      }
      this.yielded++;
      yield pair;
    }
  }

  private async next(): Promise<[string, string] | undefined> {
    const { executor, logger, token, pod, store, signal, strict } = this.params;
    const path = '/kv/seek/next';
    const outcome = await executor.execute({
      method: 'GET',
      path,
      query: [
        ['pod_name', pod],
        ['table_name', store],
      ],
      token,
      signal,
    });

    if (outcome.kind === 'success' && outcome.status === NO_CONTENT) {
      return undefined;
    }

    if (outcome.kind === 'rejected') {
      if (outcome.message.includes(SEEK_END_MESSAGE)) {
        return undefined;
      }
      const error = mapRemoteError(
        'kv',
        FairOSError.rejected(outcome.message, outcome.code, outcome.status)
      );
      if (strict) {
        throw error;
      }
      logger.warn('Seek ended on server rejection', {
        pod,
        store,
        status: outcome.status,
        reason: outcome.message,
      });
      return undefined;
    }

    const res = decodeJson(unwrap(outcome).body, SeekNextResponseSchema, path);
    const key = res.keys?.[0];
    if (key === undefined) {
      throw FairOSError.decode(`Response from ${path} carried no key`);
    }
    return [key, res.values];
  }
}
