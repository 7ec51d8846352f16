/**
 * Key-value stores inside a pod.
 */

import { z } from 'zod';
import { FairOSError } from '../errors';
import { encodeMultipart } from '../multipart';
import type { ByteSource } from '../multipart';
import { MessageResponseSchema } from '../transport';
import type { IndexType, KeyValueStore, SeekOptions } from '../types';
import { DomainService, ServiceContext, compareNames, decodeBase64Json } from './base';
import { KeyValueSeek } from './kv-seek';

const CountResponseSchema = z.object({ count: z.number().int().nonnegative() });

const ListResponseSchema = z.object({
  Tables: z
    .array(
      z.object({
        table_name: z.string(),
        indexes: z.array(z.string()).nullable(),
        type: z.string(),
      })
    )
    .nullable(),
});

const EntryResponseSchema = z.object({
  keys: z.array(z.string()).nullable(),
  values: z.string(),
});

const PresentResponseSchema = z.object({ present: z.boolean() });

/**
 * Key-value service interface.
 */
export interface KeyValueService {
  createStore(username: string, pod: string, store: string, indexType: IndexType): Promise<void>;
  openStore(username: string, pod: string, store: string): Promise<void>;
  deleteStore(username: string, pod: string, store: string): Promise<void>;
  /** Stores of a pod, sorted by name. */
  listStores(username: string, pod: string): Promise<KeyValueStore[]>;
  /** Stores `value` as its JSON serialization. */
  put(username: string, pod: string, store: string, key: string, value: unknown): Promise<void>;
  /** Reads a value written by `put`. */
  get<T = unknown>(username: string, pod: string, store: string, key: string): Promise<T>;
  delete(username: string, pod: string, store: string, key: string): Promise<void>;
  count(username: string, pod: string, store: string): Promise<number>;
  exists(username: string, pod: string, store: string, key: string): Promise<boolean>;
  /**
   * Loads CSV rows into a store. With `memory`, the server keeps the store in
   * memory while loading.
   */
  loadCsvBuffer(
    username: string,
    pod: string,
    store: string,
    data: Buffer | Uint8Array | string,
    memory?: boolean
  ): Promise<void>;
  loadCsvFile(
    username: string,
    pod: string,
    store: string,
    localPath: string,
    memory?: boolean
  ): Promise<void>;
  /**
   * Positions a cursor at `startKey` and returns a stream over the range.
   */
  seek(username: string, pod: string, store: string, options: SeekOptions): Promise<KeyValueSeek>;
}

/**
 * Default key-value service implementation.
 */
export class DefaultKeyValueService extends DomainService implements KeyValueService {
  constructor(context: ServiceContext) {
    super('kv', context);
  }

  async createStore(
    username: string,
    pod: string,
    store: string,
    indexType: IndexType
  ): Promise<void> {
    const token = this.tokenFor(username);
    await this.call(() =>
      this.executor.post(
        '/kv/new',
        { pod_name: pod, table_name: store, indexType },
        MessageResponseSchema,
        { token }
      )
    );
  }

  async openStore(username: string, pod: string, store: string): Promise<void> {
    const token = this.tokenFor(username);
    await this.call(() =>
      this.executor.post('/kv/open', { pod_name: pod, table_name: store }, MessageResponseSchema, {
        token,
      })
    );
  }

  async deleteStore(username: string, pod: string, store: string): Promise<void> {
    const token = this.tokenFor(username);
    await this.call(() =>
      this.executor.delete('/kv/delete', { pod_name: pod, table_name: store }, MessageResponseSchema, {
        token,
      })
    );
  }

  async listStores(username: string, pod: string): Promise<KeyValueStore[]> {
    const token = this.tokenFor(username);
    const res = await this.call(() =>
      this.executor.get('/kv/ls', { pod_name: pod }, ListResponseSchema, { token })
    );
    return (res.Tables ?? [])
      .map((table) => ({ name: table.table_name, indexes: table.indexes ?? [], type: table.type }))
      .sort((a, b) => compareNames(a.name, b.name));
  }

  async put(
    username: string,
    pod: string,
    store: string,
    key: string,
    value: unknown
  ): Promise<void> {
    const serialized = JSON.stringify(value);
    if (serialized === undefined) {
      throw FairOSError.validation('Value is not JSON-serializable', 'value');
    }
    const token = this.tokenFor(username);
    await this.call(() =>
      this.executor.post(
        '/kv/entry/put',
        { pod_name: pod, table_name: store, key, value: serialized },
        MessageResponseSchema,
        { token }
      )
    );
  }

  async get<T = unknown>(username: string, pod: string, store: string, key: string): Promise<T> {
    const token = this.tokenFor(username);
    const path = '/kv/entry/get';
    const res = await this.call(() =>
      this.executor.get(
        path,
        [
          ['pod_name', pod],
          ['table_name', store],
          ['key', key],
          ['format', 'byte-string'],
        ],
        EntryResponseSchema,
        { token }
      )
    );
    return decodeBase64Json<T>(res.values, path);
  }

  async delete(username: string, pod: string, store: string, key: string): Promise<void> {
    const token = this.tokenFor(username);
    await this.call(() =>
      this.executor.delete(
        '/kv/entry/del',
        { pod_name: pod, table_name: store, key },
        MessageResponseSchema,
        { token }
      )
    );
  }

  async count(username: string, pod: string, store: string): Promise<number> {
    const token = this.tokenFor(username);
    const { data } = await this.call(() =>
      this.executor.post('/kv/count', { pod_name: pod, table_name: store }, CountResponseSchema, {
        token,
      })
    );
    return data.count;
  }

  async exists(username: string, pod: string, store: string, key: string): Promise<boolean> {
    const token = this.tokenFor(username);
    const res = await this.call(() =>
      this.executor.get(
        '/kv/present',
        [
          ['pod_name', pod],
          ['table_name', store],
          ['key', key],
        ],
        PresentResponseSchema,
        { token }
      )
    );
    return res.present;
  }

  async loadCsvBuffer(
    username: string,
    pod: string,
    store: string,
    data: Buffer | Uint8Array | string,
    memory = false
  ): Promise<void> {
    await this.loadCsv(username, pod, store, { kind: 'buffer', data }, 'data.csv', memory);
  }

  async loadCsvFile(
    username: string,
    pod: string,
    store: string,
    localPath: string,
    memory = false
  ): Promise<void> {
    await this.loadCsv(username, pod, store, { kind: 'path', path: localPath }, undefined, memory);
  }

  async seek(
    username: string,
    pod: string,
    store: string,
    options: SeekOptions
  ): Promise<KeyValueSeek> {
    const { startKey, endKey, limit, signal, strict } = options;
    if (limit !== undefined && (!Number.isInteger(limit) || limit < 0)) {
      throw FairOSError.validation(`limit must be a non-negative integer, got ${limit}`, 'limit');
    }
    const token = this.tokenFor(username);
    await this.call(() =>
      this.executor.post(
        '/kv/seek',
        {
          pod_name: pod,
          table_name: store,
          start_prefix: startKey,
          end_prefix: endKey ?? null,
          limit: limit ?? null,
        },
        MessageResponseSchema,
        { token, signal }
      )
    );
    return new KeyValueSeek({
      executor: this.executor,
      logger: this.logger,
      token,
      pod,
      store,
      limit,
      signal,
      strict,
    });
  }

  private async loadCsv(
    username: string,
    pod: string,
    store: string,
    source: ByteSource,
    fileName: string | undefined,
    memory: boolean
  ): Promise<void> {
    const token = this.tokenFor(username);
    const fields: Array<[string, string]> = [
      ['pod_name', pod],
      ['table_name', store],
    ];
    if (memory) {
      fields.push(['memory', store]);
    }
    const multipart = await encodeMultipart(fields, [
      { name: 'csv', source, fileName, contentType: fileName ? 'text/csv' : undefined },
    ]);
    await this.call(() =>
      this.executor.postMultipart('/kv/loadcsv', multipart, MessageResponseSchema, { token })
    );
  }
}

/**
 * Creates a key-value service.
 */
export function createKeyValueService(context: ServiceContext): KeyValueService {
  return new DefaultKeyValueService(context);
}
