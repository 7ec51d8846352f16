/**
 * Document databases inside a pod.
 */

import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { FairOSError } from '../errors';
import { encodeMultipart } from '../multipart';
import type { ByteSource } from '../multipart';
import { compileExpression } from '../query';
import type { Expr } from '../query';
import { MessageResponseSchema } from '../transport';
import type { DocumentDatabase, FieldDefinition, FieldType } from '../types';
import { DomainService, ServiceContext, compareNames, decodeBase64Json } from './base';

const FIELD_TYPE_NAMES: Record<FieldType, string> = {
  str: 'string',
  number: 'number',
  map: 'map',
};

/** Field type codes as reported by `/doc/ls`. */
const FIELD_TYPE_CODES: Record<number, FieldType> = {
  2: 'str',
  3: 'number',
  4: 'map',
};

const ListResponseSchema = z.object({
  Tables: z
    .array(
      z.object({
        table_name: z.string(),
        indexes: z.array(z.object({ name: z.string(), type: z.number() })).nullable(),
      })
    )
    .nullable(),
});

const EntryResponseSchema = z.object({ doc: z.string() });

const FindResponseSchema = z.object({ docs: z.array(z.string()).nullable() });

/** Object-shaped document. */
export type Document = Record<string, unknown>;

/**
 * Document service interface.
 */
export interface DocumentService {
  /**
   * Creates a database indexed on the given fields.
   */
  createDatabase(
    username: string,
    pod: string,
    database: string,
    fields: ReadonlyArray<FieldDefinition>,
    mutable: boolean
  ): Promise<void>;
  openDatabase(username: string, pod: string, database: string): Promise<void>;
  deleteDatabase(username: string, pod: string, database: string): Promise<void>;
  /** Databases of a pod, sorted by name, each with its fields sorted by name. */
  listDatabases(username: string, pod: string): Promise<DocumentDatabase[]>;
  /**
   * Stores a document under a fresh `id`, overriding any `id` it carries.
   * Resolves the id.
   */
  put(username: string, pod: string, database: string, doc: Document): Promise<string>;
  get<T = Document>(username: string, pod: string, database: string, id: string): Promise<T>;
  find<T = Document>(
    username: string,
    pod: string,
    database: string,
    expr: Expr,
    limit?: number
  ): Promise<T[]>;
  delete(username: string, pod: string, database: string, id: string): Promise<void>;
  count(username: string, pod: string, database: string, expr: Expr): Promise<number>;
  loadJsonBuffer(
    username: string,
    pod: string,
    database: string,
    data: Buffer | Uint8Array | string
  ): Promise<void>;
  loadJsonFile(username: string, pod: string, database: string, localPath: string): Promise<void>;
  /**
   * Indexes a JSON file already stored in the pod.
   */
  indexJson(username: string, pod: string, database: string, file: string): Promise<void>;
}

/**
 * Default document service implementation.
 */
export class DefaultDocumentService extends DomainService implements DocumentService {
  constructor(context: ServiceContext) {
    super('document', context);
  }

  async createDatabase(
    username: string,
    pod: string,
    database: string,
    fields: ReadonlyArray<FieldDefinition>,
    mutable: boolean
  ): Promise<void> {
    const si = fields.map(([name, type]) => `${name}=${FIELD_TYPE_NAMES[type]}`).join(',');
    const token = this.tokenFor(username);
    await this.call(() =>
      this.executor.post(
        '/doc/new',
        { pod_name: pod, table_name: database, si, mutable },
        MessageResponseSchema,
        { token }
      )
    );
  }

  async openDatabase(username: string, pod: string, database: string): Promise<void> {
    const token = this.tokenFor(username);
    await this.call(() =>
      this.executor.post('/doc/open', { pod_name: pod, table_name: database }, MessageResponseSchema, {
        token,
      })
    );
  }

  async deleteDatabase(username: string, pod: string, database: string): Promise<void> {
    const token = this.tokenFor(username);
    await this.call(() =>
      this.executor.delete(
        '/doc/delete',
        { pod_name: pod, table_name: database },
        MessageResponseSchema,
        { token }
      )
    );
  }

  async listDatabases(username: string, pod: string): Promise<DocumentDatabase[]> {
    const token = this.tokenFor(username);
    const res = await this.call(() =>
      this.executor.get('/doc/ls', { pod_name: pod }, ListResponseSchema, { token })
    );
    return (res.Tables ?? [])
      .map((table) => ({
        name: table.table_name,
        fields: (table.indexes ?? [])
          .map((index): [string, FieldType] => [index.name, toFieldType(index.type)])
          .sort((a, b) => compareNames(a[0], b[0])),
      }))
      .sort((a, b) => compareNames(a.name, b.name));
  }

  async put(username: string, pod: string, database: string, doc: Document): Promise<string> {
    const id = uuidv4();
    const token = this.tokenFor(username);
    await this.call(() =>
      this.executor.post(
        '/doc/entry/put',
        { pod_name: pod, table_name: database, doc: JSON.stringify({ ...doc, id }) },
        MessageResponseSchema,
        { token }
      )
    );
    return id;
  }

  async get<T = Document>(
    username: string,
    pod: string,
    database: string,
    id: string
  ): Promise<T> {
    const token = this.tokenFor(username);
    const path = '/doc/entry/get';
    const res = await this.call(() =>
      this.executor.get(
        path,
        [
          ['pod_name', pod],
          ['table_name', database],
          ['id', id],
        ],
        EntryResponseSchema,
        { token }
      )
    );
    return decodeBase64Json<T>(res.doc, path);
  }

  async find<T = Document>(
    username: string,
    pod: string,
    database: string,
    expr: Expr,
    limit?: number
  ): Promise<T[]> {
    if (limit !== undefined && (!Number.isInteger(limit) || limit < 0)) {
      throw FairOSError.validation(`limit must be a non-negative integer, got ${limit}`, 'limit');
    }
    const query: Array<[string, string]> = [
      ['pod_name', pod],
      ['table_name', database],
      ['expr', compileExpression(expr)],
    ];
    if (limit !== undefined) {
      query.push(['limit', String(limit)]);
    }
    const token = this.tokenFor(username);
    const path = '/doc/find';
    const res = await this.call(() =>
      this.executor.get(path, query, FindResponseSchema, { token })
    );
    return (res.docs ?? []).map((doc) => decodeBase64Json<T>(doc, path));
  }

  async delete(username: string, pod: string, database: string, id: string): Promise<void> {
    const token = this.tokenFor(username);
    await this.call(() =>
      this.executor.delete(
        '/doc/entry/del',
        { pod_name: pod, table_name: database, id },
        MessageResponseSchema,
        { token }
      )
    );
  }

  async count(username: string, pod: string, database: string, expr: Expr): Promise<number> {
    const compiled = compileExpression(expr);
    const token = this.tokenFor(username);
    const { data } = await this.call(() =>
      this.executor.post(
        '/doc/count',
        { pod_name: pod, table_name: database, expr: compiled },
        MessageResponseSchema,
        { token }
      )
    );
    if (!/^\d+$/.test(data.message)) {
      throw FairOSError.decode(`Response from /doc/count is not a count: "${data.message}"`);
    }
    return Number(data.message);
  }

  async loadJsonBuffer(
    username: string,
    pod: string,
    database: string,
    data: Buffer | Uint8Array | string
  ): Promise<void> {
    await this.loadJson(username, pod, database, { kind: 'buffer', data }, 'data.json');
  }

  async loadJsonFile(
    username: string,
    pod: string,
    database: string,
    localPath: string
  ): Promise<void> {
    await this.loadJson(username, pod, database, { kind: 'path', path: localPath });
  }

  async indexJson(username: string, pod: string, database: string, file: string): Promise<void> {
    const token = this.tokenFor(username);
    await this.call(() =>
      this.executor.post(
        '/doc/indexjson',
        { pod_name: pod, table_name: database, file_name: file },
        MessageResponseSchema,
        { token }
      )
    );
  }

  private async loadJson(
    username: string,
    pod: string,
    database: string,
    source: ByteSource,
    fileName?: string
  ): Promise<void> {
    const token = this.tokenFor(username);
    const multipart = await encodeMultipart(
      [
        ['pod_name', pod],
        ['table_name', database],
      ],
      [{ name: 'json', source, fileName }]
    );
    await this.call(() =>
      this.executor.postMultipart('/doc/loadjson', multipart, MessageResponseSchema, { token })
    );
  }
}

function toFieldType(code: number): FieldType {
  const type = FIELD_TYPE_CODES[code];
  if (type === undefined) {
    throw FairOSError.decode(`Unknown field type code: ${code}`);
  }
  return type;
}

/**
 * Creates a document service.
 */
export function createDocumentService(context: ServiceContext): DocumentService {
  return new DefaultDocumentService(context);
}
