/**
 * Simulation Layer
 *
 * In-process FairOS-dfs server implementing the endpoints the client uses.
 * Plug it in as the client's transport to exercise whole flows without a
 * network.
 *
 * @example
 * ```typescript
 * const simulator = new FairOSSimulator();
 * const client = FairOSClient.builder().transport(simulator).build();
 * await client.user.signup('alice', 'test-secret');
 * ```
 */

import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { DEFAULT_SESSION_COOKIE_NAME } from '../config';
import { FairOSError } from '../errors';
import type { HttpRequest, HttpResponse, HttpTransport } from '../transport';
import { BlockSize } from '../types';
import { Filter, matchesFilter, parseFilter } from './filter';

export type { Filter, FilterOp } from './filter';
export { parseFilter, matchesFilter } from './filter';

/**
 * Simulator options.
 */
export interface SimulatorOptions {
  /** API path prefix below the host. */
  basePath?: string;
  /** Session cookie name. */
  cookieName?: string;
  /** How `/kv/seek/next` reports an exhausted range. */
  seekEnd?: 'no-content' | 'rejection';
  /** Clock in Unix seconds. */
  now?: () => number;
}

/** A request as the simulator received it. */
export interface SimulatedCall {
  method: string;
  path: string;
  query: string;
}

interface SimUser {
  password: string;
  address: string;
}

interface SimFile {
  data: Buffer;
  contentType: string;
  blockSize: bigint;
  compression: string;
  created: number;
}

interface SimKvStore {
  indexType: string;
  entries: Map<string, string>;
}

interface SimDocDatabase {
  fields: Array<{ name: string; type: number }>;
  mutable: boolean;
  docs: Map<string, Record<string, unknown>>;
}

interface SimPod {
  password: string;
  address: string;
  open: boolean;
  dirs: Map<string, number>;
  files: Map<string, SimFile>;
  kv: Map<string, SimKvStore>;
  docs: Map<string, SimDocDatabase>;
}

interface SeekCursor {
  keys: string[];
  position: number;
}

type Share =
  | { kind: 'pod'; owner: string; pod: string; sharedTime: number }
  | { kind: 'file'; owner: string; pod: string; path: string; file: SimFile; sharedTime: number };

interface SimRequest {
  query: Map<string, string>;
  body: Record<string, unknown>;
  headers: Record<string, string>;
  form?: FormData;
}

interface SimResult {
  status?: number;
  body?: unknown;
  raw?: Buffer;
  setCookie?: string;
}

type Handler = (req: SimRequest) => SimResult | Promise<SimResult>;

/** Error envelope answer raised inside handlers. */
class Rejection extends Error {
  constructor(
    readonly status: number,
    message: string
  ) {
    super(message);
  }
}

const JsonObjectSchema = z.record(z.unknown());

const FIELD_TYPE_CODES: Record<string, number> = {
  string: 2,
  number: 3,
  map: 4,
};

const OK = { message: 'ok', code: 200 };

/**
 * In-process FairOS-dfs server.
 */
export class FairOSSimulator implements HttpTransport {
  private readonly basePath: string;
  private readonly cookieName: string;
  private readonly seekEnd: 'no-content' | 'rejection';
  private readonly now: () => number;

  private readonly users = new Map<string, SimUser>();
  private readonly sessions = new Map<string, string>();
  private readonly pods = new Map<string, Map<string, SimPod>>();
  private readonly sharedPods = new Map<string, string[]>();
  private readonly shares = new Map<string, Share>();
  private readonly cursors = new Map<string, SeekCursor>();
  private readonly calls: SimulatedCall[] = [];
  private readonly routes: Record<string, Handler>;
  private addressCounter = 0;
  private offline = false;

  constructor(options: SimulatorOptions = {}) {
    this.basePath = options.basePath ?? '/v1';
    this.cookieName = options.cookieName ?? DEFAULT_SESSION_COOKIE_NAME;
    this.seekEnd = options.seekEnd ?? 'no-content';
    this.now = options.now ?? (() => Math.floor(Date.now() / 1000));

    this.routes = {
      'POST /user/signup': (req) => this.signup(req),
      'POST /user/login': (req) => this.login(req),
      'POST /user/import': (req) => this.importUser(req),
      'DELETE /user/delete': (req) => this.deleteUser(req),
      'GET /user/present': (req) => ({ body: { present: this.users.has(param(req, 'user_name')) } }),
      'GET /user/isloggedin': (req) => this.isLoggedIn(req),
      'POST /user/logout': (req) => this.logout(req),
      'POST /user/export': (req) => this.userStat(req),
      'GET /user/stat': (req) => this.userStat(req),

      'POST /pod/new': (req) => this.createPod(req),
      'POST /pod/open': (req) => this.openPod(req),
      'POST /pod/sync': (req) => this.syncPod(req),
      'POST /pod/close': (req) => this.closePod(req),
      'POST /pod/share': (req) => this.sharePod(req),
      'DELETE /pod/delete': (req) => this.deletePod(req),
      'GET /pod/present': (req) => this.podPresent(req),
      'GET /pod/ls': (req) => this.listPods(req),
      'GET /pod/stat': (req) => this.podStat(req),
      'GET /pod/receive': (req) => this.receivePod(req),
      'GET /pod/receiveinfo': (req) => this.podReceiveInfo(req),

      'POST /dir/mkdir': (req) => this.mkdir(req),
      'DELETE /dir/rmdir': (req) => this.rmdir(req),
      'GET /dir/ls': (req) => this.ls(req),
      'GET /dir/present': (req) => this.dirPresent(req),
      'GET /dir/stat': (req) => this.dirStat(req),

      'POST /file/upload': (req) => this.upload(req),
      'POST /file/download': (req) => this.download(req),
      'POST /file/share': (req) => this.shareFile(req),
      'DELETE /file/delete': (req) => this.deleteFile(req),
      'GET /file/stat': (req) => this.fileStat(req),
      'GET /file/receive': (req) => this.receiveFile(req),
      'GET /file/receiveinfo': (req) => this.fileReceiveInfo(req),

      'POST /kv/new': (req) => this.createKvStore(req),
      'POST /kv/open': (req) => this.openKvStore(req),
      'DELETE /kv/delete': (req) => this.deleteKvStore(req),
      'GET /kv/ls': (req) => this.listKvStores(req),
      'POST /kv/entry/put': (req) => this.putKv(req),
      'GET /kv/entry/get': (req) => this.getKv(req),
      'DELETE /kv/entry/del': (req) => this.deleteKv(req),
      'POST /kv/count': (req) => this.countKv(req),
      'GET /kv/present': (req) => this.kvPresent(req),
      'POST /kv/loadcsv': (req) => this.loadCsv(req),
      'POST /kv/seek': (req) => this.seek(req),
      'GET /kv/seek/next': (req) => this.seekNext(req),

      'POST /doc/new': (req) => this.createDocDatabase(req),
      'POST /doc/open': (req) => this.openDocDatabase(req),
      'DELETE /doc/delete': (req) => this.deleteDocDatabase(req),
      'GET /doc/ls': (req) => this.listDocDatabases(req),
      'POST /doc/entry/put': (req) => this.putDocument(req),
      'GET /doc/entry/get': (req) => this.getDocument(req),
      'DELETE /doc/entry/del': (req) => this.deleteDocument(req),
      'GET /doc/find': (req) => this.findDocuments(req),
      'POST /doc/count': (req) => this.countDocuments(req),
      'POST /doc/loadjson': (req) => this.loadJson(req),
      'POST /doc/indexjson': (req) => this.indexJson(req),
    };
  }

  /**
   * Makes every following request fail as unreachable, or recovers.
   */
  setOffline(offline: boolean): this {
    this.offline = offline;
    return this;
  }

  /**
   * Requests received so far.
   */
  getCalls(): SimulatedCall[] {
    return [...this.calls];
  }

  /**
   * Writes raw values into a store, creating it when missing. The user and the
   * pod must exist.
   */
  seedKeyValues(username: string, pod: string, store: string, entries: Record<string, string>): this {
    const target = this.findPod(username, pod);
    let kv = target.kv.get(store);
    if (!kv) {
      kv = { indexType: 'string', entries: new Map() };
      target.kv.set(store, kv);
    }
    for (const [key, value] of Object.entries(entries)) {
      kv.entries.set(key, value);
    }
    return this;
  }

  /**
   * Clears all state.
   */
  reset(): void {
    this.users.clear();
    this.sessions.clear();
    this.pods.clear();
    this.sharedPods.clear();
    this.shares.clear();
    this.cursors.clear();
    this.calls.length = 0;
    this.addressCounter = 0;
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    if (request.signal?.aborted) {
      throw FairOSError.aborted();
    }
    if (this.offline) {
      throw FairOSError.unreachable('Could not connect: simulator is offline');
    }

    const target = request.url.replace(/^https?:\/\/[^/]+/, '');
    const queryStart = target.indexOf('?');
    const fullPath = queryStart === -1 ? target : target.slice(0, queryStart);
    const rawQuery = queryStart === -1 ? '' : target.slice(queryStart + 1);
    const routePath = fullPath.startsWith(this.basePath)
      ? fullPath.slice(this.basePath.length)
      : fullPath;
    this.calls.push({ method: request.method, path: routePath, query: rawQuery });

    const handler = this.routes[`${request.method} ${routePath}`];
    if (!handler) {
      return envelope(404, '404 page not found');
    }

    try {
      const simRequest = await this.parseRequest(request, rawQuery);
      const result = await handler(simRequest);
      return this.respond(result);
    } catch (error) {
      if (error instanceof Rejection) {
        return envelope(error.status, error.message);
      }
      throw error;
    }
  }

  // Request plumbing

  private async parseRequest(request: HttpRequest, rawQuery: string): Promise<SimRequest> {
    const headers: Record<string, string> = {};
    for (const [name, value] of Object.entries(request.headers)) {
      headers[name.toLowerCase()] = value;
    }

    const query = new Map<string, string>();
    for (const pair of rawQuery.split('&')) {
      if (pair === '') {
        continue;
      }
      const eq = pair.indexOf('=');
      query.set(eq === -1 ? pair : pair.slice(0, eq), eq === -1 ? '' : pair.slice(eq + 1));
    }

    const contentType = headers['content-type'] ?? '';
    const simRequest: SimRequest = { query, body: {}, headers };
    if (request.body && request.body.length > 0) {
      if (contentType.startsWith('multipart/form-data')) {
        simRequest.form = await new Response(request.body, {
          headers: { 'content-type': contentType },
        }).formData();
      } else {
        simRequest.body = parseJsonObject(request.body.toString('utf-8'), 'request body');
      }
    }
    return simRequest;
  }

  private respond(result: SimResult): HttpResponse {
    const headers: Record<string, string | string[]> = {};
    if (result.setCookie !== undefined) {
      headers['set-cookie'] = [`${this.cookieName}=${result.setCookie}; Path=/; HttpOnly`];
    }
    const status = result.status ?? 200;
    if (result.raw) {
      headers['content-type'] = 'application/octet-stream';
      return { status, headers, body: result.raw };
    }
    if (status === 204) {
      return { status, headers, body: Buffer.alloc(0) };
    }
    headers['content-type'] = 'application/json';
    return { status, headers, body: Buffer.from(JSON.stringify(result.body ?? OK), 'utf-8') };
  }

  private sessionUser(req: SimRequest): string {
    const token = readCookie(req.headers['cookie'], this.cookieName);
    const username = token === undefined ? undefined : this.sessions.get(token);
    if (username === undefined) {
      throw new Rejection(400, 'user not logged in');
    }
    return username;
  }

  private openSession(username: string): string {
    const token = uuidv4();
    this.sessions.set(token, username);
    return token;
  }

  private nextAddress(): string {
    this.addressCounter++;
    return `0x${this.addressCounter.toString(16).padStart(40, '0')}`;
  }

  private findPod(username: string, name: string): SimPod {
    const pod = this.pods.get(username)?.get(name);
    if (!pod) {
      throw new Rejection(400, 'pod does not exist');
    }
    return pod;
  }

  private openedPod(username: string, name: string): SimPod {
    const pod = this.findPod(username, name);
    if (!pod.open) {
      throw new Rejection(400, 'pod not open');
    }
    return pod;
  }

  private checkPassword(username: string, password: string): void {
    if (this.users.get(username)?.password !== password) {
      throw new Rejection(400, 'invalid password');
    }
  }

  // Users

  private signup(req: SimRequest): SimResult {
    const username = field(req.body, 'user_name');
    const password = field(req.body, 'password');
    if (this.users.has(username)) {
      throw new Rejection(400, 'user signup: user name already present');
    }
    const supplied = optionalField(req.body, 'mnemonic');
    const address = this.nextAddress();
    this.users.set(username, { password, address });
    this.pods.set(username, new Map());
    const mnemonic =
      supplied === undefined
        ? Array.from({ length: 12 }, (_, i) => `word${this.addressCounter + i}`).join(' ')
        : undefined;
    return { status: 201, body: { address, mnemonic }, setCookie: this.openSession(username) };
  }

  private login(req: SimRequest): SimResult {
    const username = field(req.body, 'user_name');
    const password = field(req.body, 'password');
    const user = this.users.get(username);
    if (!user) {
      throw new Rejection(400, 'user login: invalid user name');
    }
    if (user.password !== password) {
      throw new Rejection(400, 'user login: invalid password');
    }
    return {
      body: { message: 'user logged-in successfully', code: 200 },
      setCookie: this.openSession(username),
    };
  }

  private importUser(req: SimRequest): SimResult {
    const username = field(req.body, 'user_name');
    const password = field(req.body, 'password');
    if (this.users.has(username)) {
      throw new Rejection(400, 'user import: user name already present');
    }
    const address = optionalField(req.body, 'address') ?? this.nextAddress();
    this.users.set(username, { password, address });
    this.pods.set(username, new Map());
    return { status: 201, body: { address }, setCookie: this.openSession(username) };
  }

  private deleteUser(req: SimRequest): SimResult {
    const username = this.sessionUser(req);
    this.checkPassword(username, field(req.body, 'password'));
    this.users.delete(username);
    this.pods.delete(username);
    this.sharedPods.delete(username);
    for (const [token, owner] of this.sessions) {
      if (owner === username) {
        this.sessions.delete(token);
      }
    }
    return { body: { message: 'user deleted successfully', code: 200 } };
  }

  private isLoggedIn(req: SimRequest): SimResult {
    const username = param(req, 'user_name');
    return { body: { loggedin: [...this.sessions.values()].includes(username) } };
  }

  private logout(req: SimRequest): SimResult {
    this.sessionUser(req);
    const token = readCookie(req.headers['cookie'], this.cookieName);
    if (token !== undefined) {
      this.sessions.delete(token);
    }
    return { body: { message: 'user logged out successfully', code: 200 } };
  }

  private userStat(req: SimRequest): SimResult {
    const username = this.sessionUser(req);
    const user = this.users.get(username);
    if (!user) {
      throw new Rejection(400, 'user not found');
    }
    return { body: { user_name: username, address: user.address } };
  }

  // Pods

  private createPod(req: SimRequest): SimResult {
    const username = this.sessionUser(req);
    const name = field(req.body, 'pod_name');
    const password = field(req.body, 'password');
    this.checkPassword(username, password);
    const pods = this.pods.get(username) ?? new Map<string, SimPod>();
    if (pods.has(name)) {
      throw new Rejection(400, 'pod new: pod already exists');
    }
    pods.set(name, {
      password,
      address: this.nextAddress(),
      open: true,
      dirs: new Map([['/', this.now()]]),
      files: new Map(),
      kv: new Map(),
      docs: new Map(),
    });
    this.pods.set(username, pods);
    return { status: 201, body: { message: 'pod created successfully', code: 201 } };
  }

  private openPod(req: SimRequest): SimResult {
    const username = this.sessionUser(req);
    const pod = this.findPod(username, field(req.body, 'pod_name'));
    this.checkPassword(username, field(req.body, 'password'));
    pod.open = true;
    return { body: { message: 'pod opened successfully', code: 200 } };
  }

  private syncPod(req: SimRequest): SimResult {
    const username = this.sessionUser(req);
    this.openedPod(username, field(req.body, 'pod_name'));
    return { body: { message: 'pod synced successfully', code: 200 } };
  }

  private closePod(req: SimRequest): SimResult {
    const username = this.sessionUser(req);
    const pod = this.openedPod(username, field(req.body, 'pod_name'));
    pod.open = false;
    return { body: { message: 'pod closed successfully', code: 200 } };
  }

  private sharePod(req: SimRequest): SimResult {
    const username = this.sessionUser(req);
    const name = field(req.body, 'pod_name');
    this.findPod(username, name);
    this.checkPassword(username, field(req.body, 'password'));
    const reference = newReference();
    this.shares.set(reference, { kind: 'pod', owner: username, pod: name, sharedTime: this.now() });
    return { body: { pod_sharing_reference: reference } };
  }

  private deletePod(req: SimRequest): SimResult {
    const username = this.sessionUser(req);
    const name = field(req.body, 'pod_name');
    this.findPod(username, name);
    this.checkPassword(username, field(req.body, 'password'));
    this.pods.get(username)?.delete(name);
    return { body: { message: 'pod deleted successfully', code: 200 } };
  }

  private podPresent(req: SimRequest): SimResult {
    const username = this.sessionUser(req);
    return { body: { present: this.pods.get(username)?.has(param(req, 'pod_name')) ?? false } };
  }

  private listPods(req: SimRequest): SimResult {
    const username = this.sessionUser(req);
    return {
      body: {
        pod_name: [...(this.pods.get(username)?.keys() ?? [])],
        shared_pod_name: [...(this.sharedPods.get(username) ?? [])],
      },
    };
  }

  private podStat(req: SimRequest): SimResult {
    const username = this.sessionUser(req);
    const name = param(req, 'pod_name');
    const pod = this.findPod(username, name);
    return { body: { pod_name: name, address: pod.address } };
  }

  private receivePod(req: SimRequest): SimResult {
    const username = this.sessionUser(req);
    const share = this.podShare(param(req, 'sharing_ref'));
    const shared = this.sharedPods.get(username) ?? [];
    if (!shared.includes(share.pod)) {
      shared.push(share.pod);
    }
    this.sharedPods.set(username, shared);
    return { body: { message: 'pod received successfully', code: 200 } };
  }

  private podReceiveInfo(req: SimRequest): SimResult {
    this.sessionUser(req);
    const share = this.podShare(param(req, 'sharing_ref'));
    const pod = this.findPod(share.owner, share.pod);
    return {
      body: {
        pod_name: share.pod,
        pod_address: pod.address,
        user_name: share.owner,
        user_address: this.users.get(share.owner)?.address ?? '',
        shared_time: String(share.sharedTime),
      },
    };
  }

  private podShare(reference: string): Extract<Share, { kind: 'pod' }> {
    const share = this.shares.get(reference);
    if (!share || share.kind !== 'pod') {
      throw new Rejection(400, 'invalid sharing reference');
    }
    return share;
  }

  // Directories

  private mkdir(req: SimRequest): SimResult {
    const username = this.sessionUser(req);
    const pod = this.openedPod(username, field(req.body, 'pod_name'));
    const dir = normalizePath(field(req.body, 'dir_path'));
    if (pod.dirs.has(dir)) {
      throw new Rejection(400, 'mkdir: directory name already present');
    }
    if (!pod.dirs.has(path.posix.dirname(dir))) {
      throw new Rejection(400, 'mkdir: parent directory does not exist');
    }
    pod.dirs.set(dir, this.now());
    return { status: 201, body: { message: 'directory created successfully', code: 201 } };
  }

  private rmdir(req: SimRequest): SimResult {
    const username = this.sessionUser(req);
    const pod = this.openedPod(username, field(req.body, 'pod_name'));
    const dir = normalizePath(field(req.body, 'dir_path'));
    if (dir === '/' || !pod.dirs.has(dir)) {
      throw new Rejection(400, 'rmdir: directory not present');
    }
    const prefix = `${dir}/`;
    for (const key of [...pod.dirs.keys()]) {
      if (key === dir || key.startsWith(prefix)) {
        pod.dirs.delete(key);
      }
    }
    for (const key of [...pod.files.keys()]) {
      if (key.startsWith(prefix)) {
        pod.files.delete(key);
      }
    }
    return { body: { message: 'directory removed successfully', code: 200 } };
  }

  private ls(req: SimRequest): SimResult {
    const username = this.sessionUser(req);
    const pod = this.openedPod(username, param(req, 'pod_name'));
    const dir = normalizePath(param(req, 'dir_path'));
    if (!pod.dirs.has(dir)) {
      throw new Rejection(400, 'ls: directory not present');
    }
    const dirs = [...pod.dirs.entries()]
      .filter(([key]) => key !== '/' && path.posix.dirname(key) === dir)
      .map(([key, created]) => ({
        name: path.posix.basename(key),
        content_type: 'inode/directory',
        ...timestamps(created),
      }));
    const files = [...pod.files.entries()]
      .filter(([key]) => path.posix.dirname(key) === dir)
      .map(([key, file]) => ({
        name: path.posix.basename(key),
        content_type: file.contentType,
        size: String(file.data.length),
        block_size: String(file.blockSize),
        ...timestamps(file.created),
      }));
    return { body: { dirs, files } };
  }

  private dirPresent(req: SimRequest): SimResult {
    const username = this.sessionUser(req);
    const pod = this.openedPod(username, param(req, 'pod_name'));
    return { body: { present: pod.dirs.has(normalizePath(param(req, 'dir_path'))) } };
  }

  private dirStat(req: SimRequest): SimResult {
    const username = this.sessionUser(req);
    const podName = param(req, 'pod_name');
    const pod = this.openedPod(username, podName);
    const dir = normalizePath(param(req, 'dir_path'));
    const created = pod.dirs.get(dir);
    if (created === undefined) {
      throw new Rejection(400, 'stat: directory not present');
    }
    const childDirs = [...pod.dirs.keys()].filter(
      (key) => key !== '/' && path.posix.dirname(key) === dir
    );
    const childFiles = [...pod.files.keys()].filter((key) => path.posix.dirname(key) === dir);
    return {
      body: {
        pod_name: podName,
        dir_path: path.posix.dirname(dir),
        dir_name: dir === '/' ? '/' : path.posix.basename(dir),
        ...timestamps(created),
        no_of_directories: String(childDirs.length),
        no_of_files: String(childFiles.length),
      },
    };
  }

  // Files

  private async upload(req: SimRequest): Promise<SimResult> {
    const username = this.sessionUser(req);
    const form = requireForm(req);
    const pod = this.openedPod(username, formField(form, 'pod_name'));
    const dir = normalizePath(formField(form, 'dir_path'));
    if (!pod.dirs.has(dir)) {
      throw new Rejection(400, 'upload: directory not present');
    }
    const blockSize = parseBlockSize(formField(form, 'block_size'));
    const compression = req.headers['fairos-dfs-compression'] ?? '';
    if (compression !== '' && compression !== 'gzip' && compression !== 'snappy') {
      throw new Rejection(400, `upload: unknown compression ${compression}`);
    }

    const responses: Array<{ file_name: string; message: string }> = [];
    for (const entry of form.getAll('files')) {
      if (typeof entry === 'string') {
        throw new Rejection(400, 'upload: files must be file parts');
      }
      pod.files.set(path.posix.join(dir, entry.name), {
        data: Buffer.from(await entry.arrayBuffer()),
        contentType: entry.type,
        blockSize,
        compression,
        created: this.now(),
      });
      responses.push({ file_name: entry.name, message: 'uploaded successfully' });
    }
    if (responses.length === 0) {
      throw new Rejection(400, 'upload: no files');
    }
    return { body: { Responses: responses } };
  }

  private download(req: SimRequest): SimResult {
    const username = this.sessionUser(req);
    const form = requireForm(req);
    const pod = this.openedPod(username, formField(form, 'pod_name'));
    const file = this.findFile(pod, formField(form, 'file_path'));
    return { raw: file.data };
  }

  private shareFile(req: SimRequest): SimResult {
    const username = this.sessionUser(req);
    const podName = field(req.body, 'pod_name');
    const pod = this.openedPod(username, podName);
    const filePath = normalizePath(field(req.body, 'file_path'));
    const file = this.findFile(pod, filePath);
    field(req.body, 'dest_user');
    const reference = newReference();
    this.shares.set(reference, {
      kind: 'file',
      owner: username,
      pod: podName,
      path: filePath,
      file,
      sharedTime: this.now(),
    });
    return { body: { file_sharing_reference: reference } };
  }

  private deleteFile(req: SimRequest): SimResult {
    const username = this.sessionUser(req);
    const pod = this.openedPod(username, field(req.body, 'pod_name'));
    const filePath = normalizePath(field(req.body, 'file_path'));
    this.findFile(pod, filePath);
    pod.files.delete(filePath);
    return { body: { message: 'file deleted successfully', code: 200 } };
  }

  private fileStat(req: SimRequest): SimResult {
    const username = this.sessionUser(req);
    const podName = param(req, 'pod_name');
    const pod = this.openedPod(username, podName);
    const filePath = normalizePath(param(req, 'file_path'));
    const file = this.findFile(pod, filePath);

    const blocks: Array<{ name: string; reference: string; size: string; compressed_size: string }> =
      [];
    const step = Number(file.blockSize) || file.data.length || 1;
    for (let offset = 0; offset < file.data.length; offset += step) {
      const size = Math.min(step, file.data.length - offset);
      blocks.push({
        name: `block-${String(blocks.length).padStart(5, '0')}`,
        reference: newReference(),
        size: String(size),
        compressed_size: String(size),
      });
    }

    return {
      body: {
        pod_name: podName,
        file_path: path.posix.dirname(filePath),
        file_name: path.posix.basename(filePath),
        content_type: file.contentType,
        file_size: String(file.data.length),
        block_size: String(file.blockSize),
        compression: file.compression,
        ...timestamps(file.created),
        Blocks: blocks,
      },
    };
  }

  private receiveFile(req: SimRequest): SimResult {
    const username = this.sessionUser(req);
    const pod = this.openedPod(username, param(req, 'pod_name'));
    const share = this.fileShare(param(req, 'sharing_ref'));
    const dir = normalizePath(param(req, 'dir_path'));
    if (!pod.dirs.has(dir)) {
      throw new Rejection(400, 'receive: directory not present');
    }
    const target = path.posix.join(dir, path.posix.basename(share.path));
    pod.files.set(target, { ...share.file, created: this.now() });
    return { body: { file_name: target } };
  }

  private fileReceiveInfo(req: SimRequest): SimResult {
    const username = this.sessionUser(req);
    const share = this.fileShare(param(req, 'sharing_ref'));
    const { file } = share;
    const step = Number(file.blockSize) || 1;
    return {
      body: {
        pod_name: share.pod,
        name: path.posix.basename(share.path),
        content_type: file.contentType,
        size: String(file.data.length),
        block_size: String(file.blockSize),
        number_of_blocks: String(Math.ceil(file.data.length / step)),
        compression: file.compression,
        source_address: this.users.get(share.owner)?.address ?? '',
        dest_address: this.users.get(username)?.address ?? '',
        shared_time: String(share.sharedTime),
      },
    };
  }

  private fileShare(reference: string): Extract<Share, { kind: 'file' }> {
    const share = this.shares.get(reference);
    if (!share || share.kind !== 'file') {
      throw new Rejection(400, 'invalid sharing reference');
    }
    return share;
  }

  private findFile(pod: SimPod, filePath: string): SimFile {
    const file = pod.files.get(normalizePath(filePath));
    if (!file) {
      throw new Rejection(404, 'file not found');
    }
    return file;
  }

  // Key-value stores

  private kvStore(req: SimRequest, source: 'body' | 'query'): SimKvStore {
    const username = this.sessionUser(req);
    const podName = source === 'body' ? field(req.body, 'pod_name') : param(req, 'pod_name');
    const name = source === 'body' ? field(req.body, 'table_name') : param(req, 'table_name');
    const store = this.openedPod(username, podName).kv.get(name);
    if (!store) {
      throw new Rejection(400, 'kv: table does not exist');
    }
    return store;
  }

  private createKvStore(req: SimRequest): SimResult {
    const username = this.sessionUser(req);
    const pod = this.openedPod(username, field(req.body, 'pod_name'));
    const name = field(req.body, 'table_name');
    if (pod.kv.has(name)) {
      throw new Rejection(400, 'kv create: table already present');
    }
    pod.kv.set(name, { indexType: optionalField(req.body, 'indexType') ?? 'string', entries: new Map() });
    return { status: 201, body: { message: 'kv store created', code: 201 } };
  }

  private openKvStore(req: SimRequest): SimResult {
    this.kvStore(req, 'body');
    return { body: { message: 'kv store opened', code: 200 } };
  }

  private deleteKvStore(req: SimRequest): SimResult {
    const username = this.sessionUser(req);
    const pod = this.openedPod(username, field(req.body, 'pod_name'));
    if (!pod.kv.delete(field(req.body, 'table_name'))) {
      throw new Rejection(400, 'kv: table does not exist');
    }
    return { body: { message: 'kv store deleted', code: 200 } };
  }

  private listKvStores(req: SimRequest): SimResult {
    const username = this.sessionUser(req);
    const pod = this.openedPod(username, param(req, 'pod_name'));
    const tables = [...pod.kv.entries()].map(([name, store]) => ({
      table_name: name,
      indexes: [store.indexType === 'number' ? 'NumberIndex' : 'StringIndex'],
      type: store.indexType,
    }));
    return { body: { Tables: tables } };
  }

  private putKv(req: SimRequest): SimResult {
    const store = this.kvStore(req, 'body');
    store.entries.set(field(req.body, 'key'), field(req.body, 'value'));
    return { status: 201, body: { message: 'key added', code: 201 } };
  }

  private getKv(req: SimRequest): SimResult {
    const store = this.kvStore(req, 'query');
    const key = param(req, 'key');
    const value = store.entries.get(key);
    if (value === undefined) {
      throw new Rejection(404, 'kv get: key not found');
    }
    const byteString = req.query.get('format') === 'byte-string';
    return {
      body: {
        keys: [key],
        values: byteString ? Buffer.from(value, 'utf-8').toString('base64') : value,
      },
    };
  }

  private deleteKv(req: SimRequest): SimResult {
    const store = this.kvStore(req, 'body');
    if (!store.entries.delete(field(req.body, 'key'))) {
      throw new Rejection(404, 'kv del: key not found');
    }
    return { body: { message: 'key deleted', code: 200 } };
  }

  private countKv(req: SimRequest): SimResult {
    const store = this.kvStore(req, 'body');
    return { body: { count: store.entries.size, table_name: field(req.body, 'table_name') } };
  }

  private kvPresent(req: SimRequest): SimResult {
    const store = this.kvStore(req, 'query');
    return { body: { present: store.entries.has(param(req, 'key')) } };
  }

  private async loadCsv(req: SimRequest): Promise<SimResult> {
    const username = this.sessionUser(req);
    const form = requireForm(req);
    const store = this.openedPod(username, formField(form, 'pod_name')).kv.get(
      formField(form, 'table_name')
    );
    if (!store) {
      throw new Rejection(400, 'kv: table does not exist');
    }
    const [, ...rows] = (await formFile(form, 'csv')).toString('utf-8').split(/\r?\n/);
    for (const row of rows) {
      if (row === '') {
        continue;
      }
      const [key = ''] = row.split(',', 1);
      store.entries.set(key, row);
    }
    return { body: { message: 'csv file loaded', code: 200 } };
  }

  private seek(req: SimRequest): SimResult {
    const username = this.sessionUser(req);
    const podName = field(req.body, 'pod_name');
    const tableName = field(req.body, 'table_name');
    const store = this.kvStore(req, 'body');
    const start = field(req.body, 'start_prefix');
    const end = optionalField(req.body, 'end_prefix');
    const limit = req.body['limit'];

    let keys = [...store.entries.keys()]
      .filter((key) => key >= start && (end === undefined || key <= end))
      .sort();
    if (typeof limit === 'number') {
      keys = keys.slice(0, limit);
    }
    this.cursors.set(cursorKey(username, podName, tableName), { keys, position: 0 });
    return { body: { message: 'seek done', code: 200 } };
  }

  private seekNext(req: SimRequest): SimResult {
    const username = this.sessionUser(req);
    const store = this.kvStore(req, 'query');
    const cursor = this.cursors.get(
      cursorKey(username, param(req, 'pod_name'), param(req, 'table_name'))
    );
    if (!cursor) {
      throw new Rejection(400, 'kv seek next: seek not positioned');
    }
    const key = cursor.keys[cursor.position];
    const value = key === undefined ? undefined : store.entries.get(key);
    if (key === undefined || value === undefined) {
      if (this.seekEnd === 'no-content') {
        return { status: 204 };
      }
      throw new Rejection(400, 'kv seek next: no next element');
    }
    cursor.position++;
    return { body: { keys: [key], values: value } };
  }

  // Document databases

  private docDatabase(req: SimRequest, source: 'body' | 'query'): SimDocDatabase {
    const username = this.sessionUser(req);
    const podName = source === 'body' ? field(req.body, 'pod_name') : param(req, 'pod_name');
    const name = source === 'body' ? field(req.body, 'table_name') : param(req, 'table_name');
    const database = this.openedPod(username, podName).docs.get(name);
    if (!database) {
      throw new Rejection(400, 'doc: table does not exist');
    }
    return database;
  }

  private createDocDatabase(req: SimRequest): SimResult {
    const username = this.sessionUser(req);
    const pod = this.openedPod(username, field(req.body, 'pod_name'));
    const name = field(req.body, 'table_name');
    if (pod.docs.has(name)) {
      throw new Rejection(400, 'doc create: table already present');
    }
    const fields = [{ name: 'id', type: FIELD_TYPE_CODES['string'] ?? 2 }];
    for (const entry of (optionalField(req.body, 'si') ?? '').split(',')) {
      if (entry === '') {
        continue;
      }
      const [fieldName = '', typeName = ''] = entry.split('=');
      const type = FIELD_TYPE_CODES[typeName];
      if (fieldName === '' || type === undefined) {
        throw new Rejection(400, `doc create: invalid index ${entry}`);
      }
      fields.push({ name: fieldName, type });
    }
    pod.docs.set(name, { fields, mutable: req.body['mutable'] === true, docs: new Map() });
    return { status: 201, body: { message: 'document db created', code: 201 } };
  }

  private openDocDatabase(req: SimRequest): SimResult {
    this.docDatabase(req, 'body');
    return { body: { message: 'document db opened', code: 200 } };
  }

  private deleteDocDatabase(req: SimRequest): SimResult {
    const username = this.sessionUser(req);
    const pod = this.openedPod(username, field(req.body, 'pod_name'));
    if (!pod.docs.delete(field(req.body, 'table_name'))) {
      throw new Rejection(400, 'doc: table does not exist');
    }
    return { body: { message: 'document db deleted', code: 200 } };
  }

  private listDocDatabases(req: SimRequest): SimResult {
    const username = this.sessionUser(req);
    const pod = this.openedPod(username, param(req, 'pod_name'));
    const tables = [...pod.docs.entries()].map(([name, database]) => ({
      table_name: name,
      indexes: database.fields,
    }));
    return { body: { Tables: tables } };
  }

  private putDocument(req: SimRequest): SimResult {
    const database = this.docDatabase(req, 'body');
    storeDocument(database, parseJsonObject(field(req.body, 'doc'), 'doc'));
    return { status: 201, body: { message: 'added document to db', code: 201 } };
  }

  private getDocument(req: SimRequest): SimResult {
    const database = this.docDatabase(req, 'query');
    const doc = database.docs.get(param(req, 'id'));
    if (!doc) {
      throw new Rejection(404, 'doc get: document not found');
    }
    return { body: { doc: encodeDocument(doc) } };
  }

  private deleteDocument(req: SimRequest): SimResult {
    const database = this.docDatabase(req, 'body');
    if (!database.docs.delete(field(req.body, 'id'))) {
      throw new Rejection(404, 'doc del: document not found');
    }
    return { body: { message: 'deleted document from db', code: 200 } };
  }

  private findDocuments(req: SimRequest): SimResult {
    const database = this.docDatabase(req, 'query');
    const filter = indexedFilter(database, req.query.get('expr') ?? '');
    const limitParam = req.query.get('limit');
    const limit = limitParam === undefined ? Infinity : Number(limitParam);
    const docs = [...database.docs.values()]
      .filter((doc) => matchesFilter(doc, filter))
      .slice(0, limit)
      .map(encodeDocument);
    return { body: { docs } };
  }

  private countDocuments(req: SimRequest): SimResult {
    const database = this.docDatabase(req, 'body');
    const filter = indexedFilter(database, optionalField(req.body, 'expr') ?? '');
    const count = [...database.docs.values()].filter((doc) => matchesFilter(doc, filter)).length;
    return { body: { message: String(count), code: 200 } };
  }

  private async loadJson(req: SimRequest): Promise<SimResult> {
    const username = this.sessionUser(req);
    const form = requireForm(req);
    const database = this.openedPod(username, formField(form, 'pod_name')).docs.get(
      formField(form, 'table_name')
    );
    if (!database) {
      throw new Rejection(400, 'doc: table does not exist');
    }
    loadDocumentLines(database, (await formFile(form, 'json')).toString('utf-8'));
    return { body: { message: 'json file loaded', code: 200 } };
  }

  private indexJson(req: SimRequest): SimResult {
    const username = this.sessionUser(req);
    const pod = this.openedPod(username, field(req.body, 'pod_name'));
    const database = this.docDatabase(req, 'body');
    const file = this.findFile(pod, field(req.body, 'file_name'));
    loadDocumentLines(database, file.data.toString('utf-8'));
    return { body: { message: 'indexing started', code: 200 } };
  }
}

function envelope(status: number, message: string): HttpResponse {
  return {
    status,
    headers: { 'content-type': 'application/json' },
    body: Buffer.from(JSON.stringify({ message, code: status }), 'utf-8'),
  };
}

function readCookie(header: string | undefined, name: string): string | undefined {
  for (const pair of (header ?? '').split(';')) {
    const [key, value] = pair.trim().split('=', 2);
    if (key === name && value !== undefined) {
      return value;
    }
  }
  return undefined;
}

function field(body: Record<string, unknown>, name: string): string {
  const value = body[name];
  if (typeof value !== 'string' || value === '') {
    throw new Rejection(400, `${name} is required`);
  }
  return value;
}

function optionalField(body: Record<string, unknown>, name: string): string | undefined {
  const value = body[name];
  return typeof value === 'string' ? value : undefined;
}

function param(req: SimRequest, name: string): string {
  const value = req.query.get(name);
  if (value === undefined || value === '') {
    throw new Rejection(400, `${name} is required`);
  }
  return value;
}

function requireForm(req: SimRequest): FormData {
  if (!req.form) {
    throw new Rejection(400, 'multipart body required');
  }
  return req.form;
}

function formField(form: FormData, name: string): string {
  const value = form.get(name);
  if (typeof value !== 'string' || value === '') {
    throw new Rejection(400, `${name} is required`);
  }
  return value;
}

async function formFile(form: FormData, name: string): Promise<Buffer> {
  const value = form.get(name);
  if (value === null || typeof value === 'string') {
    throw new Rejection(400, `${name} file is required`);
  }
  return Buffer.from(await value.arrayBuffer());
}

function parseJsonObject(text: string, what: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw new Rejection(400, `${what} is not valid JSON`);
  }
  const result = JsonObjectSchema.safeParse(parsed);
  if (!result.success) {
    throw new Rejection(400, `${what} must be a JSON object`);
  }
  return result.data;
}

function parseBlockSize(value: string): bigint {
  try {
    return BlockSize.parse(value).totalBytes();
  } catch {
    throw new Rejection(400, `upload: invalid block size ${value}`);
  }
}

function indexedFilter(database: SimDocDatabase, expr: string): Filter | undefined {
  let filter: Filter | undefined;
  try {
    filter = parseFilter(expr);
  } catch (error) {
    throw new Rejection(400, `doc: ${error instanceof Error ? error.message : 'invalid expression'}`);
  }
  if (filter && !database.fields.some((f) => f.name === filter?.field)) {
    throw new Rejection(400, 'doc: index not found');
  }
  return filter;
}

function storeDocument(database: SimDocDatabase, doc: Record<string, unknown>): void {
  const id = doc['id'];
  if (typeof id !== 'string' || id === '') {
    throw new Rejection(400, 'doc put: document has no id');
  }
  database.docs.set(id, doc);
}

function loadDocumentLines(database: SimDocDatabase, text: string): void {
  for (const line of text.split(/\r?\n/)) {
    if (line.trim() === '') {
      continue;
    }
    const doc = parseJsonObject(line, 'json line');
    storeDocument(database, typeof doc['id'] === 'string' ? doc : { ...doc, id: uuidv4() });
  }
}

function encodeDocument(doc: Record<string, unknown>): string {
  return Buffer.from(JSON.stringify(doc), 'utf-8').toString('base64');
}

function normalizePath(value: string): string {
  const normalized = path.posix.normalize(value.startsWith('/') ? value : `/${value}`);
  return normalized.length > 1 && normalized.endsWith('/') ? normalized.slice(0, -1) : normalized;
}

function timestamps(time: number): {
  creation_time: string;
  modification_time: string;
  access_time: string;
} {
  const value = String(time);
  return { creation_time: value, modification_time: value, access_time: value };
}

function newReference(): string {
  return uuidv4().replace(/-/g, '');
}

function cursorKey(username: string, pod: string, table: string): string {
  return `${username}\u0000${pod}\u0000${table}`;
}
