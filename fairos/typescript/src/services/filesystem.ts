/**
 * Directories and files inside a pod.
 */

import { writeFile } from 'fs/promises';
import { z } from 'zod';
import { FairOSError } from '../errors';
import { encodeMultipart } from '../multipart';
import type { StreamPart } from '../multipart';
import { MessageResponseSchema } from '../transport';
import { BlockSize } from '../types';
import type {
  Compression,
  DirInfo,
  DirListing,
  FileInfo,
  SharedFileInfo,
  UploadOptions,
} from '../types';
import { DomainService, ServiceContext } from './base';

/** Header selecting upload compression. */
export const COMPRESSION_HEADER = 'fairOS-dfs-Compression';

const DirEntrySchema = z.object({
  name: z.string(),
  content_type: z.string(),
  creation_time: z.string(),
  modification_time: z.string(),
  access_time: z.string(),
});

const FileEntrySchema = DirEntrySchema.extend({
  size: z.string(),
  block_size: z.string(),
});

const ListResponseSchema = z.object({
  dirs: z.array(DirEntrySchema).nullish(),
  files: z.array(FileEntrySchema).nullish(),
});

const PresentResponseSchema = z.object({ present: z.boolean() });

const DirStatResponseSchema = z.object({
  pod_name: z.string(),
  dir_path: z.string(),
  dir_name: z.string(),
  creation_time: z.string(),
  modification_time: z.string(),
  access_time: z.string(),
  no_of_directories: z.string(),
  no_of_files: z.string(),
});

const UploadResponseSchema = z.object({
  Responses: z.array(z.object({ file_name: z.string() })),
});

const ShareResponseSchema = z.object({ file_sharing_reference: z.string() });

const FileStatResponseSchema = z.object({
  pod_name: z.string(),
  file_path: z.string(),
  file_name: z.string(),
  content_type: z.string(),
  file_size: z.string(),
  block_size: z.string(),
  compression: z.string(),
  creation_time: z.string(),
  modification_time: z.string(),
  access_time: z.string(),
  Blocks: z
    .array(
      z.object({
        name: z.string(),
        reference: z.string(),
        size: z.string(),
        compressed_size: z.string(),
      })
    )
    .nullish(),
});

const ReceiveResponseSchema = z.object({ file_name: z.string() });

const ReceiveInfoResponseSchema = z.object({
  pod_name: z.string(),
  name: z.string(),
  content_type: z.string(),
  size: z.string(),
  block_size: z.string(),
  number_of_blocks: z.string(),
  compression: z.string(),
  source_address: z.string(),
  dest_address: z.string(),
  shared_time: z.string(),
});

/** A file to upload; `name` is always `files` on the wire. */
export type UploadFile = Omit<StreamPart, 'name'>;

/**
 * File system service interface.
 */
export interface FileSystemService {
  mkdir(username: string, pod: string, path: string): Promise<void>;
  rmdir(username: string, pod: string, path: string): Promise<void>;
  ls(username: string, pod: string, path: string): Promise<DirListing>;
  dirExists(username: string, pod: string, path: string): Promise<boolean>;
  dirInfo(username: string, pod: string, path: string): Promise<DirInfo>;

  /**
   * Uploads files into a directory. Resolves the stored names in submission
   * order.
   */
  upload(
    username: string,
    pod: string,
    dir: string,
    files: ReadonlyArray<UploadFile>,
    options: UploadOptions
  ): Promise<string[]>;

  uploadBuffer(
    username: string,
    pod: string,
    dir: string,
    fileName: string,
    data: Buffer | Uint8Array | string,
    options: UploadOptions & { contentType?: string }
  ): Promise<string>;

  uploadFile(
    username: string,
    pod: string,
    dir: string,
    localPath: string,
    options: UploadOptions
  ): Promise<string>;

  downloadBuffer(username: string, pod: string, path: string, signal?: AbortSignal): Promise<Buffer>;

  downloadFile(username: string, pod: string, path: string, localPath: string): Promise<void>;

  /**
   * Shares a file with another user. Resolves the sharing reference.
   */
  shareFile(username: string, pod: string, path: string, receiver: string): Promise<string>;

  rm(username: string, pod: string, path: string): Promise<void>;
  fileInfo(username: string, pod: string, path: string): Promise<FileInfo>;

  /**
   * Stores a shared file in a directory. Resolves the new file name.
   */
  receiveSharedFile(username: string, pod: string, reference: string, dir: string): Promise<string>;

  sharedFileInfo(username: string, pod: string, reference: string): Promise<SharedFileInfo>;
}

/**
 * Default file system service implementation.
 */
export class DefaultFileSystemService extends DomainService implements FileSystemService {
  constructor(context: ServiceContext) {
    super('filesystem', context);
  }

  async mkdir(username: string, pod: string, path: string): Promise<void> {
    const token = this.tokenFor(username);
    await this.call(() =>
      this.executor.post('/dir/mkdir', { pod_name: pod, dir_path: path }, MessageResponseSchema, {
        token,
      })
    );
  }

  async rmdir(username: string, pod: string, path: string): Promise<void> {
    const token = this.tokenFor(username);
    await this.call(() =>
      this.executor.delete('/dir/rmdir', { pod_name: pod, dir_path: path }, MessageResponseSchema, {
        token,
      })
    );
  }

  async ls(username: string, pod: string, path: string): Promise<DirListing> {
    const token = this.tokenFor(username);
    const res = await this.call(() =>
      this.executor.get('/dir/ls', [['pod_name', pod], ['dir_path', path]], ListResponseSchema, {
        token,
      })
    );
    return {
      dirs: (res.dirs ?? []).map((entry) => ({
        name: entry.name,
        contentType: entry.content_type,
        creationTime: parseUnsigned(entry.creation_time, 'creation_time'),
        modificationTime: parseUnsigned(entry.modification_time, 'modification_time'),
        accessTime: parseUnsigned(entry.access_time, 'access_time'),
      })),
      files: (res.files ?? []).map((entry) => ({
        name: entry.name,
        contentType: entry.content_type,
        size: parseUnsigned(entry.size, 'size'),
        blockSize: parseBlockSize(entry.block_size),
        creationTime: parseUnsigned(entry.creation_time, 'creation_time'),
        modificationTime: parseUnsigned(entry.modification_time, 'modification_time'),
        accessTime: parseUnsigned(entry.access_time, 'access_time'),
      })),
    };
  }

  async dirExists(username: string, pod: string, path: string): Promise<boolean> {
    const token = this.tokenFor(username);
    const res = await this.call(() =>
      this.executor.get(
        '/dir/present',
        [['pod_name', pod], ['dir_path', path]],
        PresentResponseSchema,
        { token }
      )
    );
    return res.present;
  }

  async dirInfo(username: string, pod: string, path: string): Promise<DirInfo> {
    const token = this.tokenFor(username);
    const res = await this.call(() =>
      this.executor.get(
        '/dir/stat',
        [['pod_name', pod], ['dir_path', path]],
        DirStatResponseSchema,
        { token }
      )
    );
    return {
      pod: res.pod_name,
      path: res.dir_path,
      name: res.dir_name,
      creationTime: parseUnsigned(res.creation_time, 'creation_time'),
      modificationTime: parseUnsigned(res.modification_time, 'modification_time'),
      accessTime: parseUnsigned(res.access_time, 'access_time'),
      noOfDirs: parseUnsigned(res.no_of_directories, 'no_of_directories'),
      noOfFiles: parseUnsigned(res.no_of_files, 'no_of_files'),
    };
  }

  async upload(
    username: string,
    pod: string,
    dir: string,
    files: ReadonlyArray<UploadFile>,
    options: UploadOptions
  ): Promise<string[]> {
    if (files.length === 0) {
      throw FairOSError.validation('At least one file is required', 'files');
    }
    const token = this.tokenFor(username);
    const multipart = await encodeMultipart(
      [
        ['pod_name', pod],
        ['dir_path', dir],
        ['block_size', options.blockSize.toString()],
      ],
      files.map((file) => ({ ...file, name: 'files' }))
    );
    const headers: Record<string, string> =
      options.compression !== undefined ? { [COMPRESSION_HEADER]: options.compression } : {};

    const res = await this.call(() =>
      this.executor.postMultipart('/file/upload', multipart, UploadResponseSchema, {
        token,
        headers,
        signal: options.signal,
      })
    );
    this.logger.debug('Files uploaded', { pod, dir, count: res.Responses.length });
    return res.Responses.map((entry) => entry.file_name);
  }

  async uploadBuffer(
    username: string,
    pod: string,
    dir: string,
    fileName: string,
    data: Buffer | Uint8Array | string,
    options: UploadOptions & { contentType?: string }
  ): Promise<string> {
    const names = await this.upload(
      username,
      pod,
      dir,
      [{ source: { kind: 'buffer', data }, fileName, contentType: options.contentType }],
      options
    );
    return firstName(names);
  }

  async uploadFile(
    username: string,
    pod: string,
    dir: string,
    localPath: string,
    options: UploadOptions
  ): Promise<string> {
    const names = await this.upload(
      username,
      pod,
      dir,
      [{ source: { kind: 'path', path: localPath } }],
      options
    );
    return firstName(names);
  }

  async downloadBuffer(
    username: string,
    pod: string,
    path: string,
    signal?: AbortSignal
  ): Promise<Buffer> {
    const token = this.tokenFor(username);
    const multipart = await encodeMultipart([
      ['pod_name', pod],
      ['file_path', path],
    ]);
    return this.call(() => this.executor.download('/file/download', multipart, { token, signal }));
  }

  async downloadFile(username: string, pod: string, path: string, localPath: string): Promise<void> {
    const data = await this.downloadBuffer(username, pod, path);
    await writeFile(localPath, data);
  }

  async shareFile(username: string, pod: string, path: string, receiver: string): Promise<string> {
    const token = this.tokenFor(username);
    const { data } = await this.call(() =>
      this.executor.post(
        '/file/share',
        { pod_name: pod, file_path: path, dest_user: receiver },
        ShareResponseSchema,
        { token }
      )
    );
    return data.file_sharing_reference;
  }

  async rm(username: string, pod: string, path: string): Promise<void> {
    const token = this.tokenFor(username);
    await this.call(() =>
      this.executor.delete('/file/delete', { pod_name: pod, file_path: path }, MessageResponseSchema, {
        token,
      })
    );
  }

  async fileInfo(username: string, pod: string, path: string): Promise<FileInfo> {
    const token = this.tokenFor(username);
    const res = await this.call(() =>
      this.executor.get(
        '/file/stat',
        [['pod_name', pod], ['file_path', path]],
        FileStatResponseSchema,
        { token }
      )
    );
    return {
      pod: res.pod_name,
      path: res.file_path,
      name: res.file_name,
      contentType: res.content_type === '' ? undefined : res.content_type,
      size: parseUnsigned(res.file_size, 'file_size'),
      blockSize: parseBlockSize(res.block_size),
      compression: parseCompression(res.compression),
      creationTime: parseUnsigned(res.creation_time, 'creation_time'),
      modificationTime: parseUnsigned(res.modification_time, 'modification_time'),
      accessTime: parseUnsigned(res.access_time, 'access_time'),
      blocks: (res.Blocks ?? []).map((block) => ({
        name: block.name,
        reference: block.reference,
        size: parseUnsigned(block.size, 'size'),
        compressedSize: parseUnsigned(block.compressed_size, 'compressed_size'),
      })),
    };
  }

  async receiveSharedFile(
    username: string,
    pod: string,
    reference: string,
    dir: string
  ): Promise<string> {
    const token = this.tokenFor(username);
    const res = await this.call(() =>
      this.executor.get(
        '/file/receive',
        [['pod_name', pod], ['sharing_ref', reference], ['dir_path', dir]],
        ReceiveResponseSchema,
        { token }
      )
    );
    return res.file_name;
  }

  async sharedFileInfo(username: string, pod: string, reference: string): Promise<SharedFileInfo> {
    const token = this.tokenFor(username);
    const res = await this.call(() =>
      this.executor.get(
        '/file/receiveinfo',
        [['pod_name', pod], ['sharing_ref', reference]],
        ReceiveInfoResponseSchema,
        { token }
      )
    );
    return {
      pod: res.pod_name,
      name: res.name,
      contentType: res.content_type === '' ? undefined : res.content_type,
      size: parseUnsigned(res.size, 'size'),
      blockSize: parseBlockSize(res.block_size),
      noOfBlocks: parseUnsigned(res.number_of_blocks, 'number_of_blocks'),
      compression: parseCompression(res.compression),
      sender: res.source_address,
      receiver: res.dest_address,
      sharedTime: parseUnsigned(res.shared_time, 'shared_time'),
    };
  }
}

/**
 * Parses a decimal string field; anything but digits is a decode failure.
 */
export function parseUnsigned(value: string, field: string): number {
  if (!/^\d+$/.test(value)) {
    throw FairOSError.decode(`Field ${field} is not an unsigned integer: "${value}"`);
  }
  const parsed = Number(value);
  if (!Number.isSafeInteger(parsed)) {
    throw FairOSError.decode(`Field ${field} is out of range: "${value}"`);
  }
  return parsed;
}

function parseBlockSize(value: string): BlockSize {
  return BlockSize.fromBytes(BigInt(parseUnsigned(value, 'block_size')));
}

function parseCompression(value: string): Compression | undefined {
  switch (value) {
    case '':
      return undefined;
    case 'gzip':
    case 'snappy':
      return value;
    default:
      throw FairOSError.decode(`Unknown compression: "${value}"`);
  }
}

function firstName(names: string[]): string {
  const [first] = names;
  if (first === undefined) {
    throw FairOSError.decode('Upload response listed no files');
  }
  return first;
}

/**
 * Creates a file system service.
 */
export function createFileSystemService(context: ServiceContext): FileSystemService {
  return new DefaultFileSystemService(context);
}
