/**
 * Service exports.
 */

export type { ServiceContext } from './base';
export { DomainService } from './base';

export type { UserService } from './user';
export { DefaultUserService, createUserService } from './user';

export type { PodService } from './pod';
export { DefaultPodService, createPodService } from './pod';

export type { FileSystemService, UploadFile } from './filesystem';
export {
  DefaultFileSystemService,
  createFileSystemService,
  parseUnsigned,
  COMPRESSION_HEADER,
} from './filesystem';

export type { KeyValueService } from './kv';
export { DefaultKeyValueService, createKeyValueService } from './kv';
export type { KeyValueSeekParams } from './kv-seek';
export { KeyValueSeek, SEEK_END_MESSAGE } from './kv-seek';

export type { DocumentService, Document } from './document';
export { DefaultDocumentService, createDocumentService } from './document';
