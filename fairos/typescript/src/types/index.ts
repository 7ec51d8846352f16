/**
 * Type exports.
 */

export type { BlockSizeUnit } from './block-size';
export { BlockSize } from './block-size';
export type { SignupResult, UserExport, UserInfo } from './user';
export type { PodList, PodInfo, SharedPodInfo } from './pod';
export type {
  Compression,
  DirEntry,
  FileEntry,
  DirListing,
  DirInfo,
  FileBlock,
  FileInfo,
  SharedFileInfo,
  UploadOptions,
} from './filesystem';
export type { IndexType, KeyValueStore, SeekOptions, SizeHint } from './kv';
export type { FieldType, FieldDefinition, DocumentDatabase } from './document';
