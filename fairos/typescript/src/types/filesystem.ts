/**
 * File system types. Timestamps are Unix seconds.
 */

import type { BlockSize } from './block-size';

export type Compression = 'gzip' | 'snappy';

export interface DirEntry {
  name: string;
  contentType: string;
  creationTime: number;
  modificationTime: number;
  accessTime: number;
}

export interface FileEntry {
  name: string;
  contentType: string;
  size: number;
  blockSize: BlockSize;
  creationTime: number;
  modificationTime: number;
  accessTime: number;
}

export interface DirListing {
  dirs: DirEntry[];
  files: FileEntry[];
}

export interface DirInfo {
  pod: string;
  path: string;
  name: string;
  creationTime: number;
  modificationTime: number;
  accessTime: number;
  noOfDirs: number;
  noOfFiles: number;
}

export interface FileBlock {
  name: string;
  reference: string;
  size: number;
  compressedSize: number;
}

export interface FileInfo {
  pod: string;
  path: string;
  name: string;
  contentType?: string;
  size: number;
  blockSize: BlockSize;
  compression?: Compression;
  creationTime: number;
  modificationTime: number;
  accessTime: number;
  blocks: FileBlock[];
}

export interface SharedFileInfo {
  pod: string;
  name: string;
  contentType?: string;
  size: number;
  blockSize: BlockSize;
  noOfBlocks: number;
  compression?: Compression;
  /** Address of the sharing user. */
  sender: string;
  /** Address of the receiving user. */
  receiver: string;
  sharedTime: number;
}

/**
 * Options for file uploads.
 */
export interface UploadOptions {
  blockSize: BlockSize;
  compression?: Compression;
  signal?: AbortSignal;
}
