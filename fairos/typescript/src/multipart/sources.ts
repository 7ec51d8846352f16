/**
 * Byte sources for multipart file parts.
 */

import { readFile } from 'fs/promises';
import path from 'path';
import { FairOSError } from '../errors';

/** Where the bytes of a file part come from. */
export type ByteSource =
  | { kind: 'buffer'; data: Buffer | Uint8Array | string }
  | { kind: 'stream'; stream: AsyncIterable<Buffer | Uint8Array | string> }
  | { kind: 'path'; path: string };

export const DEFAULT_CONTENT_TYPE = 'application/octet-stream';

const CONTENT_TYPES: Record<string, string> = {
  '.txt': 'text/plain',
  '.csv': 'text/csv',
  '.json': 'application/json',
  '.html': 'text/html',
  '.xml': 'application/xml',
  '.pdf': 'application/pdf',
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.gif': 'image/gif',
  '.zip': 'application/zip',
  '.gz': 'application/gzip',
};

/**
 * Guesses a content type from a file name's extension.
 */
export function guessContentType(fileName: string): string {
  return CONTENT_TYPES[path.extname(fileName).toLowerCase()] ?? DEFAULT_CONTENT_TYPE;
}

/**
 * Reads a source fully into memory.
 */
export async function readSource(source: ByteSource): Promise<Buffer> {
  switch (source.kind) {
    case 'buffer':
      return typeof source.data === 'string'
        ? Buffer.from(source.data, 'utf-8')
        : Buffer.from(source.data);
    case 'stream': {
      const chunks: Buffer[] = [];
      for await (const chunk of source.stream) {
        chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : Buffer.from(chunk));
      }
      return Buffer.concat(chunks);
    }
    case 'path':
      try {
        return await readFile(source.path);
      } catch (error) {
        throw FairOSError.validation(
          `Could not read ${source.path}: ${error instanceof Error ? error.message : String(error)}`,
          'path'
        );
      }
  }
}

/** File name a source carries by itself, if any. */
export function sourceFileName(source: ByteSource): string | undefined {
  return source.kind === 'path' ? path.basename(source.path) : undefined;
}
