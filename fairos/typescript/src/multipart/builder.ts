/**
 * Multipart/form-data encoding.
 */

import FormData from 'form-data';
import type { EncodedMultipart } from '../transport';
import {
  ByteSource,
  DEFAULT_CONTENT_TYPE,
  guessContentType,
  readSource,
  sourceFileName,
} from './sources';

/** A named file part. */
export interface StreamPart {
  name: string;
  source: ByteSource;
  fileName?: string;
  contentType?: string;
}

type Part = { kind: 'text'; name: string; value: string } | ({ kind: 'file' } & StreamPart);

export interface EncodeOptions {
  /** Fixed boundary. A random one is generated when omitted. */
  boundary?: string;
}

/**
 * Collects parts in call order and encodes them into one body.
 *
 * @example
 * ```typescript
 * const { boundary, body } = await new MultipartBuilder()
 *   .addText('pod_name', 'photos')
 *   .addFile('files', '/tmp/cat.png')
 *   .encode();
 * ```
 */
export class MultipartBuilder {
  private readonly parts: Part[] = [];

  addText(name: string, value: string): this {
    this.parts.push({ kind: 'text', name, value });
    return this;
  }

  addStream(
    name: string,
    stream: AsyncIterable<Buffer | Uint8Array | string>,
    fileName?: string,
    contentType?: string
  ): this {
    return this.addPart({ name, source: { kind: 'stream', stream }, fileName, contentType });
  }

  addBuffer(
    name: string,
    data: Buffer | Uint8Array | string,
    fileName?: string,
    contentType?: string
  ): this {
    return this.addPart({ name, source: { kind: 'buffer', data }, fileName, contentType });
  }

  addFile(name: string, filePath: string, contentType?: string): this {
    return this.addPart({ name, source: { kind: 'path', path: filePath }, contentType });
  }

  addPart(part: StreamPart): this {
    this.parts.push({ kind: 'file', ...part });
    return this;
  }

  async encode(options: EncodeOptions = {}): Promise<EncodedMultipart> {
    const form = new FormData();
    if (options.boundary !== undefined) {
      form.setBoundary(options.boundary);
    }

    for (const part of this.parts) {
      if (part.kind === 'text') {
        form.append(part.name, part.value);
        continue;
      }
      const data = await readSource(part.source);
      const fileName = part.fileName ?? sourceFileName(part.source);
      const contentType =
        part.contentType ?? (fileName !== undefined ? guessContentType(fileName) : DEFAULT_CONTENT_TYPE);
      form.append(part.name, data, { filename: fileName, contentType });
    }

    return { boundary: form.getBoundary(), body: form.getBuffer() };
  }
}

/**
 * Encodes text fields followed by file parts.
 */
export async function encodeMultipart(
  fields: ReadonlyArray<readonly [string, string]>,
  streams: ReadonlyArray<StreamPart> = [],
  options: EncodeOptions = {}
): Promise<EncodedMultipart> {
  const builder = new MultipartBuilder();
  for (const [name, value] of fields) {
    builder.addText(name, value);
  }
  for (const part of streams) {
    builder.addPart(part);
  }
  return builder.encode(options);
}
