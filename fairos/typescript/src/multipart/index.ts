/**
 * Multipart codec for uploads and downloads.
 */

export type { ByteSource } from './sources';
export { guessContentType, readSource, DEFAULT_CONTENT_TYPE } from './sources';
export type { StreamPart, EncodeOptions } from './builder';
export { MultipartBuilder, encodeMultipart } from './builder';
