/**
 * HTTP transport layer for the FairOS-dfs client.
 */

export type {
  HttpMethod,
  HttpRequest,
  HttpResponse,
  HttpTransport,
  QueryParams,
  EncodedMultipart,
  RequestBody,
  ApiRequest,
  RequestOutcome,
  CallOptions,
} from './types';
export { isSuccessStatus } from './types';

export { formatSessionCookie, extractSessionToken } from './cookies';

export type { AxiosTransportOptions } from './axios-transport';
export { AxiosTransport, createTransport } from './axios-transport';

export type { MessageResponse, ResponseSchema } from './executor';
export {
  RequestExecutor,
  MessageResponseSchema,
  buildQueryString,
  decodeJson,
  unwrap,
} from './executor';
