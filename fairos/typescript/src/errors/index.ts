/**
 * Error types for the FairOS-dfs client.
 */

export {
  FairOSError,
  FairOSErrorCode,
  isFairOSError,
  isRetryableError,
} from './error';
export type { ErrorDomain, DomainErrorKind, FairOSErrorDetails } from './error';
export { mapRemoteError, REMOTE_MESSAGE_TABLE } from './mapping';
