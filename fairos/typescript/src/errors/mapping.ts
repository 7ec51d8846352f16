/**
 * Maps remote rejections onto per-domain errors.
 *
 * The server reports failures only as English sentences, so known messages are
 * matched verbatim. Any rewording on the server side silently turns a specific
 * kind into the domain's generic `error`.
 */

import { FairOSError, FairOSErrorCode } from './error';
import type { DomainErrorKind, ErrorDomain } from './error';

/**
 * Known remote messages per domain.
 */
export const REMOTE_MESSAGE_TABLE: Readonly<
  Record<ErrorDomain, Readonly<Record<string, DomainErrorKind>>>
> = {
  user: {
    'user signup: user name already present': 'username_already_exists',
    'user login: invalid user name': 'invalid_username',
    'user login: invalid password': 'invalid_password',
  },
  pod: {},
  filesystem: {},
  kv: {},
  document: {},
};

/**
 * Converts an error raised by the transport core into a domain error.
 *
 * Remote rejections become `Domain` errors of the given domain; everything else
 * (unreachable, aborted, decode failures, caller mistakes) passes through.
 */
export function mapRemoteError(domain: ErrorDomain, error: unknown): unknown {
  if (!(error instanceof FairOSError) || error.code !== FairOSErrorCode.RemoteRejected) {
    return error;
  }

  const remoteMessage = error.details.remoteMessage ?? error.message;
  const kind = REMOTE_MESSAGE_TABLE[domain][remoteMessage] ?? 'error';

  return FairOSError.domain(domain, kind, remoteMessage, {
    statusCode: error.details.statusCode,
    remoteMessage,
    remoteCode: error.details.remoteCode,
    cause: error,
  });
}
