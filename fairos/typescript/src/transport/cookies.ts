/**
 * Session cookie helpers.
 */

/**
 * Formats the request `Cookie` header value.
 */
export function formatSessionCookie(cookieName: string, token: string): string {
  return `${cookieName}=${token}`;
}

/**
 * Finds the session token in `Set-Cookie` header values.
 *
 * Only the leading `name=value` pair of each value is considered; attributes
 * such as `Path` or `Expires` are ignored.
 */
export function extractSessionToken(
  setCookie: string | string[] | undefined,
  cookieName: string
): string | undefined {
  if (setCookie === undefined) {
    return undefined;
  }

  const values = Array.isArray(setCookie) ? setCookie : [setCookie];
  for (const value of values) {
    const pair = value.split(';', 1)[0] ?? '';
    const separator = pair.indexOf('=');
    if (separator === -1) {
      continue;
    }
    if (pair.slice(0, separator).trim() === cookieName) {
      return pair.slice(separator + 1).trim();
    }
  }
  return undefined;
}
