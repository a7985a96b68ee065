/**
 * Helpers for errors raised by the Kubernetes client.
 */

function numericField(error: object, key: string): number | undefined {
  const value: unknown = Reflect.get(error, key);
  return typeof value === 'number' ? value : undefined;
}

/**
 * True when the API server answered 404 Not Found.
 *
 * The client reports the HTTP status as `code` on its ApiException; older
 * transports used `statusCode`.
 */
export function isNotFound(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) {
    return false;
  }
  return numericField(error, 'code') === 404 || numericField(error, 'statusCode') === 404;
}
