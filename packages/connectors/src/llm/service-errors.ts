import type { ServiceErrorInfo, ServiceErrorKind } from '@docstruct/connector-sdk';

/**
 * Map an HTTP status to an error kind.
 */
export function kindFromStatus(status: number): ServiceErrorKind {
  if (status === 429) return 'rate_limit';
  if (status === 401 || status === 403) return 'auth';
  if (status === 404) return 'not_found';
  if (status === 408) return 'timeout';
  if (status >= 500) return 'server';
  if (status >= 400) return 'invalid_request';
  return 'unknown';
}

function readStatus(error: object): number | undefined {
  if ('status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

function matches(error: Error, ...needles: string[]): boolean {
  const haystack = `${error.name} ${error.message}`.toLowerCase();
  return needles.some((needle) => haystack.includes(needle));
}

/**
 * Classify anything an SDK call threw.
 *
 * Both provider SDKs attach the HTTP status to their API errors; transport
 * failures are recognised by name or message.
 */
export function classifyServiceError(error: unknown): ServiceErrorInfo {
  if (!(error instanceof Error)) {
    return { kind: 'unknown', message: typeof error === 'string' ? error : 'Unknown service error' };
  }

  const status = readStatus(error);
  if (status !== undefined) {
    return { kind: kindFromStatus(status), message: error.message, status };
  }

  if (matches(error, 'timeout', 'timed out', 'aborterror', 'aborted')) {
    return { kind: 'timeout', message: error.message };
  }
  if (matches(error, 'fetch failed', 'econnreset', 'econnrefused', 'enotfound', 'connection error', 'network')) {
    return { kind: 'network', message: error.message };
  }
  if (matches(error, 'blocked', 'safety')) {
    return { kind: 'blocked', message: error.message };
  }
  if (matches(error, 'quota', 'rate limit', 'resource_exhausted')) {
    return { kind: 'rate_limit', message: error.message };
  }

  return { kind: 'unknown', message: error.message };
}
