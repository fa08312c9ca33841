// Shared API utilities for the Gmail client and the sync pipeline.
// Retry logic for transient errors (rate limits, 5xx, network drops, timeouts)
// and the tagged error types every layer returns.
//
// Error handling follows the errore pattern (errors as values):
// - Clients and the reconciler return tagged errors instead of throwing
// - Callers narrow with instanceof, no try/catch or string matching needed
// - See https://errore.org/ for the philosophy

import * as errore from 'errore'

// ---------------------------------------------------------------------------
// Remote errors
// ---------------------------------------------------------------------------

/** Returned when authentication fails (expired token, revoked access, missing token). */
export class AuthError extends errore.createTaggedError({
  name: 'AuthError',
  message: 'Authentication failed: $reason',
}) {}

/** Returned when a transient failure outlived every retry attempt. */
export class TransientRemoteError extends errore.createTaggedError({
  name: 'TransientRemoteError',
  message: 'Gave up on $resource after retries: $reason',
}) {}

/** Returned when a requested resource doesn't exist (message, label). */
export class NotFoundError extends errore.createTaggedError({
  name: 'NotFoundError',
  message: '$resource not found',
}) {}

/** Returned when a non-auth, non-transient API call fails. */
export class ApiError extends errore.createTaggedError({
  name: 'ApiError',
  message: 'API call failed: $reason',
}) {}

/** Everything the Gmail client can hand back instead of data. */
export type RemoteError = AuthError | TransientRemoteError | NotFoundError | ApiError

// ---------------------------------------------------------------------------
// Local errors
// ---------------------------------------------------------------------------

/** Returned by the mapper when a Gmail response lacks required fields. Skips one message. */
export class MalformedMessageError extends errore.createTaggedError({
  name: 'MalformedMessageError',
  message: 'Malformed message $id: $reason',
}) {}

/** Returned when the local database rejects a read or write. */
export class StorePersistError extends errore.createTaggedError({
  name: 'StorePersistError',
  message: 'Could not persist $what: $reason',
}) {}

/** Returned when data cannot be parsed (credentials file, token file). */
export class ParseError extends errore.createTaggedError({
  name: 'ParseError',
  message: 'Failed to parse $what: $reason',
}) {}

/** Returned when required data is missing (credentials file, stored token). */
export class MissingDataError extends errore.createTaggedError({
  name: 'MissingDataError',
  message: 'Missing $what for $resource',
}) {}

/** Returned when user input or configuration fails validation. */
export class ValidationError extends errore.createTaggedError({
  name: 'ValidationError',
  message: 'Invalid $field: $reason',
}) {}

// ---------------------------------------------------------------------------
// Retry
// ---------------------------------------------------------------------------

/** Retry transient errors with exponential backoff.
 *  Anything isTransientError rejects is rethrown immediately; the last transient
 *  error is rethrown once maxAttempts is reached. */
export async function withRetry<T>(fn: () => Promise<T>, maxAttempts = 5, delayMs = 1000): Promise<T> {
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn()
    } catch (err) {
      if (!isTransientError(err) || attempt === maxAttempts) throw err
      const wait = delayMs * Math.pow(2, attempt - 1)
      await new Promise((r) => setTimeout(r, wait))
    }
  }
  throw new Error('unreachable')
}

// ---------------------------------------------------------------------------
// Error classification
// ---------------------------------------------------------------------------
// googleapis rejects with GaxiosError, whose status can sit on `code`, `status`
// or `response.status` depending on where the request failed. These helpers are
// the boundary that turns those untyped exceptions into decisions.

function field(value: unknown, key: string): unknown {
  if (typeof value !== 'object' || value === null) return undefined
  return Reflect.get(value, key)
}

/** HTTP status of a library error, if it carries one. */
export function errorStatus(err: unknown): number | undefined {
  const candidates = [field(err, 'code'), field(err, 'status'), field(field(err, 'response'), 'status')]
  for (const candidate of candidates) {
    if (typeof candidate === 'number') return candidate
    if (typeof candidate === 'string' && /^\d{3}$/.test(candidate)) return Number(candidate)
  }
  return undefined
}

function errorReasons(err: unknown): string[] {
  const direct = field(err, 'errors')
  const nested = field(field(field(field(err, 'response'), 'data'), 'error'), 'errors')
  const list = Array.isArray(direct) ? direct : Array.isArray(nested) ? nested : []
  return list.map((e) => field(e, 'reason')).filter((r): r is string => typeof r === 'string')
}

const QUOTA_REASONS = new Set([
  'userRateLimitExceeded',
  'rateLimitExceeded',
  'quotaExceeded',
  'dailyLimitExceeded',
  'limitExceeded',
  'backendError',
])

const NETWORK_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'ESOCKETTIMEDOUT',
  'EAI_AGAIN',
  'ENOTFOUND',
  'EPIPE',
])

export function isRateLimitError(err: unknown): boolean {
  const status = errorStatus(err)
  if (status === 429) return true
  if (status === 403) return errorReasons(err).some((reason) => QUOTA_REASONS.has(reason))
  return false
}

/** Worth retrying: rate limits, request timeouts, server errors and dropped connections. */
export function isTransientError(err: unknown): boolean {
  if (isRateLimitError(err)) return true

  const status = errorStatus(err)
  if (status === 408) return true
  if (status !== undefined && status >= 500 && status <= 599) return true

  const code = field(err, 'code') ?? field(err, 'errno')
  if (typeof code === 'string' && NETWORK_CODES.has(code)) return true
  if (field(err, 'name') === 'AbortError') return true

  const msg = String(err).toLowerCase()
  return msg.includes('timed out') || msg.includes('timeout') || msg.includes('socket hang up')
}

/** Detect auth-like errors from googleapis / google-auth-library.
 *  String matching is the fallback for token refresh failures, which carry no status. */
export function isAuthLikeError(err: unknown): boolean {
  const status = errorStatus(err)
  if (status === 401) return true
  if (status === 403 && !isRateLimitError(err)) return true
  const msg = String(err)
  return msg.includes('Invalid Credentials') || msg.includes('Unauthorized') || msg.includes('invalid_grant')
}
