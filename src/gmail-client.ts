// Gmail API client for the sync pipeline.
// Wraps the @googleapis/gmail SDK with the four calls a sync needs: paginated
// message-id listing, full and minimal message fetches, and the label map.
// Every request carries a timeout, is retried on transient failures (withRetry),
// and passes through gmailBoundary, which turns library exceptions into typed
// error values. Responses are returned raw (gmail_v1.Schema$Message); parsing
// happens in message-mapper.ts.

import { gmail as gmailApi, type gmail_v1 } from '@googleapis/gmail'
import type { OAuth2Client } from 'google-auth-library'
import * as errore from 'errore'
import {
  withRetry,
  errorStatus,
  isAuthLikeError,
  isTransientError,
  AuthError,
  ApiError,
  NotFoundError,
  TransientRemoteError,
  type RemoteError,
} from './api-utils.js'
import type { LabelNames } from './message-mapper.js'
import { EPOCH, type Checkpoint, type RemoteMailbox } from './sync.js'

// ---------------------------------------------------------------------------
// Boundary
// ---------------------------------------------------------------------------

function classifyRemoteError(resource: string, err: unknown): RemoteError {
  if (isAuthLikeError(err)) return new AuthError({ reason: String(err), cause: err })
  if (isTransientError(err)) return new TransientRemoteError({ resource, reason: String(err), cause: err })
  if (errorStatus(err) === 404) return new NotFoundError({ resource })
  return new ApiError({ reason: String(err), cause: err })
}

/** Wrap a googleapis SDK call so failures come back as RemoteError values.
 *  The original error is preserved as `cause` for debugging. */
function gmailBoundary<T>(resource: string, fn: () => Promise<T>) {
  return errore.tryAsync({
    try: fn,
    catch: (err) => classifyRemoteError(resource, err),
  })
}

/**
 * Gmail search query for an incremental listing.
 * `after:` takes epoch seconds; one second of overlap keeps messages that share
 * the checkpoint's second in the window. Re-listed ones only get a metadata refresh.
 */
export function buildListQuery(since: Checkpoint): string | undefined {
  if (since <= EPOCH) return undefined
  return `after:${Math.max(0, Math.floor(since / 1000) - 1)}`
}

// ---------------------------------------------------------------------------
// GmailClient
// ---------------------------------------------------------------------------

export interface GmailClientOptions {
  auth: OAuth2Client
  /** Per-request timeout handed to gaxios. */
  timeoutMs?: number
  maxAttempts?: number
  retryDelayMs?: number
  /** messages.list maxResults. */
  pageSize?: number
}

export class GmailClient implements RemoteMailbox {
  private gmail: gmail_v1.Gmail
  private timeoutMs: number
  private maxAttempts: number
  private retryDelayMs: number
  private pageSize: number
  private labelNameCache: LabelNames | null = null

  constructor({ auth, timeoutMs = 30_000, maxAttempts = 5, retryDelayMs = 1_000, pageSize = 500 }: GmailClientOptions) {
    this.gmail = gmailApi({ version: 'v1', auth })
    this.timeoutMs = timeoutMs
    this.maxAttempts = maxAttempts
    this.retryDelayMs = retryDelayMs
    this.pageSize = pageSize
  }

  private call<T>(resource: string, fn: (options: { timeout: number }) => Promise<T>) {
    return gmailBoundary(resource, () =>
      withRetry(() => fn({ timeout: this.timeoutMs }), this.maxAttempts, this.retryDelayMs),
    )
  }

  // =========================================================================
  // Listing
  // =========================================================================

  /**
   * Yield message ids page by page. On failure the error is yielded as the last item.
   */
  async *listChangedIds(since: Checkpoint): AsyncGenerator<string | RemoteError> {
    const q = buildListQuery(since)
    let pageToken: string | undefined

    while (true) {
      const res = await this.call('message list', (options) =>
        this.gmail.users.messages.list(
          {
            userId: 'me',
            q,
            maxResults: this.pageSize,
            pageToken,
          },
          options,
        ),
      )
      if (res instanceof Error) {
        yield res
        return
      }

      for (const message of res.data.messages ?? []) {
        if (message.id) yield message.id
      }

      pageToken = res.data.nextPageToken ?? undefined
      if (!pageToken) return
    }
  }

  // =========================================================================
  // Messages
  // =========================================================================

  async getMessage({
    messageId,
    format = 'full',
  }: {
    messageId: string
    format?: 'full' | 'minimal'
  }): Promise<gmail_v1.Schema$Message | RemoteError> {
    const res = await this.call(`message ${messageId}`, (options) =>
      this.gmail.users.messages.get({ userId: 'me', id: messageId, format }, options),
    )
    if (res instanceof Error) return res
    return res.data
  }

  fetch(id: string): Promise<gmail_v1.Schema$Message | RemoteError> {
    return this.getMessage({ messageId: id, format: 'full' })
  }

  fetchFlags(id: string): Promise<gmail_v1.Schema$Message | RemoteError> {
    return this.getMessage({ messageId: id, format: 'minimal' })
  }

  // =========================================================================
  // Labels
  // =========================================================================

  /** Label id -> name. Fetched once per client; a sync run uses one client. */
  async labelNames(): Promise<LabelNames | RemoteError> {
    if (this.labelNameCache) return this.labelNameCache

    const res = await this.call('label list', (options) =>
      this.gmail.users.labels.list({ userId: 'me' }, options),
    )
    if (res instanceof Error) return res

    const names: LabelNames = {}
    for (const label of res.data.labels ?? []) {
      if (label.id) names[label.id] = label.name ?? label.id
    }
    this.labelNameCache = names
    return names
  }

  // =========================================================================
  // Account / profile
  // =========================================================================

  async getProfile(): Promise<{ emailAddress: string; messagesTotal: number; historyId: string } | RemoteError> {
    const res = await this.call('profile', (options) =>
      this.gmail.users.getProfile({ userId: 'me' }, options),
    )
    if (res instanceof Error) return res

    return {
      emailAddress: res.data.emailAddress ?? '',
      messagesTotal: res.data.messagesTotal ?? 0,
      historyId: res.data.historyId ?? '',
    }
  }
}
