// Sync reconciler: converges the local replica toward the remote mailbox.
//
// One run = read the checkpoint, walk the remote's changed-id listing once,
// insert messages that are missing locally and refresh labels/read state of those
// already present, then write the new checkpoint as the very last step.
//
// The checkpoint is a plain value threaded through the run: read once at the
// start, written once on success, never touched mid-run. Any fatal error returns
// a SyncAbortedError before that write, so the next run re-walks the same window
// (at-least-once). Rows upserted before the failure stay; upserts are idempotent.
//
// Existing rows only ever get a metadata-only refresh here, in both modes:
// subject, sender, body and the other content columns are written once at insert.
// `syncOne` is the escape hatch that overwrites a full row.

import type { gmail_v1 } from '@googleapis/gmail'
import * as errore from 'errore'
import { MalformedMessageError, NotFoundError, StorePersistError, type RemoteError } from './api-utils.js'
import { mapMessage, mapFlags, type LabelNames, type StoredMessage } from './message-mapper.js'
import { EPOCH, type Checkpoint } from './message-store.js'
import * as out from './output.js'

export { EPOCH, type Checkpoint }

// ---------------------------------------------------------------------------
// Collaborator contracts
// ---------------------------------------------------------------------------

export type SyncMode = 'full' | 'incremental'

/** The local side. MessageStore implements it; each call is individually durable. */
export interface LocalStore {
  get(id: string): StoredMessage | undefined
  upsert(message: StoredMessage): void
  getCheckpoint(): Checkpoint
  setCheckpoint(value: Checkpoint): void
}

/** The remote side. GmailClient implements it; transient errors are retried inside. */
export interface RemoteMailbox {
  /** Ids of messages changed since `since` (EPOCH = everything). Lazy; each call starts over. */
  listChangedIds(since: Checkpoint): AsyncIterable<string | RemoteError>
  /** Full message, headers and body included. */
  fetch(id: string): Promise<gmail_v1.Schema$Message | RemoteError>
  /** Labels and internalDate only. */
  fetchFlags(id: string): Promise<gmail_v1.Schema$Message | RemoteError>
  labelNames(): Promise<LabelNames | RemoteError>
}

// ---------------------------------------------------------------------------
// Results
// ---------------------------------------------------------------------------

export interface SkippedMessage {
  id: string
  reason: string
}

export interface SyncReport {
  mode: SyncMode
  /** Distinct ids the remote listed. */
  listed: number
  inserted: number
  updated: number
  skipped: SkippedMessage[]
  checkpoint: { before: Checkpoint; after: Checkpoint }
}

/** Returned when a run stops early. `cause` is the RemoteError or StorePersistError that stopped it. */
export class SyncAbortedError extends errore.createTaggedError({
  name: 'SyncAbortedError',
  message: 'Sync aborted after $persisted persisted message(s), checkpoint left unchanged: $reason',
}) {}

// ---------------------------------------------------------------------------
// Store boundary
// ---------------------------------------------------------------------------

/** better-sqlite3 throws; the reconciler deals in values. */
function persist<T>(what: string, fn: () => T) {
  return errore.tryAsync({
    try: async () => fn(),
    catch: (err) => new StorePersistError({ what, reason: String(err), cause: err }),
  })
}

// ---------------------------------------------------------------------------
// sync
// ---------------------------------------------------------------------------

export async function sync({
  mode,
  store,
  remote,
  now = () => new Date(),
}: {
  mode: SyncMode
  store: LocalStore
  remote: RemoteMailbox
  now?: () => Date
}): Promise<SyncReport | SyncAbortedError> {
  let persisted = 0
  const abort = (cause: RemoteError | StorePersistError) =>
    new SyncAbortedError({ persisted: String(persisted), reason: cause.message, cause })

  const before = await persist('checkpoint read', () => store.getCheckpoint())
  if (before instanceof Error) return abort(before)

  const labelNames = await remote.labelNames()
  if (labelNames instanceof Error) return abort(labelNames)

  const boundary = mode === 'incremental' ? before : EPOCH
  out.hint(
    boundary === EPOCH
      ? `${mode} sync: listing the whole mailbox`
      : `${mode} sync: listing messages received since ${new Date(boundary).toISOString()}`,
  )

  const report: SyncReport = {
    mode,
    listed: 0,
    inserted: 0,
    updated: 0,
    skipped: [],
    checkpoint: { before, after: before },
  }
  let highWater = before
  const seen = new Set<string>()

  for await (const candidate of remote.listChangedIds(boundary)) {
    if (candidate instanceof Error) return abort(candidate)
    if (seen.has(candidate)) continue
    seen.add(candidate)
    report.listed++

    const existing = await persist(`lookup of ${candidate}`, () => store.get(candidate))
    if (existing instanceof Error) return abort(existing)

    if (!existing) {
      const raw = await remote.fetch(candidate)
      if (raw instanceof NotFoundError) {
        skip(report, candidate, raw)
        continue
      }
      if (raw instanceof Error) return abort(raw)

      const message = mapMessage(raw, labelNames)
      if (message instanceof MalformedMessageError) {
        skip(report, candidate, message)
        continue
      }

      const written = await persist(`message ${candidate}`, () => store.upsert({ ...message, lastIndexed: now() }))
      if (written instanceof Error) return abort(written)

      persisted++
      report.inserted++
      highWater = Math.max(highWater, message.timestamp.getTime())
    } else {
      const raw = await remote.fetchFlags(candidate)
      if (raw instanceof NotFoundError) {
        skip(report, candidate, raw)
        continue
      }
      if (raw instanceof Error) return abort(raw)

      const flags = mapFlags(raw, labelNames)
      if (flags instanceof MalformedMessageError) {
        skip(report, candidate, flags)
        continue
      }

      const refreshed: StoredMessage = {
        ...existing,
        labels: flags.labels,
        isRead: flags.isRead,
        lastIndexed: now(),
      }
      const written = await persist(`message ${candidate}`, () => store.upsert(refreshed))
      if (written instanceof Error) return abort(written)

      persisted++
      report.updated++
      highWater = Math.max(highWater, flags.receivedAt ?? existing.timestamp.getTime())
    }

    if (persisted % 100 === 0) {
      out.hint(`${persisted} message(s) synced...`)
    }
  }

  // Last action of a successful run.
  const saved = await persist('checkpoint', () => store.setCheckpoint(highWater))
  if (saved instanceof Error) return abort(saved)

  report.checkpoint.after = highWater
  return report
}

/** Malformed responses, and messages deleted between listing and fetch, cost one id, not the run. */
function skip(report: SyncReport, id: string, err: MalformedMessageError | NotFoundError) {
  report.skipped.push({ id, reason: err.message })
  out.warn(`Skipping ${id}: ${err.message}`)
}

// ---------------------------------------------------------------------------
// syncOne
// ---------------------------------------------------------------------------

/**
 * Fetch one message and overwrite its full row, whatever was stored before.
 * Never reads or writes the checkpoint.
 */
export async function syncOne({
  id,
  store,
  remote,
  now = () => new Date(),
}: {
  id: string
  store: LocalStore
  remote: RemoteMailbox
  now?: () => Date
}): Promise<StoredMessage | RemoteError | MalformedMessageError | StorePersistError> {
  const labelNames = await remote.labelNames()
  if (labelNames instanceof Error) return labelNames

  const raw = await remote.fetch(id)
  if (raw instanceof Error) return raw

  const message = mapMessage(raw, labelNames)
  if (message instanceof Error) return message

  const stored: StoredMessage = { ...message, lastIndexed: now() }
  const written = await persist(`message ${id}`, () => store.upsert(stored))
  if (written instanceof Error) return written

  return stored
}
