// Local replica store for synced messages.
// Uses better-sqlite3 for synchronous, individually durable writes: each upsert is
// one statement, so an interrupted run never leaves a half-written row.
// Two tables: `messages` (one row per Gmail message id) and `sync_state`
// for persistent values like the checkpoint.

import type Database from 'better-sqlite3'
import { openDatabase, dbPathFor } from './db.js'
import type { Sender } from './email-utils.js'
import type { Recipients, StoredMessage } from './message-mapper.js'

/** Epoch milliseconds of the newest message a successful run has processed. */
export type Checkpoint = number

/** Checkpoint of a store that has never completed a sync. */
export const EPOCH: Checkpoint = 0

// Row shapes for typed .prepare() queries
interface MessageRow {
  message_id: string
  thread_id: string
  sender: string
  recipients: string
  labels: string
  subject: string
  body: string
  size: number
  timestamp: string
  is_read: number
  is_outgoing: number
  last_indexed: string
}
interface SyncRow { value: string }
interface StatsRow { total: number; first: string | null; last: string | null }

export interface StoreStats {
  messages: number
  firstMessageAt: Date | null
  lastMessageAt: Date | null
  checkpoint: Checkpoint
  lastSyncedAt: Date | null
}

const CHECKPOINT_KEY = 'checkpoint'
const LAST_SYNCED_KEY = 'last_synced_at'

export class MessageStore {
  private db: Database.Database

  constructor({ dbPath }: { dbPath: string }) {
    this.db = openDatabase(dbPath)
  }

  /** Open the store kept under a data directory. */
  static open(dataDir: string): MessageStore {
    return new MessageStore({ dbPath: dbPathFor(dataDir) })
  }

  // ---------------------------------------------------------------------------
  // Messages
  // ---------------------------------------------------------------------------

  get(id: string): StoredMessage | undefined {
    const row = this.db
      .prepare<[string], MessageRow>('SELECT * FROM messages WHERE message_id = ?')
      .get(id)
    return row ? fromRow(row) : undefined
  }

  /** Insert, or overwrite every column of an existing row. */
  upsert(message: StoredMessage): void {
    this.db
      .prepare(
        `INSERT INTO messages (
           message_id, thread_id, sender, recipients, labels, subject, body,
           size, timestamp, is_read, is_outgoing, last_indexed
         ) VALUES (
           @message_id, @thread_id, @sender, @recipients, @labels, @subject, @body,
           @size, @timestamp, @is_read, @is_outgoing, @last_indexed
         )
         ON CONFLICT (message_id) DO UPDATE SET
           thread_id = excluded.thread_id,
           sender = excluded.sender,
           recipients = excluded.recipients,
           labels = excluded.labels,
           subject = excluded.subject,
           body = excluded.body,
           size = excluded.size,
           timestamp = excluded.timestamp,
           is_read = excluded.is_read,
           is_outgoing = excluded.is_outgoing,
           last_indexed = excluded.last_indexed`,
      )
      .run(toRow(message))
  }

  /** Latest messages first. */
  listMessages(limit = 10): StoredMessage[] {
    return this.db
      .prepare<[number], MessageRow>('SELECT * FROM messages ORDER BY timestamp DESC LIMIT ?')
      .all(limit)
      .map(fromRow)
  }

  // ---------------------------------------------------------------------------
  // Sync state (persistent, no TTL)
  // ---------------------------------------------------------------------------

  getCheckpoint(): Checkpoint {
    const value = Number(this.getState(CHECKPOINT_KEY) ?? EPOCH)
    // a garbled value restarts from the epoch
    return Number.isSafeInteger(value) && value >= 0 ? value : EPOCH
  }

  /** Write the checkpoint and the completion time together. */
  setCheckpoint(value: Checkpoint, syncedAt = new Date()): void {
    const put = this.db.prepare('INSERT OR REPLACE INTO sync_state (key, value) VALUES (?, ?)')
    const tx = this.db.transaction(() => {
      put.run(CHECKPOINT_KEY, String(value))
      put.run(LAST_SYNCED_KEY, syncedAt.toISOString())
    })
    tx()
  }

  private getState(key: string): string | undefined {
    const row = this.db
      .prepare<[string], SyncRow>('SELECT value FROM sync_state WHERE key = ?')
      .get(key)
    return row?.value
  }

  // ---------------------------------------------------------------------------
  // Housekeeping
  // ---------------------------------------------------------------------------

  stats(): StoreStats {
    const row = this.db
      .prepare<[], StatsRow>('SELECT COUNT(*) AS total, MIN(timestamp) AS first, MAX(timestamp) AS last FROM messages')
      .get()
    const lastSyncedAt = this.getState(LAST_SYNCED_KEY)

    return {
      messages: row?.total ?? 0,
      firstMessageAt: row?.first ? new Date(row.first) : null,
      lastMessageAt: row?.last ? new Date(row.last) : null,
      checkpoint: this.getCheckpoint(),
      lastSyncedAt: lastSyncedAt ? new Date(lastSyncedAt) : null,
    }
  }

  close() {
    this.db.close()
  }
}

// ---------------------------------------------------------------------------
// Row conversion
// ---------------------------------------------------------------------------

function toRow(message: StoredMessage): MessageRow {
  return {
    message_id: message.id,
    thread_id: message.threadId,
    sender: JSON.stringify(message.sender),
    recipients: JSON.stringify(message.recipients),
    labels: JSON.stringify(message.labels),
    subject: message.subject,
    body: message.body,
    size: message.size,
    timestamp: message.timestamp.toISOString(),
    is_read: message.isRead ? 1 : 0,
    is_outgoing: message.isOutgoing ? 1 : 0,
    last_indexed: message.lastIndexed.toISOString(),
  }
}

function fromRow(row: MessageRow): StoredMessage {
  const sender: Sender = JSON.parse(row.sender)
  const recipients: Recipients = JSON.parse(row.recipients)
  const labels: string[] = JSON.parse(row.labels)

  return {
    id: row.message_id,
    threadId: row.thread_id,
    subject: row.subject,
    sender,
    recipients,
    labels,
    body: row.body,
    size: row.size,
    timestamp: new Date(row.timestamp),
    isRead: row.is_read === 1,
    isOutgoing: row.is_outgoing === 1,
    lastIndexed: new Date(row.last_indexed),
  }
}
