// Maps raw Gmail API messages to the row shape stored by inboxdb.
// Pure functions, no I/O: the same raw message always maps to the same value.
// Gmail responses are loosely typed (every field optional and nullable), so a zod
// schema checks the fields the row depends on before anything else reads them.
// A response that fails the schema becomes a MalformedMessageError, which the
// reconciler skips instead of aborting the run.

import type { gmail_v1 } from '@googleapis/gmail'
import { z } from 'zod'
import { parseFrom, parseAddressList, type Sender } from './email-utils.js'
import { renderEmailBody } from './body-text.js'
import { MalformedMessageError } from './api-utils.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface Recipients {
  to: Sender[]
  cc: Sender[]
  bcc: Sender[]
}

/** One email as stored locally, minus local bookkeeping. */
export interface Message {
  id: string
  threadId: string
  subject: string
  sender: Sender
  recipients: Recipients
  labels: string[]
  body: string
  size: number
  timestamp: Date
  isRead: boolean
  isOutgoing: boolean
}

/** A Message plus the time inboxdb last wrote it. */
export interface StoredMessage extends Message {
  lastIndexed: Date
}

/** The mutable subset refreshed by a metadata-only update. */
export interface MessageFlags {
  id: string
  labels: string[]
  isRead: boolean
  /** internalDate in epoch ms, null when the response omits it */
  receivedAt: number | null
}

/** Gmail label id -> display name (e.g. Label_12 -> "Receipts"). */
export type LabelNames = Record<string, string>

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

interface RawPart {
  mimeType?: string | null
  headers?: Array<{ name?: string | null; value?: string | null }> | null
  body?: { data?: string | null } | null
  parts?: RawPart[] | null
}

const headerSchema = z.object({
  name: z.string().nullish(),
  value: z.string().nullish(),
})

const partSchema: z.ZodType<RawPart> = z.lazy(() =>
  z.object({
    mimeType: z.string().nullish(),
    headers: z.array(headerSchema).nullish(),
    body: z.object({ data: z.string().nullish() }).nullish(),
    parts: z.array(partSchema).nullish(),
  }),
)

// Largest epoch ms a JS Date can hold (±100,000,000 days)
const MAX_EPOCH_MS = 8.64e15

function isEpochMs(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0 && value <= MAX_EPOCH_MS
}

// internalDate feeds the checkpoint, so anything that isn't a real Date is rejected here
const epochMsString = z
  .string()
  .refine((value) => /^\d+$/.test(value) && isEpochMs(Number(value)), 'expected epoch milliseconds')

const flagsSchema = z.object({
  id: z.string().min(1),
  labelIds: z.array(z.string()).nullish(),
  internalDate: epochMsString.nullish(),
})

const messageSchema = flagsSchema.extend({
  threadId: z.string().min(1),
  sizeEstimate: z.number().int().nonnegative().nullish(),
  payload: partSchema.nullish(),
})

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ')
}

function rawId(raw: gmail_v1.Schema$Message): string {
  return raw.id || '(no id)'
}

// ---------------------------------------------------------------------------
// Mapping
// ---------------------------------------------------------------------------

/** Map a `format: 'full'` message to a Message. */
export function mapMessage(raw: gmail_v1.Schema$Message, labelNames: LabelNames): Message | MalformedMessageError {
  const parsed = messageSchema.safeParse(raw)
  if (!parsed.success) {
    return new MalformedMessageError({ id: rawId(raw), reason: describeIssues(parsed.error) })
  }
  const msg = parsed.data
  const headers = msg.payload?.headers ?? []

  const getHeader = (name: string) =>
    headers.find((h) => h.name?.toLowerCase() === name)?.value ?? null

  const timestamp = resolveTimestamp(msg.internalDate, getHeader('date'))
  if (!timestamp) {
    return new MalformedMessageError({ id: msg.id, reason: 'no internalDate and no parseable Date header' })
  }

  const labelIds = msg.labelIds ?? []
  const { body, mimeType } = extractBody(msg.payload ?? {})

  return {
    id: msg.id,
    threadId: msg.threadId,
    subject: (getHeader('subject') ?? '').trim(),
    sender: parseFrom(getHeader('from') ?? ''),
    recipients: {
      to: parseAddressList(getHeader('to') ?? ''),
      cc: parseAddressList(getHeader('cc') ?? ''),
      bcc: parseAddressList(getHeader('bcc') ?? ''),
    },
    labels: labelIds.map((id) => labelNames[id] ?? id),
    body: renderEmailBody(body, mimeType),
    size: msg.sizeEstimate ?? 0,
    timestamp,
    isRead: !labelIds.includes('UNREAD'),
    isOutgoing: labelIds.includes('SENT'),
  }
}

/** Map a `format: 'minimal'` message to the fields a metadata-only update touches. */
export function mapFlags(raw: gmail_v1.Schema$Message, labelNames: LabelNames): MessageFlags | MalformedMessageError {
  const parsed = flagsSchema.safeParse(raw)
  if (!parsed.success) {
    return new MalformedMessageError({ id: rawId(raw), reason: describeIssues(parsed.error) })
  }
  const labelIds = parsed.data.labelIds ?? []

  return {
    id: parsed.data.id,
    labels: labelIds.map((id) => labelNames[id] ?? id),
    isRead: !labelIds.includes('UNREAD'),
    receivedAt: parsed.data.internalDate ? Number(parsed.data.internalDate) : null,
  }
}

function resolveTimestamp(internalDate: string | null | undefined, dateHeader: string | null): Date | null {
  const date = internalDate ? new Date(Number(internalDate)) : dateHeader ? new Date(dateHeader) : null
  if (!date || isNaN(date.getTime())) return null
  return date
}

// ---------------------------------------------------------------------------
// Body extraction
// ---------------------------------------------------------------------------

function decodeBase64Url(encoded: string) {
  const base64 = encoded.replace(/-/g, '+').replace(/_/g, '/')
  return Buffer.from(base64, 'base64').toString('utf-8')
}

/** HTML wins over plain text when both alternatives exist; nested multiparts are searched depth-first. */
function extractBody(payload: RawPart): { body: string; mimeType: string } {
  if (payload.body?.data) {
    return { body: decodeBase64Url(payload.body.data), mimeType: payload.mimeType ?? 'text/plain' }
  }

  const parts = payload.parts ?? []
  for (const mimeType of ['text/html', 'text/plain']) {
    const data = findBodyPart(parts, mimeType)
    if (data) return { body: decodeBase64Url(data), mimeType }
  }

  return { body: '', mimeType: 'text/plain' }
}

function findBodyPart(parts: RawPart[], mimeType: string): string | null {
  for (const part of parts) {
    if (part.mimeType === mimeType && part.body?.data) {
      return part.body.data
    }
    if (part.parts) {
      const found = findBodyPart(part.parts, mimeType)
      if (found) return found
    }
  }
  return null
}
