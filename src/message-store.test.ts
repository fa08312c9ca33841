import { afterEach, beforeEach, describe, expect, test } from 'vitest'
import { MessageStore, EPOCH } from './message-store.js'
import { IN_MEMORY } from './db.js'
import type { StoredMessage } from './message-mapper.js'

function storedMessage(id: string, overrides: Partial<StoredMessage> = {}): StoredMessage {
  return {
    id,
    threadId: `thread-${id}`,
    subject: `Subject ${id}`,
    sender: { name: 'Ada Lovelace', email: 'ada@example.com' },
    recipients: { to: [{ name: '', email: 'grace@example.com' }], cc: [], bcc: [] },
    labels: ['INBOX'],
    body: `Body of ${id}`,
    size: 100,
    timestamp: new Date('2024-03-01T10:00:00.000Z'),
    isRead: false,
    isOutgoing: false,
    lastIndexed: new Date('2024-03-02T08:30:00.250Z'),
    ...overrides,
  }
}

let store: MessageStore

beforeEach(() => {
  store = new MessageStore({ dbPath: IN_MEMORY })
})

afterEach(() => {
  store.close()
})

describe('messages', () => {
  test('get returns undefined for unknown ids', () => {
    expect(store.get('missing')).toBeUndefined()
  })

  test('upsert then get round-trips every field', () => {
    const message = storedMessage('m1', { isRead: true, isOutgoing: true, labels: ['SENT', 'Receipts'] })
    store.upsert(message)
    expect(store.get('m1')).toEqual(message)
  })

  test('upsert overwrites an existing row', () => {
    store.upsert(storedMessage('m1'))
    store.upsert(storedMessage('m1', { subject: 'Changed', isRead: true }))

    expect(store.get('m1')?.subject).toBe('Changed')
    expect(store.get('m1')?.isRead).toBe(true)
    expect(store.stats().messages).toBe(1)
  })

  test('listMessages returns newest first up to the limit', () => {
    store.upsert(storedMessage('old', { timestamp: new Date('2024-01-01T00:00:00.000Z') }))
    store.upsert(storedMessage('new', { timestamp: new Date('2024-06-01T00:00:00.000Z') }))
    store.upsert(storedMessage('mid', { timestamp: new Date('2024-03-01T00:00:00.000Z') }))

    expect(store.listMessages(2).map((m) => m.id)).toEqual(['new', 'mid'])
  })
})

describe('sync state', () => {
  test('a fresh store is at the epoch checkpoint', () => {
    expect(store.getCheckpoint()).toBe(EPOCH)
    expect(store.stats()).toEqual({
      messages: 0,
      firstMessageAt: null,
      lastMessageAt: null,
      checkpoint: EPOCH,
      lastSyncedAt: null,
    })
  })

  test('setCheckpoint stores the value and the completion time', () => {
    store.setCheckpoint(1700000000000, new Date('2024-05-05T12:00:00.000Z'))
    expect(store.getCheckpoint()).toBe(1700000000000)
    expect(store.stats().lastSyncedAt).toEqual(new Date('2024-05-05T12:00:00.000Z'))
  })

  test('a garbled checkpoint reads as the epoch', () => {
    store.setCheckpoint(Number.NaN)
    expect(store.getCheckpoint()).toBe(EPOCH)

    store.setCheckpoint(-5)
    expect(store.getCheckpoint()).toBe(EPOCH)
  })

  test('stats reports the stored time range', () => {
    store.upsert(storedMessage('a', { timestamp: new Date('2024-01-01T00:00:00.000Z') }))
    store.upsert(storedMessage('b', { timestamp: new Date('2024-06-01T00:00:00.000Z') }))

    const stats = store.stats()
    expect(stats.messages).toBe(2)
    expect(stats.firstMessageAt).toEqual(new Date('2024-01-01T00:00:00.000Z'))
    expect(stats.lastMessageAt).toEqual(new Date('2024-06-01T00:00:00.000Z'))
  })
})
