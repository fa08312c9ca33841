import { describe, expect, test } from 'vitest'
import type { gmail_v1 } from '@googleapis/gmail'
import { mapFlags, mapMessage, type LabelNames } from './message-mapper.js'
import { MalformedMessageError } from './api-utils.js'

const labelNames: LabelNames = { INBOX: 'INBOX', UNREAD: 'UNREAD', SENT: 'SENT', Label_1: 'Receipts' }

function encode(text: string) {
  return Buffer.from(text, 'utf-8').toString('base64url')
}

function rawMessage(overrides: gmail_v1.Schema$Message = {}): gmail_v1.Schema$Message {
  return {
    id: 'm1',
    threadId: 't1',
    labelIds: ['INBOX', 'UNREAD', 'Label_1'],
    internalDate: '1700000000000',
    sizeEstimate: 2048,
    payload: {
      mimeType: 'multipart/alternative',
      headers: [
        { name: 'From', value: 'Ada Lovelace <Ada@Example.com>' },
        { name: 'To', value: 'grace@example.com' },
        { name: 'Cc', value: 'Alan <alan@example.com>' },
        { name: 'Subject', value: '  Quarterly numbers  ' },
        { name: 'Date', value: 'Tue, 14 Nov 2023 22:13:20 +0000' },
      ],
      parts: [
        { mimeType: 'text/plain', body: { data: encode('Hello world') } },
        { mimeType: 'text/html', body: { data: encode('<p>Hello <b>world</b></p>') } },
      ],
    },
    ...overrides,
  }
}

describe('mapMessage', () => {
  test('maps headers, labels and flags', () => {
    expect(mapMessage(rawMessage(), labelNames)).toEqual({
      id: 'm1',
      threadId: 't1',
      subject: 'Quarterly numbers',
      sender: { name: 'Ada Lovelace', email: 'ada@example.com' },
      recipients: {
        to: [{ name: '', email: 'grace@example.com' }],
        cc: [{ name: 'Alan', email: 'alan@example.com' }],
        bcc: [],
      },
      labels: ['INBOX', 'UNREAD', 'Receipts'],
      body: 'Hello **world**',
      size: 2048,
      timestamp: new Date(1700000000000),
      isRead: false,
      isOutgoing: false,
    })
  })

  test('mapping is deterministic', () => {
    const raw = rawMessage()
    expect(mapMessage(raw, labelNames)).toEqual(mapMessage(raw, labelNames))
  })

  test('SENT without UNREAD is outgoing and read', () => {
    const message = mapMessage(rawMessage({ labelIds: ['SENT'] }), labelNames)
    if (message instanceof Error) throw message
    expect(message.isOutgoing).toBe(true)
    expect(message.isRead).toBe(true)
  })

  test('unknown label ids are kept as-is', () => {
    const message = mapMessage(rawMessage({ labelIds: ['Label_99'] }), labelNames)
    if (message instanceof Error) throw message
    expect(message.labels).toEqual(['Label_99'])
  })

  test('finds the text part inside nested multiparts', () => {
    const message = mapMessage(
      rawMessage({
        payload: {
          mimeType: 'multipart/mixed',
          headers: [{ name: 'Subject', value: 'Nested' }],
          parts: [
            {
              mimeType: 'multipart/alternative',
              parts: [{ mimeType: 'text/plain', body: { data: encode('  Plain only\n') } }],
            },
            { mimeType: 'application/pdf', body: {} },
          ],
        },
      }),
      labelNames,
    )
    if (message instanceof Error) throw message
    expect(message.body).toBe('Plain only')
  })

  test('missing headers give empty fields', () => {
    const message = mapMessage(rawMessage({ payload: { mimeType: 'text/plain', body: { data: encode('Body') } } }), {})
    if (message instanceof Error) throw message
    expect(message.subject).toBe('')
    expect(message.sender).toEqual({ name: '', email: '' })
    expect(message.recipients).toEqual({ to: [], cc: [], bcc: [] })
    expect(message.body).toBe('Body')
  })

  test('falls back to the Date header without internalDate', () => {
    const message = mapMessage(rawMessage({ internalDate: null }), labelNames)
    if (message instanceof Error) throw message
    expect(message.timestamp).toEqual(new Date('2023-11-14T22:13:20.000Z'))
  })

  test('no timestamp at all is malformed', () => {
    const message = mapMessage(
      rawMessage({ internalDate: null, payload: { headers: [{ name: 'Subject', value: 'Undated' }] } }),
      labelNames,
    )
    expect(message).toBeInstanceOf(MalformedMessageError)
    expect(message instanceof Error && message.message).toBe(
      'Malformed message m1: no internalDate and no parseable Date header',
    )
  })

  test('missing threadId is malformed', () => {
    const message = mapMessage(rawMessage({ threadId: null }), labelNames)
    expect(message).toBeInstanceOf(MalformedMessageError)
    expect(message instanceof Error && message.message).toBe('Malformed message m1: threadId: Expected string, received null')
  })

  test('missing id is reported as (no id)', () => {
    const raw = rawMessage()
    delete raw.id
    const message = mapMessage(raw, labelNames)
    expect(message instanceof Error && message.message).toBe('Malformed message (no id): id: Required')
  })

  test('internalDate beyond the Date range is malformed', () => {
    const message = mapMessage(rawMessage({ internalDate: '99999999999999999' }), labelNames)
    expect(message).toBeInstanceOf(MalformedMessageError)
    expect(message instanceof Error && message.message).toBe(
      'Malformed message m1: internalDate: expected epoch milliseconds',
    )
  })

  test('unparseable Date header without internalDate is malformed', () => {
    const message = mapMessage(
      rawMessage({ internalDate: null, payload: { headers: [{ name: 'Date', value: 'sometime last week' }] } }),
      labelNames,
    )
    expect(message instanceof Error && message.message).toBe(
      'Malformed message m1: no internalDate and no parseable Date header',
    )
  })

  test('non-numeric internalDate is malformed', () => {
    const message = mapMessage(rawMessage({ internalDate: 'yesterday' }), labelNames)
    expect(message instanceof Error && message.message).toBe(
      'Malformed message m1: internalDate: expected epoch milliseconds',
    )
  })
})

describe('mapFlags', () => {
  test('maps labels, read state and internalDate', () => {
    expect(mapFlags({ id: 'm1', labelIds: ['INBOX', 'Label_1'], internalDate: '1700000000000' }, labelNames)).toEqual({
      id: 'm1',
      labels: ['INBOX', 'Receipts'],
      isRead: true,
      receivedAt: 1700000000000,
    })
  })

  test('missing internalDate gives null receivedAt', () => {
    expect(mapFlags({ id: 'm1', labelIds: ['UNREAD'] }, labelNames)).toEqual({
      id: 'm1',
      labels: ['UNREAD'],
      isRead: false,
      receivedAt: null,
    })
  })

  test('missing id is malformed', () => {
    expect(mapFlags({ labelIds: [] }, labelNames)).toBeInstanceOf(MalformedMessageError)
  })

  test('internalDate beyond the Date range is malformed', () => {
    const flags = mapFlags({ id: 'm1', labelIds: ['INBOX'], internalDate: '99999999999999999' }, labelNames)
    expect(flags).toBeInstanceOf(MalformedMessageError)
    expect(flags instanceof Error && flags.message).toBe('Malformed message m1: internalDate: expected epoch milliseconds')
  })
})
