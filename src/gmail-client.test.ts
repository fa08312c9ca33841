// GmailClient tests with the @googleapis/gmail SDK mocked out. No network.

import { beforeEach, describe, expect, test, vi } from 'vitest'
import { OAuth2Client } from 'google-auth-library'
import { GmailClient, buildListQuery } from './gmail-client.js'
import { ApiError, AuthError, NotFoundError, TransientRemoteError } from './api-utils.js'
import { EPOCH } from './sync.js'

const api = vi.hoisted(() => ({
  list: vi.fn(),
  get: vi.fn(),
  labelsList: vi.fn(),
  getProfile: vi.fn(),
}))

vi.mock('@googleapis/gmail', () => ({
  gmail: () => ({
    users: {
      messages: { list: api.list, get: api.get },
      labels: { list: api.labelsList },
      getProfile: api.getProfile,
    },
  }),
}))

function httpError(message: string, code: number) {
  return Object.assign(new Error(message), { code })
}

function createClient() {
  return new GmailClient({
    auth: new OAuth2Client({ clientId: 'test-client', clientSecret: 'test-secret' }),
    timeoutMs: 1234,
    maxAttempts: 2,
    retryDelayMs: 0,
    pageSize: 50,
  })
}

async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = []
  for await (const item of iterable) items.push(item)
  return items
}

beforeEach(() => {
  vi.resetAllMocks()
})

describe('buildListQuery', () => {
  test('no query from the epoch', () => {
    expect(buildListQuery(EPOCH)).toBeUndefined()
  })

  test('epoch seconds with one second of overlap', () => {
    expect(buildListQuery(1700000000500)).toBe('after:1699999999')
  })
})

describe('listChangedIds', () => {
  test('follows page tokens until the last page', async () => {
    api.list
      .mockResolvedValueOnce({ data: { messages: [{ id: 'a' }, { id: 'b' }], nextPageToken: 'page-2' } })
      .mockResolvedValueOnce({ data: { messages: [{ id: 'c' }] } })

    const ids = await collect(createClient().listChangedIds(1700000000500))

    expect(ids).toEqual(['a', 'b', 'c'])
    expect(api.list).toHaveBeenNthCalledWith(
      1,
      { userId: 'me', q: 'after:1699999999', maxResults: 50, pageToken: undefined },
      { timeout: 1234 },
    )
    expect(api.list).toHaveBeenNthCalledWith(
      2,
      { userId: 'me', q: 'after:1699999999', maxResults: 50, pageToken: 'page-2' },
      { timeout: 1234 },
    )
  })

  test('an empty mailbox yields nothing', async () => {
    api.list.mockResolvedValueOnce({ data: {} })
    expect(await collect(createClient().listChangedIds(EPOCH))).toEqual([])
  })

  test('a failure is yielded as the last item', async () => {
    api.list.mockRejectedValueOnce(httpError('Invalid Credentials', 401))

    const items = await collect(createClient().listChangedIds(EPOCH))

    expect(items).toHaveLength(1)
    expect(items[0]).toBeInstanceOf(AuthError)
  })
})

describe('fetch', () => {
  test('requests the full format', async () => {
    api.get.mockResolvedValueOnce({ data: { id: 'm1', threadId: 't1' } })

    expect(await createClient().fetch('m1')).toEqual({ id: 'm1', threadId: 't1' })
    expect(api.get).toHaveBeenCalledWith({ userId: 'me', id: 'm1', format: 'full' }, { timeout: 1234 })
  })

  test('fetchFlags requests the minimal format', async () => {
    api.get.mockResolvedValueOnce({ data: { id: 'm1', labelIds: ['INBOX'] } })

    await createClient().fetchFlags('m1')
    expect(api.get).toHaveBeenCalledWith({ userId: 'me', id: 'm1', format: 'minimal' }, { timeout: 1234 })
  })

  test('retries a transient failure', async () => {
    api.get
      .mockRejectedValueOnce(httpError('Backend Error', 503))
      .mockResolvedValueOnce({ data: { id: 'm1' } })

    expect(await createClient().fetch('m1')).toEqual({ id: 'm1' })
    expect(api.get).toHaveBeenCalledTimes(2)
  })

  test('gives up after maxAttempts with TransientRemoteError', async () => {
    api.get.mockRejectedValue(httpError('Backend Error', 503))

    const result = await createClient().fetch('m1')

    expect(result).toBeInstanceOf(TransientRemoteError)
    expect(api.get).toHaveBeenCalledTimes(2)
  })

  test('404 becomes NotFoundError', async () => {
    api.get.mockRejectedValueOnce(httpError('Requested entity was not found.', 404))

    const result = await createClient().fetch('m1')

    expect(result).toBeInstanceOf(NotFoundError)
    expect(result instanceof Error && result.message).toBe('message m1 not found')
  })

  test('other failures become ApiError', async () => {
    api.get.mockRejectedValueOnce(httpError('Bad Request', 400))

    const result = await createClient().fetch('m1')

    expect(result).toBeInstanceOf(ApiError)
    expect(result instanceof Error && result.message).toBe('API call failed: Error: Bad Request')
  })
})

describe('labelNames', () => {
  test('maps ids to names and caches the result', async () => {
    api.labelsList.mockResolvedValueOnce({
      data: { labels: [{ id: 'INBOX', name: 'INBOX' }, { id: 'Label_1', name: 'Receipts' }, { id: 'Label_2' }] },
    })
    const client = createClient()

    expect(await client.labelNames()).toEqual({ INBOX: 'INBOX', Label_1: 'Receipts', Label_2: 'Label_2' })
    await client.labelNames()
    expect(api.labelsList).toHaveBeenCalledTimes(1)
  })
})

describe('getProfile', () => {
  test('fills missing fields', async () => {
    api.getProfile.mockResolvedValueOnce({ data: { emailAddress: 'ada@example.com' } })

    expect(await createClient().getProfile()).toEqual({
      emailAddress: 'ada@example.com',
      messagesTotal: 0,
      historyId: '',
    })
  })
})
