// Email address parsing utilities.
// Wraps the `email-addresses` package (RFC 5322 parser) with simpler return types.
// Addresses are lowercased so rows group cleanly by sender in SQL.

import { parseFrom as _parseFrom, parseAddressList as _parseAddressList } from 'email-addresses'

export interface Sender {
  name: string
  email: string
}

const EMPTY_SENDER: Sender = {
  name: '',
  email: '',
}

/**
 * Parse an RFC 5322 "From" header into a { name, email } object.
 * Group syntax takes the first member; unparseable headers give an empty sender.
 */
export function parseFrom(fromHeader: string): Sender {
  if (!fromHeader.trim()) return EMPTY_SENDER

  const parsed = _parseFrom(fromHeader)
  if (!parsed) return EMPTY_SENDER

  const first = parsed[0]
  if (!first) return EMPTY_SENDER

  if (first.type === 'group') {
    const member = first.addresses?.[0]
    return {
      name: first.name || '',
      email: (member?.address || '').toLowerCase(),
    }
  }

  return {
    name: first.name || '',
    email: (first.address || '').toLowerCase(),
  }
}

/**
 * Parse an RFC 5322 address list header (To, Cc, Bcc) into an array of { name, email }.
 * Group addresses are flattened. Returns an empty array if the header cannot be parsed.
 */
export function parseAddressList(header: string): Sender[] {
  if (!header.trim()) return []

  const parsed = _parseAddressList(header)
  if (!parsed) return []

  return parsed.flatMap((address) => {
    if (address.type === 'group') {
      return (address.addresses || []).map((a) => ({
        name: a.name || '',
        email: (a.address || '').toLowerCase(),
      }))
    }

    return {
      name: address.name || '',
      email: (address.address || '').toLowerCase(),
    }
  })
}
