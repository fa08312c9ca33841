// Local read commands: messages, status.
// Both only read <data-dir>/messages.db; no Gmail access and no token needed.

import type { Goke } from 'goke'
import { z } from 'zod'
import { EPOCH } from '../sync.js'
import * as out from '../output.js'
import { openStore, requireDataDir } from './context.js'

export function registerMessageCommands(cli: Goke) {
  // =========================================================================
  // messages
  // =========================================================================

  cli
    .command('messages', 'List the latest stored messages')
    .option('--data-dir <dataDir>', z.string().describe('Directory holding messages.db'))
    .option('--limit <limit>', z.number().int().positive().default(10).describe('Max messages to print'))
    .action(async (options) => {
      const dataDir = requireDataDir(options.dataDir)
      const store = openStore(dataDir, { mustExist: true })
      const messages = store.listMessages(options.limit)
      store.close()

      if (messages.length === 0) {
        out.hint('No messages stored yet. Run: inboxdb sync --data-dir <path>')
        return
      }

      out.printList(
        messages.map((m) => ({
          id: m.id,
          date: m.timestamp.toISOString(),
          from: out.formatSender(m.sender),
          subject: m.subject,
          labels: m.labels,
          read: m.isRead,
        })),
        { summary: `${messages.length} message(s)` },
      )
    })

  // =========================================================================
  // status
  // =========================================================================

  cli
    .command('status', 'Show what the local database holds and when it was last synced')
    .option('--data-dir <dataDir>', z.string().describe('Directory holding messages.db'))
    .action(async (options) => {
      const dataDir = requireDataDir(options.dataDir)
      const store = openStore(dataDir, { mustExist: true })
      const stats = store.stats()
      store.close()

      out.printYaml({
        messages: stats.messages,
        first_message_at: stats.firstMessageAt?.toISOString() ?? null,
        last_message_at: stats.lastMessageAt?.toISOString() ?? null,
        checkpoint: stats.checkpoint === EPOCH ? null : new Date(stats.checkpoint).toISOString(),
        last_synced_at: stats.lastSyncedAt?.toISOString() ?? null,
      })
    })
}
