// Sync commands: sync, sync-message.
// `sync` runs the reconciler against the account stored in --data-dir and prints
// the run report as YAML. `sync-message` re-fetches one message and overwrites its row.

import type { Goke } from 'goke'
import { z } from 'zod'
import { getClient } from '../auth.js'
import { sync, syncOne, EPOCH, type Checkpoint, type SyncReport } from '../sync.js'
import * as out from '../output.js'
import { handleCommandError } from '../output.js'
import { openStore, requireConfig, requireDataDir, requireOption } from './context.js'

function formatCheckpoint(checkpoint: Checkpoint): string | null {
  return checkpoint === EPOCH ? null : new Date(checkpoint).toISOString()
}

function formatReport(report: SyncReport) {
  return {
    mode: report.mode,
    listed: report.listed,
    inserted: report.inserted,
    updated: report.updated,
    skipped: report.skipped,
    checkpoint: {
      before: formatCheckpoint(report.checkpoint.before),
      after: formatCheckpoint(report.checkpoint.after),
    },
  }
}

export function registerSyncCommands(cli: Goke) {
  // =========================================================================
  // sync
  // =========================================================================

  cli
    .command('sync', 'Sync Gmail messages into <data-dir>/messages.db')
    .option('--data-dir <dataDir>', z.string().describe('Directory holding messages.db and token.json'))
    .option('--full-sync', z.boolean().describe('List the whole mailbox instead of messages since the last sync'))
    .action(async (options) => {
      const dataDir = requireDataDir(options.dataDir)
      const config = requireConfig()

      const client = await getClient({ dataDir, config })
      if (client instanceof Error) handleCommandError(client)

      const store = openStore(dataDir)

      // Each upsert is durable on its own and the checkpoint is only written at the end,
      // so stopping here leaves a database the next run picks up from.
      process.on('SIGINT', () => {
        store.close()
        out.hint('Interrupted, checkpoint left unchanged')
        process.exit(130)
      })

      const report = await sync({
        mode: options.fullSync ? 'full' : 'incremental',
        store,
        remote: client,
      })
      store.close()
      if (report instanceof Error) handleCommandError(report)

      out.printYaml(formatReport(report))
      out.success(`Synced ${report.inserted} new and ${report.updated} existing message(s)`)
      process.exit(0)
    })

  // =========================================================================
  // sync-message
  // =========================================================================

  cli
    .command('sync-message', 'Fetch one message and overwrite its stored row')
    .option('--data-dir <dataDir>', z.string().describe('Directory holding messages.db and token.json'))
    .option('--message-id <messageId>', z.string().describe('Gmail message ID'))
    .action(async (options) => {
      const dataDir = requireDataDir(options.dataDir)
      const id = requireOption(options.messageId, '--message-id')
      const config = requireConfig()

      const client = await getClient({ dataDir, config })
      if (client instanceof Error) handleCommandError(client)

      const store = openStore(dataDir)
      const message = await syncOne({ id, store, remote: client })
      store.close()
      if (message instanceof Error) handleCommandError(message)

      out.printYaml({
        id: message.id,
        thread_id: message.threadId,
        date: message.timestamp.toISOString(),
        from: out.formatSender(message.sender),
        subject: message.subject,
        labels: message.labels,
        read: message.isRead,
      })
      out.success(`Synced message ${message.id}`)
      process.exit(0)
    })
}
