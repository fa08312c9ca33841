// Shared setup for commands: --data-dir validation, config, and store opening.
// Each helper reports through handleCommandError, so commands read top to bottom.

import fs from 'node:fs'
import path from 'node:path'
import * as errore from 'errore'
import { StorePersistError, ValidationError } from '../api-utils.js'
import { loadConfig, type Config } from '../config.js'
import { dbPathFor } from '../db.js'
import { MessageStore } from '../message-store.js'
import { handleCommandError } from '../output.js'

export function requireOption(value: string | undefined, flag: string): string {
  if (!value || !value.trim()) {
    handleCommandError(new ValidationError({ field: flag, reason: 'a value is required' }))
  }
  return value.trim()
}

export function requireDataDir(value: string | undefined): string {
  return path.resolve(requireOption(value, '--data-dir'))
}

export function requireConfig(): Config {
  const config = loadConfig()
  if (config instanceof Error) handleCommandError(config)
  return config
}

/**
 * Open <data-dir>/messages.db. Read-only commands pass mustExist so they
 * don't create an empty data directory as a side effect.
 */
export function openStore(dataDir: string, { mustExist = false }: { mustExist?: boolean } = {}): MessageStore {
  if (mustExist && !fs.existsSync(dbPathFor(dataDir))) {
    handleCommandError(
      new ValidationError({ field: '--data-dir', reason: `no messages.db in ${dataDir}, run inboxdb sync first` }),
    )
  }

  const store = errore.tryFn(() => MessageStore.open(dataDir))
  if (store instanceof Error) {
    handleCommandError(new StorePersistError({ what: 'database open', reason: store.message, cause: store }))
  }
  return store
}
