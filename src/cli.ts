#!/usr/bin/env node

// inboxdb: mirror a Gmail mailbox into a local SQLite database.
// Entry point: registers all commands, help, and version.
// Uses goke for command parsing with zod schemas for type-safe options.

import { goke } from 'goke'
import { registerAuthCommands } from './commands/auth-cmd.js'
import { registerSyncCommands } from './commands/sync.js'
import { registerMessageCommands } from './commands/messages.js'

const cli = goke('inboxdb')

// ---------------------------------------------------------------------------
// Register all command modules (auth first so login/logout appear at top of --help)
// ---------------------------------------------------------------------------

registerAuthCommands(cli)
registerSyncCommands(cli)
registerMessageCommands(cli)

// ---------------------------------------------------------------------------
// Help & version
// ---------------------------------------------------------------------------

cli.help()
cli.version('0.1.0')

// ---------------------------------------------------------------------------
// Parse & run
// ---------------------------------------------------------------------------

cli.parse()
