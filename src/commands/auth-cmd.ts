// Auth commands: login, logout.
// One account per data directory; the token is kept in <data-dir>/token.json.

import type { Goke } from 'goke'
import { z } from 'zod'
import { login, logout, tokenPathFor } from '../auth.js'
import * as out from '../output.js'
import { handleCommandError } from '../output.js'
import { requireConfig, requireDataDir } from './context.js'

export function registerAuthCommands(cli: Goke) {
  cli
    .command('login', 'Authenticate with Google (opens browser). On a remote machine, open the printed URL locally and paste back the localhost redirect URL containing the auth code.')
    .option('--data-dir <dataDir>', z.string().describe('Directory to store token.json in'))
    .action(async (options) => {
      const dataDir = requireDataDir(options.dataDir)
      const config = requireConfig()

      const result = await login({ dataDir, config })
      if (result instanceof Error) handleCommandError(result)

      out.success(`Authenticated as ${result.email}`)
      out.hint(`Token saved to ${tokenPathFor(dataDir)}`)
      process.exit(0)
    })

  cli
    .command('logout', 'Remove the stored token for a data directory')
    .option('--data-dir <dataDir>', z.string().describe('Directory holding token.json'))
    .action(async (options) => {
      const dataDir = requireDataDir(options.dataDir)

      if (!logout(dataDir)) {
        out.hint(`No token in ${dataDir}`)
        return
      }
      out.success(`Token removed from ${dataDir}`)
    })
}
