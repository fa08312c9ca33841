// OAuth2 authentication module for inboxdb.
// One account per data directory: the token lives in <data-dir>/token.json
// (mode 0600). Supports login (browser OAuth, installed-app flow), token
// refresh on expiry, and a helper that returns an authenticated GmailClient.
// The OAuth client pair comes from INBOXDB_CLIENT_ID/INBOXDB_CLIENT_SECRET or
// from a Google Cloud credentials.json ("installed" or "web" key).

import http from 'node:http'
import readline from 'node:readline'
import fs from 'node:fs'
import path from 'node:path'
import { OAuth2Client, type Credentials } from 'google-auth-library'
import fkill from 'fkill'
import pc from 'picocolors'
import { z } from 'zod'
import * as errore from 'errore'
import { AuthError, MissingDataError, ParseError, type RemoteError } from './api-utils.js'
import type { Config } from './config.js'
import { prepareDataDir } from './db.js'
import { GmailClient } from './gmail-client.js'

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const TOKEN_FILE = 'token.json'
export const CREDENTIALS_FILE = 'credentials.json'

const SCOPES = ['https://www.googleapis.com/auth/gmail.readonly']

// ---------------------------------------------------------------------------
// Client credentials
// ---------------------------------------------------------------------------

export interface ClientCredentials {
  clientId: string
  clientSecret: string
}

const clientSecretsSchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
})

const credentialsFileSchema = z.object({
  installed: clientSecretsSchema.optional(),
  web: clientSecretsSchema.optional(),
})

/**
 * Resolve the OAuth client pair. Environment variables win; otherwise the first
 * existing file of INBOXDB_CREDENTIALS_FILE, <data-dir>/credentials.json,
 * ./credentials.json is read.
 */
export function loadClientCredentials({
  dataDir,
  config,
  cwd = process.cwd(),
}: {
  dataDir: string
  config: Config
  cwd?: string
}): ClientCredentials | MissingDataError | ParseError {
  if (config.clientId && config.clientSecret) {
    return { clientId: config.clientId, clientSecret: config.clientSecret }
  }

  const candidates = [
    config.credentialsFile,
    path.join(dataDir, CREDENTIALS_FILE),
    path.join(cwd, CREDENTIALS_FILE),
  ].filter((p): p is string => typeof p === 'string')

  const file = candidates.find((p) => fs.existsSync(p))
  if (!file) {
    return new MissingDataError({
      what: 'OAuth client credentials',
      resource: 'INBOXDB_CLIENT_ID/INBOXDB_CLIENT_SECRET or credentials.json',
    })
  }

  const json = errore.tryFn(() => JSON.parse(fs.readFileSync(file, 'utf-8')))
  if (json instanceof Error) return new ParseError({ what: file, reason: json.message })

  const parsed = credentialsFileSchema.safeParse(json)
  if (!parsed.success) {
    return new ParseError({ what: file, reason: parsed.error.issues[0]?.message ?? 'unexpected shape' })
  }

  const secrets = parsed.data.installed ?? parsed.data.web
  if (!secrets) {
    return new ParseError({ what: file, reason: 'expected an "installed" or "web" client' })
  }
  return { clientId: secrets.client_id, clientSecret: secrets.client_secret }
}

// ---------------------------------------------------------------------------
// OAuth2 client factory
// ---------------------------------------------------------------------------

export function createOAuth2Client(credentials: ClientCredentials, redirectPort: number): OAuth2Client {
  return new OAuth2Client({
    clientId: credentials.clientId,
    clientSecret: credentials.clientSecret,
    redirectUri: `http://localhost:${redirectPort}`,
  })
}

// ---------------------------------------------------------------------------
// Token file
// ---------------------------------------------------------------------------

const tokenSchema = z.object({
  access_token: z.string().nullish(),
  refresh_token: z.string().nullish(),
  expiry_date: z.number().nullish(),
  token_type: z.string().nullish(),
  id_token: z.string().nullish(),
  scope: z.string().optional(),
})

export function tokenPathFor(dataDir: string): string {
  return path.join(dataDir, TOKEN_FILE)
}

export function loadToken(dataDir: string): Credentials | AuthError | ParseError {
  const file = tokenPathFor(dataDir)
  if (!fs.existsSync(file)) {
    return new AuthError({ reason: `no token in ${dataDir}` })
  }

  const json = errore.tryFn(() => JSON.parse(fs.readFileSync(file, 'utf-8')))
  if (json instanceof Error) return new ParseError({ what: file, reason: json.message })

  const parsed = tokenSchema.safeParse(json)
  if (!parsed.success) {
    return new ParseError({ what: file, reason: parsed.error.issues[0]?.message ?? 'unexpected shape' })
  }
  return parsed.data
}

export function saveToken(dataDir: string, tokens: Credentials): void {
  prepareDataDir(dataDir)
  const file = tokenPathFor(dataDir)
  fs.writeFileSync(file, JSON.stringify(tokens, null, 2), { mode: 0o600 })
  // writeFileSync only applies mode on create
  fs.chmodSync(file, 0o600)
}

// ---------------------------------------------------------------------------
// Browser OAuth flow
// ---------------------------------------------------------------------------

/** Accept either the full redirect URL or a bare authorization code. */
export function extractCodeFromInput(input: string): string | null {
  const trimmed = input.trim()
  if (!trimmed) return null

  const url = errore.tryFn(() => new URL(trimmed))
  if (!(url instanceof Error)) {
    const code = url.searchParams.get('code')
    if (code) return code
  }

  if (trimmed.length > 10 && !trimmed.includes(' ')) {
    return trimmed
  }

  return null
}

function printConsentInstructions(authUrl: string) {
  process.stderr.write('\n' + pc.bold('inboxdb needs read-only access to your Gmail account.') + '\n\n')
  process.stderr.write('  Open in a browser: ' + pc.cyan(pc.underline(authUrl)) + '\n\n')
  process.stderr.write(pc.dim('  On this machine the consent page redirects back here by itself.') + '\n')
  process.stderr.write(pc.dim('  On a remote machine the redirect page fails to load; paste its address below.') + '\n\n')
}

function replyHtml(res: http.ServerResponse, status: number, text: string) {
  res.writeHead(status, { 'Content-Type': 'text/html; charset=utf-8' })
  res.end(`<p>${text}</p>`)
}

/**
 * Wait for the consent redirect on localhost:<redirectPort>, or for the redirect
 * URL pasted on stdin, whichever arrives first.
 */
async function getAuthCodeFromBrowser(oauth2Client: OAuth2Client, redirectPort: number): Promise<string> {
  const authUrl = oauth2Client.generateAuthUrl({
    access_type: 'offline',
    scope: SCOPES,
    prompt: 'consent',
  })

  // silent: a free port is not an error
  await fkill(`:${redirectPort}`, { force: true, silent: true })
  printConsentInstructions(authUrl)

  return new Promise((resolve, reject) => {
    let settled = false
    let prompt: readline.Interface | null = null

    const server = http.createServer((req, res) => {
      const params = new URL(req.url ?? '/', `http://localhost:${redirectPort}`).searchParams
      const denied = params.get('error')
      const code = params.get('code')

      if (denied) {
        replyHtml(res, 400, `Google returned an error: ${denied}`)
        settle(new AuthError({ reason: `consent denied (${denied})` }))
      } else if (code) {
        replyHtml(res, 200, 'inboxdb is authorized. This tab can be closed.')
        settle(code)
      } else {
        replyHtml(res, 400, 'The redirect carried no authorization code.')
      }
    })

    function settle(outcome: string | Error) {
      if (settled) return
      settled = true
      server.close()
      if (prompt) {
        prompt.close()
        process.stdin.unref()
      }
      if (outcome instanceof Error) reject(outcome)
      else resolve(outcome)
    }

    server.on('error', settle)
    server.listen(redirectPort)

    if (!process.stdin.isTTY) return

    prompt = readline.createInterface({ input: process.stdin, output: process.stderr })
    prompt.question(pc.dim('Redirect URL (leave it to the browser if local): '), (answer) => {
      const code = extractCodeFromInput(answer)
      if (code) {
        settle(code)
        return
      }
      process.stderr.write(pc.yellow('No authorization code in that input; still waiting for the browser.') + '\n')
    })
  })
}

// ---------------------------------------------------------------------------
// Gmail client construction
// ---------------------------------------------------------------------------

function gmailClientFor(auth: OAuth2Client, config: Config): GmailClient {
  return new GmailClient({
    auth,
    timeoutMs: config.requestTimeoutMs,
    maxAttempts: config.maxAttempts,
    retryDelayMs: config.retryDelayMs,
    pageSize: config.pageSize,
  })
}

// ---------------------------------------------------------------------------
// Login: browser OAuth -> token.json
// ---------------------------------------------------------------------------

/**
 * Run the browser OAuth flow and store the token under dataDir.
 * Returns the mailbox address the token belongs to.
 */
export async function login({
  dataDir,
  config,
}: {
  dataDir: string
  config: Config
}): Promise<{ email: string } | MissingDataError | ParseError | RemoteError> {
  const credentials = loadClientCredentials({ dataDir, config })
  if (credentials instanceof Error) return credentials

  const oauth2Client = createOAuth2Client(credentials, config.redirectPort)

  const code = await errore.tryAsync({
    try: () => getAuthCodeFromBrowser(oauth2Client, config.redirectPort),
    catch: (err) => new AuthError({ reason: String(err), cause: err }),
  })
  if (code instanceof Error) return code
  process.stderr.write(pc.dim('Got authorization code, exchanging for tokens...') + '\n')

  const exchanged = await errore.tryAsync({
    try: () => oauth2Client.getToken(code),
    catch: (err) => new AuthError({ reason: String(err), cause: err }),
  })
  if (exchanged instanceof Error) return exchanged
  oauth2Client.setCredentials(exchanged.tokens)

  const profile = await gmailClientFor(oauth2Client, config).getProfile()
  if (profile instanceof Error) return profile

  saveToken(dataDir, exchanged.tokens)
  return { email: profile.emailAddress }
}

// ---------------------------------------------------------------------------
// Logout: remove token.json
// ---------------------------------------------------------------------------

/** Returns false when there was no token to remove. */
export function logout(dataDir: string): boolean {
  const file = tokenPathFor(dataDir)
  if (!fs.existsSync(file)) return false
  fs.rmSync(file)
  return true
}

// ---------------------------------------------------------------------------
// Authenticated clients
// ---------------------------------------------------------------------------

/**
 * Create an authenticated OAuth2Client from the stored token.
 * Refreshes an expired token up front; tokens google-auth-library refreshes
 * later in the run are written back through the 'tokens' event.
 */
export async function authenticate({
  dataDir,
  config,
}: {
  dataDir: string
  config: Config
}): Promise<OAuth2Client | AuthError | MissingDataError | ParseError> {
  const credentials = loadClientCredentials({ dataDir, config })
  if (credentials instanceof Error) return credentials

  const tokens = loadToken(dataDir)
  if (tokens instanceof Error) return tokens

  const oauth2Client = createOAuth2Client(credentials, config.redirectPort)
  oauth2Client.setCredentials(tokens)

  let current: Credentials = tokens

  // Refresh if expired, merging to keep the refresh_token Google omits from refresh responses
  if (tokens.expiry_date && tokens.expiry_date < Date.now()) {
    if (!tokens.refresh_token) {
      return new AuthError({ reason: 'token expired and has no refresh token' })
    }
    process.stderr.write(pc.dim('Token expired, refreshing...') + '\n')
    const refreshed = await errore.tryAsync({
      try: () => oauth2Client.refreshAccessToken(),
      catch: (err) => new AuthError({ reason: String(err), cause: err }),
    })
    if (refreshed instanceof Error) return refreshed

    current = { ...tokens, ...refreshed.credentials }
    oauth2Client.setCredentials(current)
    saveToken(dataDir, current)
  }

  oauth2Client.on('tokens', (next) => {
    current = { ...current, ...next }
    saveToken(dataDir, current)
  })

  return oauth2Client
}

/** Authenticated GmailClient for the account stored under dataDir. */
export async function getClient({
  dataDir,
  config,
}: {
  dataDir: string
  config: Config
}): Promise<GmailClient | AuthError | MissingDataError | ParseError> {
  const auth = await authenticate({ dataDir, config })
  if (auth instanceof Error) return auth
  return gmailClientFor(auth, config)
}
