// Runtime configuration for inboxdb.
// Everything comes from INBOXDB_* environment variables, validated with zod.
// Each setting has a default except the OAuth client pair, which may instead
// come from a Google credentials.json (see auth.ts).

import { z } from 'zod'
import { ValidationError } from './api-utils.js'

const envSchema = z.object({
  INBOXDB_CLIENT_ID: z.string().min(1).optional(),
  INBOXDB_CLIENT_SECRET: z.string().min(1).optional(),
  INBOXDB_CREDENTIALS_FILE: z.string().min(1).optional(),
  INBOXDB_REDIRECT_PORT: z.coerce.number().int().min(1).max(65535).default(8089),
  INBOXDB_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  INBOXDB_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(5),
  INBOXDB_RETRY_DELAY_MS: z.coerce.number().int().nonnegative().default(1_000),
  // Gmail caps messages.list at 500 per page
  INBOXDB_PAGE_SIZE: z.coerce.number().int().min(1).max(500).default(500),
})

export interface Config {
  clientId?: string
  clientSecret?: string
  credentialsFile?: string
  redirectPort: number
  requestTimeoutMs: number
  maxAttempts: number
  retryDelayMs: number
  pageSize: number
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config | ValidationError {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    return new ValidationError({
      field: issue?.path.join('.') || 'environment',
      reason: issue?.message ?? 'unknown',
    })
  }

  const e = parsed.data
  return {
    clientId: e.INBOXDB_CLIENT_ID,
    clientSecret: e.INBOXDB_CLIENT_SECRET,
    credentialsFile: e.INBOXDB_CREDENTIALS_FILE,
    redirectPort: e.INBOXDB_REDIRECT_PORT,
    requestTimeoutMs: e.INBOXDB_REQUEST_TIMEOUT_MS,
    maxAttempts: e.INBOXDB_MAX_ATTEMPTS,
    retryDelayMs: e.INBOXDB_RETRY_DELAY_MS,
    pageSize: e.INBOXDB_PAGE_SIZE,
  }
}
