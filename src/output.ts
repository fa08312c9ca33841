// Terminal output for inboxdb.
// stdout carries YAML only, so `inboxdb status | yq` and similar pipes work;
// progress, warnings and errors go to stderr through picocolors.
// YAML is dumped unfolded (lineWidth Infinity) and only coloured when stdout is a TTY.

import yaml from 'js-yaml'
import pc from 'picocolors'
import { AuthError } from './api-utils.js'

const isTTY = process.stdout.isTTY ?? false

// ---------------------------------------------------------------------------
// YAML output
// ---------------------------------------------------------------------------

/** Dim the keys and tint list dashes; values keep the terminal colour. */
function colorizeYaml(yamlStr: string): string {
  return yamlStr.replace(
    /^(\s*)(- )?([\w_][\w_ ]*?)(:)/gm,
    (_match: string, indent: string, dash: string | undefined, key: string, colon: string) => {
      const prefix = dash ? `${indent}${pc.cyan(dash)}` : indent
      return `${prefix}${pc.dim(key)}${pc.dim(colon)}`
    },
  )
}

/** Print any value as YAML to stdout. */
export function printYaml(data: unknown): void {
  const str = yaml.dump(data, {
    lineWidth: Infinity,
    noRefs: true,
    quotingType: "'",
    sortKeys: false,
  })

  process.stdout.write(isTTY ? colorizeYaml(str) : str)
}

/** `items:` list on stdout; the summary (e.g. a count) goes to stderr. */
export function printList(
  items: Record<string, unknown>[],
  opts?: { summary?: string },
): void {
  printYaml({ items })
  if (opts?.summary) {
    hint(opts.summary)
  }
}

// ---------------------------------------------------------------------------
// Sender formatting
// ---------------------------------------------------------------------------

export function formatSender(sender: { name?: string; email: string }): string {
  if (sender.name && sender.name !== sender.email) {
    return `${sender.name} <${sender.email}>`
  }
  return sender.email
}

// ---------------------------------------------------------------------------
// Stderr hints
// ---------------------------------------------------------------------------

export function hint(msg: string): void {
  process.stderr.write(pc.dim(`# ${msg}`) + '\n')
}

export function success(msg: string): void {
  process.stderr.write(pc.green(msg) + '\n')
}

export function warn(msg: string): void {
  process.stderr.write(pc.yellow(msg) + '\n')
}

export function error(msg: string): void {
  process.stderr.write(pc.red(msg) + '\n')
}

// ---------------------------------------------------------------------------
// Centralized command error handler (errore pattern)
// ---------------------------------------------------------------------------

/** Handle any error value in a command context.
 *  Prints the message to stderr and exits non-zero.
 *  AuthError (directly or as the cause of an aborted sync) gets a login hint. */
export function handleCommandError(err: Error): never {
  error(err.message)
  if (err instanceof AuthError || err.cause instanceof AuthError) {
    hint('Try: inboxdb login --data-dir <path>')
  }
  process.exit(1)
}
