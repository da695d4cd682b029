const MENTION_SEPARATOR = '@'

/**
 * Lower-cases a command token and drops any `@botname` addressing, so
 * `/Play@some_bot` and `/play` name the same command.
 */
export function normalizeCommandName(token: string): string {
  const trimmed = token.trim()
  const at = trimmed.indexOf(MENTION_SEPARATOR)
  const base = at > 0 ? trimmed.slice(0, at) : trimmed
  return base.toLowerCase()
}

export interface ParsedCommand {
  /** First whitespace-delimited token as typed. */
  token: string
  name: string
  args: string[]
  /** Everything after the command token. */
  rawArgs: string
}

/** Splits message text into a normalized command name and its arguments. */
export function parseCommand(text: string): ParsedCommand {
  const trimmed = text.trim()
  const match = /^(\S+)\s*([\s\S]*)$/.exec(trimmed)
  const token = match?.[1] ?? ''
  const rawArgs = (match?.[2] ?? '').trim()
  return {
    token,
    name: normalizeCommandName(token),
    args: rawArgs ? rawArgs.split(/\s+/) : [],
    rawArgs
  }
}
