import type { SettingsInput } from '../config/settings.js'

export type Flags = Record<string, string | boolean>

export const KNOWN_FLAGS = ['category', 'concurrency', 'delay-ms', 'max-attempts', 'help', 'h'] as const

/**
 * `--key value words` joins the value tokens with spaces; a bare `--key`
 * is `true`. Tokens before the first flag are ignored.
 */
export function parseFlags(argv: string[]): Flags {
  const flags: Flags = {}

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i]
    if (!token.startsWith('--') && token !== '-h') {
      continue
    }

    const key = token === '-h' ? 'h' : token.slice(2)
    const valueTokens: string[] = []
    let j = i + 1
    while (j < argv.length && !argv[j].startsWith('-')) {
      valueTokens.push(argv[j])
      j++
    }

    if (valueTokens.length > 0) {
      flags[key] = valueTokens.join(' ')
      i = j - 1
    } else {
      flags[key] = true
    }
  }

  return flags
}

export function unknownFlags(flags: Flags): string[] {
  const known: readonly string[] = KNOWN_FLAGS
  return Object.keys(flags).filter(key => !known.includes(key))
}

/**
 * Numeric flags pass through as NaN when malformed so settings validation
 * reports them.
 */
function asNumber(value: string | boolean | undefined): number | undefined {
  if (value === undefined) {
    return undefined
  }
  return typeof value === 'string' ? Number(value) : Number.NaN
}

function asList(value: string | boolean | undefined): string[] | undefined {
  if (typeof value !== 'string') {
    return undefined
  }
  return value.split(/[\s,]+/).filter(Boolean)
}

export function toSettingsInput(flags: Flags): SettingsInput {
  const input: SettingsInput = {}

  const categories = asList(flags.category)
  if (categories) input.categories = categories

  const concurrency = asNumber(flags.concurrency)
  if (concurrency !== undefined) input.concurrency = concurrency

  const delayMs = asNumber(flags['delay-ms'])
  if (delayMs !== undefined) input.courtesyDelayMs = delayMs

  const maxAttempts = asNumber(flags['max-attempts'])
  if (maxAttempts !== undefined) input.retry = { maxAttempts }

  return input
}
