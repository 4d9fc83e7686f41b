export type Flags = Record<string, string | boolean>

/**
 * Parse `--key value`, `--key=value` and bare `--switch` tokens.
 * Consecutive non-flag tokens after a key are joined into one value.
 */
export function parseFlags(argv: string[]): Flags {
  const flags: Flags = {}

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i]
    if (!token.startsWith('--')) {
      continue
    }

    const eq = token.indexOf('=')
    if (eq > 2) {
      flags[token.slice(2, eq)] = token.slice(eq + 1)
      continue
    }

    const key = token.slice(2)
    const valueTokens: string[] = []
    let j = i + 1
    while (j < argv.length && !argv[j].startsWith('--')) {
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

export function asString(value: string | boolean | undefined): string | undefined {
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined
}

export function asPositiveInt(value: string | boolean | undefined): number | undefined {
  if (typeof value !== 'string' || !/^\d+$/.test(value.trim())) {
    return undefined
  }
  const parsed = Number.parseInt(value, 10)
  return parsed > 0 ? parsed : undefined
}
