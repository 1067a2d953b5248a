/**
 * `--name value...` flags. A flag takes every token up to the next flag;
 * repeating a flag appends. `--name=value` is accepted too. Positional
 * tokens are ignored.
 */

export type Flags = Map<string, string[]>

export function parseFlags(argv: readonly string[]): Flags {
  const flags: Flags = new Map()

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i]
    if (!token.startsWith('--')) {
      continue
    }

    let key = token.slice(2)
    const valueTokens: string[] = []

    const eq = key.indexOf('=')
    if (eq !== -1) {
      valueTokens.push(key.slice(eq + 1))
      key = key.slice(0, eq)
    }

    let j = i + 1
    while (j < argv.length && !argv[j].startsWith('--')) {
      valueTokens.push(argv[j])
      j++
    }
    i = j - 1

    flags.set(key, [...(flags.get(key) ?? []), ...valueTokens])
  }

  return flags
}

export function hasFlag(flags: Flags, name: string): boolean {
  return flags.has(name)
}

/** Value tokens joined with spaces; undefined when absent or bare */
export function flagString(flags: Flags, name: string): string | undefined {
  const tokens = flags.get(name)
  return tokens && tokens.length > 0 ? tokens.join(' ') : undefined
}

/** Every value token given for the flag, split on whitespace */
export function flagList(flags: Flags, name: string): string[] {
  return (flags.get(name) ?? []).flatMap(token => token.split(/\s+/)).filter(Boolean)
}

/**
 * Numeric flag. Unparseable input comes back as NaN so validation can
 * report it instead of silently dropping it.
 */
export function flagNumber(flags: Flags, name: string): number | undefined {
  const value = flagString(flags, name)
  return value === undefined ? undefined : Number(value)
}
