// ============================================================
// CLI option parsing shared by the scripts
// ============================================================
// `--key value` pairs; a `--flag` followed by another option or
// nothing is stored as 'true'.
// ============================================================

export type CliArgs = Record<string, string>

export function parseCliArgs(argv: readonly string[] = process.argv.slice(2)): CliArgs {
  const opts: CliArgs = {}

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]
    if (!arg.startsWith('--')) continue

    const key = arg.slice(2)
    const next = argv[i + 1]
    if (next !== undefined && !next.startsWith('--')) {
      opts[key] = next
      i++
    } else {
      opts[key] = 'true'
    }
  }

  return opts
}

/** Numeric option; throws on a value that is not a finite number */
export function numberArg(args: CliArgs, key: string): number | undefined {
  const raw = args[key]
  if (raw === undefined) return undefined
  const value = Number(raw)
  if (!Number.isFinite(value)) {
    throw new Error(`--${key} must be a number, got "${raw}"`)
  }
  return value
}
