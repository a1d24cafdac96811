import { ConfigurationError } from "./errors"

const UNIT_MS: Record<string, number> = {
  ns: 1e-6,
  us: 1e-3,
  "µs": 1e-3,
  "μs": 1e-3,
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
}

const SEGMENT = /^(\d+\.?\d*|\.\d+)(ns|us|µs|μs|ms|s|m|h)/

/**
 * Parse a duration literal such as `300ms`, `1.5h` or `2h45m` into
 * milliseconds. Accepts an optional leading sign, and a bare `0`.
 */
export function parseDuration(input: string): number {
  let rest = input
  let sign = 1
  if (rest.startsWith("-") || rest.startsWith("+")) {
    if (rest[0] === "-") sign = -1
    rest = rest.slice(1)
  }

  if (rest === "0") return 0
  if (rest === "") {
    throw new ConfigurationError(`invalid duration ${JSON.stringify(input)}`)
  }

  let total = 0
  while (rest.length > 0) {
    const match = SEGMENT.exec(rest)
    if (!match) {
      const reason = /^(\d+\.?\d*|\.\d+)$/.test(rest) ? "missing unit in" : "invalid"
      throw new ConfigurationError(`${reason} duration ${JSON.stringify(input)}`)
    }
    const [segment, value, unit] = match
    total += Number.parseFloat(value) * UNIT_MS[unit]
    rest = rest.slice(segment.length)
  }

  return sign * total
}

export function formatDuration(ms: number): string {
  if (ms === 0) return "0s"
  if (ms % 3_600_000 === 0) return `${ms / 3_600_000}h`
  if (ms % 60_000 === 0) return `${ms / 60_000}m`
  if (ms % 1000 === 0) return `${ms / 1000}s`
  return `${ms}ms`
}
