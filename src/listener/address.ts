import type { AddressSpec, SysdConfig, UnixSocketConfig } from "./types"

import { parseDuration } from "../lib/duration"
import { ConfigurationError, errorMessage, ProtocolMismatchError } from "../lib/errors"

export const DEFAULT_UNIX_SOCKET_CONFIG: UnixSocketConfig = Object.freeze({
  socketPath: "",
  socketMode: 0o666,
  removeExisting: true,
})

export const DEFAULT_SYSD_CONFIG: SysdConfig = Object.freeze({
  checkPid: true,
  unsetEnv: true,
})

type Mutable<T> = { -readonly [K in keyof T]: T[K] }

type Overrides<T> = Partial<Omit<T, "socketPath" | "fdIndex" | "fdName">>

export function unixSocketConfig(
  socketPath: string,
  overrides: Overrides<UnixSocketConfig> = {},
): UnixSocketConfig {
  return Object.freeze({ ...DEFAULT_UNIX_SOCKET_CONFIG, ...overrides, socketPath })
}

export function sysdConfigWithIndex(
  fdIndex: number,
  overrides: Overrides<SysdConfig> = {},
): SysdConfig {
  return Object.freeze({ ...DEFAULT_SYSD_CONFIG, ...overrides, fdIndex })
}

export function sysdConfigWithName(
  fdName: string,
  overrides: Overrides<SysdConfig> = {},
): SysdConfig {
  return Object.freeze({ ...DEFAULT_SYSD_CONFIG, ...overrides, fdName })
}

const TRUE_LITERALS = new Set(["1", "t", "T", "TRUE", "true", "True"])
const FALSE_LITERALS = new Set(["0", "f", "F", "FALSE", "false", "False"])

/**
 * Parse an address into the transport it names.
 *
 * `unix?path=/run/app.sock&mode=660` and `sysd?name=app.socket` select a Unix
 * socket and a socket-activated descriptor; anything else is a TCP address
 * and is passed through untouched.
 */
export function resolveAddress(address: string): AddressSpec {
  const hashAt = address.indexOf("#")
  const withoutFragment = hashAt === -1 ? address : address.slice(0, hashAt)
  const queryAt = withoutFragment.indexOf("?")
  const path = queryAt === -1 ? withoutFragment : withoutFragment.slice(0, queryAt)
  const query = queryAt === -1 ? "" : withoutFragment.slice(queryAt + 1)

  let spec: AddressSpec
  if (path === "unix") {
    spec = { kind: "unix", config: parseUnix(address, query) }
  } else if (path === "sysd") {
    spec = { kind: "sysd", config: parseSysd(query) }
  } else {
    spec = { kind: "tcp", address }
  }
  return Object.freeze(spec)
}

function singleValues(query: string, context: string): Map<string, string> {
  const params = new URLSearchParams(query)
  const values = new Map<string, string>()
  for (const key of new Set(params.keys())) {
    const all = params.getAll(key)
    if (all.length !== 1) {
      throw new ConfigurationError(
        `${context} address error. Multiple ${key} found: ${JSON.stringify(all)}`,
      )
    }
    values.set(key, all[0])
  }
  return values
}

function parseUnix(address: string, query: string): UnixSocketConfig {
  const context = "unix socket"
  const config: Mutable<UnixSocketConfig> = { ...DEFAULT_UNIX_SOCKET_CONFIG }

  for (const [key, value] of singleValues(query, context)) {
    switch (key) {
      case "path":
        config.socketPath = value
        break
      case "mode":
        config.socketMode = parseMode(value, context)
        break
      case "remove_existing":
        config.removeExisting = parseBool(key, value, context)
        break
      default:
        throw badOption(key, value, context)
    }
  }

  if (config.socketPath === "") {
    throw new ConfigurationError(`${context} address error. Missing path; addr: ${address}`)
  }
  return Object.freeze(config)
}

function parseSysd(query: string): SysdConfig {
  const context = "systemd socket fd"
  const config: Mutable<SysdConfig> = { ...DEFAULT_SYSD_CONFIG }

  for (const [key, value] of singleValues(query, context)) {
    switch (key) {
      case "name":
        config.fdName = value
        break
      case "idx":
        config.fdIndex = parseIndex(value, context)
        break
      case "check_pid":
        config.checkPid = parseBool(key, value, context)
        break
      case "unset_env":
        config.unsetEnv = parseBool(key, value, context)
        break
      case "idle_timeout":
        config.idleTimeoutMs = parseIdleTimeout(value, context)
        break
      default:
        throw badOption(key, value, context)
    }
  }

  if ((config.fdIndex === undefined) === (config.fdName === undefined)) {
    throw new ProtocolMismatchError(
      `${context} address error. Exactly one of name and idx has to be set. `
        + `name: ${config.fdName ?? "<unset>"}, idx: ${config.fdIndex ?? "<unset>"}`,
    )
  }
  return Object.freeze(config)
}

function badOption(key: string, value: string, context: string): ConfigurationError {
  return new ConfigurationError(`${context} address error. Bad option; key: ${key}, val: ${value}`)
}

function parseBool(key: string, value: string, context: string): boolean {
  if (TRUE_LITERALS.has(value)) return true
  if (FALSE_LITERALS.has(value)) return false
  throw new ConfigurationError(`${context} address error. Bad ${key}: ${JSON.stringify(value)}`)
}

function parseMode(value: string, context: string): number {
  const digits = value.startsWith("0o") ? value.slice(2) : value
  if (!/^[0-7]{1,4}$/.test(digits)) {
    throw new ConfigurationError(`${context} address error. Bad mode: ${JSON.stringify(value)}`)
  }
  return Number.parseInt(digits, 8)
}

function parseIndex(value: string, context: string): number {
  if (!/^\+?\d+$/.test(value) || !Number.isSafeInteger(Number(value))) {
    throw new ConfigurationError(`${context} address error. Bad idx: ${JSON.stringify(value)}`)
  }
  return Number(value)
}

function parseIdleTimeout(value: string, context: string): number {
  let timeout: number
  try {
    timeout = parseDuration(value)
  } catch (err) {
    throw new ConfigurationError(
      `${context} address error. Bad idle_timeout: ${JSON.stringify(value)}, err: ${errorMessage(err)}`,
      { cause: err },
    )
  }
  if (timeout <= 0) {
    throw new ConfigurationError(
      `${context} address error. idle_timeout must be positive, got ${JSON.stringify(value)}`,
    )
  }
  return timeout
}
