import consola from "consola"

import type { SysdConfig, SystemdDescriptor, SystemdEnvironment } from "./types"

import { ConfigurationError, ProtocolMismatchError } from "../lib/errors"

// Descriptors 0-2 are stdio; activated sockets are passed from 3 upwards
export const SD_LISTEN_FDS_START = 3

export const LISTEN_ENV_VARS = ["LISTEN_PID", "LISTEN_FDS", "LISTEN_FDNAMES"] as const

type Outcome<T> = { ok: true; value: T } | { ok: false; error: unknown }

// once caches the first outcome of fn, error included, and replays it forever
export function once<T>(fn: () => T): () => T {
  let outcome: Outcome<T> | null = null
  return () => {
    if (outcome === null) {
      try {
        outcome = { ok: true, value: fn() }
      } catch (error) {
        outcome = { ok: false, error }
      }
    }
    if (!outcome.ok) throw outcome.error
    return outcome.value
  }
}

function parseCount(name: string, raw: string | undefined): number {
  if (raw === undefined || !/^\d+$/.test(raw)) {
    throw new ConfigurationError(`invalid ${name}: ${JSON.stringify(raw ?? "")}`)
  }
  return Number(raw)
}

export function parseSystemdEnvironment(
  env: NodeJS.ProcessEnv = process.env,
): SystemdEnvironment {
  const pid = parseCount("LISTEN_PID", env.LISTEN_PID)
  const fdCount = parseCount("LISTEN_FDS", env.LISTEN_FDS)
  const fdNamesRaw = env.LISTEN_FDNAMES ?? ""
  const fdNames = fdNamesRaw === "" ? [] : fdNamesRaw.split(":")

  consola.debug("Parsed systemd activation environment", { pid, fdCount, fdNames })
  return Object.freeze({ pid, fdCount, fdNames: Object.freeze(fdNames), fdNamesRaw })
}

export function createSystemdEnvironmentLoader(
  env: NodeJS.ProcessEnv = process.env,
): () => SystemdEnvironment {
  return once(() => parseSystemdEnvironment(env))
}

/** Process-wide activation environment, read on first use and never again. */
export const loadSystemdEnvironment = createSystemdEnvironmentLoader()

/**
 * Pick the descriptor `config` asks for out of the activation environment.
 */
export function resolveSystemdDescriptor(
  config: SysdConfig,
  environment: SystemdEnvironment,
  pid: number = process.pid,
): SystemdDescriptor {
  if (config.checkPid && environment.pid !== pid) {
    throw new ProtocolMismatchError(
      `unexpected PID, current: ${pid}, LISTEN_PID: ${environment.pid}`,
    )
  }

  if (config.fdIndex !== undefined) {
    const idx = config.fdIndex
    if (idx < 0 || idx >= environment.fdCount) {
      throw new ProtocolMismatchError(
        `invalid fd index, expected between 0 and ${environment.fdCount - 1}, got: ${idx}`,
      )
    }
    const fd = SD_LISTEN_FDS_START + idx
    return { fd, name: environment.fdNames[idx] ?? `sysdfd_${fd}` }
  }

  if (config.fdName !== undefined) {
    const idx = environment.fdNames.indexOf(config.fdName)
    if (idx === -1) {
      throw new ProtocolMismatchError(
        `fdName not found: ${JSON.stringify(config.fdName)}, LISTEN_FDNAMES: ${JSON.stringify(environment.fdNamesRaw)}`,
      )
    }
    return { fd: SD_LISTEN_FDS_START + idx, name: config.fdName }
  }

  throw new ProtocolMismatchError("neither fdIndex nor fdName set")
}

// Unset the LISTEN_* variables so they are not passed on to child processes
export function unsetSystemdListenVars(env: NodeJS.ProcessEnv = process.env): void {
  for (const name of LISTEN_ENV_VARS) {
    delete env[name]
  }
}
