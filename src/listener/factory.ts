import consola from "consola"
import fs from "node:fs/promises"
import net from "node:net"

import type {
  AddressSpec,
  SysdConfig,
  SystemdDescriptor,
  SystemdEnvironment,
  UnixSocketConfig,
} from "./types"

import { ConfigurationError, errorMessage, errnoCode, OSResourceError } from "../lib/errors"
import {
  loadSystemdEnvironment,
  resolveSystemdDescriptor,
  unsetSystemdListenVars,
} from "./systemd"

// Address used when a TCP address is left empty
export const DEFAULT_TCP_ADDRESS = ":http"

const SERVICE_PORTS: Record<string, number> = {
  http: 80,
  https: 443,
  "http-alt": 8080,
}

export interface AcquireOptions {
  // Activation environment loader, the process-wide one by default
  systemdEnvironment?: () => SystemdEnvironment
  // PID that LISTEN_PID has to match, process.pid by default
  pid?: number
  // Environment the LISTEN_* variables are removed from
  env?: NodeJS.ProcessEnv
}

export interface HostPort {
  host?: string
  port: number
}

/**
 * Split `host:port`, `:port` or `[v6]:port`. The port may be a number, empty
 * for an ephemeral port, or one of a few well-known service names.
 */
export function splitHostPort(address: string): HostPort {
  const colon = address.lastIndexOf(":")
  if (colon === -1) {
    throw new ConfigurationError(`address ${address}: missing port in address`)
  }

  let host = address.slice(0, colon)
  const portText = address.slice(colon + 1)

  if (host.startsWith("[")) {
    if (!host.endsWith("]")) {
      throw new ConfigurationError(`address ${address}: missing ']' in address`)
    }
    host = host.slice(1, -1)
  } else if (host.includes(":")) {
    throw new ConfigurationError(`address ${address}: too many colons in address`)
  }

  // An empty port picks an ephemeral one, same as ":0"
  let port: number
  if (portText === "") {
    port = 0
  } else if (/^\d+$/.test(portText)) {
    port = Number(portText)
  } else if (Object.hasOwn(SERVICE_PORTS, portText)) {
    port = SERVICE_PORTS[portText]
  } else {
    throw new ConfigurationError(`address ${address}: unknown port ${JSON.stringify(portText)}`)
  }
  if (port > 65535) {
    throw new ConfigurationError(`address ${address}: invalid port ${port}`)
  }

  return host === "" ? { port } : { host, port }
}

// listenOn resolves once the server is listening, rejects on its first error
function listenOn(server: net.Server, start: (server: net.Server) => void): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const onError = (err: Error) => {
      server.off("listening", onListening)
      reject(err)
    }
    const onListening = () => {
      server.off("error", onError)
      resolve()
    }
    server.once("error", onError)
    server.once("listening", onListening)
    start(server)
  })
}

export function closeListener(server: net.Server): Promise<void> {
  return new Promise<void>((resolve) => {
    if (!server.listening) {
      resolve()
      return
    }
    server.close((err) => {
      if (err) consola.debug("Listener close reported:", err)
      resolve()
    })
  })
}

export async function acquireTcpListener(address: string): Promise<net.Server> {
  const target = address === "" ? DEFAULT_TCP_ADDRESS : address
  const { host, port } = splitHostPort(target)

  const server = net.createServer()
  try {
    await listenOn(server, (s) => s.listen({ host, port }))
  } catch (err) {
    throw new OSResourceError(`listen tcp ${target}: ${errorMessage(err)}`, err)
  }
  return server
}

export async function acquireUnixListener(config: UnixSocketConfig): Promise<net.Server> {
  const { socketPath, socketMode } = config
  if (socketPath === "") {
    throw new ConfigurationError("unix socket path is empty")
  }

  if (config.removeExisting) {
    try {
      await fs.unlink(socketPath)
      consola.debug(`Removed existing file at ${socketPath}`)
    } catch (err) {
      if (errnoCode(err) !== "ENOENT") {
        throw new OSResourceError(`remove ${socketPath}: ${errorMessage(err)}`, err)
      }
    }
  }

  const server = net.createServer()
  try {
    await listenOn(server, (s) => s.listen({ path: socketPath }))
  } catch (err) {
    throw new OSResourceError(`listen unix ${socketPath}: ${errorMessage(err)}`, err)
  }

  try {
    await fs.chmod(socketPath, socketMode)
  } catch (err) {
    await closeListener(server)
    throw new OSResourceError(
      `chmod ${socketPath} to ${socketMode.toString(8)}: ${errorMessage(err)}`,
      err,
    )
  }
  return server
}

// Node exposes no fcntl(), so the descriptor keeps whatever FD_CLOEXEC flag
// the supervisor handed it with.
async function wrapDescriptor({ fd, name }: SystemdDescriptor): Promise<net.Server> {
  const server = net.createServer()
  try {
    await listenOn(server, (s) => s.listen({ fd }))
  } catch (err) {
    throw new OSResourceError(`listen on fd ${fd} (${name}): ${errorMessage(err)}`, err)
  }
  consola.debug(`Listening on activated fd ${fd} (${name})`)
  return server
}

export async function acquireSystemdListener(
  config: SysdConfig,
  options: AcquireOptions = {},
): Promise<net.Server> {
  try {
    const environment = (options.systemdEnvironment ?? loadSystemdEnvironment)()
    const descriptor = resolveSystemdDescriptor(config, environment, options.pid ?? process.pid)
    return await wrapDescriptor(descriptor)
  } finally {
    if (config.unsetEnv) {
      unsetSystemdListenVars(options.env)
    }
  }
}

/**
 * Obtain a listening socket for `spec`. The returned server is bound and
 * listening but has no connection handler of its own.
 */
export function acquireListener(
  spec: AddressSpec,
  options: AcquireOptions = {},
): Promise<net.Server> {
  switch (spec.kind) {
    case "tcp":
      return acquireTcpListener(spec.address)
    case "unix":
      return acquireUnixListener(spec.config)
    case "sysd":
      return acquireSystemdListener(spec.config, options)
  }
}
