import { getRequestListener } from "@hono/node-server"
import consola from "consola"
import http from "node:http"
import https from "node:https"
import type net from "node:net"

import { createIdler, type Idler } from "../idle/idler"
import { type FetchHandler, withIdleTick } from "../idle/middleware"
import { resolveAddress } from "../listener/address"
import { acquireListener } from "../listener/factory"
import { ServerHandle, type HttpServer } from "./handle"
import type { ServeOptions, TlsMaterial } from "./types"

export function describeAddress(address: net.AddressInfo | string | null): string {
  if (address === null) return "<closed>"
  if (typeof address === "string") return `unix:${address}`
  const host = address.family === "IPv6" ? `[${address.address}]` : address.address
  return `${host}:${address.port}`
}

function createHttpServer(handler: FetchHandler, tls?: TlsMaterial): HttpServer {
  const requestListener = getRequestListener(handler)
  return tls ? https.createServer(tls, requestListener) : http.createServer(requestListener)
}

/**
 * Resolve `address`, bind it, and serve `handler` on it.
 *
 * Socket-activated addresses carrying `idle_timeout` get an idler: every
 * request ticks it, and once it fires the server shuts down gracefully and
 * the handle completes.
 */
export async function serve(
  address: string,
  handler: FetchHandler,
  options: ServeOptions = {},
): Promise<ServerHandle> {
  const spec = resolveAddress(address)
  const listener = await acquireListener(spec, options)

  let idler: Idler | undefined
  let fetch = handler
  if (spec.kind === "sysd" && spec.config.idleTimeoutMs !== undefined) {
    idler = createIdler(spec.config.idleTimeoutMs)
    fetch = withIdleTick(idler, handler)
  }

  const handle = new ServerHandle({
    kind: spec.kind,
    listener,
    server: createHttpServer(fetch, options.tls),
    idler,
    shutdownTimeoutMs: options.shutdownTimeoutMs,
  })
  handle.start()

  consola.info(`Serving ${options.tls ? "https" : "http"} on ${describeAddress(handle.address())}`)
  return handle
}

// listenAndServe serves until the server stops, rejecting if it failed
export async function listenAndServe(
  address: string,
  handler: FetchHandler,
  options: ServeOptions = {},
): Promise<void> {
  const handle = await serve(address, handler, options)
  await handle.wait()
}
