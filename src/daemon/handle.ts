import consola from "consola"
import type http from "node:http"
import type https from "node:https"
import type net from "node:net"

import type { Idler } from "../idle/idler"
import type { AddressKind } from "../listener/types"
import { DEFAULT_SHUTDOWN_TIMEOUT_MS, type LifecycleState } from "./types"

import { errorMessage, ServeError, ShutdownTimeoutError } from "../lib/errors"

export type HttpServer = http.Server | https.Server

export interface ServerHandleInit {
  kind: AddressKind
  listener: net.Server
  server: HttpServer
  idler?: Idler
  shutdownTimeoutMs?: number
}

const DRAIN_POLL_MS = 200

// ServerHandle owns a live listener and the HTTP server fed from it.
// - Lifecycle: created -> serving -> draining -> stopped | failed
// - Accepted sockets are handed to the HTTP server through its "connection" event
// - With an idler, whichever comes first of "listener closed" and "went idle"
//   decides how the server stops
export class ServerHandle {
  readonly kind: AddressKind
  readonly listener: net.Server
  readonly server: HttpServer
  readonly idler?: Idler
  private state: LifecycleState = "created"
  private readonly shutdownTimeoutMs: number
  private readonly sockets = new Set<net.Socket>()
  private activeRequests = 0
  private draining: Promise<void> | null = null
  private completion: Promise<void> | null = null

  constructor(init: ServerHandleInit) {
    this.kind = init.kind
    this.listener = init.listener
    this.server = init.server
    this.idler = init.idler
    this.shutdownTimeoutMs = init.shutdownTimeoutMs ?? DEFAULT_SHUTDOWN_TIMEOUT_MS
  }

  getState(): LifecycleState {
    return this.state
  }

  getActiveRequests(): number {
    return this.activeRequests
  }

  address(): net.AddressInfo | string | null {
    return this.listener.address()
  }

  start(): void {
    if (this.state !== "created") {
      throw new Error(`Cannot start from state ${this.state}`)
    }

    const engine: net.Server = this.server
    engine.on("request", this.onRequest)
    this.listener.on("connection", this.onConnection)
    this.state = "serving"

    const loop = this.serveLoop()
    const idler = this.idler
    this.completion =
      idler ?
        Promise.race([loop, idler.whenIdle.then(() => this.shutdownOnIdle())])
      : loop

    // The watcher outlives the server unless released; a pending idle timer
    // would keep the process alive after shutdown
    void this.completion.then(
      () => {
        idler?.dispose()
        this.state = "stopped"
      },
      (err: unknown) => {
        idler?.dispose()
        this.state = "failed"
        consola.error("Server stopped with error:", err)
      },
    )
  }

  // Resolves when the server stopped after a shutdown, rejects with a
  // ServeError when the serve loop failed
  async wait(): Promise<void> {
    if (this.completion === null) {
      throw new Error(`Cannot wait from state ${this.state}`)
    }
    await this.completion
  }

  /**
   * Stop accepting connections, let in-flight requests finish within
   * `timeoutMs`, then wait for the serve loop. A shutdown error wins over the
   * serve loop's outcome.
   */
  async shutdown(timeoutMs: number = this.shutdownTimeoutMs): Promise<void> {
    const [drained, completed] = await Promise.allSettled([this.drain(timeoutMs), this.wait()])
    if (drained.status === "rejected") throw drained.reason
    if (completed.status === "rejected") throw completed.reason
  }

  private onConnection = (socket: net.Socket): void => {
    if (this.state === "draining") {
      socket.destroy()
      return
    }
    this.sockets.add(socket)
    socket.once("close", () => this.sockets.delete(socket))
    const engine: net.Server = this.server
    engine.emit("connection", socket)
  }

  private onRequest = (_req: http.IncomingMessage, res: http.ServerResponse): void => {
    this.activeRequests += 1
    res.once("close", () => {
      this.activeRequests -= 1
    })
  }

  private serveLoop(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      let failed = false
      this.listener.once("close", () => resolve())
      this.listener.on("error", (err) => {
        if (failed) return
        failed = true
        this.listener.close()
        for (const socket of this.sockets) socket.destroy()
        reject(new ServeError(`serve failed: ${errorMessage(err)}`, { cause: err }))
      })
    })
  }

  private async shutdownOnIdle(): Promise<void> {
    consola.info("Server idle, shutting down")
    await this.drain(this.shutdownTimeoutMs)
  }

  private drain(timeoutMs: number): Promise<void> {
    this.draining ??= this.runDrain(timeoutMs)
    return this.draining
  }

  private async runDrain(timeoutMs: number): Promise<void> {
    if (this.state === "serving") this.state = "draining"
    consola.info("Begin graceful shutdown")

    this.listener.close()
    const deadline = Date.now() + timeoutMs

    for (;;) {
      // Keep-alive sockets with nothing in flight can go right away
      if (this.activeRequests === 0) {
        for (const socket of this.sockets) socket.destroySoon()
      }
      if (this.sockets.size === 0) break

      const left = deadline - Date.now()
      if (left <= 0) {
        const open = this.sockets.size
        consola.warn("Shutdown deadline reached; forcing termination", { open })
        for (const socket of this.sockets) socket.destroy()
        throw new ShutdownTimeoutError(
          `shutdown deadline of ${timeoutMs}ms exceeded with ${open} open connection(s)`,
        )
      }

      consola.debug("Waiting for active requests to finish...", {
        active: this.activeRequests,
      })
      await new Promise((r) => setTimeout(r, Math.min(DRAIN_POLL_MS, left)))
    }

    consola.info("Shutdown complete")
  }
}
