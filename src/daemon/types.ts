import type https from "node:https"

import type { AcquireOptions } from "../listener/factory"

export type LifecycleState =
  | "created"
  | "serving"
  | "draining"
  | "stopped"
  | "failed"

export type TlsMaterial = Pick<https.ServerOptions, "key" | "cert" | "ca" | "passphrase">

export interface ServeOptions extends AcquireOptions {
  // Deadline for a graceful shutdown, whether triggered by idleness or by shutdown()
  shutdownTimeoutMs?: number
  // Serve HTTPS with this key/cert instead of plain HTTP
  tls?: TlsMaterial
}

export const DEFAULT_SHUTDOWN_TIMEOUT_MS = 30000
