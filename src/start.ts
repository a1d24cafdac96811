import { defineCommand } from "citty"
import consola from "consola"

import type { ServerHandle } from "./daemon/handle"
import { serve } from "./daemon/serve"
import { formatDuration, parseDuration } from "./lib/duration"
import { createDemoApp } from "./server"

export const DEFAULT_ADDRESS = ":8080"

export interface RunServerOptions {
  address: string
  shutdownTimeoutMs: number
  jobDurationMs: number
  verbose: boolean
}

export async function runServer(options: RunServerOptions): Promise<ServerHandle> {
  if (options.verbose) {
    consola.level = 5
    consola.info("Verbose logging enabled")
  }

  let handle: ServerHandle | undefined
  const app = createDemoApp({
    idler: () => handle?.idler,
    draining: () => handle?.getState() === "draining",
    jobDurationMs: options.jobDurationMs,
  })

  handle = await serve(options.address, app.fetch, {
    shutdownTimeoutMs: options.shutdownTimeoutMs,
  })
  if (handle.idler) {
    consola.info(`Shutting down after ${formatDuration(handle.idler.timeoutMs)} without requests`)
  }
  return handle
}

// A single owner for signals: the first one drains, a second one exits at once
function installSignalHandlers(handle: ServerHandle): void {
  let signalled = false
  const onSignal = (signal: NodeJS.Signals) => {
    consola.info("Signal received:", signal)
    if (signalled) {
      consola.warn("Second signal received during shutdown: forcing immediate termination")
      process.exit(2)
    }
    signalled = true
    handle.shutdown().catch((err: unknown) => {
      consola.error("Graceful shutdown failed:", err)
      process.exitCode = 1
    })
  }
  process.on("SIGTERM", onSignal)
  process.on("SIGINT", onSignal)
}

export const start = defineCommand({
  meta: {
    name: "serve",
    description: "Serve a small demo app on a TCP, Unix socket or socket-activated address",
  },
  args: {
    address: {
      alias: "a",
      type: "string",
      description:
        "Listen address, e.g. :8080, unix?path=/run/app.sock or sysd?name=app.socket&idle_timeout=30m "
        + `(default: $POLYLISTEN_ADDRESS or ${DEFAULT_ADDRESS})`,
    },
    "shutdown-timeout": {
      type: "string",
      default: "30s",
      description: "How long a graceful shutdown may take",
    },
    "job-duration": {
      type: "string",
      default: "15s",
      description: "How long a job scheduled through POST /job runs",
    },
    verbose: {
      alias: "v",
      type: "boolean",
      default: false,
      description: "Enable verbose logging",
    },
  },
  async run({ args }) {
    const address = args.address ?? process.env.POLYLISTEN_ADDRESS ?? DEFAULT_ADDRESS

    let handle: ServerHandle
    try {
      handle = await runServer({
        address,
        shutdownTimeoutMs: parseDuration(args["shutdown-timeout"]),
        jobDurationMs: parseDuration(args["job-duration"]),
        verbose: args.verbose,
      })
    } catch (error) {
      consola.error("Failed to start server:", error)
      process.exit(1)
    }

    installSignalHandlers(handle)
    try {
      await handle.wait()
      consola.info("Server stopped")
    } catch (error) {
      consola.error("Server failed:", error)
      process.exitCode = 1
    }
  },
})
