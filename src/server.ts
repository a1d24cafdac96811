import { Hono } from "hono"
import { logger } from "hono/logger"

import type { Idler } from "./idle/idler"

export interface DemoAppOptions {
  // The idler of the running server, once there is one
  idler: () => Idler | undefined
  // Whether the server is draining; new requests get a 503 meanwhile
  draining: () => boolean
  jobDurationMs?: number
}

export function createDemoApp(options: DemoAppOptions): Hono {
  const app = new Hono()
  const jobDurationMs = options.jobDurationMs ?? 15000

  app.use(logger())

  app.use(async (c, next) => {
    if (options.draining()) {
      return c.text("Server is shutting down", 503)
    }
    await next()
  })

  app.get("/", (c) => c.text("hello\n"))

  // Schedules a background job; the idler won't fire until it is done
  app.post("/job", (c) => {
    const idler = options.idler()
    idler?.enter()
    setTimeout(() => {
      idler?.exit()
    }, jobDurationMs)
    return c.json({ scheduled: true, durationMs: jobDurationMs }, 202)
  })

  return app
}
