import type { MiddlewareHandler } from "hono"

import { globalTick } from "./global"
import type { Idler } from "./idler"

export type FetchHandler = (request: Request) => Response | Promise<Response>

// withIdleTick ticks the idler before handing the request on untouched
export function withIdleTick(idler: Idler, handler: FetchHandler): FetchHandler {
  return (request) => {
    idler.tick()
    return handler(request)
  }
}

export function withGlobalIdleTick(handler: FetchHandler): FetchHandler {
  return (request) => {
    globalTick()
    return handler(request)
  }
}

/**
 * Hono middleware that counts every request as activity, on `idler` or on
 * the process-wide idler when none is given.
 */
export function idleTicker(idler?: Idler): MiddlewareHandler {
  return async (_c, next) => {
    if (idler) {
      idler.tick()
    } else {
      globalTick()
    }
    await next()
  }
}
