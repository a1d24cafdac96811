import { Hono } from "hono"
import { test, expect, beforeEach, afterEach, vi } from "vitest"

import { globalIdler, globalWait } from "../src/idle/global"
import { createIdler } from "../src/idle/idler"
import { idleTicker, withGlobalIdleTick, withIdleTick } from "../src/idle/middleware"
import { useFakeClock } from "./fake-clock"

beforeEach(() => {
  useFakeClock()
})

afterEach(() => {
  vi.useRealTimers()
})

test("withIdleTick ticks before handing the request on", async () => {
  const start = performance.now()
  const idler = createIdler(1000)
  const handler = withIdleTick(idler, (request) => new Response(new URL(request.url).pathname))

  await vi.advanceTimersByTimeAsync(300)
  const response = await handler(new Request("http://localhost/ping"))

  expect(await response.text()).toBe("/ping")
  expect(idler.lastActivity).toBeCloseTo(start + 300)
})

test("idleTicker counts every request on the given idler", async () => {
  const start = performance.now()
  const idler = createIdler(1000)
  const app = new Hono()
  app.use(idleTicker(idler))
  app.get("/", (c) => c.text("ok"))

  await vi.advanceTimersByTimeAsync(250)
  const res = await app.request("/")

  expect(res.status).toBe(200)
  expect(idler.lastActivity).toBeCloseTo(start + 250)

  // Unmatched routes are activity too
  await vi.advanceTimersByTimeAsync(250)
  expect((await app.request("/missing")).status).toBe(404)
  expect(idler.lastActivity).toBeCloseTo(start + 500)
})

test("process-wide variants tick the installed idler", async () => {
  const start = performance.now()
  const waiting = globalWait(1000)
  const handler = withGlobalIdleTick(() => new Response("ok"))
  const app = new Hono()
  app.use(idleTicker())
  app.get("/", (c) => c.text("ok"))

  await vi.advanceTimersByTimeAsync(400)
  await handler(new Request("http://localhost/"))
  expect(globalIdler()?.lastActivity).toBeCloseTo(start + 400)

  await vi.advanceTimersByTimeAsync(400)
  await app.request("/")
  expect(globalIdler()?.lastActivity).toBeCloseTo(start + 800)

  await vi.advanceTimersByTimeAsync(1000)
  await expect(waiting).resolves.toBeUndefined()
})
