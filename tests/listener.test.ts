import fs from "node:fs"
import type net from "node:net"
import os from "node:os"
import path from "node:path"
import { test, expect, afterEach } from "vitest"

import { ConfigurationError, OSResourceError } from "../src/lib/errors"
import { resolveAddress } from "../src/listener/address"
import { acquireListener, closeListener, splitHostPort } from "../src/listener/factory"

const cleanup: Array<net.Server> = []

afterEach(async () => {
  for (const server of cleanup) {
    await closeListener(server)
  }
  cleanup.length = 0
})

function tmpSocketPath(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "polylisten-"))
  return path.join(dir, "t.sock")
}

async function acquire(address: string): Promise<net.Server> {
  const server = await acquireListener(resolveAddress(address))
  cleanup.push(server)
  return server
}

test("splitHostPort understands the usual address shapes", () => {
  expect(splitHostPort(":8080")).toEqual({ port: 8080 })
  expect(splitHostPort("127.0.0.1:0")).toEqual({ host: "127.0.0.1", port: 0 })
  expect(splitHostPort("[::1]:9000")).toEqual({ host: "::1", port: 9000 })
  expect(splitHostPort(":http")).toEqual({ port: 80 })
  expect(splitHostPort("localhost:https")).toEqual({ host: "localhost", port: 443 })
})

test("splitHostPort rejects malformed addresses", () => {
  expect(() => splitHostPort("localhost")).toThrow("missing port in address")
  expect(() => splitHostPort("::1:80")).toThrow("too many colons in address")
  expect(() => splitHostPort("[::1:80")).toThrow(ConfigurationError)
  expect(() => splitHostPort(":99999")).toThrow("invalid port 99999")
  expect(() => splitHostPort(":toString")).toThrow('unknown port "toString"')
})

test("splitHostPort treats an empty port as ephemeral", () => {
  expect(splitHostPort("localhost:")).toEqual({ host: "localhost", port: 0 })
  expect(splitHostPort(":")).toEqual({ port: 0 })
  expect(splitHostPort("[::1]:")).toEqual({ host: "::1", port: 0 })
})

test("tcp with an empty port binds an ephemeral port", async () => {
  const server = await acquire("127.0.0.1:")

  const address = server.address()
  if (address === null || typeof address === "string") throw new Error("expected a TCP address")
  expect(address.address).toBe("127.0.0.1")
  expect(address.port).toBeGreaterThan(0)
})

test("tcp :0 binds an ephemeral port", async () => {
  const server = await acquire(":0")

  const address = server.address()
  expect(address).not.toBeNull()
  expect(typeof address).toBe("object")
  if (address !== null && typeof address === "object") {
    expect(address.port).toBeGreaterThan(0)
  }
})

test("tcp bind failure is an OS resource error", async () => {
  const first = await acquire("127.0.0.1:0")
  const address = first.address()
  if (address === null || typeof address === "string") throw new Error("expected a TCP address")

  await expect(acquire(`127.0.0.1:${address.port}`)).rejects.toMatchObject({
    name: "OSResourceError",
    code: "EADDRINUSE",
  })
})

test("unix socket is created with the default mode", async () => {
  const socketPath = tmpSocketPath()
  const server = await acquire(`unix?path=${socketPath}`)

  expect(server.address()).toBe(socketPath)
  const stat = fs.statSync(socketPath)
  expect(stat.isSocket()).toBe(true)
  expect(stat.mode & 0o777).toBe(0o666)
})

test("unix socket honours mode", async () => {
  const socketPath = tmpSocketPath()
  await acquire(`unix?path=${socketPath}&mode=600`)

  expect(fs.statSync(socketPath).mode & 0o777).toBe(0o600)
})

test("occupied unix socket path fails without remove_existing", async () => {
  const socketPath = tmpSocketPath()
  await acquire(`unix?path=${socketPath}`)

  const second = acquire(`unix?path=${socketPath}&remove_existing=false`)
  await expect(second).rejects.toThrow(OSResourceError)
  await expect(second).rejects.toMatchObject({ code: "EADDRINUSE" })
})

test("remove_existing replaces a stale file", async () => {
  const socketPath = tmpSocketPath()
  fs.writeFileSync(socketPath, "stale")

  await acquire(`unix?path=${socketPath}`)
  expect(fs.statSync(socketPath).isSocket()).toBe(true)
})

test("removal failures other than a missing file abort", async () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "polylisten-"))
  const file = path.join(dir, "plain")
  fs.writeFileSync(file, "")

  await expect(acquire(`unix?path=${path.join(file, "t.sock")}`)).rejects.toMatchObject({
    name: "OSResourceError",
    code: "ENOTDIR",
  })
})
