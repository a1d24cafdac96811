import { IdlerAlreadyActiveError } from "../lib/errors"
import { createIdler, type Idler } from "./idler"

// Process-wide idler for simple servers without background jobs. enter()/exit()
// are not exposed here since a job may start before globalWait() is called;
// use createIdler() for those.
let installed: Idler | null = null

/**
 * Wait until no globalTick() happened for `timeoutMs`. Only one caller can
 * install the process-wide idler; later calls reject at once.
 */
export async function globalWait(timeoutMs: number): Promise<void> {
  if (installed !== null) {
    throw new IdlerAlreadyActiveError()
  }
  const idler = createIdler(timeoutMs)
  installed = idler
  await idler.wait()
}

export function globalTick(): void {
  installed?.tick()
}

export function globalIdler(): Idler | null {
  return installed
}
