import consola from "consola"

import { ConfigurationError, IdlerMisuseError } from "../lib/errors"

export interface Idler {
  // Record activity now; the server stays busy until `timeoutMs` after the last tick
  tick: () => void
  // Start of a background job. The idler will not fire while jobs are active
  enter: () => void
  // End of a background job, counted as activity
  exit: () => void
  // Resolves once the idler fired; stays resolved
  wait: () => Promise<void>
  // Stop the watcher without firing, so its timer no longer holds the process open
  dispose: () => void
  // Same promise as wait(), for racing against other events
  readonly whenIdle: Promise<void>
  readonly idle: boolean
  readonly activeJobs: number
  // performance.now() of the last recorded activity
  readonly lastActivity: number
  readonly timeoutMs: number
}

// setTimeout overflows past this and fires after 1ms instead
const MAX_TIMER_DELAY_MS = 2 ** 31 - 1

function oneShot(): { promise: Promise<void>; fire: () => void } {
  let fire = () => {}
  const promise = new Promise<void>((resolve) => {
    fire = resolve
  })
  return { promise, fire }
}

class IdleCoordinator implements Idler {
  readonly whenIdle: Promise<void>
  private readonly fire: () => void
  private lastTick = performance.now()
  private active = 0
  private fired = false
  private disposed = false
  private timer: NodeJS.Timeout | null = null

  constructor(readonly timeoutMs: number) {
    const signal = oneShot()
    this.whenIdle = signal.promise
    this.fire = signal.fire
    this.scheduleCheck(timeoutMs)
  }

  tick = (): void => {
    this.lastTick = performance.now()
  }

  enter = (): void => {
    this.active += 1
  }

  exit = (): void => {
    if (this.active === 0) {
      throw new IdlerMisuseError("idler exit() called without a matching enter()")
    }
    this.tick()
    this.active -= 1
  }

  wait = (): Promise<void> => this.whenIdle

  dispose = (): void => {
    this.disposed = true
    if (this.timer) {
      clearTimeout(this.timer)
      this.timer = null
    }
  }

  get idle(): boolean {
    return this.fired
  }

  get activeJobs(): number {
    return this.active
  }

  get lastActivity(): number {
    return this.lastTick
  }

  // The watcher re-reads state every time it wakes, so ticks and enters made
  // while it slept are picked up without any wake-up call.
  private check = (): void => {
    this.timer = null
    if (this.active !== 0) {
      this.scheduleCheck(this.timeoutMs)
      return
    }

    const remaining = this.lastTick + this.timeoutMs - performance.now()
    if (remaining > 0) {
      this.scheduleCheck(remaining)
      return
    }

    this.fired = true
    consola.debug(`Idle for ${this.timeoutMs}ms, firing idle signal`)
    this.fire()
  }

  // Long timeouts are slept in chunks; check() recomputes from fresh state on every wake
  private scheduleCheck(delay: number): void {
    if (this.disposed) return
    const ms = Math.min(MAX_TIMER_DELAY_MS, Math.max(1, Math.ceil(delay)))
    this.timer = setTimeout(this.check, ms)
  }
}

/**
 * Create an idler that fires once nothing ticked for `timeoutMs` and no
 * background job is active.
 */
export function createIdler(timeoutMs: number): Idler {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    throw new ConfigurationError(`idle timeout must be a positive duration, got ${timeoutMs}`)
  }
  return new IdleCoordinator(timeoutMs)
}
