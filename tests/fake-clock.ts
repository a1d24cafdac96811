import { vi } from "vitest"

// The idler measures time with performance.now(), so it is faked alongside the timers
export function useFakeClock(): void {
  vi.useFakeTimers({
    toFake: ["setTimeout", "clearTimeout", "setInterval", "clearInterval", "Date", "performance"],
  })
}
