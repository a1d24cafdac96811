import { defineConfig } from "vitest/config"

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    environment: "node",
    // Listener tests bind real sockets and mutate process.env
    pool: "forks",
  },
})
