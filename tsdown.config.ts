import { defineConfig } from "tsdown"

export default defineConfig({
  entry: ["src/index.ts", "src/main.ts"],

  format: ["esm"],
  target: "es2022",
  platform: "node",

  dts: true,
  sourcemap: true,
  clean: true,
  removeNodeProtocol: false,
})
