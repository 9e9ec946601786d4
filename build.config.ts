import { defineBuildConfig } from "unbuild";

export default defineBuildConfig({
  entries: ["./src/index"],
  outDir: "dist",
  clean: true,
  failOnWarn: false,
  declaration: true,
  rollup: {
    emitCJS: true,
    cjsBridge: true,
    esbuild: {
      target: "node20"
    }
  },
  sourcemap: true,
  externals: [
    "@hono/node-server",
    "better-sqlite3",
    "hono",
    "mongodb",
    "pg",
    "zod"
  ]
});
