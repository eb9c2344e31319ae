import { defineConfig, type Options } from "tsup";

const ENTRY = { index: "src/index.ts" } as const;

function withCommon(overrides: Options = {}): Options {
  return {
    entry: ENTRY,
    splitting: false,
    sourcemap: true,
    treeshake: true,
    minify: false,
    tsconfig: "tsconfig.build.json",
    target: "es2022",
    ...overrides,
  };
}

export default defineConfig([
  withCommon({
    outDir: "dist/bundle",
    platform: "node",
    format: ["esm", "cjs"],
    clean: true,
    dts: false,
    esbuildOptions(options) {
      options.keepNames = true;
    },
    outExtension({ format }) {
      return { js: format === "cjs" ? ".cjs" : ".mjs" };
    },
  }),
]);
