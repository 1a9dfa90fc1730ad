import { defineConfig, type Options } from "tsup";

const base: Options = {
  format: ["esm"],
  target: "es2022",
  platform: "node",
  splitting: false,
  sourcemap: true,
  outDir: "dist",
  bundle: false,
};

export default defineConfig([
  {
    ...base,
    entry: ["src/index.ts", "src/instantiator/**/*.ts"],
    dts: true,
    clean: true,
  },
  {
    ...base,
    entry: ["src/cli/index.ts"],
    dts: false,
    clean: false,
    outDir: "dist/cli",
  },
]);
