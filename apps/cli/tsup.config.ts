import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/cli.ts"],
  format: ["esm"],
  dts: false,
  clean: true,
  splitting: false,
  sourcemap: true,
  minify: false,
  target: "es2022",
  outDir: "dist",
  // cli.ts carries its own shebang, which tsup keeps
  skipNodeModulesBundle: true,
  // Workspace packages export TypeScript sources; bundle them in
  noExternal: [/^@bytesize\/.*/],
});
