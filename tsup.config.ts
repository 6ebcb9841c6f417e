import { defineConfig } from "tsup";

export default defineConfig({
  entry: {
    "cli/index": "src/cli/index.ts",
  },
  format: ["esm"],
  dts: false,
  sourcemap: true,
  clean: true,
  platform: "node",
  target: "node20",
  external: [
    /^@aws-sdk\//,
    "effect",
    /^@effect\//,
  ],
});
