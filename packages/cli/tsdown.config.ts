import { defineConfig } from "tsdown";

export default defineConfig({
  entry: {
    index: "./src/index.ts",
  },
  tsconfig: "../../tsconfig.json",
  dts: false,
  format: ["esm"],
  sourcemap: false,
  clean: true,
  outDir: "dist",
  platform: "node",
  target: "node20",
  noExternal: ["@beaconhq/core"],
});
