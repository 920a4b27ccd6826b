import type { KnipConfig } from "knip";

const config: KnipConfig = {
  workspaces: {
    ".": {
      entry: ["vitest.config.ts"],
    },
    "packages/proto-builder": {
      entry: ["src/index.ts"],
      project: ["src/**/*.ts"],
    },
  },
  ignore: ["packages/*/dist/**"],
};

export default config;
