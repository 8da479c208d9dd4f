import { defineConfig } from "vitest/config";

/** Vitest config for the protocol, serial and storage unit tests. */
export default defineConfig({
  test: {
    // Serial and protocol code runs under plain Node; no DOM needed.
    environment: "node",
    include: ["src/**/*.test.ts"]
  }
});
