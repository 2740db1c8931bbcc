import { defineConfig } from "vitest/config";

// Threads rather than forks: the fork pool can fail to terminate its child
// processes in some sandboxes.
export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],
    pool: "threads",
  },
});
