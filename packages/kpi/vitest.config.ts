import { defineProject } from "vitest/config";

export default defineProject({
  test: {
    name: "kpi",
    include: ["src/**/*.test.ts"],
  },
});
