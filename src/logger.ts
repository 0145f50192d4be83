import * as core from "@actions/core";
import type { Env } from "./config.js";
import type { Logger } from "./lib.js";

export type Reporter = Logger & {
  readonly fail: (message: string) => void;
};

/**
 * Output through `@actions/core`. Workflow commands (`::warning::`,
 * `::error::`) are only emitted inside a workflow run; in a terminal the
 * status markers stay plain lines.
 */
export const createReporter = (env: Env = process.env): Reporter => {
  const inWorkflow = env["GITHUB_ACTIONS"] === "true";

  return {
    info: (message) => core.info(message),
    warning: (message) =>
      inWorkflow ? core.warning(message) : core.info(message),
    fail: (message) => {
      if (inWorkflow) {
        core.setFailed(message);
        return;
      }
      core.info(`❌ ${message}`);
      process.exitCode = 1;
    },
  };
};
