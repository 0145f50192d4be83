#!/usr/bin/env node
import { stdin as input, stdout as output } from "node:process";
import { collectAll } from "./collect.js";
import { parseConfig } from "./config.js";
import { createGitHubPlatform } from "./github.js";
import { bytesToMB, formatMB, toError, type Result } from "./lib.js";
import { createReporter } from "./logger.js";
import { runPruningSession, type PruneSummary } from "./prune.js";
import { renderGlobalTotal, renderRepositorySummary } from "./report.js";
import { createAuditStore } from "./store.js";
import { withLinePrompt } from "./terminal.js";

const reporter = createReporter();

const logLines = (lines: readonly string[]): void => {
  lines.forEach((line) => reporter.info(line));
};

const logPruneSummary = (summary: PruneSummary): void => {
  if (summary.reviewed === 0 && summary.protectedCount === 0) {
    return;
  }

  reporter.info("");
  reporter.info("========================================");
  reporter.info("Review Summary:");
  reporter.info("========================================");
  reporter.info(`Artifacts reviewed: ${summary.reviewed}`);
  reporter.info(`Protected (latest release): ${summary.protectedCount}`);
  reporter.info(`Artifacts skipped: ${summary.skippedCount}`);
  reporter.info(`Artifacts deleted: ${summary.deletedCount}`);
  reporter.info(`Space freed: ${formatMB(bytesToMB(summary.freedBytes))} MB`);

  if (summary.failures.length > 0) {
    reporter.warning(`Failed deletions: ${summary.failures.length}`);
  }
  if (summary.quit) {
    reporter.info("Review ended early.");
  }
  reporter.info("========================================");
};

const main = async (): Promise<Result<void>> => {
  reporter.info("Starting artifact audit...");

  const configResult = await parseConfig();
  if (!configResult.ok) {
    return { ok: false, error: configResult.error };
  }

  const platform = createGitHubPlatform({
    token: configResult.value.token,
    logger: reporter,
  });

  let login: string;
  try {
    login = await platform.currentUser();
  } catch (error) {
    return {
      ok: false,
      error: new Error(
        `Not authenticated with GitHub: ${toError(error).message}`
      ),
    };
  }

  reporter.info("Fetching artifact usage for all accessible repositories...");
  reporter.info("");

  const store = createAuditStore();
  await collectAll(platform, store, login, reporter);

  logLines(renderRepositorySummary(store));
  reporter.info(renderGlobalTotal(store));

  const summary = await withLinePrompt(
    (prompt) => runPruningSession({ store, platform, logger: reporter, prompt }),
    { input, output }
  );
  logPruneSummary(summary);

  return { ok: true, value: undefined };
};

main()
  .then((result) => {
    if (!result.ok) {
      reporter.fail(result.error.message);
      process.exit(1);
    }
  })
  .catch((error: unknown) => {
    reporter.fail(`Unexpected error: ${toError(error).message}`);
    process.exit(1);
  });
