import {
  formatMB,
  parseDecision,
  sortBySizeDesc,
  type ArtifactRecord,
  type Logger,
  type Platform,
} from "./lib.js";
import type { AuditStore } from "./store.js";

export type Prompt = (artifact: ArtifactRecord) => Promise<string>;

export type DeletionResult = {
  readonly artifact: ArtifactRecord;
  readonly success: boolean;
  readonly error?: string;
};

export type PruneSummary = {
  readonly reviewed: number;
  readonly protectedCount: number;
  readonly skippedCount: number;
  readonly deletedCount: number;
  readonly freedBytes: number;
  readonly failures: readonly DeletionResult[];
  readonly quit: boolean;
};

export type PruneOptions = {
  readonly store: AuditStore;
  readonly platform: Platform;
  readonly logger: Logger;
  readonly prompt: Prompt;
};

export const PROMPT_QUESTION =
  "Do you want to delete this artifact? (y/n/q to quit): ";

const emptySummary: PruneSummary = {
  reviewed: 0,
  protectedCount: 0,
  skippedCount: 0,
  deletedCount: 0,
  freedBytes: 0,
  failures: [],
  quit: false,
};

const logArtifactDetails = (
  artifact: ArtifactRecord,
  platform: Platform,
  logger: Logger
): void => {
  logger.info("");
  logger.info(`Artifact in repo: ${artifact.repository}`);
  logger.info(`Artifact Name: ${artifact.name}`);
  logger.info(`Size: ${formatMB(artifact.sizeMB)} MB`);
  logger.info(`Created: ${artifact.createdAt}`);
  if (artifact.associatedPr !== undefined) {
    logger.info(`Associated with PR #${artifact.associatedPr}`);
  }
  logger.info(`View artifact: ${platform.artifactsUrl(artifact.repository)}`);
};

const deleteArtifact = async (
  artifact: ArtifactRecord,
  { store, platform, logger }: PruneOptions
): Promise<DeletionResult> => {
  const result = await platform.deleteArtifact(
    artifact.repository,
    artifact.artifactId
  );

  if (!result.ok) {
    logger.warning(
      `❌ Failed to delete artifact ${artifact.name}: ${result.error.message}`
    );
    return { artifact, success: false, error: result.error.message };
  }

  store.remove(artifact.repository, artifact.artifactId);
  logger.info(`✅ Artifact ${artifact.name} deleted.`);
  return { artifact, success: true };
};

/**
 * Walks every collected artifact, largest first, and asks whether to delete
 * it. Artifacts of the latest release are skipped without a prompt; "quit"
 * ends the session before anything else is shown.
 */
export const runPruningSession = async (
  options: PruneOptions
): Promise<PruneSummary> => {
  const { store, platform, logger, prompt } = options;
  const artifacts = sortBySizeDesc(store.artifacts());

  if (artifacts.length === 0) {
    logger.info("No artifacts to review for deletion.");
    return emptySummary;
  }

  logger.info("");
  logger.info("Reviewing artifacts for deletion...");
  logger.info("");

  let reviewed = 0;
  let protectedCount = 0;
  let skippedCount = 0;
  const results: DeletionResult[] = [];

  const summarize = (quit: boolean): PruneSummary => {
    const successful = results.filter((r) => r.success);
    return {
      reviewed,
      protectedCount,
      skippedCount,
      deletedCount: successful.length,
      freedBytes: successful.reduce(
        (sum, r) => sum + r.artifact.sizeBytes,
        0
      ),
      failures: results.filter((r) => !r.success),
      quit,
    };
  };

  for (const artifact of artifacts) {
    if (store.isProtected(artifact.repository, artifact.name)) {
      logger.info(
        `⏭️  Skipping ${artifact.name} in ${artifact.repository} (associated with latest release)`
      );
      protectedCount += 1;
      continue;
    }

    logArtifactDetails(artifact, platform, logger);
    reviewed += 1;

    const decision = parseDecision(await prompt(artifact));
    switch (decision) {
      case "delete":
        results.push(await deleteArtifact(artifact, options));
        break;
      case "quit":
        logger.info("Exiting artifact review.");
        return summarize(true);
      case "skip":
        logger.info(`⏭️  Skipping artifact ${artifact.name}`);
        skippedCount += 1;
        break;
    }
  }

  return summarize(false);
};
