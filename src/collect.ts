import {
  formatMB,
  normalizeArtifact,
  roundMB,
  toError,
  type ArtifactRecord,
  type Logger,
  type Owner,
  type Platform,
  type RawArtifact,
} from "./lib.js";
import type { AuditStore } from "./store.js";

export type CollectionResult =
  | {
      readonly status: "collected";
      readonly records: readonly ArtifactRecord[];
      readonly totalMB: number;
    }
  | { readonly status: "empty" }
  | { readonly status: "failed"; readonly error: Error };

const listOwnerRepositories = async (
  platform: Platform,
  owner: Owner,
  logger: Logger
): Promise<readonly string[]> => {
  try {
    return await platform.listRepositories(owner);
  } catch (error) {
    logger.warning(
      `⚠️  Could not list repositories for ${owner.login}: ${toError(error).message}`
    );
    return [];
  }
};

/**
 * Yields the user's own repositories, then the repositories of every
 * organization the user belongs to, in listing order.
 */
export async function* enumerateRepositories(
  platform: Platform,
  login: string,
  logger: Logger
): AsyncGenerator<string, void, undefined> {
  logger.info(`📂 Getting personal repositories for ${login}...`);
  yield* await listOwnerRepositories(
    platform,
    { kind: "user", login },
    logger
  );

  logger.info("");
  logger.info("👥 Fetching organizations...");

  let organizations: readonly string[];
  try {
    organizations = await platform.listOrganizations();
  } catch (error) {
    logger.warning(
      `⚠️  Could not list organizations: ${toError(error).message}`
    );
    return;
  }

  for (const org of organizations) {
    logger.info(`📂 Repos in org: ${org}`);
    yield* await listOwnerRepositories(
      platform,
      { kind: "organization", login: org },
      logger
    );
  }
}

export const resolveLatestRelease = async (
  platform: Platform,
  store: AuditStore,
  repository: string,
  logger: Logger
): Promise<string | undefined> => {
  if (store.hasResolvedRelease(repository)) {
    return store.latestRelease(repository);
  }

  let tag: string | undefined;
  try {
    tag = await platform.latestRelease(repository);
  } catch (error) {
    logger.warning(
      `  ⚠️  Could not look up latest release: ${toError(error).message}`
    );
    tag = undefined;
  }

  store.setLatestRelease(repository, tag);
  return store.latestRelease(repository);
};

export const collectArtifacts = async (
  platform: Platform,
  store: AuditStore,
  repository: string
): Promise<CollectionResult> => {
  let rawArtifacts: readonly RawArtifact[];
  try {
    rawArtifacts = await platform.listArtifacts(repository);
  } catch (error) {
    return { status: "failed", error: toError(error) };
  }

  const records: ArtifactRecord[] = [];
  let totalMB = 0;

  for (const raw of rawArtifacts) {
    const record = normalizeArtifact(repository, raw);
    if (record === undefined) {
      continue;
    }
    store.add(record);
    records.push(record);
    totalMB = roundMB(totalMB + record.sizeMB);
  }

  if (records.length === 0) {
    return { status: "empty" };
  }

  store.setRepoTotal(repository, totalMB);
  return { status: "collected", records, totalMB };
};

const logCollection = (result: CollectionResult, logger: Logger): void => {
  switch (result.status) {
    case "collected":
      logger.info(
        `  ${result.records.length} artifact(s), ${formatMB(result.totalMB)} MB`
      );
      return;
    case "empty":
      logger.info("  No artifacts");
      return;
    case "failed":
      logger.warning(`  ❌ Could not list artifacts: ${result.error.message}`);
      return;
  }
};

export const processRepository = async (
  platform: Platform,
  store: AuditStore,
  repository: string,
  logger: Logger
): Promise<CollectionResult> => {
  logger.info(`🔍 Checking ${repository}...`);

  await resolveLatestRelease(platform, store, repository, logger);
  const result = await collectArtifacts(platform, store, repository);
  logCollection(result, logger);

  return result;
};

export const collectAll = async (
  platform: Platform,
  store: AuditStore,
  login: string,
  logger: Logger
): Promise<number> => {
  let processed = 0;
  for await (const repository of enumerateRepositories(
    platform,
    login,
    logger
  )) {
    await processRepository(platform, store, repository, logger);
    processed += 1;
  }
  return processed;
};
