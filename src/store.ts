import {
  calculateTotalSize,
  isReleaseArtifact,
  type ArtifactRecord,
} from "./lib.js";

export type AuditStore = {
  readonly add: (record: ArtifactRecord) => void;
  readonly remove: (repository: string, artifactId: number) => boolean;
  readonly artifacts: () => readonly ArtifactRecord[];
  readonly setRepoTotal: (repository: string, totalMB: number) => void;
  readonly repoTotals: () => ReadonlyMap<string, number>;
  readonly setLatestRelease: (
    repository: string,
    tag: string | undefined
  ) => void;
  readonly hasResolvedRelease: (repository: string) => boolean;
  readonly latestRelease: (repository: string) => string | undefined;
  readonly isProtected: (repository: string, artifactName: string) => boolean;
  readonly globalTotalBytes: () => number;
};

/**
 * In-memory state for one audit run: every retained artifact, the
 * per-repository totals and the latest-release tag cache.
 */
export const createAuditStore = (): AuditStore => {
  const records: ArtifactRecord[] = [];
  const totals = new Map<string, number>();
  // `undefined` marks a repository that was looked up and has no release.
  const releases = new Map<string, string | undefined>();

  return {
    add: (record) => {
      records.push(record);
    },
    remove: (repository, artifactId) => {
      const index = records.findIndex(
        (r) => r.repository === repository && r.artifactId === artifactId
      );
      if (index === -1) {
        return false;
      }
      records.splice(index, 1);
      return true;
    },
    artifacts: () => [...records],
    setRepoTotal: (repository, totalMB) => {
      if (totalMB > 0) {
        totals.set(repository, totalMB);
      }
    },
    repoTotals: () => new Map(totals),
    setLatestRelease: (repository, tag) => {
      releases.set(repository, tag === "" ? undefined : tag);
    },
    hasResolvedRelease: (repository) => releases.has(repository),
    latestRelease: (repository) => releases.get(repository),
    isProtected: (repository, artifactName) =>
      isReleaseArtifact(releases.get(repository), artifactName),
    globalTotalBytes: () => calculateTotalSize(records),
  };
};
