export type Result<T, E = Error> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export type Logger = {
  readonly info: (message: string) => void;
  readonly warning: (message: string) => void;
};

export type Owner = {
  readonly kind: "user" | "organization";
  readonly login: string;
};

/**
 * Artifact as the listing API returns it. The size is left loose because
 * records with a missing or malformed size must be dropped, not coerced.
 */
export type RawArtifact = {
  readonly id: number;
  readonly name: string;
  readonly size_in_bytes?: unknown;
  readonly created_at?: string | null;
  readonly pull_request?: number | null;
};

export type ArtifactRecord = {
  readonly repository: string;
  readonly artifactId: number;
  readonly name: string;
  readonly sizeBytes: number;
  readonly sizeMB: number;
  readonly createdAt: string;
  readonly associatedPr?: number;
};

/**
 * Remote services the audit depends on. Every call is awaited before the
 * next one is issued.
 */
export type Platform = {
  readonly currentUser: () => Promise<string>;
  readonly listRepositories: (owner: Owner) => Promise<readonly string[]>;
  readonly listOrganizations: () => Promise<readonly string[]>;
  /** Resolves to `undefined` when the repository has no release. */
  readonly latestRelease: (repository: string) => Promise<string | undefined>;
  readonly listArtifacts: (
    repository: string
  ) => Promise<readonly RawArtifact[]>;
  readonly deleteArtifact: (
    repository: string,
    artifactId: number
  ) => Promise<Result<void>>;
  readonly artifactsUrl: (repository: string) => string;
};

export type Decision = "delete" | "skip" | "quit";

const BYTES_PER_MB = 1024 ** 2;

export const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));

export const roundMB = (mb: number): number => Math.round(mb * 100) / 100;

export const bytesToMB = (bytes: number): number => bytes / BYTES_PER_MB;

export const formatMB = (mb: number): string => mb.toFixed(2);

export const parseSizeBytes = (value: unknown): number | undefined => {
  if (typeof value === "number") {
    return Number.isSafeInteger(value) && value > 0 ? value : undefined;
  }
  if (typeof value === "string" && /^[0-9]+$/.test(value)) {
    const parsed = Number(value);
    return Number.isSafeInteger(parsed) && parsed > 0 ? parsed : undefined;
  }
  return undefined;
};

export const normalizeArtifact = (
  repository: string,
  raw: RawArtifact
): ArtifactRecord | undefined => {
  const sizeBytes = parseSizeBytes(raw.size_in_bytes);
  if (sizeBytes === undefined) {
    return undefined;
  }

  const record: ArtifactRecord = {
    repository,
    artifactId: raw.id,
    name: raw.name,
    sizeBytes,
    sizeMB: roundMB(bytesToMB(sizeBytes)),
    createdAt: raw.created_at ?? "unknown",
  };

  return typeof raw.pull_request === "number"
    ? { ...record, associatedPr: raw.pull_request }
    : record;
};

export const calculateTotalSize = (
  artifacts: readonly ArtifactRecord[]
): number => artifacts.reduce((sum, artifact) => sum + artifact.sizeBytes, 0);

// Heuristic: the tag only has to appear somewhere in the artifact name.
export const isReleaseArtifact = (
  releaseTag: string | undefined,
  artifactName: string
): boolean =>
  releaseTag !== undefined &&
  releaseTag !== "" &&
  artifactName.includes(releaseTag);

export const sortBySizeDesc = (
  artifacts: readonly ArtifactRecord[]
): readonly ArtifactRecord[] =>
  [...artifacts].sort((a, b) => b.sizeMB - a.sizeMB);

export const parseDecision = (answer: string): Decision => {
  switch (answer.trim().toLowerCase()) {
    case "y":
    case "yes":
      return "delete";
    case "q":
    case "quit":
      return "quit";
    default:
      return "skip";
  }
};
