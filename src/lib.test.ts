import { describe, expect, it } from "vitest";
import {
  bytesToMB,
  calculateTotalSize,
  formatMB,
  isReleaseArtifact,
  normalizeArtifact,
  parseDecision,
  parseSizeBytes,
  roundMB,
  sortBySizeDesc,
  toError,
  type ArtifactRecord,
} from "./lib.js";

const MB = 1024 ** 2;

const createRecord = (
  overrides: Partial<ArtifactRecord> & { artifactId: number; sizeBytes: number }
): ArtifactRecord => ({
  repository: overrides.repository ?? "acme/widgets",
  artifactId: overrides.artifactId,
  name: overrides.name ?? `artifact-${overrides.artifactId}`,
  sizeBytes: overrides.sizeBytes,
  sizeMB: roundMB(bytesToMB(overrides.sizeBytes)),
  createdAt: overrides.createdAt ?? "2024-01-01T00:00:00Z",
});

describe("bytesToMB", () => {
  it("converts bytes to megabytes", () => {
    expect(bytesToMB(0)).toBe(0);
    expect(bytesToMB(MB)).toBe(1);
    expect(bytesToMB(10 * MB)).toBe(10);
    expect(bytesToMB(512 * 1024)).toBe(0.5);
  });
});

describe("formatMB", () => {
  it("formats MB with 2 decimal places", () => {
    expect(formatMB(0)).toBe("0.00");
    expect(formatMB(1.5)).toBe("1.50");
    expect(formatMB(1.234)).toBe("1.23");
  });
});

describe("roundMB", () => {
  it("rounds to 2 decimal places", () => {
    expect(roundMB(1.234)).toBe(1.23);
    expect(roundMB(1.236)).toBe(1.24);
    expect(roundMB(0.1 + 0.2)).toBe(0.3);
  });
});

describe("parseSizeBytes", () => {
  it("accepts positive integers", () => {
    expect(parseSizeBytes(1)).toBe(1);
    expect(parseSizeBytes(10485760)).toBe(10485760);
    expect(parseSizeBytes("2048")).toBe(2048);
  });

  it("rejects zero, negative and malformed sizes", () => {
    expect(parseSizeBytes(0)).toBeUndefined();
    expect(parseSizeBytes(-5)).toBeUndefined();
    expect(parseSizeBytes(1.5)).toBeUndefined();
    expect(parseSizeBytes(Number.NaN)).toBeUndefined();
    expect(parseSizeBytes("0")).toBeUndefined();
    expect(parseSizeBytes("12abc")).toBeUndefined();
    expect(parseSizeBytes("")).toBeUndefined();
    expect(parseSizeBytes(null)).toBeUndefined();
    expect(parseSizeBytes(undefined)).toBeUndefined();
  });
});

describe("normalizeArtifact", () => {
  it("builds a record with size in MB", () => {
    const record = normalizeArtifact("acme/widgets", {
      id: 7,
      name: "build-linux",
      size_in_bytes: 10485760,
      created_at: "2024-05-01T10:00:00Z",
    });

    expect(record).toEqual({
      repository: "acme/widgets",
      artifactId: 7,
      name: "build-linux",
      sizeBytes: 10485760,
      sizeMB: 10,
      createdAt: "2024-05-01T10:00:00Z",
    });
  });

  it("keeps the pull request number when present", () => {
    const record = normalizeArtifact("acme/widgets", {
      id: 8,
      name: "coverage",
      size_in_bytes: 1536 * 1024,
      created_at: "2024-05-01T10:00:00Z",
      pull_request: 42,
    });

    expect(record?.associatedPr).toBe(42);
    expect(record?.sizeMB).toBe(1.5);
  });

  it("uses a placeholder for a missing timestamp", () => {
    const record = normalizeArtifact("acme/widgets", {
      id: 9,
      name: "logs",
      size_in_bytes: 100,
      created_at: null,
    });

    expect(record?.createdAt).toBe("unknown");
    expect(record?.sizeMB).toBe(0);
  });

  it("drops artifacts with an invalid size", () => {
    expect(
      normalizeArtifact("acme/widgets", { id: 1, name: "a", size_in_bytes: 0 })
    ).toBeUndefined();
    expect(
      normalizeArtifact("acme/widgets", { id: 2, name: "b" })
    ).toBeUndefined();
    expect(
      normalizeArtifact("acme/widgets", {
        id: 3,
        name: "c",
        size_in_bytes: "large",
      })
    ).toBeUndefined();
  });
});

describe("calculateTotalSize", () => {
  it("returns 0 for empty array", () => {
    expect(calculateTotalSize([])).toBe(0);
  });

  it("sums exact byte sizes", () => {
    const artifacts = [
      createRecord({ artifactId: 1, sizeBytes: 1 }),
      createRecord({ artifactId: 2, sizeBytes: 5000 }),
      createRecord({ artifactId: 3, sizeBytes: 3 * MB }),
    ];
    expect(calculateTotalSize(artifacts)).toBe(3 * MB + 5001);
  });
});

describe("isReleaseArtifact", () => {
  it("returns false without a release tag", () => {
    expect(isReleaseArtifact(undefined, "build-v2.0.0-linux")).toBe(false);
    expect(isReleaseArtifact("", "build-v2.0.0-linux")).toBe(false);
  });

  it("matches the tag anywhere in the name", () => {
    expect(isReleaseArtifact("v2.0.0", "build-v2.0.0-linux")).toBe(true);
    expect(isReleaseArtifact("v2.0.0", "v2.0.0")).toBe(true);
    expect(isReleaseArtifact("v2.0.0", "build-v2.0.1-linux")).toBe(false);
  });

  it("is case-sensitive", () => {
    expect(isReleaseArtifact("v2.0.0", "BUILD-V2.0.0")).toBe(false);
  });
});

describe("sortBySizeDesc", () => {
  it("sorts artifacts largest first", () => {
    const artifacts = [
      createRecord({ artifactId: 1, sizeBytes: 5 * MB }),
      createRecord({ artifactId: 2, sizeBytes: 50 * MB }),
      createRecord({ artifactId: 3, sizeBytes: 20 * MB }),
    ];

    const sorted = sortBySizeDesc(artifacts);

    expect(sorted.map((a) => a.artifactId)).toEqual([2, 3, 1]);
  });

  it("does not mutate original array", () => {
    const artifacts = [
      createRecord({ artifactId: 1, sizeBytes: MB }),
      createRecord({ artifactId: 2, sizeBytes: 2 * MB }),
    ];

    sortBySizeDesc(artifacts);

    expect(artifacts[0]?.artifactId).toBe(1);
  });
});

describe("parseDecision", () => {
  it("recognizes delete answers", () => {
    expect(parseDecision("y")).toBe("delete");
    expect(parseDecision("YES")).toBe("delete");
    expect(parseDecision(" Yes \n")).toBe("delete");
  });

  it("recognizes quit answers", () => {
    expect(parseDecision("q")).toBe("quit");
    expect(parseDecision("Quit")).toBe("quit");
  });

  it("treats anything else as skip", () => {
    expect(parseDecision("n")).toBe("skip");
    expect(parseDecision("no")).toBe("skip");
    expect(parseDecision("")).toBe("skip");
    expect(parseDecision("yep")).toBe("skip");
  });
});

describe("toError", () => {
  it("keeps Error instances and wraps other values", () => {
    const error = new Error("boom");
    expect(toError(error)).toBe(error);
    expect(toError("nope").message).toBe("nope");
  });
});
