import { bytesToMB, formatMB } from "./lib.js";
import type { AuditStore } from "./store.js";

const REPOSITORY_COLUMN_WIDTH = 50;

export const sortRepoTotals = (
  totals: ReadonlyMap<string, number>
): readonly (readonly [string, number])[] =>
  [...totals.entries()].sort(([, a], [, b]) => b - a);

export const renderRepositorySummary = (
  store: AuditStore
): readonly string[] => {
  const totals = store.repoTotals();
  if (totals.size === 0) {
    return ["No artifacts found."];
  }

  return [
    "",
    "Artifact Usage Summary:",
    "",
    ...sortRepoTotals(totals).map(
      ([repository, totalMB]) =>
        `📂 ${repository.padEnd(REPOSITORY_COLUMN_WIDTH)} ${formatMB(totalMB)} MB`
    ),
  ];
};

export const renderGlobalTotal = (store: AuditStore): string =>
  `🧮 Total Storage Used: ${formatMB(bytesToMB(store.globalTotalBytes()))} MB`;
