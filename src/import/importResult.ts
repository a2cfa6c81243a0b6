export type ImportResult = "success" | "incomplete" | "failure" | "error";

export const ImportResult = {
  SUCCESS: "success",
  INCOMPLETE: "incomplete",
  FAILURE: "failure",
  ERROR: "error"
} as const satisfies Record<string, ImportResult>;

const SEVERITY: Record<ImportResult, number> = {
  success: 0,
  incomplete: 1,
  failure: 2,
  error: 3
};

/** Worse result wins. */
export function combine(left: ImportResult, right: ImportResult): ImportResult {
  return SEVERITY[right] > SEVERITY[left] ? right : left;
}

export function combineAll(results: Iterable<ImportResult>): ImportResult {
  let merged: ImportResult = ImportResult.SUCCESS;
  for (const result of results) {
    merged = combine(merged, result);
  }
  return merged;
}

export function isAtLeast(result: ImportResult, threshold: ImportResult): boolean {
  return SEVERITY[result] >= SEVERITY[threshold];
}
