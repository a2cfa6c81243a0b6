import type { SettledTask } from "../import/workerPool.js";
import { ImportError } from "../utils/errors.js";
import type { Supplier, SupplierSearchResult } from "./types.js";

export type PendingSearch = {
  supplier: Supplier;
  results: Promise<SettledTask<SupplierSearchResult>>;
};

export type SupplierScope = {
  supplierId?: string;
  onlySupplier?: boolean;
};

/**
 * Starts every selected supplier's search right away and hands back the pending
 * results in registration order. The promises never reject; a failed search settles
 * as `rejected`.
 */
export function searchSuppliers(
  suppliers: readonly Supplier[],
  searchTerm: string,
  scope: SupplierScope = {}
): PendingSearch[] {
  return selectSuppliers(suppliers, scope).map((supplier) => ({
    supplier,
    results: settle(() => supplier.search(searchTerm))
  }));
}

/** Waits for every outstanding search, whatever its outcome. */
export async function drainSearches(pending: readonly PendingSearch[]): Promise<void> {
  await Promise.all(pending.map((entry) => entry.results));
}

export function selectSuppliers(suppliers: readonly Supplier[], scope: SupplierScope): Supplier[] {
  if (!scope.supplierId) {
    return [...suppliers];
  }

  const match = suppliers.find((supplier) => supplier.id === scope.supplierId);
  if (!match) {
    throw new ImportError(`supplier '${scope.supplierId}' is not enabled`, "unknown_supplier");
  }
  if (scope.onlySupplier) {
    return [match];
  }
  return [match, ...suppliers.filter((supplier) => supplier !== match)];
}

async function settle<T>(task: () => Promise<T>): Promise<SettledTask<T>> {
  try {
    return { status: "fulfilled", value: await task() };
  } catch (reason) {
    return { status: "rejected", reason };
  }
}
