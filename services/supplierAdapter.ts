// services/supplierAdapter.ts
import type { CanonicalPart, SupplierId } from "../types.js";
import { ImporterError } from "./errors.js";

export interface SupplierFetchResult {
  part: CanonicalPart;
  /** How many parts the supplier returned for the query. */
  resultCount: number;
  warnings: string[];
}

/**
 * Fetches one part by exact part number and returns it in canonical form.
 * Implementations throw ImporterError with kind NotFound, SupplierUnavailable
 * or Misconfigured.
 */
export interface SupplierAdapter {
  readonly id: SupplierId;
  readonly displayName: string;
  fetch(partNumber: string): Promise<SupplierFetchResult>;
}

export type SupplierRegistry = Partial<Record<SupplierId, SupplierAdapter>>;

export function getAdapter(registry: SupplierRegistry, supplier: SupplierId): SupplierAdapter {
  const adapter = registry[supplier];
  if (!adapter) {
    throw new ImporterError("Misconfigured", `Supplier '${supplier}' is not configured`);
  }
  return adapter;
}

/** Prefers an exact SKU or MPN match, else the first candidate. */
export function selectCandidate<T>(
  candidates: T[],
  query: string,
  keys: (candidate: T) => (string | undefined)[]
): T | undefined {
  const q = query.toLowerCase();
  return (
    candidates.find(candidate =>
      keys(candidate).some(key => key !== undefined && key.toLowerCase() === q)
    ) ?? candidates[0]
  );
}
