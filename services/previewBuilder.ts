// services/previewBuilder.ts
import type { CanonicalPart, ImportPreview, SupplierId } from "../types.js";
import { CategoryMatchResult, CategoryTree, matchCategory } from "./categoryMatcher.js";
import { ImporterConfig, requireEnabled } from "./config.js";
import { ImporterError, errorMessage } from "./errors.js";
import type { DestinationClient } from "./inventreeService.js";
import { SupplierAdapter, SupplierFetchResult, SupplierRegistry, getAdapter } from "./supplierAdapter.js";

export interface PipelineDeps {
  config: ImporterConfig;
  suppliers: SupplierRegistry;
  destination: DestinationClient;
}

export interface FetchedAndMatched {
  adapter: SupplierAdapter;
  partNumber: string;
  fetched: SupplierFetchResult;
  tree: CategoryTree;
  match: CategoryMatchResult;
  warnings: string[];
}

export function normalizePartNumber(partNumber: string): string {
  const trimmed = partNumber.trim();
  if (!trimmed) {
    throw new ImporterError("InvalidRequest", "Part number is required");
  }
  return trimmed;
}

function partWarnings(part: CanonicalPart, adapter: SupplierAdapter, currency: string): string[] {
  const warnings: string[] = [];
  if (!part.datasheetUrl) warnings.push("No datasheet found");
  if (!part.imageUrl) warnings.push("No image found");
  if (part.priceBreaks.length === 0) {
    warnings.push("No price breaks reported");
  } else if (part.priceBreaks[0].currency !== currency) {
    warnings.push(
      `Prices are reported in ${part.priceBreaks[0].currency}, not ${currency}; no conversion applied`
    );
  }
  if (part.supplierCompanyId === undefined) {
    warnings.push(`No destination company configured for ${adapter.displayName}`);
  }
  return warnings;
}

/**
 * Supplier fetch followed by category matching. Shared by preview and import
 * so an import never trusts catalog data sent back by the client.
 *
 * With `tolerateDestination`, a failed category listing degrades to "no
 * suggestion" instead of failing the call.
 */
export async function fetchAndMatch(
  deps: PipelineDeps,
  supplier: SupplierId,
  rawPartNumber: string,
  options: { tolerateDestination: boolean }
): Promise<FetchedAndMatched> {
  const partNumber = normalizePartNumber(rawPartNumber);
  requireEnabled(deps.config, supplier);
  const adapter = getAdapter(deps.suppliers, supplier);

  const fetched = await adapter.fetch(partNumber);

  const warnings = [...fetched.warnings];
  let tree: CategoryTree;
  try {
    tree = new CategoryTree(await deps.destination.listCategories());
  } catch (err) {
    if (!options.tolerateDestination) throw err;
    console.warn("[importer] category listing failed:", errorMessage(err));
    warnings.push("Destination categories could not be loaded; no category suggested");
    tree = new CategoryTree([]);
  }

  const match = matchCategory(fetched.part.categoryHint, tree);
  warnings.push(...partWarnings(fetched.part, adapter, deps.config.defaultCurrency));
  warnings.push(...match.warnings);

  return { adapter, partNumber, fetched, tree, match, warnings };
}

/** Read-only: never writes to the destination system. */
export async function buildPreview(
  deps: PipelineDeps,
  supplier: SupplierId,
  partNumber: string
): Promise<ImportPreview> {
  const result = await fetchAndMatch(deps, supplier, partNumber, { tolerateDestination: true });

  return {
    supplier,
    supplierName: result.adapter.displayName,
    partNumber: result.partNumber,
    matchCount: result.match.considered,
    supplierResultCount: result.fetched.resultCount,
    part: result.fetched.part,
    matchedCategory: result.match.path,
    warnings: result.warnings
  };
}
