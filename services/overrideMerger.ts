// services/overrideMerger.ts
import type { CanonicalPart, CategoryChoice, CategoryMatch, PartOverrides } from "../types.js";
import { cleanCategoryHint, cleanParameters, derivePartName, normalizePriceBreaks } from "./normalizePart.js";

export interface MergedPart {
  part: CanonicalPart;
  warnings: string[];
}

/**
 * Field-level replacement of the freshly fetched part by operator edits.
 * `name` is always re-derived from the resulting MPN; `supplier` and
 * `supplierCompanyId` identify the source and are never taken from overrides.
 */
export function mergeOverrides(canonical: CanonicalPart, overrides: PartOverrides): MergedPart {
  const warnings: string[] = [];
  const merged: CanonicalPart = {
    ...canonical,
    parameters: [...canonical.parameters],
    priceBreaks: [...canonical.priceBreaks],
    categoryHint: [...canonical.categoryHint]
  };

  if (overrides.description !== undefined) merged.description = overrides.description;
  if (overrides.manufacturer !== undefined) merged.manufacturer = overrides.manufacturer;
  if (overrides.mpn !== undefined) merged.mpn = overrides.mpn;
  if (overrides.supplierSku !== undefined) merged.supplierSku = overrides.supplierSku;
  if (overrides.supplierLink !== undefined) merged.supplierLink = overrides.supplierLink;
  if (overrides.datasheetUrl !== undefined) merged.datasheetUrl = overrides.datasheetUrl;
  if (overrides.imageUrl !== undefined) merged.imageUrl = overrides.imageUrl;
  if (overrides.stock !== undefined) merged.stock = overrides.stock;
  if (overrides.leadTimeWeeks !== undefined) merged.leadTimeWeeks = overrides.leadTimeWeeks;
  if (overrides.categoryHint !== undefined) {
    merged.categoryHint = cleanCategoryHint(overrides.categoryHint);
  }
  if (overrides.parameters !== undefined) {
    merged.parameters = cleanParameters(overrides.parameters);
  }
  if (overrides.priceBreaks !== undefined) {
    const currency = overrides.priceBreaks[0]?.currency ?? canonical.priceBreaks[0]?.currency ?? "";
    const { priceBreaks, dropped } = normalizePriceBreaks(overrides.priceBreaks, currency);
    merged.priceBreaks = priceBreaks;
    if (dropped > 0) {
      warnings.push(
        `Ignored ${dropped} edited price break(s); kept valid ${currency.toUpperCase()} breaks with distinct quantities`
      );
    }
  }

  merged.name = derivePartName(merged.mpn, merged.supplierSku);
  return { part: merged, warnings };
}

/**
 * Operator choice wins over the heuristic match: a category id first,
 * then a non-empty path.
 */
export function chooseCategory(matched: CategoryMatch, overrides: PartOverrides): CategoryChoice | null {
  if (overrides.categoryId !== undefined) {
    return { source: "id", categoryId: overrides.categoryId };
  }
  const explicit = cleanCategoryHint(overrides.categoryPath ?? []);
  if (explicit.length > 0) return { source: "override", path: explicit };
  if (matched && matched.length > 0) return { source: "match", path: matched };
  return null;
}
